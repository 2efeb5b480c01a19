/**
 * @packageDocumentation
 * @module nanobot-delivery
 *
 * Nanobot design-and-delivery simulation engine.
 *
 * Scores a nanoscale delivery vehicle's expected efficiency from its size and
 * payload, then simulates its stochastic trajectory to a 3-D target and
 * derives trajectory statistics and a success probability. Output structures
 * are plain objects meant for dashboards and protocol generators.
 *
 * ## Modules
 * - `design` - Efficiency model, mechanism selection, design specs
 * - `delivery` - Trajectory integrator, analyzer, success scorer, trials
 * - `core` - Errors, logging, seeded RNG
 * - `numeric` - Vectors and statistics
 *
 * ## Usage Example
 * ```typescript
 * import { designNanobot, simulateDelivery } from 'nanobot-delivery';
 *
 * const bot = designNanobot(20, 'mRNA');
 * const result = simulateDelivery(bot, [1, 1, 1], { seed: 0 });
 * console.log(result.successRate, result.trajectoryAnalysis.pathLinearity);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as design from './src/design';
export * as delivery from './src/delivery';
export * as numeric from './src/models/numeric';

// ==================== Top-level operations ====================

export { designNanobot } from './src/design/designer';
export { simulateDelivery } from './src/delivery/simulation';
export { runDeliveryTrials, sweepDesigns } from './src/delivery/trials';
export { createRng } from './src/core/repro';
export { InvalidParameterError } from './src/core/errors';

export type { NanobotConfig, PayloadType, DeliveryMechanism } from './src/design/types';
export type { DeliverySimulationResult, TrajectoryAnalysis, TrajectoryStep } from './src/delivery/types';

// ==================== Version ====================
export const VERSION = '1.0.0';
