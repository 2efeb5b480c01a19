/**
 * @module delivery/simulation
 * @description Run a delivery simulation end to end
 */

import type { NanobotConfig } from '../design/types';
import type { Logger } from '../core/logging';
import { createRng, type RandomSource } from '../core/repro';
import { InvalidParameterError } from '../core/errors';
import { isVector3, type Vector3 } from '../models/numeric/vector';
import type { DeliverySimulationResult } from './types';
import {
    assertValidDeliveryOptions,
    resolveDeliveryOptions,
    type DeliverySimulationOptions,
} from './config';
import { assertValidConfig, integrateTrajectory } from './integrator';
import { analyzeTrajectory } from './analyzer';
import { scoreDelivery } from './scorer';

/**
 * Options for a single simulation
 */
export interface SimulateDeliveryOptions extends Partial<DeliverySimulationOptions> {
    /** Random source; overrides `seed` when given */
    rng?: RandomSource;
    /** Receives step entries */
    logger?: Logger;
    /** Trial index written to step entries */
    trial?: number;
}

/**
 * Simulate a nanobot travelling from the start point (origin by default) to
 * the target.
 *
 * Reaching the step cap is not an error: the result has
 * `targetReached: false` and `terminalState: 'exhausted'`.
 *
 * @throws InvalidParameterError for a missing config, a malformed target or
 * invalid options
 *
 * @example
 * ```typescript
 * const bot = designNanobot(20, 'mRNA');
 * const result = simulateDelivery(bot, [1, 1, 1], { seed: 0 });
 * ```
 */
export function simulateDelivery(
    config: NanobotConfig | null | undefined,
    target: Vector3,
    options: SimulateDeliveryOptions = {}
): DeliverySimulationResult {
    assertValidConfig(config);
    if (!isVector3(target)) {
        throw new InvalidParameterError('target', 'target must be a 3-vector of finite numbers', { target });
    }

    const { rng, logger, trial, ...partial } = options;
    const resolved = resolveDeliveryOptions(partial);
    assertValidDeliveryOptions(resolved);

    const integration = integrateTrajectory(
        resolved.start,
        target,
        config,
        rng ?? createRng(resolved.seed),
        {
            maxSteps: resolved.maxSteps,
            arrivalThreshold: resolved.arrivalThreshold,
            brownianStd: resolved.brownianStd,
            fluidResistanceCoefficient: resolved.fluidResistanceCoefficient,
            cellularInteractionAmplitude: resolved.cellularInteractionAmplitude,
            logger,
            trial,
        }
    );

    const velocities = integration.records.map(r => r.velocity);
    const environmentalEffects = integration.records.map(r => r.effect);

    return {
        path: integration.path,
        steps: integration.records.length,
        successRate: scoreDelivery(integration.path, target, resolved.start),
        trajectoryAnalysis: analyzeTrajectory(integration.path, velocities, environmentalEffects),
        targetReached: integration.targetReached,
        terminalState: integration.terminalState,
        target: [target[0], target[1], target[2]],
        velocities,
        environmentalEffects,
    };
}
