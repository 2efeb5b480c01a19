/**
 * @module delivery
 * @description Delivery simulation: integrator, trajectory analytics, success scoring
 *
 * Flow: NanobotConfig + target -> integrator -> path and step records ->
 * analyzer and scorer -> DeliverySimulationResult.
 */

export * from './types';
export * from './config';
export * from './integrator';
export * from './analyzer';
export * from './scorer';
export * from './simulation';
export * from './trials';
