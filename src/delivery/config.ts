/**
 * @module delivery/config
 * @description Delivery simulation options
 */

import type { DeliveryMechanism } from '../design/types';
import { InvalidParameterError } from '../core/errors';
import { isVector3, type Vector3 } from '../models/numeric/vector';

// ==================== Constants ====================

/**
 * Hard upper bound on integrator steps. Options may lower it, never raise it.
 */
export const MAX_STEP_CAP = 1000;

/** Largest seed; the generator keeps 32 bits of state */
export const MAX_SEED = 0xffffffff;

/**
 * Base speed per step by mechanism, scaled by design efficiency
 */
export const MECHANISM_BASE_VELOCITY: Readonly<Record<DeliveryMechanism, number>> = {
    passive_diffusion: 0.05,
    active_transport: 0.1,
    guided_propulsion: 0.15,
};

// ==================== Options ====================

/**
 * Delivery simulation options
 */
export interface DeliverySimulationOptions {
    /** Start position */
    start: Vector3;
    /** Step cap, integer in [1, MAX_STEP_CAP] */
    maxSteps: number;
    /** Distance below which the target counts as reached */
    arrivalThreshold: number;
    /** Standard deviation of each brownian component */
    brownianStd: number;
    /** Fraction of base velocity lost to the medium */
    fluidResistanceCoefficient: number;
    /** Amplitude of the sinusoidal cellular interaction */
    cellularInteractionAmplitude: number;
    /** Seed for the default random source */
    seed: number;
}

/**
 * Default options
 */
export const DEFAULT_DELIVERY_OPTIONS: Readonly<DeliverySimulationOptions> = {
    start: [0, 0, 0],
    maxSteps: MAX_STEP_CAP,
    arrivalThreshold: 1e-3,
    brownianStd: 0.01,
    fluidResistanceCoefficient: 0.05,
    cellularInteractionAmplitude: 0.02,
    seed: 0,
};

/**
 * Validation result for options
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

/**
 * Merge partial options over the defaults
 */
export function resolveDeliveryOptions(
    partial: Partial<DeliverySimulationOptions> = {}
): DeliverySimulationOptions {
    const start = partial.start ?? DEFAULT_DELIVERY_OPTIONS.start;
    return {
        start: [start[0], start[1], start[2]],
        maxSteps: partial.maxSteps ?? DEFAULT_DELIVERY_OPTIONS.maxSteps,
        arrivalThreshold: partial.arrivalThreshold ?? DEFAULT_DELIVERY_OPTIONS.arrivalThreshold,
        brownianStd: partial.brownianStd ?? DEFAULT_DELIVERY_OPTIONS.brownianStd,
        fluidResistanceCoefficient:
            partial.fluidResistanceCoefficient ?? DEFAULT_DELIVERY_OPTIONS.fluidResistanceCoefficient,
        cellularInteractionAmplitude:
            partial.cellularInteractionAmplitude ?? DEFAULT_DELIVERY_OPTIONS.cellularInteractionAmplitude,
        seed: partial.seed ?? DEFAULT_DELIVERY_OPTIONS.seed,
    };
}

/**
 * Validate resolved options
 */
export function validateDeliveryOptions(options: DeliverySimulationOptions): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isVector3(options.start)) {
        errors.push('start must be a 3-vector of finite numbers');
    }

    if (!Number.isInteger(options.maxSteps) || options.maxSteps < 1 || options.maxSteps > MAX_STEP_CAP) {
        errors.push(`maxSteps must be an integer in [1, ${MAX_STEP_CAP}]`);
    }

    if (!Number.isFinite(options.arrivalThreshold) || options.arrivalThreshold <= 0) {
        errors.push('arrivalThreshold must be a positive finite number');
    }

    if (!Number.isFinite(options.brownianStd) || options.brownianStd < 0) {
        errors.push('brownianStd must be a non-negative finite number');
    }

    if (!Number.isFinite(options.fluidResistanceCoefficient)) {
        errors.push('fluidResistanceCoefficient must be finite');
    }

    if (!Number.isFinite(options.cellularInteractionAmplitude)) {
        errors.push('cellularInteractionAmplitude must be finite');
    }

    if (!Number.isInteger(options.seed) || options.seed < 0 || options.seed > MAX_SEED) {
        errors.push(`seed must be an integer in [0, ${MAX_SEED}]`);
    }

    // Warnings
    if (options.brownianStd === 0) {
        warnings.push('brownianStd is 0: trajectories do not depend on the seed');
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

/**
 * Throw InvalidParameterError unless options are valid
 */
export function assertValidDeliveryOptions(options: DeliverySimulationOptions): void {
    const result = validateDeliveryOptions(options);
    if (!result.valid) {
        throw new InvalidParameterError(
            'options',
            `Invalid delivery options: ${result.errors.join('; ')}`,
            { errors: result.errors }
        );
    }
}
