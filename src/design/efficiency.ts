/**
 * @module design/efficiency
 * @description Delivery efficiency model
 *
 * overall = base * sizeFactor * payloadEfficiency * environmentalEfficiency
 *
 * The size factor is a Gaussian centered at 30 nm: mid-sized vehicles balance
 * diffusion speed against payload capacity, so efficiency is not monotonic in
 * size.
 */

import type {
    EfficiencyResult,
    EnvironmentalFactors,
    PayloadFactors,
    PayloadType,
} from './types';
import { PayloadTypes } from './types';
import { assertValidSize } from './validation';

// ==================== Model Constants ====================

export const BASE_EFFICIENCY = 0.9;

/** Size with peak efficiency (nm) */
export const OPTIMAL_SIZE_NM = 30;

/** Denominator of the size Gaussian, 2σ² with σ = 20 nm */
export const SIZE_FACTOR_SPREAD = 800;

/**
 * Payload factor table
 */
export const PAYLOAD_FACTORS: Readonly<Record<PayloadType, PayloadFactors>> = {
    small_molecules: { weight: 0.1, stability: 0.95, diffusion: 0.9 },
    mRNA: { weight: 0.3, stability: 0.7, diffusion: 0.8 },
    proteins: { weight: 0.5, stability: 0.8, diffusion: 0.7 },
    plasmids: { weight: 0.7, stability: 0.6, diffusion: 0.5 },
};

export const ENVIRONMENTAL_FACTORS: EnvironmentalFactors = {
    phSensitivity: 0.95,
    temperatureStability: 0.9,
    cellularBarriers: 0.85,
    degradationResistance: 0.88,
};

// ==================== Payload Resolution ====================

const PAYLOAD_VALUES: readonly string[] = Object.values(PayloadTypes);

export function isPayloadType(value: unknown): value is PayloadType {
    return typeof value === 'string' && PAYLOAD_VALUES.includes(value);
}

/**
 * Resolve free-form input to a payload type; anything unrecognized is mRNA
 */
export function resolvePayloadType(input: unknown): PayloadType {
    return isPayloadType(input) ? input : PayloadTypes.MRNA;
}

// ==================== Factors ====================

/**
 * exp(-(size - 30)² / 800)
 */
export function sizeFactor(size: number): number {
    return Math.exp(-((size - OPTIMAL_SIZE_NM) ** 2) / SIZE_FACTOR_SPREAD);
}

export function payloadEfficiency(factors: PayloadFactors): number {
    return (1 - factors.weight) * factors.stability * factors.diffusion;
}

export function environmentalEfficiency(factors: EnvironmentalFactors): number {
    const values = [
        factors.phSensitivity,
        factors.temperatureStability,
        factors.cellularBarriers,
        factors.degradationResistance,
    ];
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ==================== Model ====================

/**
 * Compute the overall delivery efficiency and its factor breakdown.
 *
 * @param size - Nanobot size in nm, must be > 0
 * @param payload - Payload type; unrecognized values fall back to mRNA
 * @throws InvalidParameterError when size is not a positive finite number
 *
 * @example
 * ```typescript
 * computeEfficiency(20, 'mRNA').factors.sizeFactor; // exp(-100 / 800) ≈ 0.8825
 * ```
 */
export function computeEfficiency(size: number, payload: PayloadType | string): EfficiencyResult {
    assertValidSize(size);

    const payloadFactors = PAYLOAD_FACTORS[resolvePayloadType(payload)];
    const sf = sizeFactor(size);
    const pe = payloadEfficiency(payloadFactors);
    const ee = environmentalEfficiency(ENVIRONMENTAL_FACTORS);

    return {
        overallEfficiency: BASE_EFFICIENCY * sf * pe * ee,
        payloadEfficiency: pe,
        environmentalEfficiency: ee,
        factors: {
            baseEfficiency: BASE_EFFICIENCY,
            sizeFactor: sf,
            payloadFactors: { ...payloadFactors },
            environmentalFactors: { ...ENVIRONMENTAL_FACTORS },
        },
    };
}
