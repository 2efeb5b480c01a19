/**
 * @module delivery/trials
 * @description Repeated simulations of one design and sweeps over designs
 *
 * Trial i is seeded with `seed + i`, so two designs run with the same seed see
 * the same noise sequence.
 */

import type { NanobotConfig, PayloadType } from '../design/types';
import { designNanobot } from '../design/designer';
import type { Logger } from '../core/logging';
import { computeRunHash } from '../core/repro';
import { InvalidParameterError } from '../core/errors';
import { mean, standardDeviation } from '../models/numeric/statistics';
import { distance, isVector3, type Vector3 } from '../models/numeric/vector';
import type { DeliverySimulationResult } from './types';
import {
    assertValidDeliveryOptions,
    MAX_SEED,
    resolveDeliveryOptions,
    type DeliverySimulationOptions,
} from './config';
import { simulateDelivery } from './simulation';
import { assertValidConfig } from './integrator';

// ==================== Types ====================

/**
 * Options for a batch of trials
 */
export interface DeliveryTrialOptions extends Partial<DeliverySimulationOptions> {
    /** Number of trials (default 20) */
    trials?: number;
    /** Receives step, trial and report entries */
    logger?: Logger;
}

/**
 * Summary over all trials of one design
 */
export interface DeliveryTrialSummary {
    /** Hash of design, target and options */
    runId: string;
    trials: number;
    reachedCount: number;
    reachRate: number;
    meanSuccessRate: number;
    /** Population standard deviation */
    successRateStd: number;
    meanSteps: number;
    results: DeliverySimulationResult[];
}

/**
 * Sweep input: the cross product of sizes and payloads is simulated
 */
export interface DesignSweepInput extends DeliveryTrialOptions {
    sizes: number[];
    payloads: (PayloadType | string)[];
    target: Vector3;
}

export interface DesignSweepEntry {
    size: number;
    payload: PayloadType;
    config: NanobotConfig;
    summary: DeliveryTrialSummary;
}

export const DEFAULT_TRIALS = 20;

// ==================== Trials ====================

/**
 * Simulate one design several times with consecutive seeds
 *
 * @throws InvalidParameterError for a missing config, malformed target,
 * invalid options, a trial count that is not a positive integer, or a seed
 * whose last trial (seed + trials - 1) exceeds MAX_SEED
 */
export function runDeliveryTrials(
    config: NanobotConfig | null | undefined,
    target: Vector3,
    options: DeliveryTrialOptions = {}
): DeliveryTrialSummary {
    assertValidConfig(config);
    if (!isVector3(target)) {
        throw new InvalidParameterError('target', 'target must be a 3-vector of finite numbers', { target });
    }

    const { trials = DEFAULT_TRIALS, logger, ...partial } = options;
    if (!Number.isInteger(trials) || trials < 1) {
        throw new InvalidParameterError('trials', `trials must be a positive integer, got ${trials}`);
    }

    const resolved = resolveDeliveryOptions(partial);
    assertValidDeliveryOptions(resolved);
    if (resolved.seed + trials - 1 > MAX_SEED) {
        throw new InvalidParameterError(
            'seed',
            `seed + trials - 1 must not exceed ${MAX_SEED}, got seed ${resolved.seed} with ${trials} trials`
        );
    }
    const runId = computeRunHash({
        design: { size: config.size, payload: config.payload },
        target,
        options: resolved,
        trials,
    });

    const results: DeliverySimulationResult[] = [];
    for (let trial = 0; trial < trials; trial++) {
        const result = simulateDelivery(config, target, {
            ...resolved,
            seed: resolved.seed + trial,
            logger,
            trial,
        });
        results.push(result);

        logger?.logTrial({
            trial,
            steps: result.steps,
            targetReached: result.targetReached,
            successRate: result.successRate,
            finalDistance: distance(result.path[result.path.length - 1], target),
        });
    }

    const successRates = results.map(r => r.successRate);
    const reachedCount = results.filter(r => r.targetReached).length;
    const summary: DeliveryTrialSummary = {
        runId,
        trials,
        reachedCount,
        reachRate: reachedCount / trials,
        meanSuccessRate: mean(successRates),
        successRateStd: standardDeviation(successRates),
        meanSteps: mean(results.map(r => r.steps)),
        results,
    };

    logger?.logReport({
        runId,
        totalTrials: trials,
        reachedCount,
        reachRate: summary.reachRate,
        meanSuccessRate: summary.meanSuccessRate,
        meanSteps: summary.meanSteps,
        design: {
            size: config.size,
            payload: config.payload,
            mechanism: config.mechanism,
            efficiency: config.efficiency,
        },
    });

    return summary;
}

// ==================== Sweeps ====================

/**
 * Design and simulate every (size, payload) pair, sizes outermost
 */
export function sweepDesigns(input: DesignSweepInput): DesignSweepEntry[] {
    const { sizes, payloads, target, ...trialOptions } = input;

    const entries: DesignSweepEntry[] = [];
    for (const size of sizes) {
        for (const payload of payloads) {
            const config = designNanobot(size, payload);
            entries.push({
                size,
                payload: config.payload,
                config,
                summary: runDeliveryTrials(config, target, trialOptions),
            });
        }
    }
    return entries;
}
