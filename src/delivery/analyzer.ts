/**
 * @module delivery/analyzer
 * @description Aggregate statistics over a recorded trajectory
 */

import { mean, variance } from '../models/numeric/statistics';
import { distance, magnitude, type Vector3 } from '../models/numeric/vector';
import type { EnvironmentalEffect, EnvironmentalImpact, TrajectoryAnalysis } from './types';

/**
 * Sum of segment lengths
 */
export function pathLength(path: readonly Vector3[]): number {
    let total = 0;
    for (let i = 1; i < path.length; i++) {
        total += distance(path[i], path[i - 1]);
    }
    return total;
}

/**
 * Straight-line distance over traveled distance.
 * 1.0 for paths shorter than two points or with zero traveled distance.
 */
export function pathLinearity(path: readonly Vector3[]): number {
    if (path.length < 2) {
        return 1.0;
    }
    const actual = pathLength(path);
    if (actual === 0) {
        return 1.0;
    }
    return distance(path[path.length - 1], path[0]) / actual;
}

/**
 * Means of the per-step environmental effects; all zero for no effects
 */
export function analyzeEnvironmentalImpact(effects: readonly EnvironmentalEffect[]): EnvironmentalImpact {
    if (effects.length === 0) {
        return { brownianIntensity: 0, resistanceImpact: 0, cellularInteractionStrength: 0 };
    }
    return {
        brownianIntensity: mean(effects.map(e => magnitude(e.brownianVector))),
        resistanceImpact: mean(effects.map(e => e.fluidResistance)),
        cellularInteractionStrength: mean(effects.map(e => e.cellularInteraction)),
    };
}

/**
 * Analyze a trajectory.
 *
 * @param path - Positions including the start
 * @param velocities - Per-step velocities
 * @param effects - Per-step environmental effects
 */
export function analyzeTrajectory(
    path: readonly Vector3[],
    velocities: readonly number[],
    effects: readonly EnvironmentalEffect[]
): TrajectoryAnalysis {
    const environmentalImpact = analyzeEnvironmentalImpact(effects);

    if (path.length < 2) {
        return {
            totalDistance: 0,
            averageVelocity: 0,
            velocityVariance: 0,
            pathLinearity: 1.0,
            environmentalImpact,
        };
    }

    return {
        totalDistance: pathLength(path),
        averageVelocity: mean(velocities),
        velocityVariance: variance(velocities),
        pathLinearity: pathLinearity(path),
        environmentalImpact,
    };
}
