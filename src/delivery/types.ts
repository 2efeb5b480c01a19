/**
 * Delivery module type definitions
 */

import type { Vector3 } from '../models/numeric/vector';

/**
 * Terminal state of a trajectory
 */
export type TerminalState = 'reached' | 'exhausted';

/**
 * Integrator state machine: traveling -> reached | exhausted
 */
export type IntegratorState = 'traveling' | TerminalState;

/**
 * Environmental contributions recorded for one step
 */
export interface EnvironmentalEffect {
    /** Random displacement drawn this step */
    brownianVector: Vector3;
    /** Velocity loss to the medium (negative) */
    fluidResistance: number;
    /** Scalar applied along the travel direction */
    cellularInteraction: number;
}

/**
 * One integrator iteration
 */
export interface TrajectoryStep {
    /** Position after the step */
    position: Vector3;
    velocity: number;
    effect: EnvironmentalEffect;
}

/**
 * Means of the per-step environmental effects
 */
export interface EnvironmentalImpact {
    /** Mean norm of the brownian vectors */
    brownianIntensity: number;
    resistanceImpact: number;
    cellularInteractionStrength: number;
}

/**
 * Aggregate trajectory statistics
 */
export interface TrajectoryAnalysis {
    totalDistance: number;
    averageVelocity: number;
    /** Population variance */
    velocityVariance: number;
    /** Straight-line distance over traveled distance, 1 = straight */
    pathLinearity: number;
    environmentalImpact: EnvironmentalImpact;
}

/**
 * Raw integrator output
 */
export interface IntegrationResult {
    /** Positions including the start */
    path: Vector3[];
    /** One record per step, records.length === path.length - 1 */
    records: TrajectoryStep[];
    targetReached: boolean;
    terminalState: TerminalState;
}

/**
 * Result handed to presentation and reporting
 */
export interface DeliverySimulationResult {
    /** Positions including the start point, never empty */
    path: Vector3[];
    /** Number of step records (path.length - 1), at most 1000 */
    steps: number;
    /** In [0, 1] */
    successRate: number;
    trajectoryAnalysis: TrajectoryAnalysis;
    targetReached: boolean;
    terminalState: TerminalState;
    target: Vector3;
    /** Per-step scalar velocities */
    velocities: number[];
    /** Per-step environmental effects */
    environmentalEffects: EnvironmentalEffect[];
}
