/**
 * @module delivery/integrator
 * @description Step-wise stochastic trajectory integrator
 *
 * Per step, with d the unit direction to the target (zero at the target):
 *
 *   v        = base + fluidResistance,   fluidResistance = -k * base
 *   movement = d * v + brownian + c * d, c = A * sin(x + y + z)
 *
 * The arrival check runs after every step. Because the brownian term can keep
 * a slow design from converging, the step cap is always enforced.
 */

import type { NanobotConfig } from '../design/types';
import type { Logger } from '../core/logging';
import type { RandomSource } from '../core/repro';
import { InvalidParameterError } from '../core/errors';
import {
    addVectors,
    componentSum,
    distance,
    isVector3,
    normalize,
    scaleVector,
    subtractVectors,
    type Vector3,
} from '../models/numeric/vector';
import type {
    IntegrationResult,
    IntegratorState,
    TerminalState,
    TrajectoryStep,
} from './types';
import {
    assertValidDeliveryOptions,
    DEFAULT_DELIVERY_OPTIONS,
    MECHANISM_BASE_VELOCITY,
    type DeliverySimulationOptions,
} from './config';

/**
 * Integrator tuning; the start point and seed are passed separately
 */
export interface IntegratorOptions extends Omit<DeliverySimulationOptions, 'start' | 'seed'> {
    /** Receives one step entry per iteration */
    logger?: Logger;
    /** Trial index written to step log entries */
    trial?: number;
}

/**
 * Base velocity of a design: mechanism speed scaled by efficiency
 */
export function baseVelocity(config: Pick<NanobotConfig, 'mechanism' | 'efficiency'>): number {
    const mechanismVelocity: number | undefined = MECHANISM_BASE_VELOCITY[config.mechanism];
    if (mechanismVelocity === undefined) {
        throw new InvalidParameterError('config', `Unknown delivery mechanism: ${String(config.mechanism)}`);
    }
    return mechanismVelocity * config.efficiency;
}

/**
 * Throw unless config is a usable NanobotConfig
 */
export function assertValidConfig(config: NanobotConfig | null | undefined): asserts config is NanobotConfig {
    if (config === null || config === undefined) {
        throw new InvalidParameterError('config', 'Invalid nanobot configuration: config is required');
    }
    if (!Number.isFinite(config.efficiency) || config.efficiency < 0 || config.efficiency > 1) {
        throw new InvalidParameterError('config', `Nanobot efficiency must be in [0, 1], got ${config.efficiency}`);
    }
}

/**
 * Stateful trajectory stepper.
 *
 * ```typescript
 * const integrator = new TrajectoryIntegrator([0, 0, 0], [1, 1, 1], bot, createRng(0));
 * while (integrator.state === 'traveling') integrator.step();
 * ```
 */
export class TrajectoryIntegrator {
    private _state: IntegratorState = 'traveling';
    private current: Vector3;
    private readonly _path: Vector3[];
    private readonly _records: TrajectoryStep[] = [];
    private readonly target: Vector3;
    private readonly rng: RandomSource;
    private readonly options: IntegratorOptions;
    private readonly base: number;

    constructor(
        start: Vector3,
        target: Vector3,
        config: NanobotConfig | null | undefined,
        rng: RandomSource,
        options: Partial<IntegratorOptions> = {}
    ) {
        assertValidConfig(config);
        if (!isVector3(start)) {
            throw new InvalidParameterError('start', 'start must be a 3-vector of finite numbers', { start });
        }
        if (!isVector3(target)) {
            throw new InvalidParameterError('target', 'target must be a 3-vector of finite numbers', { target });
        }

        this.options = {
            maxSteps: options.maxSteps ?? DEFAULT_DELIVERY_OPTIONS.maxSteps,
            arrivalThreshold: options.arrivalThreshold ?? DEFAULT_DELIVERY_OPTIONS.arrivalThreshold,
            brownianStd: options.brownianStd ?? DEFAULT_DELIVERY_OPTIONS.brownianStd,
            fluidResistanceCoefficient:
                options.fluidResistanceCoefficient ?? DEFAULT_DELIVERY_OPTIONS.fluidResistanceCoefficient,
            cellularInteractionAmplitude:
                options.cellularInteractionAmplitude ?? DEFAULT_DELIVERY_OPTIONS.cellularInteractionAmplitude,
            logger: options.logger,
            trial: options.trial,
        };
        assertValidDeliveryOptions({ ...this.options, start, seed: 0 });

        this.current = [start[0], start[1], start[2]];
        this._path = [[start[0], start[1], start[2]]];
        this.target = [target[0], target[1], target[2]];
        this.rng = rng;
        this.base = baseVelocity(config);
    }

    get state(): IntegratorState {
        return this._state;
    }

    get position(): Vector3 {
        return [this.current[0], this.current[1], this.current[2]];
    }

    get path(): readonly Vector3[] {
        return this._path;
    }

    get records(): readonly TrajectoryStep[] {
        return this._records;
    }

    get stepCount(): number {
        return this._records.length;
    }

    /**
     * Advance one step.
     * @returns The step record, or null once the integrator is terminal
     */
    step(): TrajectoryStep | null {
        if (this._state !== 'traveling') {
            return null;
        }

        const { brownianStd, fluidResistanceCoefficient, cellularInteractionAmplitude } = this.options;

        const direction = normalize(subtractVectors(this.target, this.current));
        const fluidResistance = -fluidResistanceCoefficient * this.base;
        const velocity = this.base + fluidResistance;
        const brownianVector: Vector3 = [
            this.rng.normal(0, brownianStd),
            this.rng.normal(0, brownianStd),
            this.rng.normal(0, brownianStd),
        ];
        const cellularInteraction = cellularInteractionAmplitude * Math.sin(componentSum(this.current));

        const movement = addVectors(
            addVectors(scaleVector(direction, velocity), brownianVector),
            scaleVector(direction, cellularInteraction)
        );
        this.current = addVectors(this.current, movement);

        const record: TrajectoryStep = {
            position: [this.current[0], this.current[1], this.current[2]],
            velocity,
            effect: { brownianVector, fluidResistance, cellularInteraction },
        };
        this._path.push([this.current[0], this.current[1], this.current[2]]);
        this._records.push(record);

        const distanceToTarget = distance(this.current, this.target);
        this.options.logger?.logStep({
            trial: this.options.trial ?? 0,
            step: this._records.length,
            position: record.position,
            velocity,
            distanceToTarget,
        });

        if (distanceToTarget < this.options.arrivalThreshold) {
            this._state = 'reached';
        } else if (this._records.length >= this.options.maxSteps) {
            this._state = 'exhausted';
        }

        return record;
    }

    /**
     * Step until reached or exhausted
     */
    run(): IntegrationResult {
        while (this._state === 'traveling') {
            this.step();
        }
        return this.result();
    }

    private result(): IntegrationResult {
        const terminalState: TerminalState = this._state === 'reached' ? 'reached' : 'exhausted';
        return {
            path: [...this._path],
            records: [...this._records],
            targetReached: terminalState === 'reached',
            terminalState,
        };
    }
}

/**
 * Integrate a full trajectory from start to target
 */
export function integrateTrajectory(
    start: Vector3,
    target: Vector3,
    config: NanobotConfig | null | undefined,
    rng: RandomSource,
    options: Partial<IntegratorOptions> = {}
): IntegrationResult {
    return new TrajectoryIntegrator(start, target, config, rng, options).run();
}
