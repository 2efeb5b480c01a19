/**
 * Core Module Tests
 * Seeded RNG, run hashing, errors and logging
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    SeededRandom,
    createRng,
    computeRunHash,
    ErrorCodes,
    NanobotError,
    InvalidParameterError,
    isNanobotError,
    hasErrorCode,
    wrapError,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    DEFAULT_SCHEMA_VERSION,
    type TrialLogInput,
    type StepLogInput,
} from '../src/core';

// ==================== Seeded Random ====================

describe('SeededRandom', () => {
    it('should repeat its sequence for the same seed', () => {
        const a = createRng(42);
        const b = createRng(42);
        const seqA = Array.from({ length: 20 }, () => a.random());
        const seqB = Array.from({ length: 20 }, () => b.random());

        expect(seqA).toEqual(seqB);
    });

    it('should differ across seeds', () => {
        expect(createRng(1).random()).not.toBe(createRng(2).random());
    });

    it('should produce uniforms in [0, 1)', () => {
        const rng = new SeededRandom(0);
        for (let i = 0; i < 1000; i++) {
            const x = rng.random();
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x).toBeLessThan(1);
        }
    });

    it('should scale uniforms into a range', () => {
        const rng = createRng(9);
        for (let i = 0; i < 100; i++) {
            const x = rng.uniform(-2, 3);
            expect(x).toBeGreaterThanOrEqual(-2);
            expect(x).toBeLessThan(3);
        }
    });

    it('should sample normals with the requested moments', () => {
        const rng = createRng(123);
        const samples = Array.from({ length: 20000 }, () => rng.normal(1, 2));
        const m = samples.reduce((s, x) => s + x, 0) / samples.length;
        const v = samples.reduce((s, x) => s + (x - m) ** 2, 0) / samples.length;

        expect(Math.abs(m - 1)).toBeLessThan(0.1);
        expect(Math.abs(Math.sqrt(v) - 2)).toBeLessThan(0.1);
        expect(samples.every(Number.isFinite)).toBe(true);
    });

    it('should return the mean exactly with zero spread', () => {
        const rng = createRng(0);
        expect(rng.normal(0, 0)).toBe(0);
        expect(rng.normal(3, 0)).toBe(3);
    });

    it('should save and restore state', () => {
        const rng = createRng(5);
        rng.random();
        const saved = rng.getState();
        const next = rng.random();

        rng.setState(saved);
        expect(rng.random()).toBe(next);
    });
});

describe('computeRunHash', () => {
    it('should ignore key order', () => {
        expect(computeRunHash({ a: 1, b: { c: [1, 2], d: 'x' } }))
            .toBe(computeRunHash({ b: { d: 'x', c: [1, 2] }, a: 1 }));
    });

    it('should change with values', () => {
        expect(computeRunHash({ seed: 1 })).not.toBe(computeRunHash({ seed: 2 }));
        expect(computeRunHash([1, 2])).not.toBe(computeRunHash([2, 1]));
    });

    it('should return 32 hex characters', () => {
        expect(computeRunHash({ size: 20 })).toMatch(/^[0-9a-f]{32}$/);
    });
});

// ==================== Errors ====================

describe('Errors', () => {
    it('should carry code and parameter', () => {
        const error = new InvalidParameterError('size', 'bad size', { size: -1 });

        expect(error).toBeInstanceOf(NanobotError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('InvalidParameterError');
        expect(error.code).toBe(ErrorCodes.INVALID_PARAMETER);
        expect(error.parameter).toBe('size');
        expect(error.toJSON()).toMatchObject({
            name: 'InvalidParameterError',
            code: 'INVALID_PARAMETER',
            message: 'bad size',
            details: { size: -1 },
        });
    });

    it('should recognize engine errors and codes', () => {
        const error = new InvalidParameterError('config', 'missing');

        expect(isNanobotError(error)).toBe(true);
        expect(isNanobotError(new Error('x'))).toBe(false);
        expect(hasErrorCode(error, ErrorCodes.INVALID_PARAMETER)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.INTERNAL_ERROR)).toBe(false);
    });

    it('should wrap foreign errors', () => {
        const original = new InvalidParameterError('size', 'kept');
        expect(wrapError(original)).toBe(original);

        const wrapped = wrapError(new RangeError('out of range'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('out of range');

        expect(wrapError('plain').message).toBe('plain');
    });
});

// ==================== Logging ====================

const TRIAL: TrialLogInput = {
    trial: 0,
    steps: 12,
    targetReached: false,
    successRate: 0.42,
    finalDistance: 0.3,
};

describe('MemoryLogger', () => {
    it('should stamp base fields', () => {
        const logger = new MemoryLogger({ task: 'delivery', seed: 7 });
        logger.logTrial(TRIAL);

        expect(logger.trials[0]).toMatchObject({
            logType: 'trial',
            schemaVersion: DEFAULT_SCHEMA_VERSION,
            task: 'delivery',
            seed: 7,
            steps: 12,
        });
        expect(typeof logger.trials[0].timestamp).toBe('number');
    });

    it('should drop step entries when logSteps is false', () => {
        const logger = new MemoryLogger({ task: 'delivery', seed: 0, logSteps: false });
        logger.logStep({ trial: 0, step: 1, position: [0, 0, 0], velocity: 0.1, distanceToTarget: 1 });

        expect(logger.steps).toHaveLength(0);
    });

    it('should export JSONL and clear', () => {
        const logger = new MemoryLogger({ task: 'delivery', seed: 0 });
        logger.logStep({ trial: 0, step: 1, position: [0, 0, 0], velocity: 0.1, distanceToTarget: 1 });
        logger.logTrial(TRIAL);

        const lines = logger.toJSONL().split('\n');
        expect(lines).toHaveLength(2);
        expect(JSON.parse(lines[0]).logType).toBe('step');
        expect(JSON.parse(logger.toJSON()).trials).toHaveLength(1);

        logger.clear();
        expect(logger.getAllLogs()).toHaveLength(0);
    });
});

describe('MultiLogger', () => {
    it('should fan out to every logger', () => {
        const a = new MemoryLogger({ task: 'a', seed: 0 });
        const b = new MemoryLogger({ task: 'b', seed: 0 });
        const multi = new MultiLogger([a, b]);

        multi.logTrial(TRIAL);
        multi.flush();
        multi.close();

        expect(a.trials).toHaveLength(1);
        expect(b.trials[0].task).toBe('b');
    });
});

describe('ConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should print steps only at debug level', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const step: StepLogInput = { trial: 0, step: 1, position: [0, 0, 0], velocity: 0.1, distanceToTarget: 1 };

        new ConsoleLogger('info').logStep(step);
        expect(spy).not.toHaveBeenCalled();

        new ConsoleLogger('debug').logStep(step);
        expect(spy).toHaveBeenCalledWith('[STEP] T0 S1: v=0.1000, d=1.0000');
    });

    it('should print trial summaries at info level', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('console', { task: 'delivery', seed: 0 }).logTrial(TRIAL);
        expect(spy).toHaveBeenCalledWith('[TRIAL] T0: steps=12, success=0.420, reached=false');
    });

    it('should skip steps when logSteps is off, even at debug level', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = createLogger('console', { task: 'delivery', seed: 0, level: 'debug', logSteps: false });

        logger.logStep({ trial: 0, step: 1, position: [0, 0, 0], velocity: 0.1, distanceToTarget: 1 });
        expect(spy).not.toHaveBeenCalled();

        logger.logTrial(TRIAL);
        expect(spy).toHaveBeenCalledTimes(1);
    });

    it('should honor the configured level', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('console', { task: 'delivery', seed: 0, level: 'warn' }).logTrial(TRIAL);
        expect(spy).not.toHaveBeenCalled();
    });

    it('should print task, schema version and seed on reports', () => {
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger({ task: 'sweep', seed: 9, schemaVersion: '2.1.0' });

        logger.logReport({
            runId: 'abcdef0123456789abcdef0123456789',
            totalTrials: 4,
            reachedCount: 2,
            reachRate: 0.5,
            meanSuccessRate: 0.42,
            meanSteps: 10,
            design: {},
        });
        expect(spy).toHaveBeenCalledWith(
            '[REPORT] sweep v2.1.0 seed=9 abcdef01 Trials=4, ReachRate=50.0%, MeanSuccess=0.420'
        );
    });

    it('should create memory loggers', () => {
        expect(createLogger('memory', { task: 'delivery', seed: 0 })).toBeInstanceOf(MemoryLogger);
    });
});
