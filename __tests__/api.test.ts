/**
 * Public API Tests
 * The package entry exposes stable names for presentation and reporting layers
 */

import { describe, it, expect } from 'vitest';
import * as lib from '../index';

describe('package entry', () => {
    it('should expose the top-level operations', () => {
        expect(typeof lib.designNanobot).toBe('function');
        expect(typeof lib.simulateDelivery).toBe('function');
        expect(typeof lib.runDeliveryTrials).toBe('function');
        expect(typeof lib.sweepDesigns).toBe('function');
        expect(lib.VERSION).toBe('1.0.0');
    });

    it('should expose module namespaces', () => {
        expect(typeof lib.design.computeEfficiency).toBe('function');
        expect(typeof lib.delivery.TrajectoryIntegrator).toBe('function');
        expect(typeof lib.core.SeededRandom).toBe('function');
        expect(typeof lib.numeric.normalize).toBe('function');
    });

    it('should keep the field names consumers render', () => {
        const bot = lib.designNanobot(20, 'mRNA');
        const result = lib.simulateDelivery(bot, [1, 1, 1], { seed: 0, maxSteps: 5 });

        expect(Object.keys(bot).sort()).toEqual(
            ['designSpecs', 'efficiency', 'efficiencyFactors', 'mechanism', 'payload', 'size']
        );
        expect(Object.keys(result.trajectoryAnalysis).sort()).toEqual(
            ['averageVelocity', 'environmentalImpact', 'pathLinearity', 'totalDistance', 'velocityVariance']
        );
        expect(result).toHaveProperty('path');
        expect(result).toHaveProperty('steps');
        expect(result).toHaveProperty('successRate');
        expect(result).toHaveProperty('targetReached');
    });

    it('should raise InvalidParameterError for the documented bad inputs', () => {
        expect(() => lib.designNanobot(-10, 'mRNA')).toThrow(lib.InvalidParameterError);
        expect(() => lib.simulateDelivery(null, [1, 1, 1])).toThrow(lib.InvalidParameterError);
    });
});
