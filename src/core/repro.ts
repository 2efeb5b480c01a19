/**
 * @module core/repro
 * @description Reproducibility primitives
 *
 * Seeded random generation for the trajectory integrator and a canonical hash
 * for identifying a (design, target, options) combination across runs.
 */

// ==================== Browser-compatible Hash ====================

/**
 * djb2 variant, works in both browser and Node.js
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

function createHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

/**
 * Compute a 32-character hex hash of any JSON-compatible value.
 *
 * Object keys are sorted recursively, so two values that differ only in key
 * order hash identically.
 */
export function computeRunHash(value: unknown): string {
    return createHash(JSON.stringify(sortObjectKeys(value)));
}

// ==================== Random Source ====================

/**
 * Minimal random source consumed by the simulation.
 *
 * Anything that can produce standard uniforms and normals can drive the
 * integrator; `SeededRandom` is the default.
 */
export interface RandomSource {
    /** Uniform float in [0, 1) */
    random(): number;
    /** Sample from N(mean, std²) */
    normal(mean?: number, std?: number): number;
}

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Generate a random sample from a normal distribution
     */
    normal(mean: number = 0, std: number = 1): number {
        // Box-Muller transform; u1 must be in (0, 1) so log stays finite
        let u1 = this.random();
        while (u1 === 0) u1 = this.random();
        const u2 = this.random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + std * z;
    }

    /**
     * Get the current state (for saving/restoring)
     */
    getState(): number {
        return this.state;
    }

    /**
     * Set the state (for restoring)
     */
    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

// ==================== Utility Functions ====================

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || typeof obj !== 'object') {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = sortObjectKeys(value);
    }
    return sorted;
}
