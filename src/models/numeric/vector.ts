/**
 * @module numeric/vector
 * @description Fixed-size 3-D vector operations
 *
 * Vectors are plain tuples and every operation returns a new tuple.
 */

/**
 * 3-D position or displacement [x, y, z]
 */
export type Vector3 = [number, number, number];

/**
 * Origin of the delivery frame
 */
export const ORIGIN: Readonly<Vector3> = [0, 0, 0];

/**
 * Vector addition
 */
export function addVectors(a: Readonly<Vector3>, b: Readonly<Vector3>): Vector3 {
    return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Vector subtraction (a - b)
 */
export function subtractVectors(a: Readonly<Vector3>, b: Readonly<Vector3>): Vector3 {
    return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Scalar multiplication
 */
export function scaleVector(v: Readonly<Vector3>, s: number): Vector3 {
    return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Euclidean norm
 */
export function magnitude(v: Readonly<Vector3>): number {
    return Math.sqrt(v[0] ** 2 + v[1] ** 2 + v[2] ** 2);
}

/**
 * Euclidean distance between two points
 */
export function distance(a: Readonly<Vector3>, b: Readonly<Vector3>): number {
    return magnitude(subtractVectors(a, b));
}

/**
 * Sum of components
 */
export function componentSum(v: Readonly<Vector3>): number {
    return v[0] + v[1] + v[2];
}

/**
 * Unit vector in the direction of v.
 * The zero vector normalizes to the zero vector.
 */
export function normalize(v: Readonly<Vector3>): Vector3 {
    const norm = magnitude(v);
    if (norm === 0) {
        return [0, 0, 0];
    }
    return [v[0] / norm, v[1] / norm, v[2] / norm];
}

/**
 * Narrow an unknown value to a Vector3 of finite numbers
 */
export function isVector3(value: unknown): value is Vector3 {
    return (
        Array.isArray(value) &&
        value.length === 3 &&
        value.every(c => typeof c === 'number' && Number.isFinite(c))
    );
}
