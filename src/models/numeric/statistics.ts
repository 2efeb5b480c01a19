/**
 * @module numeric/statistics
 * @description Descriptive statistics over plain number arrays
 */

/**
 * Compute the mean of an array
 *
 * @param arr - Numeric array
 * @returns Mean value, 0 for an empty array
 */
export function mean(arr: readonly number[]): number {
    if (arr.length === 0) {
        return 0;
    }
    return arr.reduce((sum, val) => sum + val, 0) / arr.length;
}

/**
 * Compute the variance of an array
 *
 * @param arr - Numeric array
 * @param isSample - Whether to compute sample variance (uses n-1). Default false
 * @returns Variance, 0 when there are too few values
 */
export function variance(arr: readonly number[], isSample: boolean = false): number {
    const divisor = isSample ? arr.length - 1 : arr.length;
    if (divisor <= 0) {
        return 0;
    }
    const m = mean(arr);
    const squaredDiffs = arr.map(val => Math.pow(val - m, 2));
    return squaredDiffs.reduce((sum, val) => sum + val, 0) / divisor;
}

/**
 * Compute the standard deviation of an array
 */
export function standardDeviation(arr: readonly number[], isSample: boolean = false): number {
    return Math.sqrt(variance(arr, isSample));
}
