/**
 * @module numeric
 * @description Numerical helpers: 3-D vectors and descriptive statistics
 */

export * from './vector';
export * from './statistics';
