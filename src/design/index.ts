/**
 * @module design
 * @description Nanobot design: efficiency model, mechanism selection, design specs
 */

export * from './types';
export * from './efficiency';
export * from './mechanism';
export * from './specs';
export * from './designer';
export { assertValidSize } from './validation';
