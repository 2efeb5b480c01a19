import { InvalidParameterError } from '../core/errors';

/**
 * Throw unless size is a finite number above zero
 */
export function assertValidSize(size: number): void {
    if (typeof size !== 'number' || !Number.isFinite(size) || size <= 0) {
        throw new InvalidParameterError('size', `Nanobot size must be a positive finite number, got ${size}`, { size });
    }
}
