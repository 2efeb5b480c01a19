/**
 * @module delivery/scorer
 * @description Delivery success probability
 *
 * success = 0.7 * (1 - min(finalDistance / ‖target - start‖, 1)) + 0.3 / path.length
 */

import { InvalidParameterError } from '../core/errors';
import { distance, ORIGIN, type Vector3 } from '../models/numeric/vector';

export const DISTANCE_WEIGHT = 0.7;
export const PATH_EFFICIENCY_WEIGHT = 0.3;

/**
 * Final distance relative to the start-to-target distance, clipped to 1.
 * When the target is the start, 0 if the path ends on it and 1 otherwise.
 */
export function normalizedFinalDistance(finalDistance: number, maxExpectedDistance: number): number {
    if (maxExpectedDistance === 0) {
        return finalDistance === 0 ? 0 : 1;
    }
    return Math.min(finalDistance / maxExpectedDistance, 1);
}

/**
 * Score a delivery path.
 *
 * @param path - Positions including the start, must not be empty
 * @param target - Target position
 * @param start - Start of the delivery, defaults to the origin
 * @returns Success rate in [0, 1]
 */
export function scoreDelivery(
    path: readonly Vector3[],
    target: Readonly<Vector3>,
    start: Readonly<Vector3> = ORIGIN
): number {
    if (path.length === 0) {
        throw new InvalidParameterError('path', 'Cannot score an empty path');
    }

    const finalDistance = distance(path[path.length - 1], target);
    const pathEfficiency = 1.0 / path.length;
    const maxExpectedDistance = distance(target, start);

    const distanceScore = 1.0 - normalizedFinalDistance(finalDistance, maxExpectedDistance);

    return DISTANCE_WEIGHT * distanceScore + PATH_EFFICIENCY_WEIGHT * pathEfficiency;
}
