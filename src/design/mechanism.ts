import type { DeliveryMechanism } from './types';
import { DeliveryMechanisms } from './types';

/** Sizes below this use passive diffusion (nm) */
export const PASSIVE_DIFFUSION_LIMIT_NM = 10;

/** Sizes at or above this use guided propulsion (nm) */
export const GUIDED_PROPULSION_MIN_NM = 50;

/**
 * Select the delivery mechanism for a size.
 * [0, 10) passive, [10, 50) active, [50, ∞) guided.
 */
export function selectMechanism(size: number): DeliveryMechanism {
    if (size < PASSIVE_DIFFUSION_LIMIT_NM) {
        return DeliveryMechanisms.PassiveDiffusion;
    }
    if (size < GUIDED_PROPULSION_MIN_NM) {
        return DeliveryMechanisms.ActiveTransport;
    }
    return DeliveryMechanisms.GuidedPropulsion;
}
