/**
 * @module design/designer
 * @description Compose efficiency, mechanism and specs into a NanobotConfig
 */

import type { NanobotConfig, PayloadType } from './types';
import { computeEfficiency, resolvePayloadType } from './efficiency';
import { selectMechanism } from './mechanism';
import { generateDesignSpecs } from './specs';
import { assertValidSize } from './validation';

/**
 * Design a nanobot for a size and payload.
 *
 * @param size - Size in nm, must be > 0
 * @param payload - Payload type; unrecognized values fall back to mRNA
 * @throws InvalidParameterError when size is not a positive finite number
 *
 * @example
 * ```typescript
 * const bot = designNanobot(20, 'mRNA');
 * bot.mechanism; // 'active_transport'
 * ```
 */
export function designNanobot(size: number, payload: PayloadType | string): NanobotConfig {
    assertValidSize(size);

    const resolved = resolvePayloadType(payload);
    const efficiency = computeEfficiency(size, resolved);

    return {
        size,
        payload: resolved,
        efficiency: efficiency.overallEfficiency,
        efficiencyFactors: efficiency.factors,
        mechanism: selectMechanism(size),
        designSpecs: generateDesignSpecs(size, resolved),
    };
}
