/**
 * @module design/specs
 * @description Deterministic design specifications for protocol generation
 *
 * Values are derived from size and payload only. The engine does not format
 * them; a reporting layer turns them into lab protocol text.
 */

import type {
    CoatingRequirements,
    DesignSpecs,
    PayloadType,
    StabilityParameters,
    SurfaceChemistry,
} from './types';
import { resolvePayloadType } from './efficiency';

const SURFACE_CHEMISTRY: Readonly<Record<PayloadType, SurfaceChemistry>> = {
    small_molecules: { charge: 'neutral', hydrophobicity: 'moderate' },
    mRNA: { charge: 'positive', hydrophobicity: 'low' },
    proteins: { charge: 'variable', hydrophobicity: 'moderate' },
    plasmids: { charge: 'positive', hydrophobicity: 'low' },
};

/** Coating thickness as a fraction of particle size */
export const COATING_THICKNESS_RATIO = 0.1;

export const MANUFACTURING_PROTOCOL: readonly string[] = [
    'Prepare biocompatible polymer solution',
    'Add payload under controlled conditions',
    'Perform nanoprecipitation',
    'Apply surface coating',
    'Purify using tangential flow filtration',
    'Perform quality control',
];

export function determineSurfaceChemistry(payload: PayloadType | string): SurfaceChemistry {
    return { ...SURFACE_CHEMISTRY[resolvePayloadType(payload)] };
}

export function determineCoating(size: number): CoatingRequirements {
    return {
        material: 'PEG',
        thicknessNm: size * COATING_THICKNESS_RATIO,
        degradationRate: '0.1nm/hour',
    };
}

// Same envelope for every design at present
export function stabilityParameters(): StabilityParameters {
    return {
        temperatureRange: { min: 4, max: 40 },
        phRange: { min: 6.5, max: 7.5 },
        shelfLifeDays: 30,
        zetaPotentialMv: -30,
    };
}

export function generateDesignSpecs(size: number, payload: PayloadType | string): DesignSpecs {
    return {
        surfaceChemistry: determineSurfaceChemistry(payload),
        coatingRequirements: determineCoating(size),
        stabilityParameters: stabilityParameters(),
        manufacturingProtocol: [...MANUFACTURING_PROTOCOL],
    };
}
