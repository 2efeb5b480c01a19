/**
 * Design module type definitions
 */

/**
 * Payload type names
 */
export const PayloadTypes = {
    SmallMolecules: 'small_molecules',
    MRNA: 'mRNA',
    Proteins: 'proteins',
    Plasmids: 'plasmids',
} as const;

/**
 * Category of cargo carried by the nanobot
 */
export type PayloadType = (typeof PayloadTypes)[keyof typeof PayloadTypes];

/**
 * Delivery mechanism names
 */
export const DeliveryMechanisms = {
    PassiveDiffusion: 'passive_diffusion',
    ActiveTransport: 'active_transport',
    GuidedPropulsion: 'guided_propulsion',
} as const;

/**
 * Transport strategy, a function of size only
 */
export type DeliveryMechanism = (typeof DeliveryMechanisms)[keyof typeof DeliveryMechanisms];

/**
 * Per-payload factors, each in [0, 1]
 */
export interface PayloadFactors {
    /** Molecular weight penalty */
    readonly weight: number;
    /** Stability in transit */
    readonly stability: number;
    /** Diffusion capability */
    readonly diffusion: number;
}

/**
 * Fixed environmental factors, each in [0, 1]
 */
export interface EnvironmentalFactors {
    readonly phSensitivity: number;
    readonly temperatureStability: number;
    readonly cellularBarriers: number;
    readonly degradationResistance: number;
}

/**
 * Full breakdown of the efficiency score
 */
export interface EfficiencyFactors {
    readonly baseEfficiency: number;
    /** Gaussian in size, peaks at 30 nm */
    readonly sizeFactor: number;
    readonly payloadFactors: PayloadFactors;
    readonly environmentalFactors: EnvironmentalFactors;
}

/**
 * Efficiency model output
 */
export interface EfficiencyResult {
    /** In [0, baseEfficiency] */
    readonly overallEfficiency: number;
    /** (1 - weight) * stability * diffusion */
    readonly payloadEfficiency: number;
    /** Mean of environmental factors */
    readonly environmentalEfficiency: number;
    readonly factors: EfficiencyFactors;
}

/**
 * Surface chemistry requirements
 */
export interface SurfaceChemistry {
    readonly charge: 'neutral' | 'positive' | 'variable';
    readonly hydrophobicity: 'low' | 'moderate';
}

/**
 * Coating specification
 */
export interface CoatingRequirements {
    readonly material: string;
    readonly thicknessNm: number;
    readonly degradationRate: string;
}

export interface NumericRange {
    readonly min: number;
    readonly max: number;
}

/**
 * Storage and handling stability parameters
 */
export interface StabilityParameters {
    /** Celsius */
    readonly temperatureRange: NumericRange;
    readonly phRange: NumericRange;
    readonly shelfLifeDays: number;
    /** mV */
    readonly zetaPotentialMv: number;
}

/**
 * Design specifications consumed by protocol generation
 */
export interface DesignSpecs {
    readonly surfaceChemistry: SurfaceChemistry;
    readonly coatingRequirements: CoatingRequirements;
    readonly stabilityParameters: StabilityParameters;
    readonly manufacturingProtocol: readonly string[];
}

/**
 * A complete nanobot design. Created once per design request.
 */
export interface NanobotConfig {
    /** Diameter in nm, > 0 */
    readonly size: number;
    readonly payload: PayloadType;
    /** Overall efficiency in [0, 1] */
    readonly efficiency: number;
    readonly efficiencyFactors: EfficiencyFactors;
    readonly mechanism: DeliveryMechanism;
    readonly designSpecs: DesignSpecs;
}
