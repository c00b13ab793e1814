export type EntityType = 'product_feature' | 'capability' | 'technical_function';

export type ConfigurationType =
  | 'vehicle_platform'
  | 'odd'
  | 'environment'
  | 'trailer'
  | 'technical_readiness_level';

export const ENTITY_TYPES: readonly EntityType[] = [
  'product_feature',
  'capability',
  'technical_function',
];

export const CONFIGURATION_TYPES: readonly ConfigurationType[] = [
  'vehicle_platform',
  'odd',
  'environment',
  'trailer',
  'technical_readiness_level',
];

/**
 * Shared shape of the three planned work items.
 *
 * Notes:
 * - Dates are ISO `YYYY-MM-DD` strings; timestamps are full ISO-8601.
 * - `progressRelativeToTmos` is a percentage (0.0 to 100.0) against the
 *   Target Measure of Success.
 */
type PlannedWorkItem = {
  readonly id: number;
  /** Unique within its entity type; the lookup key for batch operations */
  name: string;
  tmos: string;
  vehiclePlatformId: number | null;
  plannedStartDate: string | null;
  plannedEndDate: string | null;
  progressRelativeToTmos: number;
  documentUrl: string | null;
  createdAt: string;
};

export type ProductFeature = PlannedWorkItem & {
  description: string;
  /** e.g. "baseline" or "PF-<SWIM_LANE>-1.1" */
  label: string;
  activeFlag: string;
};

export type Capability = PlannedWorkItem & {
  successCriteria: string;
  label: string;
};

export type TechnicalFunction = PlannedWorkItem & {
  description: string;
  successCriteria: string;
};

export type VehiclePlatform = {
  readonly id: number;
  name: string;
  description: string;
  vehicleType: string;
  /** kg */
  maxPayload: number | null;
};

/** Operational Design Domain: the conditions a configuration is valid for. */
export type Odd = {
  readonly id: number;
  name: string;
  description: string;
  /** km/h */
  maxSpeed: number | null;
  direction: string;
  lanes: string;
  intersections: string;
  infrastructure: string;
  hazards: string;
  actors: string;
  handlingEquipment: string;
  traction: string;
  inclines: string;
};

export type Environment = {
  readonly id: number;
  name: string;
  description: string;
  region: string;
  climate: string;
  terrain: string;
};

export type Trailer = {
  readonly id: number;
  name: string;
  description: string;
  trailerType: string;
  /** m */
  length: number | null;
  /** kg */
  maxWeight: number | null;
  axleCount: number | null;
};

export type TechnicalReadinessLevel = {
  readonly id: number;
  level: number;
  name: string;
  description: string;
};

export type ReadinessAssessment = {
  readonly id: number;
  technicalFunctionId: number;
  readinessLevelId: number;
  vehiclePlatformId: number;
  oddId: number;
  environmentId: number;
  trailerId: number | null;
  assessor: string;
  notes: string;
  /** 1 (low) to 5 (high) */
  confidence: number;
  assessmentDate: string;
  /** The due date that cascading updates move */
  nextReviewDate: string | null;
  targetTrl: number | null;
};

export type RecordMap = {
  product_feature: ProductFeature;
  capability: Capability;
  technical_function: TechnicalFunction;
  vehicle_platform: VehiclePlatform;
  odd: Odd;
  environment: Environment;
  trailer: Trailer;
  technical_readiness_level: TechnicalReadinessLevel;
  readiness_assessment: ReadinessAssessment;
};

export type RecordKind = keyof RecordMap;

/** Kinds whose rows carry a unique `name`. */
export type NamedKind = Exclude<RecordKind, 'readiness_assessment'>;

export type RecordValues<K extends RecordKind> = Omit<RecordMap[K], 'id'>;

export type RecordPatch<K extends RecordKind> = Partial<RecordValues<K>>;

export type LinkTable =
  | 'capability_product_features'
  | 'capability_technical_functions';

/** The non-capability end of each association table. */
export const LINK_MEMBER: Record<LinkTable, EntityType> = {
  capability_product_features: 'product_feature',
  capability_technical_functions: 'technical_function',
};

export type DependentCounts = {
  capabilities: number;
  productFeatures: number;
  technicalFunctions: number;
  assessments: number;
};

export const TRL_MIN = 1;
export const TRL_MAX = 9;
export const CONFIDENCE_MIN = 1;
export const CONFIDENCE_MAX = 5;
export const PROGRESS_MIN = 0;
export const PROGRESS_MAX = 100;

const KIND_LABELS: Record<RecordKind, [singular: string, plural: string]> = {
  product_feature: ['product feature', 'product features'],
  capability: ['capability', 'capabilities'],
  technical_function: ['technical function', 'technical functions'],
  vehicle_platform: ['vehicle platform', 'vehicle platforms'],
  odd: ['ODD', 'ODDs'],
  environment: ['environment', 'environments'],
  trailer: ['trailer', 'trailers'],
  technical_readiness_level: [
    'technical readiness level',
    'technical readiness levels',
  ],
  readiness_assessment: ['assessment', 'assessments'],
};

export const kindLabel = (kind: RecordKind, count = 1): string =>
  count === 1 ? KIND_LABELS[kind][0] : KIND_LABELS[kind][1];

export const isEntityType = (value: unknown): value is EntityType =>
  ENTITY_TYPES.some((type) => type === value);

export const isConfigurationType = (
  value: unknown,
): value is ConfigurationType =>
  CONFIGURATION_TYPES.some((type) => type === value);
