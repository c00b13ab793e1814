import type { BatchReport } from '../../batch/batch.types';
import type {
  EntityType,
  Environment,
  Odd,
  ReadinessAssessment,
  RecordMap,
  TechnicalReadinessLevel,
  Trailer,
  VehiclePlatform,
} from '../../readiness/model';

// ─── Dashboard ─────────────────────────────────────────────────────────────

export type TrlBucketName = 'high' | 'medium' | 'low';

export type TrlBucket = {
  count: number;
  /** Share of all assessments, 0-100, one decimal */
  percentage: number;
};

export type DashboardSummary = {
  totals: {
    productFeatures: number;
    capabilities: number;
    technicalFunctions: number;
    assessments: number;
  };
  /** high: TRL >= 7, medium: 4-6, low: < 4 */
  trlBuckets: Record<TrlBucketName, TrlBucket>;
  averageTrl: number | null;
};

// ─── Entities ──────────────────────────────────────────────────────────────

export type EntityLinksView = {
  productFeatures?: string[];
  capabilities?: string[];
  technicalFunctions?: string[];
};

export type EntityRow<T extends EntityType = EntityType> = {
  entityType: T;
  record: RecordMap[T];
  vehiclePlatformName: string | null;
  links: EntityLinksView;
  assessmentCount: number;
  averageTrl: number | null;
};

export type WriteResult<T extends EntityType = EntityType> = {
  entity: EntityRow<T> | null;
  report: BatchReport;
};

// ─── Assessments ───────────────────────────────────────────────────────────

export type AssessmentQuery = {
  technicalFunctionId?: number;
  productFeatureId?: number;
  platformId?: number;
  minTrl?: number;
};

export type AssessmentView = ReadinessAssessment & {
  technicalFunctionName: string;
  vehiclePlatformName: string;
  oddName: string;
  environmentName: string;
  trailerName: string | null;
  trl: number | null;
};

export type ConfigurationTuple = {
  vehiclePlatformId: number;
  oddId: number;
  environmentId: number;
  trailerId: number | null;
  /** "Platform / ODD / Environment[ / Trailer]" */
  label: string;
};

export type MatrixCell = {
  configurationKey: string;
  assessmentId: number;
  trl: number | null;
  targetTrl: number | null;
  confidence: number;
  assessor: string;
  assessmentDate: string;
  nextReviewDate: string | null;
};

export type ReadinessMatrix = {
  configurations: (ConfigurationTuple & { key: string })[];
  rows: {
    technicalFunctionId: number;
    technicalFunctionName: string;
    cells: MatrixCell[];
  }[];
};

export type ConfigurationsView = {
  vehiclePlatforms: VehiclePlatform[];
  odds: Odd[];
  environments: Environment[];
  trailers: Trailer[];
  readinessLevels: TechnicalReadinessLevel[];
};

export type ReadinessData = {
  distribution: { level: number; name: string; count: number }[];
  productFeatures: {
    name: string;
    averageTrl: number | null;
    assessmentCount: number;
  }[];
};
