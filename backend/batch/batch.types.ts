// ─── Batch Types ───────────────────────────────────────────────────────────
// Operations produced by the JSON / CSV / HTTP parsers and consumed by the
// batch update engine. Every reference is still a name at this point; the
// engine resolves names to ids inside the transaction.

import type {
  ConfigurationType,
  EntityType,
  RecordKind,
  RecordPatch,
} from '../readiness/model';
import type { DomainErrorCode } from '../reliability/DomainError';

export type OperationKind = 'create' | 'update' | 'delete';

export type BatchSource = 'json' | 'csv' | 'api';

/** Assessment fields pushed down from an entity to every reachable assessment. */
export type CascadeFields = {
  /** ISO date; becomes `nextReviewDate` */
  dueDate?: string;
  targetTrl?: number;
  assessor?: string;
  notes?: string;
};

/** Link lists by entity type. A present list replaces the current links. */
export type EntityLinks = {
  product_feature: { capabilities?: string[] };
  capability: { productFeatures?: string[]; technicalFunctions?: string[] };
  technical_function: { capabilities?: string[] };
};

type OperationBase = {
  /** Position in the input, for messages ("Entity 3", "Row 4"). */
  label: string;
};

export type EntityWriteOperation<T extends EntityType> = OperationBase & {
  scope: 'entity';
  kind: 'create' | 'update';
  entityType: T;
  name: string;
  fields: RecordPatch<T>;
  links: EntityLinks[T];
  cascade: CascadeFields;
};

export type EntityDeleteOperation = OperationBase & {
  scope: 'entity';
  kind: 'delete';
  entityType: EntityType;
  name: string;
  force: boolean;
};

export type EntityOperation =
  | { [T in EntityType]: EntityWriteOperation<T> }[EntityType]
  | EntityDeleteOperation;

/** TRLs are keyed by `level`; every other configuration by `name`. */
export type ConfigurationKey = { name: string } | { level: number };

export type ConfigurationWriteOperation<C extends ConfigurationType> =
  OperationBase & {
    scope: 'configuration';
    kind: 'create' | 'update';
    configType: C;
    key: ConfigurationKey;
    fields: RecordPatch<C>;
  };

export type ConfigurationDeleteOperation = OperationBase & {
  scope: 'configuration';
  kind: 'delete';
  configType: ConfigurationType;
  key: ConfigurationKey;
  force: boolean;
};

export type ConfigurationOperation =
  | { [C in ConfigurationType]: ConfigurationWriteOperation<C> }[ConfigurationType]
  | ConfigurationDeleteOperation;

/** Assessments are created against names of their configuration tuple. */
export type AssessmentCreateOperation = OperationBase & {
  scope: 'assessment';
  kind: 'create';
  technicalFunction: string;
  vehiclePlatform: string | number;
  odd: string;
  environment: string;
  trailer: string | null;
  trl: number;
  confidence?: number;
  assessor?: string;
  notes?: string;
  assessmentDate?: string;
  nextReviewDate?: string | null;
  targetTrl?: number | null;
};

export type BatchOperation =
  | EntityOperation
  | ConfigurationOperation
  | AssessmentCreateOperation;

export type IssueSeverity = 'warning' | 'error';

export type BatchIssue = {
  label: string;
  severity: IssueSeverity;
  code: DomainErrorCode;
  message: string;
};

/** Parser output: operations plus whatever was dropped on the way in. */
export type ParsedBatch = {
  source: BatchSource;
  metadata: Record<string, unknown>;
  operations: BatchOperation[];
  issues: BatchIssue[];
  /** Items rejected by validation; counted as errored. */
  rejected: number;
  /** Items ignored (e.g. blank CSV rows); counted as skipped. */
  ignored: number;
};

export type BatchCounts = {
  created: number;
  updated: number;
  deleted: number;
  skipped: number;
  errored: number;
};

export type BatchReport = {
  source: BatchSource;
  ok: boolean;
  /** Set when the batch was rolled back. */
  fatal: { code: DomainErrorCode; message: string } | null;
  counts: BatchCounts;
  assessmentsAffected: number;
  updatedByType: Partial<Record<RecordKind, number>>;
  issues: BatchIssue[];
  summary: string[];
  exitCode: 0 | 1;
};
