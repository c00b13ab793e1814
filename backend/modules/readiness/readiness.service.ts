import { BatchUpdateEngine } from '../../batch/BatchUpdateEngine';
import type { BatchOperation, BatchReport, ParsedBatch } from '../../batch/batch.types';
import { reachableFunctionIds } from '../../batch/cascade';
import { exportBatchDocument } from '../../batch/exportService';
import {
  parseAssessmentItem,
  parseBatchDocument,
  parseEntityItem,
} from '../../batch/operationParser';
import {
  kindLabel,
  type EntityType,
  type ReadinessAssessment,
  type RecordMap,
} from '../../readiness/model';
import type { ReadinessRepository } from '../../readiness/ReadinessRepository';
import { DomainError, validationError } from '../../reliability/DomainError';
import type {
  AssessmentQuery,
  AssessmentView,
  ConfigurationsView,
  DashboardSummary,
  EntityLinksView,
  EntityRow,
  MatrixCell,
  ReadinessData,
  ReadinessMatrix,
  TrlBucketName,
  WriteResult,
} from './readiness.types';

const round1 = (value: number) => Math.round(value * 10) / 10;

const average = (values: number[]): number | null =>
  values.length === 0
    ? null
    : round1(values.reduce((sum, v) => sum + v, 0) / values.length);

export const bucketFor = (trl: number): TrlBucketName =>
  trl >= 7 ? 'high' : trl >= 4 ? 'medium' : 'low';

const levelsById = (repository: ReadinessRepository) =>
  new Map(repository.list('technical_readiness_level').map((l) => [l.id, l]));

const trlOf = (
  levels: ReturnType<typeof levelsById>,
  assessment: ReadinessAssessment,
): number | null => levels.get(assessment.readinessLevelId)?.level ?? null;

const asBody = (body: unknown): object => {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw validationError('Request body must be a JSON object.');
  }
  return body;
};

const singleItemBatch = (operation: BatchOperation): ParsedBatch => ({
  source: 'api',
  metadata: {},
  operations: [operation],
  issues: [],
  rejected: 0,
  ignored: 0,
});

/**
 * Single-item writes surface the item's failure as an error response. A skip
 * (missing record, existing name) counts as a failure here.
 */
const assertApplied = (report: BatchReport): void => {
  if (report.fatal) {
    throw new DomainError({ ...report.fatal, details: { summary: report.summary } });
  }
  if (report.counts.errored === 0 && report.counts.skipped === 0) return;
  const issue =
    report.issues.find((i) => i.severity === 'error') ?? report.issues[0];
  throw new DomainError({
    code: issue?.code ?? 'UNKNOWN_ERROR',
    message: issue?.message ?? 'Operation was not applied.',
  });
};

// ─── Dashboard ─────────────────────────────────────────────────────────────

export function getDashboard(repository: ReadinessRepository): DashboardSummary {
  const levels = levelsById(repository);
  const trls = repository
    .listAssessments()
    .flatMap((a) => {
      const trl = trlOf(levels, a);
      return trl === null ? [] : [trl];
    });

  const counts: Record<TrlBucketName, number> = { high: 0, medium: 0, low: 0 };
  for (const trl of trls) counts[bucketFor(trl)] += 1;
  const total = trls.length;
  const bucket = (name: TrlBucketName) => ({
    count: counts[name],
    percentage: total === 0 ? 0 : round1((counts[name] / total) * 100),
  });

  return {
    totals: {
      productFeatures: repository.list('product_feature').length,
      capabilities: repository.list('capability').length,
      technicalFunctions: repository.list('technical_function').length,
      assessments: total,
    },
    trlBuckets: { high: bucket('high'), medium: bucket('medium'), low: bucket('low') },
    averageTrl: average(trls),
  };
}

// ─── Entities ──────────────────────────────────────────────────────────────

const namesOf = (
  repository: ReadinessRepository,
  type: EntityType,
  ids: number[],
): string[] =>
  ids.flatMap((id) => {
    const record = repository.findById(type, id);
    return record ? [record.name] : [];
  });

const linksFor = (
  repository: ReadinessRepository,
  type: EntityType,
  id: number,
): EntityLinksView => {
  switch (type) {
    case 'product_feature':
      return {
        capabilities: namesOf(
          repository,
          'capability',
          repository.linkedIds('capability_product_features', type, id),
        ),
      };
    case 'capability':
      return {
        productFeatures: namesOf(
          repository,
          'product_feature',
          repository.linkedIds('capability_product_features', type, id),
        ),
        technicalFunctions: namesOf(
          repository,
          'technical_function',
          repository.linkedIds('capability_technical_functions', type, id),
        ),
      };
    case 'technical_function':
      return {
        capabilities: namesOf(
          repository,
          'capability',
          repository.linkedIds('capability_technical_functions', type, id),
        ),
      };
  }
};

const toEntityRow = <T extends EntityType>(
  repository: ReadinessRepository,
  entityType: T,
  record: RecordMap[T],
): EntityRow<T> => {
  const levels = levelsById(repository);
  const functionIds = reachableFunctionIds(repository, entityType, record.id);
  const assessments =
    functionIds.length === 0
      ? []
      : repository.listAssessments({ technicalFunctionIds: functionIds });
  const platformId: number | null = record.vehiclePlatformId;
  const platform =
    platformId === null ? null : repository.findById('vehicle_platform', platformId);

  return {
    entityType,
    record,
    vehiclePlatformName: platform?.name ?? null,
    links: linksFor(repository, entityType, record.id),
    assessmentCount: assessments.length,
    averageTrl: average(
      assessments.flatMap((a) => {
        const trl = trlOf(levels, a);
        return trl === null ? [] : [trl];
      }),
    ),
  };
};

export function listEntities<T extends EntityType>(
  repository: ReadinessRepository,
  entityType: T,
): EntityRow<T>[] {
  return repository
    .list(entityType)
    .map((record) => toEntityRow(repository, entityType, record));
}

export function getEntity<T extends EntityType>(
  repository: ReadinessRepository,
  entityType: T,
  name: string,
): EntityRow<T> {
  const record = repository.findByName(entityType, name);
  if (!record) {
    throw new DomainError({
      code: 'NOT_FOUND',
      message: `${kindLabel(entityType)} not found: '${name}'`,
    });
  }
  return toEntityRow(repository, entityType, record);
}

/**
 * Creates or updates one entity through the batch engine. The body uses the
 * batch item fields; `entity_type`, `operation` and (for updates) `name`
 * come from the route.
 */
export function writeEntity<T extends EntityType>(
  repository: ReadinessRepository,
  entityType: T,
  operation: 'create' | 'update',
  body: unknown,
  name?: string,
): WriteResult<T> {
  const item = {
    ...asBody(body),
    ...(name === undefined ? {} : { name }),
    entity_type: entityType,
    operation,
  };
  const parsed = parseEntityItem(item, entityType);
  if (!parsed.ok) throw validationError(parsed.issue.message);

  const report = new BatchUpdateEngine(repository).apply(
    singleItemBatch(parsed.operation),
  );
  assertApplied(report);

  const record = repository.findByName(entityType, parsed.operation.name);
  return {
    entity: record ? toEntityRow(repository, entityType, record) : null,
    report,
  };
}

export function deleteEntity(
  repository: ReadinessRepository,
  entityType: EntityType,
  name: string,
  force: boolean,
): BatchReport {
  const report = new BatchUpdateEngine(repository).apply(
    singleItemBatch({
      scope: 'entity',
      kind: 'delete',
      entityType,
      name,
      force,
      label: entityType,
    }),
  );
  assertApplied(report);
  return report;
}

// ─── Assessments ───────────────────────────────────────────────────────────

const assessmentViews = (
  repository: ReadinessRepository,
  assessments: ReadinessAssessment[],
): AssessmentView[] => {
  const levels = levelsById(repository);
  const nameMap = <K extends 'technical_function' | 'vehicle_platform' | 'odd' | 'environment' | 'trailer'>(
    kind: K,
  ) => new Map(repository.list(kind).map((r) => [r.id, r.name]));
  const functions = nameMap('technical_function');
  const platforms = nameMap('vehicle_platform');
  const odds = nameMap('odd');
  const environments = nameMap('environment');
  const trailers = nameMap('trailer');

  return assessments.map((a) => ({
    ...a,
    technicalFunctionName: functions.get(a.technicalFunctionId) ?? '',
    vehiclePlatformName: platforms.get(a.vehiclePlatformId) ?? '',
    oddName: odds.get(a.oddId) ?? '',
    environmentName: environments.get(a.environmentId) ?? '',
    trailerName: a.trailerId === null ? null : (trailers.get(a.trailerId) ?? null),
    trl: trlOf(levels, a),
  }));
};

const functionScope = (
  repository: ReadinessRepository,
  query: AssessmentQuery,
): number[] | undefined => {
  const scopes: number[][] = [];
  if (query.technicalFunctionId !== undefined) scopes.push([query.technicalFunctionId]);
  if (query.productFeatureId !== undefined) {
    scopes.push(reachableFunctionIds(repository, 'product_feature', query.productFeatureId));
  }
  const [first, ...rest] = scopes;
  if (!first) return undefined;
  return first.filter((id) => rest.every((ids) => ids.includes(id)));
};

export function listAssessments(
  repository: ReadinessRepository,
  query: AssessmentQuery = {},
): AssessmentView[] {
  const views = assessmentViews(
    repository,
    repository.listAssessments({
      technicalFunctionIds: functionScope(repository, query),
      vehiclePlatformId: query.platformId,
    }),
  );
  const { minTrl } = query;
  if (minTrl === undefined) return views;
  return views.filter((view) => view.trl !== null && view.trl >= minTrl);
}

export function createAssessment(
  repository: ReadinessRepository,
  body: unknown,
): { assessment: AssessmentView | null; report: BatchReport } {
  const parsed = parseAssessmentItem(asBody(body), 'assessment');
  if (!parsed.ok) throw validationError(parsed.issue.message);

  const report = new BatchUpdateEngine(repository).apply(
    singleItemBatch(parsed.operation),
  );
  assertApplied(report);

  // Ids only grow, so the newest row is the one just written.
  const created = repository.listAssessments().at(-1);
  return {
    assessment: created ? (assessmentViews(repository, [created])[0] ?? null) : null,
    report,
  };
}

// ─── Matrix / reference views ──────────────────────────────────────────────

export function getReadinessMatrix(repository: ReadinessRepository): ReadinessMatrix {
  const views = assessmentViews(repository, repository.listAssessments());
  const columns = new Map<string, ReadinessMatrix['configurations'][number]>();
  const rows = new Map<number, ReadinessMatrix['rows'][number]>();

  for (const view of views) {
    const key = [view.vehiclePlatformId, view.oddId, view.environmentId, view.trailerId ?? '-'].join('|');
    if (!columns.has(key)) {
      columns.set(key, {
        key,
        vehiclePlatformId: view.vehiclePlatformId,
        oddId: view.oddId,
        environmentId: view.environmentId,
        trailerId: view.trailerId,
        label: [view.vehiclePlatformName, view.oddName, view.environmentName, view.trailerName]
          .filter((part): part is string => Boolean(part))
          .join(' / '),
      });
    }

    const row = rows.get(view.technicalFunctionId) ?? {
      technicalFunctionId: view.technicalFunctionId,
      technicalFunctionName: view.technicalFunctionName,
      cells: [],
    };
    const cell: MatrixCell = {
      configurationKey: key,
      assessmentId: view.id,
      trl: view.trl,
      targetTrl: view.targetTrl,
      confidence: view.confidence,
      assessor: view.assessor,
      assessmentDate: view.assessmentDate,
      nextReviewDate: view.nextReviewDate,
    };
    row.cells.push(cell);
    rows.set(view.technicalFunctionId, row);
  }

  return {
    configurations: [...columns.values()].sort((a, b) => a.label.localeCompare(b.label)),
    rows: [...rows.values()].sort((a, b) =>
      a.technicalFunctionName.localeCompare(b.technicalFunctionName),
    ),
  };
}

export function getConfigurations(repository: ReadinessRepository): ConfigurationsView {
  return {
    vehiclePlatforms: repository.list('vehicle_platform'),
    odds: repository.list('odd'),
    environments: repository.list('environment'),
    trailers: repository.list('trailer'),
    readinessLevels: repository
      .list('technical_readiness_level')
      .sort((a, b) => a.level - b.level),
  };
}

export function getReadinessData(repository: ReadinessRepository): ReadinessData {
  const assessments = repository.listAssessments();
  const perLevel = new Map<number, number>();
  for (const a of assessments) {
    perLevel.set(a.readinessLevelId, (perLevel.get(a.readinessLevelId) ?? 0) + 1);
  }

  return {
    distribution: getConfigurations(repository).readinessLevels.map((level) => ({
      level: level.level,
      name: level.name,
      count: perLevel.get(level.id) ?? 0,
    })),
    productFeatures: listEntities(repository, 'product_feature').map((row) => ({
      name: row.record.name,
      averageTrl: row.averageTrl,
      assessmentCount: row.assessmentCount,
    })),
  };
}

// ─── Batch documents ───────────────────────────────────────────────────────

export const exportDocument = (repository: ReadinessRepository) =>
  exportBatchDocument(repository);

/** Applies a whole batch document; a rolled-back batch is an error response. */
export function applyBatchDocument(
  repository: ReadinessRepository,
  body: unknown,
): BatchReport {
  const parsed = parseBatchDocument(body, 'api');
  if (!parsed.ok) throw validationError(parsed.message);
  const report = new BatchUpdateEngine(repository).apply(parsed.batch);
  if (report.fatal) {
    throw new DomainError({
      ...report.fatal,
      details: { summary: report.summary, issues: report.issues },
    });
  }
  return report;
}
