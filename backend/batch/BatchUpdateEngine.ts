import {
  CONFIGURATION_TYPES,
  ENTITY_TYPES,
  kindLabel,
  type ConfigurationType,
  type DependentCounts,
  type EntityType,
  type LinkTable,
  type RecordKind,
} from '../readiness/model';
import type { ReadinessRepository } from '../readiness/ReadinessRepository';
import {
  asDomainError,
  DomainError,
  isDomainError,
  validationError,
} from '../reliability/DomainError';
import { telemetry } from '../telemetry/Telemetry';
import type {
  AssessmentCreateOperation,
  BatchCounts,
  BatchIssue,
  BatchOperation,
  BatchReport,
  ConfigurationKey,
  ConfigurationOperation,
  EntityDeleteOperation,
  EntityOperation,
  ParsedBatch,
} from './batch.types';
import { cascadeToAssessments, hasCascade, reachableFunctionIds } from './cascade';

type EntityWrite = Exclude<EntityOperation, EntityDeleteOperation>;

type ItemOutcome = {
  status: 'created' | 'updated' | 'deleted' | 'skipped';
  kind: RecordKind;
  assessments: number;
  warnings: BatchIssue[];
};

type LinkPlan = {
  table: LinkTable;
  target: EntityType;
  names: string[] | undefined;
};

export type BatchUpdateEngineOptions = {
  /** Clock for `assessmentDate` / `createdAt`; defaults to the wall clock. */
  now?: () => Date;
};

const emptyCounts = (): BatchCounts => ({
  created: 0,
  updated: 0,
  deleted: 0,
  skipped: 0,
  errored: 0,
});

const SUMMARY_ORDER: readonly RecordKind[] = [...ENTITY_TYPES, ...CONFIGURATION_TYPES];

const keyText = (key: ConfigurationKey): string =>
  'level' in key ? `level ${key.level}` : `'${key.name}'`;

const describeDependents = (counts: DependentCounts): string[] => {
  const entries: [count: number, kind: RecordKind][] = [
    [counts.productFeatures, 'product_feature'],
    [counts.capabilities, 'capability'],
    [counts.technicalFunctions, 'technical_function'],
    [counts.assessments, 'readiness_assessment'],
  ];
  return entries
    .filter(([count]) => count > 0)
    .map(([count, kind]) => `${count} ${kindLabel(kind, count)}`);
};

const linkPlanFor = (op: EntityWrite): LinkPlan[] => {
  switch (op.entityType) {
    case 'product_feature':
      return [
        {
          table: 'capability_product_features',
          target: 'capability',
          names: op.links.capabilities,
        },
      ];
    case 'capability':
      return [
        {
          table: 'capability_product_features',
          target: 'product_feature',
          names: op.links.productFeatures,
        },
        {
          table: 'capability_technical_functions',
          target: 'technical_function',
          names: op.links.technicalFunctions,
        },
      ];
    case 'technical_function':
      return [
        {
          table: 'capability_technical_functions',
          target: 'capability',
          names: op.links.capabilities,
        },
      ];
  }
};

export function summarizeReport(
  counts: BatchCounts,
  updatedByType: Partial<Record<RecordKind, number>>,
  assessmentsAffected: number,
): string[] {
  const lines = [
    `Created: ${counts.created}, Updated: ${counts.updated}, Deleted: ${counts.deleted}, ` +
      `Skipped: ${counts.skipped}, Errored: ${counts.errored}`,
  ];
  const updates = SUMMARY_ORDER.flatMap((kind) => {
    const n = updatedByType[kind] ?? 0;
    return n > 0 ? [`${n} ${kindLabel(kind, n)} updated`] : [];
  });
  if (updates.length > 0 || assessmentsAffected > 0) {
    if (updates.length === 0) updates.push('0 records updated');
    const affected = kindLabel('readiness_assessment', assessmentsAffected);
    lines.push(`${updates.join(', ')}, ${assessmentsAffected} ${affected} affected`);
  }
  return lines;
}

/**
 * Applies parsed batch operations to a repository.
 *
 * Transaction model:
 * - The whole batch runs inside one repository transaction.
 * - Each item runs in a nested transaction. Validation, not-found,
 *   duplicate and dependency-conflict errors roll back that item only and are
 *   reported; the batch continues.
 * - Any other error rolls back the entire batch and is reported as fatal.
 */
export class BatchUpdateEngine {
  private readonly now: () => Date;

  constructor(
    private readonly repository: ReadinessRepository,
    options: BatchUpdateEngineOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  apply(batch: ParsedBatch): BatchReport {
    const startedAt = telemetry.nowMs();
    let counts = emptyCounts();
    let updatedByType: Partial<Record<RecordKind, number>> = {};
    let assessmentsAffected = 0;
    const issues: BatchIssue[] = [...batch.issues];
    let fatal: BatchReport['fatal'] = null;

    try {
      this.repository.transaction(() => {
        counts.errored += batch.rejected;
        counts.skipped += batch.ignored;

        for (const operation of batch.operations) {
          let outcome: ItemOutcome;
          try {
            outcome = this.repository.transaction(() => this.applyItem(operation));
          } catch (err) {
            if (!isDomainError(err) || !err.itemScoped) throw err;
            issues.push({
              label: operation.label,
              severity: 'error',
              code: err.code,
              message: err.message,
            });
            counts.errored += 1;
            continue;
          }

          issues.push(...outcome.warnings);
          counts[outcome.status] += 1;
          assessmentsAffected += outcome.assessments;
          if (outcome.status === 'updated') {
            updatedByType[outcome.kind] = (updatedByType[outcome.kind] ?? 0) + 1;
          }
        }
      });
    } catch (err) {
      const domain = asDomainError(err);
      fatal = { code: domain.code, message: domain.message };
      counts = emptyCounts();
      updatedByType = {};
      assessmentsAffected = 0;
      issues.push({
        label: 'Batch',
        severity: 'error',
        code: domain.code,
        message: `Rolled back: ${domain.message}`,
      });
    }

    const summary = summarizeReport(counts, updatedByType, assessmentsAffected);
    if (fatal) summary.push(`Batch rolled back: ${fatal.message}`);

    telemetry.record({
      name: 'batch.apply',
      durationMs: telemetry.nowMs() - startedAt,
      tags: { source: batch.source, outcome: fatal ? 'fatal' : 'ok', code: fatal?.code },
      metrics: { ...counts, assessmentsAffected, operations: batch.operations.length },
    });

    return {
      source: batch.source,
      ok: fatal === null,
      fatal,
      counts,
      assessmentsAffected,
      updatedByType,
      issues,
      summary,
      exitCode: fatal ? 1 : 0,
    };
  }

  private applyItem(operation: BatchOperation): ItemOutcome {
    switch (operation.scope) {
      case 'entity':
        return operation.kind === 'delete'
          ? this.deleteEntity(operation)
          : operation.kind === 'create'
            ? this.createEntity(operation)
            : this.updateEntity(operation);
      case 'configuration':
        return this.applyConfiguration(operation);
      case 'assessment':
        return this.createAssessment(operation);
    }
  }

  // ─── Entities ────────────────────────────────────────────────────────────

  private createEntity(op: EntityWrite): ItemOutcome {
    const warnings: BatchIssue[] = [];
    const label = kindLabel(op.entityType);

    if (this.repository.findByName(op.entityType, op.name)) {
      return this.skip(
        op.entityType,
        op.label,
        `${label} '${op.name}' already exists, skipping creation`,
        'DUPLICATE',
      );
    }

    const created = this.repository.insert(op.entityType, {
      ...op.fields,
      vehiclePlatformId: this.checkPlatform(op, warnings),
      name: op.name,
      createdAt: this.now().toISOString(),
    });
    this.writeLinks(op, created.id, warnings);

    return { status: 'created', kind: op.entityType, assessments: 0, warnings };
  }

  private updateEntity(op: EntityWrite): ItemOutcome {
    const warnings: BatchIssue[] = [];
    const existing = this.repository.findByName(op.entityType, op.name);
    if (!existing) {
      return this.skip(
        op.entityType,
        op.label,
        `${kindLabel(op.entityType)} not found: '${op.name}'`,
      );
    }

    const fields = { ...op.fields, vehiclePlatformId: this.checkPlatform(op, warnings) };
    if (Object.values(fields).some((value) => value !== undefined)) {
      this.repository.update(op.entityType, existing.id, fields);
    }
    this.writeLinks(op, existing.id, warnings);

    let assessments = 0;
    if (hasCascade(op.cascade)) {
      const functionIds = reachableFunctionIds(this.repository, op.entityType, existing.id);
      assessments = cascadeToAssessments(
        this.repository,
        functionIds,
        op.cascade,
        this.now(),
      ).length;
    }

    return { status: 'updated', kind: op.entityType, assessments, warnings };
  }

  private deleteEntity(op: EntityDeleteOperation): ItemOutcome {
    const label = kindLabel(op.entityType);
    const existing = this.repository.findByName(op.entityType, op.name);
    if (!existing) {
      return this.skip(op.entityType, op.label, `${label} not found: '${op.name}'`);
    }

    const dependents = this.repository.listDependents(op.entityType, existing.id);
    const parts = describeDependents(dependents);
    if (parts.length > 0 && !op.force) {
      throw new DomainError({
        code: 'DEPENDENCY_CONFLICT',
        message:
          `Cannot delete ${label} '${op.name}': ${parts.join(', ')} ` +
          'depend on it. Use force_delete to override.',
        details: dependents,
      });
    }

    this.repository.delete(op.entityType, existing.id);
    return { status: 'deleted', kind: op.entityType, assessments: 0, warnings: [] };
  }

  /** Clears a platform id that does not exist, with a warning. */
  private checkPlatform(op: EntityWrite, warnings: BatchIssue[]): number | null | undefined {
    const platformId = op.fields.vehiclePlatformId;
    if (platformId === undefined || platformId === null) return platformId;
    if (this.repository.findById('vehicle_platform', platformId)) return platformId;
    warnings.push({
      label: op.label,
      severity: 'warning',
      code: 'NOT_FOUND',
      message: `Vehicle platform ${platformId} not found; platform left empty`,
    });
    return null;
  }

  private writeLinks(op: EntityWrite, id: number, warnings: BatchIssue[]): void {
    for (const { table, target, names } of linkPlanFor(op)) {
      if (names === undefined) continue;
      const ids: number[] = [];
      for (const name of names) {
        const targetId = this.findReference(target, name);
        if (targetId === null) {
          warnings.push({
            label: op.label,
            severity: 'warning',
            code: 'NOT_FOUND',
            message: `Referenced ${kindLabel(target)} '${name}' not found, skipping`,
          });
        } else {
          ids.push(targetId);
        }
      }
      this.repository.replaceLinks(table, op.entityType, id, ids);
    }
  }

  /** Resolves a referenced entity by name, then by label where the type has one. */
  private findReference(type: EntityType, name: string): number | null {
    const byName = this.repository.findByName(type, name);
    if (byName) return byName.id;
    switch (type) {
      case 'capability':
        return this.repository.list('capability').find((c) => c.label === name)?.id ?? null;
      case 'product_feature':
        return this.repository.list('product_feature').find((pf) => pf.label === name)?.id ?? null;
      default:
        return null;
    }
  }

  // ─── Configurations ──────────────────────────────────────────────────────

  private findConfiguration(type: ConfigurationType, key: ConfigurationKey) {
    return 'level' in key
      ? this.repository.findReadinessLevel(key.level)
      : this.repository.findByName(type, key.name);
  }

  private applyConfiguration(op: ConfigurationOperation): ItemOutcome {
    const label = `${kindLabel(op.configType)} ${keyText(op.key)}`;
    const existing = this.findConfiguration(op.configType, op.key);

    switch (op.kind) {
      case 'create':
        if (existing) {
          return this.skip(
            op.configType,
            op.label,
            `${label} already exists, skipping creation`,
            'DUPLICATE',
          );
        }
        this.repository.insert(op.configType, op.fields);
        return { status: 'created', kind: op.configType, assessments: 0, warnings: [] };

      case 'update':
        if (!existing) return this.skip(op.configType, op.label, `${label} not found`);
        this.repository.update(op.configType, existing.id, op.fields);
        return { status: 'updated', kind: op.configType, assessments: 0, warnings: [] };

      case 'delete': {
        // Levels 1-9 are reference data.
        if (op.configType === 'technical_readiness_level') {
          throw validationError(
            'Cannot delete technical readiness levels: they are system-defined',
          );
        }
        if (!existing) return this.skip(op.configType, op.label, `${label} not found`);
        const dependents = this.repository.listDependents(op.configType, existing.id);
        if (dependents.assessments > 0 && !op.force) {
          throw new DomainError({
            code: 'DEPENDENCY_CONFLICT',
            message:
              `Cannot delete ${label}: ${describeDependents(dependents).join(', ')} ` +
              'depend on it. Use force_delete to override.',
            details: dependents,
          });
        }
        this.repository.delete(op.configType, existing.id);
        return { status: 'deleted', kind: op.configType, assessments: 0, warnings: [] };
      }
    }
  }

  // ─── Assessments ─────────────────────────────────────────────────────────

  private mustFind<T>(value: T | null, message: string): T {
    if (value === null) throw new DomainError({ code: 'NOT_FOUND', message });
    return value;
  }

  private createAssessment(op: AssessmentCreateOperation): ItemOutcome {
    const warnings: BatchIssue[] = [];
    const repo = this.repository;

    const technicalFunction = this.mustFind(
      repo.findByName('technical_function', op.technicalFunction),
      `technical function not found: '${op.technicalFunction}'`,
    );
    const platform = this.mustFind(
      typeof op.vehiclePlatform === 'number'
        ? repo.findById('vehicle_platform', op.vehiclePlatform)
        : repo.findByName('vehicle_platform', op.vehiclePlatform),
      `vehicle platform not found: '${op.vehiclePlatform}'`,
    );
    const odd = this.mustFind(repo.findByName('odd', op.odd), `ODD not found: '${op.odd}'`);
    const environment = this.mustFind(
      repo.findByName('environment', op.environment),
      `environment not found: '${op.environment}'`,
    );
    const level = this.mustFind(repo.findReadinessLevel(op.trl), `TRL level ${op.trl} not found`);

    let trailerId: number | null = null;
    if (op.trailer !== null) {
      const trailer = repo.findByName('trailer', op.trailer);
      if (trailer) trailerId = trailer.id;
      else {
        warnings.push({
          label: op.label,
          severity: 'warning',
          code: 'NOT_FOUND',
          message: `Referenced trailer '${op.trailer}' not found, skipping`,
        });
      }
    }

    const duplicate = repo
      .listAssessments({
        technicalFunctionIds: [technicalFunction.id],
        vehiclePlatformId: platform.id,
      })
      .some(
        (a) =>
          a.oddId === odd.id && a.environmentId === environment.id && a.trailerId === trailerId,
      );
    if (duplicate) {
      return this.skip(
        'readiness_assessment',
        op.label,
        `assessment of '${technicalFunction.name}' on ` +
          `${platform.name} / ${odd.name} / ${environment.name} already exists, skipping creation`,
        'DUPLICATE',
      );
    }

    repo.insert('readiness_assessment', {
      technicalFunctionId: technicalFunction.id,
      readinessLevelId: level.id,
      vehiclePlatformId: platform.id,
      oddId: odd.id,
      environmentId: environment.id,
      trailerId,
      confidence: op.confidence,
      assessor: op.assessor,
      notes: op.notes,
      assessmentDate: op.assessmentDate ?? this.now().toISOString(),
      nextReviewDate: op.nextReviewDate,
      targetTrl: op.targetTrl,
    });
    return { status: 'created', kind: 'readiness_assessment', assessments: 0, warnings };
  }

  private skip(
    kind: RecordKind,
    label: string,
    message: string,
    code: 'NOT_FOUND' | 'DUPLICATE' = 'NOT_FOUND',
  ): ItemOutcome {
    return {
      status: 'skipped',
      kind,
      assessments: 0,
      warnings: [{ label, severity: 'warning', code, message }],
    };
  }
}
