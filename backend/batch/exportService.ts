// ─── Export Service ────────────────────────────────────────────────────────
// Serializes the store back into the batch formats. The JSON export is a
// valid batch document: importing it into an empty store rebuilds every
// record and association, and importing it again only produces skips.

import type {
  Capability,
  EntityType,
  ProductFeature,
  TechnicalFunction,
} from '../readiness/model';
import type { ReadinessRepository } from '../readiness/ReadinessRepository';
import { reachableFunctionIds } from './cascade';
import { formatCsv } from './csvParser';

export const EXPORT_FORMAT_VERSION = '2.0';

export const CSV_EXPORT_COLUMNS = [
  'capability_type',
  'capability_name',
  'description',
  'current_avg_trl',
  'assessment_count',
  'last_updated',
] as const;

const names = (repository: ReadinessRepository, type: EntityType, ids: number[]) =>
  ids.flatMap((id) => {
    const record = repository.findById(type, id);
    return record ? [record.name] : [];
  });

const workItemData = (item: ProductFeature | Capability | TechnicalFunction) => ({
  name: item.name,
  tmos: item.tmos,
  vehicle_platform_id: item.vehiclePlatformId,
  planned_start_date: item.plannedStartDate,
  planned_end_date: item.plannedEndDate,
  progress_relative_to_tmos: item.progressRelativeToTmos,
  document_url: item.documentUrl,
});

function exportConfigurations(repository: ReadinessRepository) {
  return [
    ...repository.list('vehicle_platform').map((p) => ({
      type: 'vehicle_platform',
      operation: 'create',
      data: {
        name: p.name,
        description: p.description,
        vehicle_type: p.vehicleType,
        max_payload: p.maxPayload,
      },
    })),
    ...repository.list('odd').map((o) => ({
      type: 'odd',
      operation: 'create',
      data: {
        name: o.name,
        description: o.description,
        max_speed: o.maxSpeed,
        direction: o.direction,
        lanes: o.lanes,
        intersections: o.intersections,
        infrastructure: o.infrastructure,
        hazards: o.hazards,
        actors: o.actors,
        handling_equipment: o.handlingEquipment,
        traction: o.traction,
        inclines: o.inclines,
      },
    })),
    ...repository.list('environment').map((e) => ({
      type: 'environment',
      operation: 'create',
      data: {
        name: e.name,
        description: e.description,
        region: e.region,
        climate: e.climate,
        terrain: e.terrain,
      },
    })),
    ...repository.list('trailer').map((t) => ({
      type: 'trailer',
      operation: 'create',
      data: {
        name: t.name,
        description: t.description,
        trailer_type: t.trailerType,
        length: t.length,
        max_weight: t.maxWeight,
        axle_count: t.axleCount,
      },
    })),
    ...repository.list('technical_readiness_level').map((l) => ({
      type: 'technical_readiness_level',
      operation: 'create',
      data: { level: l.level, name: l.name, description: l.description },
    })),
  ];
}

/**
 * Entities as create operations, ordered technical functions, capabilities,
 * product features: each links only to records created before it.
 */
function exportEntities(repository: ReadinessRepository) {
  const functions = repository.list('technical_function').map((tf) => ({
    entity_type: 'technical_function',
    operation: 'create',
    ...workItemData(tf),
    description: tf.description,
    success_criteria: tf.successCriteria,
  }));

  const capabilities = repository.list('capability').map((cap) => ({
    entity_type: 'capability',
    operation: 'create',
    ...workItemData(cap),
    success_criteria: cap.successCriteria,
    label: cap.label,
    technical_functions: names(
      repository,
      'technical_function',
      repository.linkedIds('capability_technical_functions', 'capability', cap.id),
    ),
  }));

  const features = repository.list('product_feature').map((pf) => ({
    entity_type: 'product_feature',
    operation: 'create',
    ...workItemData(pf),
    description: pf.description,
    label: pf.label,
    active_flag: pf.activeFlag,
    capabilities: names(
      repository,
      'capability',
      repository.linkedIds('capability_product_features', 'product_feature', pf.id),
    ),
  }));

  return [...functions, ...capabilities, ...features];
}

function exportAssessments(repository: ReadinessRepository) {
  const nameOf = <T extends { id: number; name: string }>(rows: T[]) =>
    new Map(rows.map((row) => [row.id, row.name]));
  const functionNames = nameOf(repository.list('technical_function'));
  const platformNames = nameOf(repository.list('vehicle_platform'));
  const oddNames = nameOf(repository.list('odd'));
  const environmentNames = nameOf(repository.list('environment'));
  const trailerNames = nameOf(repository.list('trailer'));
  const levels = new Map(
    repository.list('technical_readiness_level').map((l) => [l.id, l.level]),
  );

  return repository.listAssessments().map((a) => ({
    technical_function: functionNames.get(a.technicalFunctionId) ?? '',
    vehicle_platform: platformNames.get(a.vehiclePlatformId) ?? a.vehiclePlatformId,
    odd: oddNames.get(a.oddId) ?? '',
    environment: environmentNames.get(a.environmentId) ?? '',
    trailer: a.trailerId === null ? null : (trailerNames.get(a.trailerId) ?? null),
    trl: levels.get(a.readinessLevelId) ?? null,
    confidence: a.confidence,
    assessor: a.assessor,
    notes: a.notes,
    assessment_date: a.assessmentDate,
    next_review_date: a.nextReviewDate,
    target_trl: a.targetTrl,
  }));
}

export function exportBatchDocument(repository: ReadinessRepository, now = new Date()) {
  const configurations = exportConfigurations(repository);
  const entities = exportEntities(repository);
  const assessments = exportAssessments(repository);

  return {
    metadata: {
      version: EXPORT_FORMAT_VERSION,
      description: 'Complete readiness database export',
      exported_by: 'trl-update-json',
      export_date: now.toISOString(),
      total_product_features: entities.filter((e) => e.entity_type === 'product_feature').length,
      total_capabilities: entities.filter((e) => e.entity_type === 'capability').length,
      total_technical_functions: entities.filter((e) => e.entity_type === 'technical_function').length,
      total_assessments: assessments.length,
    },
    configurations,
    entities,
    assessments,
  };
}

export type ExportedBatchDocument = ReturnType<typeof exportBatchDocument>;

/** One row per product feature, capability and technical function. */
export function exportCapabilitiesCsv(repository: ReadinessRepository): string {
  const levels = new Map(
    repository.list('technical_readiness_level').map((l) => [l.id, l.level]),
  );

  const rowFor = (type: EntityType, id: number, name: string, description: string) => {
    const assessments = repository.listAssessments({
      technicalFunctionIds: reachableFunctionIds(repository, type, id),
    });
    const total = assessments.reduce((sum, a) => sum + (levels.get(a.readinessLevelId) ?? 0), 0);
    const lastUpdated = assessments
      .map((a) => a.assessmentDate.slice(0, 10))
      .sort()
      .at(-1);
    return {
      capability_type: type,
      capability_name: name,
      description,
      current_avg_trl: assessments.length ? Math.round((total / assessments.length) * 10) / 10 : 0,
      assessment_count: assessments.length,
      last_updated: lastUpdated ?? '',
    };
  };

  const rows = [
    ...repository
      .list('product_feature')
      .map((pf) => rowFor('product_feature', pf.id, pf.name, pf.description)),
    ...repository
      .list('capability')
      .map((cap) => rowFor('capability', cap.id, cap.name, cap.successCriteria)),
    ...repository
      .list('technical_function')
      .map((tf) => rowFor('technical_function', tf.id, tf.name, tf.description)),
  ];
  return formatCsv(CSV_EXPORT_COLUMNS, rows);
}
