import type { EntityType, ReadinessAssessment } from '../readiness/model';
import type { ReadinessRepository } from '../readiness/ReadinessRepository';
import type { CascadeFields } from './batch.types';

export const hasCascade = (fields: CascadeFields): boolean =>
  fields.dueDate !== undefined || fields.targetTrl !== undefined;

/**
 * Technical functions whose assessments an entity reaches:
 * - technical function: itself
 * - capability: its linked functions
 * - product feature: functions of every linked capability (two hops)
 */
export function reachableFunctionIds(
  repository: ReadinessRepository,
  entityType: EntityType,
  id: number,
): number[] {
  if (entityType === 'technical_function') return [id];

  const capabilityIds =
    entityType === 'capability'
      ? [id]
      : repository.linkedIds('capability_product_features', 'product_feature', id);

  const functionIds = new Set<number>();
  for (const capabilityId of capabilityIds) {
    for (const functionId of repository.linkedIds(
      'capability_technical_functions',
      'capability',
      capabilityId,
    )) {
      functionIds.add(functionId);
    }
  }
  return [...functionIds].sort((a, b) => a - b);
}

/**
 * Writes the cascade fields onto every assessment of the given functions,
 * once per assessment, and stamps `assessmentDate`. Returns the touched rows.
 */
export function cascadeToAssessments(
  repository: ReadinessRepository,
  functionIds: readonly number[],
  fields: CascadeFields,
  now: Date,
): ReadinessAssessment[] {
  if (!hasCascade(fields) || functionIds.length === 0) return [];

  const byId = new Map<number, ReadinessAssessment>();
  for (const assessment of repository.listAssessments({ technicalFunctionIds: functionIds })) {
    byId.set(assessment.id, assessment);
  }

  const assessmentDate = now.toISOString();
  return [...byId.values()].map((assessment) =>
    repository.update('readiness_assessment', assessment.id, {
      nextReviewDate: fields.dueDate,
      targetTrl: fields.targetTrl,
      assessor: fields.assessor,
      notes: fields.notes,
      assessmentDate,
    }),
  );
}
