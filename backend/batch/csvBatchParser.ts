// ─── CSV Batch Parser ──────────────────────────────────────────────────────
// Turns update CSVs (one row per named entity) into update operations that
// carry only cascade fields.

import type { EntityType } from '../readiness/model';
import type { BatchIssue, BatchOperation } from './batch.types';
import { parseCsv } from './csvParser';
import { type BatchDocumentResult, parseEntityItem } from './operationParser';

export const CSV_BATCH_COLUMNS = [
  'capability_type',
  'capability_name',
  'due_date',
  'target_trl',
  'assessor',
  'notes',
] as const;

const REQUIRED_COLUMNS = ['capability_type', 'capability_name'];

const CAPABILITY_TYPES: Record<string, EntityType> = {
  product_feature: 'product_feature',
  product: 'product_feature',
  capability: 'capability',
  technical_function: 'technical_function',
  technical: 'technical_function',
};

const resolveCapabilityType = (value: string): EntityType | null =>
  Object.prototype.hasOwnProperty.call(CAPABILITY_TYPES, value)
    ? CAPABILITY_TYPES[value]
    : null;

export function parseBatchCsv(content: string): BatchDocumentResult {
  const csv = parseCsv(content);
  if (csv.headers.length === 0) {
    return { ok: false, message: csv.errors[0] ?? 'CSV has no header row.' };
  }
  for (const column of REQUIRED_COLUMNS) {
    if (!csv.headers.includes(column)) {
      return { ok: false, message: `Required column '${column}' not found in CSV` };
    }
  }

  const operations: BatchOperation[] = [];
  const issues: BatchIssue[] = csv.errors.map((message) => ({
    label: 'CSV',
    severity: 'warning',
    code: 'VALIDATION_ERROR',
    message,
  }));
  let rejected = 0;
  let ignored = 0;

  for (const { line, values } of csv.records) {
    const label = `Row ${line}`;
    const name = values.capability_name?.trim() ?? '';
    const rawType = values.capability_type?.trim().toLowerCase() ?? '';

    if (!name) {
      issues.push({
        label,
        severity: 'warning',
        code: 'VALIDATION_ERROR',
        message: 'Skipping empty capability name',
      });
      ignored += 1;
      continue;
    }

    const entityType = resolveCapabilityType(rawType);
    if (!entityType) {
      issues.push({
        label,
        severity: 'error',
        code: 'VALIDATION_ERROR',
        message: `Invalid capability_type '${rawType}'. Must be 'product_feature', 'capability' or 'technical_function'`,
      });
      rejected += 1;
      continue;
    }

    const item: Record<string, string> = {
      entity_type: entityType,
      operation: 'update',
      name,
    };
    for (const column of ['due_date', 'target_trl', 'assessor', 'notes']) {
      const value = values[column]?.trim();
      if (value) item[column] = value;
    }

    const result = parseEntityItem(item, label);
    if (result.ok) operations.push(result.operation);
    else {
      issues.push(result.issue);
      rejected += 1;
    }
  }

  return {
    ok: true,
    batch: { source: 'csv', metadata: {}, operations, issues, rejected, ignored },
  };
}
