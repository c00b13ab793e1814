// ─── Operation Parser ──────────────────────────────────────────────────────
// Validates JSON batch documents into tagged operations. Item-level problems
// reject only that item; a malformed envelope rejects the document.

import { z } from 'zod';

import type { ConfigurationType } from '../readiness/model';
import {
  CONFIDENCE_MAX,
  CONFIDENCE_MIN,
  PROGRESS_MAX,
  PROGRESS_MIN,
  TRL_MAX,
  TRL_MIN,
} from '../readiness/model';
import { normalizePlatformReference } from '../readiness/vehiclePlatforms';
import type {
  AssessmentCreateOperation,
  BatchIssue,
  BatchOperation,
  BatchSource,
  ConfigurationKey,
  ConfigurationOperation,
  EntityOperation,
  ParsedBatch,
} from './batch.types';
import { parseFlexibleDate } from './dateParsing';

// ─── Field schemas ─────────────────────────────────────────────────────────

const toNumber = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;

const numeric = (schema: z.ZodNumber) => z.preprocess(toNumber, schema);

const trlValue = numeric(
  z
    .number({ invalid_type_error: 'TRL must be a number' })
    .int('TRL must be a whole number')
    .min(TRL_MIN, `TRL must be between ${TRL_MIN} and ${TRL_MAX}`)
    .max(TRL_MAX, `TRL must be between ${TRL_MIN} and ${TRL_MAX}`),
);

const progressValue = numeric(
  z
    .number({ invalid_type_error: 'progress must be a number' })
    .min(PROGRESS_MIN, `progress must be between ${PROGRESS_MIN} and ${PROGRESS_MAX}`)
    .max(PROGRESS_MAX, `progress must be between ${PROGRESS_MIN} and ${PROGRESS_MAX}`),
);

const confidenceValue = numeric(
  z
    .number({ invalid_type_error: 'confidence must be a number' })
    .int('confidence must be a whole number')
    .min(CONFIDENCE_MIN, `confidence must be between ${CONFIDENCE_MIN} and ${CONFIDENCE_MAX}`)
    .max(CONFIDENCE_MAX, `confidence must be between ${CONFIDENCE_MIN} and ${CONFIDENCE_MAX}`),
);

const optionalNumber = z
  .union([z.number(), z.string(), z.null()])
  .transform((value, ctx) => {
    if (value === null || (typeof value === 'string' && value.trim() === '')) return null;
    const num = Number(value);
    if (!Number.isFinite(num)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a number` });
      return z.NEVER;
    }
    return num;
  });

const text = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null ? '' : String(value).trim()));

const nullableText = z
  .union([z.string(), z.null()])
  .transform((value) => (value?.trim() ? value.trim() : null));

const dateValue = z.union([z.string(), z.null()]).transform((value, ctx) => {
  if (value === null || value.trim() === '') return null;
  const iso = parseFlexibleDate(value);
  if (!iso) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable date '${value}'` });
    return z.NEVER;
  }
  return iso;
});

const isoTimestamp = z.string().datetime({ offset: true });

/**
 * Assessment timestamps: full ISO timestamps pass through in UTC; the
 * flexible date formats become midnight UTC (or their own time of day).
 */
const timestampValue = z.string().transform((raw, ctx) => {
  const value = raw.trim();
  if (isoTimestamp.safeParse(value).success) return new Date(value).toISOString();
  const day = parseFlexibleDate(value);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable date '${raw}'` });
    return z.NEVER;
  }
  const time = /T(\d{1,2}):(\d{1,2}):(\d{1,2})Z?$/.exec(value);
  const [hh, mm, ss] = (time?.slice(1) ?? ['0', '0', '0']).map((part) => part.padStart(2, '0'));
  return `${day}T${hh}:${mm}:${ss}.000Z`;
});

const nameList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : [value])
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  );

const flag = z.preprocess(
  (value) =>
    typeof value === 'string' ? ['1', 'true', 'yes'].includes(value.trim().toLowerCase()) : value,
  z.boolean(),
);

const keyword = <U extends string, T extends [U, ...U[]]>(values: T) =>
  z.string().trim().toLowerCase().pipe(z.enum(values));

const operationKind = keyword(['create', 'update', 'delete']);

// ─── Item schemas ──────────────────────────────────────────────────────────

const entityItemSchema = z.object({
  entity_type: keyword(['product_feature', 'capability', 'technical_function']),
  operation: operationKind,
  name: z.string().trim().min(1, 'name cannot be empty'),
  description: text.optional(),
  label: text.optional(),
  success_criteria: text.optional(),
  tmos: text.optional(),
  active_flag: text.optional(),
  document_url: nullableText.optional(),
  vehicle_platform_id: z.union([z.number().int(), z.string(), z.null()]).optional(),
  vehicle_type: z.union([z.string(), z.null()]).optional(),
  planned_start_date: dateValue.optional(),
  planned_end_date: dateValue.optional(),
  progress_relative_to_tmos: progressValue.optional(),
  status_relative_to_tmos: progressValue.optional(),
  capabilities: nameList.optional(),
  capabilities_required: nameList.optional(),
  technical_functions: nameList.optional(),
  product_feature_ids: nameList.optional(),
  product_feature: nameList.optional(),
  due_date: dateValue.optional(),
  target_trl: trlValue.optional(),
  assessor: text.optional(),
  notes: text.optional(),
  force_delete: flag.optional(),
});

export type EntityItem = z.infer<typeof entityItemSchema>;

const configurationDataSchema = z.object({
  name: z.string().trim().min(1, 'name cannot be empty').optional(),
  level: trlValue.optional(),
  description: text.optional(),
  vehicle_type: text.optional(),
  max_payload: optionalNumber.optional(),
  max_speed: optionalNumber.optional(),
  direction: text.optional(),
  lanes: text.optional(),
  intersections: text.optional(),
  infrastructure: text.optional(),
  hazards: text.optional(),
  actors: text.optional(),
  handling_equipment: text.optional(),
  traction: text.optional(),
  inclines: text.optional(),
  region: text.optional(),
  climate: text.optional(),
  terrain: text.optional(),
  trailer_type: text.optional(),
  length: optionalNumber.optional(),
  max_weight: optionalNumber.optional(),
  axle_count: optionalNumber.optional(),
});

type ConfigurationData = z.infer<typeof configurationDataSchema>;

const configurationItemSchema = z
  .object({
    type: keyword(['vehicle_platform', 'odd', 'environment', 'trailer', 'technical_readiness_level']),
    operation: operationKind,
    data: configurationDataSchema.default({}),
    force_delete: flag.optional(),
  })
  .superRefine((item, ctx) => {
    if (item.type === 'technical_readiness_level') {
      if (item.data.level === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['data', 'level'],
          message: 'level is required for technical_readiness_level',
        });
      }
    } else if (item.data.name === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['data', 'name'],
        message: 'name is required',
      });
    }
  });

const assessmentItemSchema = z
  .object({
    technical_function: z.string().trim().min(1, 'technical_function is required'),
    vehicle_platform: z.union([z.string().trim().min(1), z.number().int()]).optional(),
    vehicle_platform_id: z.number().int().optional(),
    odd: z.string().trim().min(1, 'odd is required'),
    environment: z.string().trim().min(1, 'environment is required'),
    trailer: z.union([z.string(), z.null()]).optional(),
    trl: trlValue.optional(),
    readiness_level: trlValue.optional(),
    confidence: confidenceValue.optional(),
    assessor: text.optional(),
    notes: text.optional(),
    assessment_date: timestampValue.optional(),
    next_review_date: dateValue.optional(),
    target_trl: z.union([trlValue, z.null()]).optional(),
  })
  .superRefine((item, ctx) => {
    if (item.vehicle_platform === undefined && item.vehicle_platform_id === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['vehicle_platform'],
        message: 'vehicle_platform is required',
      });
    }
    if (item.trl === undefined && item.readiness_level === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['trl'], message: 'trl is required' });
    }
  });

const envelopeSchema = z.object(
  {
    metadata: z.record(z.unknown()).optional(),
    entities: z.array(z.unknown(), { invalid_type_error: "'entities' must be a list" }).optional(),
    configurations: z
      .array(z.unknown(), { invalid_type_error: "'configurations' must be a list" })
      .optional(),
    assessments: z
      .array(z.unknown(), { invalid_type_error: "'assessments' must be a list" })
      .optional(),
  },
  { invalid_type_error: 'Batch document must be a JSON object' },
);

// ─── Builders ──────────────────────────────────────────────────────────────

export const formatZodError = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

type ItemResult<T> = { ok: true; operation: T } | { ok: false; issue: BatchIssue };

const rejected = (label: string, message: string): { ok: false; issue: BatchIssue } => ({
  ok: false,
  issue: { label, severity: 'error', code: 'VALIDATION_ERROR', message },
});

const workItemFields = (item: EntityItem) => ({
  tmos: item.tmos,
  vehiclePlatformId: normalizePlatformReference({
    vehiclePlatformId: item.vehicle_platform_id,
    vehicleType: item.vehicle_type,
  }),
  plannedStartDate: item.planned_start_date,
  plannedEndDate: item.planned_end_date,
  progressRelativeToTmos: item.progress_relative_to_tmos ?? item.status_relative_to_tmos,
  documentUrl: item.document_url,
});

export function toEntityOperation(item: EntityItem, label: string): EntityOperation {
  const { entity_type: entityType, name } = item;
  if (item.operation === 'delete') {
    return {
      scope: 'entity',
      kind: 'delete',
      entityType,
      name,
      force: item.force_delete ?? false,
      label,
    };
  }

  const base = {
    scope: 'entity' as const,
    kind: item.operation,
    name,
    label,
    cascade: {
      dueDate: item.due_date ?? undefined,
      targetTrl: item.target_trl,
      assessor: item.assessor,
      notes: item.notes,
    },
  };
  const common = workItemFields(item);

  switch (entityType) {
    case 'product_feature':
      return {
        ...base,
        entityType,
        fields: {
          ...common,
          description: item.description,
          label: item.label,
          activeFlag: item.active_flag,
        },
        links: { capabilities: item.capabilities ?? item.capabilities_required },
      };
    case 'capability':
      return {
        ...base,
        entityType,
        fields: {
          ...common,
          successCriteria: item.success_criteria,
          label: item.label,
        },
        links: {
          productFeatures: item.product_feature_ids ?? item.product_feature,
          technicalFunctions: item.technical_functions,
        },
      };
    case 'technical_function':
      return {
        ...base,
        entityType,
        fields: {
          ...common,
          description: item.description,
          successCriteria: item.success_criteria,
        },
        links: { capabilities: item.capabilities },
      };
  }
}

export function parseEntityItem(raw: unknown, label: string): ItemResult<EntityOperation> {
  const parsed = entityItemSchema.safeParse(raw);
  if (!parsed.success) return rejected(label, formatZodError(parsed.error));
  return { ok: true, operation: toEntityOperation(parsed.data, label) };
}

type WriteBase = {
  scope: 'configuration';
  kind: 'create' | 'update';
  label: string;
  key: ConfigurationKey;
};

const toConfigurationWrite = (
  configType: ConfigurationType,
  base: WriteBase,
  data: ConfigurationData,
): ConfigurationOperation => {
  switch (configType) {
    case 'vehicle_platform':
      return {
        ...base,
        configType,
        fields: {
          name: data.name,
          description: data.description,
          vehicleType: data.vehicle_type,
          maxPayload: data.max_payload,
        },
      };
    case 'odd':
      return {
        ...base,
        configType,
        fields: {
          name: data.name,
          description: data.description,
          maxSpeed: data.max_speed,
          direction: data.direction,
          lanes: data.lanes,
          intersections: data.intersections,
          infrastructure: data.infrastructure,
          hazards: data.hazards,
          actors: data.actors,
          handlingEquipment: data.handling_equipment,
          traction: data.traction,
          inclines: data.inclines,
        },
      };
    case 'environment':
      return {
        ...base,
        configType,
        fields: {
          name: data.name,
          description: data.description,
          region: data.region,
          climate: data.climate,
          terrain: data.terrain,
        },
      };
    case 'trailer':
      return {
        ...base,
        configType,
        fields: {
          name: data.name,
          description: data.description,
          trailerType: data.trailer_type,
          length: data.length,
          maxWeight: data.max_weight,
          axleCount: data.axle_count,
        },
      };
    case 'technical_readiness_level':
      return {
        ...base,
        configType,
        fields: { level: data.level, name: data.name, description: data.description },
      };
  }
};

const FLAT_ENVELOPE_KEYS = ['config_type', 'operation', 'force_delete', '_comment'];

/** Accepts `{ type, operation, data }` and the flat `{ config_type, operation, ...fields }` form. */
const normalizeConfigurationItem = (raw: unknown): unknown => {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw) || !('config_type' in raw)) {
    return raw;
  }
  const fields = new Map<string, unknown>(Object.entries(raw));
  return {
    type: fields.get('config_type'),
    operation: fields.get('operation'),
    force_delete: fields.get('force_delete'),
    data: Object.fromEntries(
      [...fields].filter(([key]) => !FLAT_ENVELOPE_KEYS.includes(key)),
    ),
  };
};

export function parseConfigurationItem(
  raw: unknown,
  label: string,
): ItemResult<ConfigurationOperation> {
  const parsed = configurationItemSchema.safeParse(normalizeConfigurationItem(raw));
  if (!parsed.success) return rejected(label, formatZodError(parsed.error));

  const { type: configType, operation, data } = parsed.data;
  const key: ConfigurationKey =
    configType === 'technical_readiness_level'
      ? { level: data.level ?? 0 }
      : { name: data.name ?? '' };

  if (operation === 'delete') {
    return {
      ok: true,
      operation: {
        scope: 'configuration',
        kind: 'delete',
        configType,
        key,
        force: parsed.data.force_delete ?? false,
        label,
      },
    };
  }
  return {
    ok: true,
    operation: toConfigurationWrite(
      configType,
      { scope: 'configuration', kind: operation, label, key },
      data,
    ),
  };
}

export function parseAssessmentItem(
  raw: unknown,
  label: string,
): ItemResult<AssessmentCreateOperation> {
  const parsed = assessmentItemSchema.safeParse(raw);
  if (!parsed.success) return rejected(label, formatZodError(parsed.error));
  const item = parsed.data;
  const trailer = item.trailer?.trim();
  return {
    ok: true,
    operation: {
      scope: 'assessment',
      kind: 'create',
      label,
      technicalFunction: item.technical_function,
      vehiclePlatform: item.vehicle_platform ?? item.vehicle_platform_id ?? 0,
      odd: item.odd,
      environment: item.environment,
      trailer: trailer ? trailer : null,
      trl: item.trl ?? item.readiness_level ?? 0,
      confidence: item.confidence,
      assessor: item.assessor,
      notes: item.notes,
      assessmentDate: item.assessment_date,
      nextReviewDate: item.next_review_date,
      targetTrl: item.target_trl,
    },
  };
}

// ─── Document ──────────────────────────────────────────────────────────────

export type BatchDocumentResult =
  | { ok: true; batch: ParsedBatch }
  | { ok: false; message: string };

/**
 * Validates a whole batch document. Configurations are ordered first so that
 * entities and assessments in the same document can reference them.
 */
export function parseBatchDocument(
  document: unknown,
  source: BatchSource = 'json',
): BatchDocumentResult {
  const envelope = envelopeSchema.safeParse(document);
  if (!envelope.success) return { ok: false, message: formatZodError(envelope.error) };

  const { metadata = {}, entities = [], configurations = [], assessments = [] } = envelope.data;
  if (entities.length === 0 && configurations.length === 0 && assessments.length === 0) {
    return {
      ok: false,
      message: "No 'entities', 'configurations' or 'assessments' section found.",
    };
  }

  const operations: BatchOperation[] = [];
  const issues: BatchIssue[] = [];
  let rejectedCount = 0;

  const collect = <T extends BatchOperation>(result: ItemResult<T>) => {
    if (result.ok) operations.push(result.operation);
    else {
      issues.push(result.issue);
      rejectedCount += 1;
    }
  };

  configurations.forEach((raw, i) => collect(parseConfigurationItem(raw, `Configuration ${i + 1}`)));
  entities.forEach((raw, i) => collect(parseEntityItem(raw, `Entity ${i + 1}`)));
  assessments.forEach((raw, i) => collect(parseAssessmentItem(raw, `Assessment ${i + 1}`)));

  return {
    ok: true,
    batch: { source, metadata, operations, issues, rejected: rejectedCount, ignored: 0 },
  };
}

/** Parses JSON text; syntax errors reject the document. */
export function parseBatchJson(content: string): BatchDocumentResult {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      message: `Invalid JSON format - ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return parseBatchDocument(document, 'json');
}
