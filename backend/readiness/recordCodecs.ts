import { DomainError } from '../reliability/DomainError';
import type { RecordKind, RecordMap } from './model';

export type SqlValue = string | number | null;

/** A stored row, keyed by snake_case column name. */
export type Row = Record<string, SqlValue>;

export type RecordCodec<K extends RecordKind> = {
  table: string;
  /** Writable columns, excluding `id`. */
  columns: readonly string[];
  /** Values for columns an insert leaves out. */
  defaults: Row;
  fromRow(row: Row): RecordMap[K];
};

const toSnakeCase = (field: string): string =>
  field.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);

const toSqlValue = (field: string, value: unknown): SqlValue => {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new DomainError({
    code: 'VALIDATION_ERROR',
    message: `Field '${field}' has an unsupported value.`,
  });
};

/** Accepts whatever a driver hands back and keeps only scalar columns. */
export function asRow(value: unknown): Row {
  const row: Row = {};
  if (!value || typeof value !== 'object') return row;
  for (const [column, raw] of Object.entries(value)) {
    if (typeof raw === 'string' || typeof raw === 'number') row[column] = raw;
    else if (typeof raw === 'bigint') row[column] = Number(raw);
    else row[column] = null;
  }
  return row;
}

/**
 * Converts camelCase record values into a row restricted to the codec's
 * columns. Undefined values are dropped so a patch touches only what it names.
 */
export function toRow(
  codec: { columns: readonly string[] },
  values: object,
): Row {
  const row: Row = {};
  for (const [field, value] of Object.entries(values)) {
    if (value === undefined) continue;
    const column = toSnakeCase(field);
    if (!codec.columns.includes(column)) continue;
    row[column] = toSqlValue(field, value);
  }
  return row;
}

const readId = (row: Row): number => readNumber(row, 'id');

const readString = (row: Row, column: string): string => {
  const value = row[column];
  if (typeof value === 'string') return value;
  return value === null || value === undefined ? '' : String(value);
};

const readNullableString = (row: Row, column: string): string | null => {
  const value = row[column];
  if (value === null || value === undefined || value === '') return null;
  return String(value);
};

const readNumber = (row: Row, column: string, fallback = 0): number => {
  const value = row[column];
  const num = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(num) ? num : fallback;
};

const readNullableNumber = (row: Row, column: string): number | null => {
  const value = row[column];
  if (value === null || value === undefined || value === '') return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
};

const WORK_ITEM_COLUMNS = [
  'name',
  'tmos',
  'vehicle_platform_id',
  'planned_start_date',
  'planned_end_date',
  'progress_relative_to_tmos',
  'document_url',
  'created_at',
] as const;

const WORK_ITEM_DEFAULTS: Row = {
  tmos: '',
  vehicle_platform_id: null,
  planned_start_date: null,
  planned_end_date: null,
  progress_relative_to_tmos: 0,
  document_url: null,
  created_at: '',
};

const readWorkItem = (row: Row) => ({
  id: readId(row),
  name: readString(row, 'name'),
  tmos: readString(row, 'tmos'),
  vehiclePlatformId: readNullableNumber(row, 'vehicle_platform_id'),
  plannedStartDate: readNullableString(row, 'planned_start_date'),
  plannedEndDate: readNullableString(row, 'planned_end_date'),
  progressRelativeToTmos: readNumber(row, 'progress_relative_to_tmos'),
  documentUrl: readNullableString(row, 'document_url'),
  createdAt: readString(row, 'created_at'),
});

export const RECORD_CODECS: { [K in RecordKind]: RecordCodec<K> } = {
  product_feature: {
    table: 'product_features',
    columns: [...WORK_ITEM_COLUMNS, 'description', 'label', 'active_flag'],
    defaults: {
      ...WORK_ITEM_DEFAULTS,
      description: '',
      label: '',
      active_flag: 'next',
    },
    fromRow: (row) => ({
      ...readWorkItem(row),
      description: readString(row, 'description'),
      label: readString(row, 'label'),
      activeFlag: readString(row, 'active_flag'),
    }),
  },
  capability: {
    table: 'capabilities',
    columns: [...WORK_ITEM_COLUMNS, 'success_criteria', 'label'],
    defaults: { ...WORK_ITEM_DEFAULTS, success_criteria: '', label: '' },
    fromRow: (row) => ({
      ...readWorkItem(row),
      successCriteria: readString(row, 'success_criteria'),
      label: readString(row, 'label'),
    }),
  },
  technical_function: {
    table: 'technical_functions',
    columns: [...WORK_ITEM_COLUMNS, 'description', 'success_criteria'],
    defaults: { ...WORK_ITEM_DEFAULTS, description: '', success_criteria: '' },
    fromRow: (row) => ({
      ...readWorkItem(row),
      description: readString(row, 'description'),
      successCriteria: readString(row, 'success_criteria'),
    }),
  },
  vehicle_platform: {
    table: 'vehicle_platforms',
    columns: ['name', 'description', 'vehicle_type', 'max_payload'],
    defaults: { description: '', vehicle_type: '', max_payload: null },
    fromRow: (row) => ({
      id: readId(row),
      name: readString(row, 'name'),
      description: readString(row, 'description'),
      vehicleType: readString(row, 'vehicle_type'),
      maxPayload: readNullableNumber(row, 'max_payload'),
    }),
  },
  odd: {
    table: 'odds',
    columns: [
      'name',
      'description',
      'max_speed',
      'direction',
      'lanes',
      'intersections',
      'infrastructure',
      'hazards',
      'actors',
      'handling_equipment',
      'traction',
      'inclines',
    ],
    defaults: {
      description: '',
      max_speed: null,
      direction: '',
      lanes: '',
      intersections: '',
      infrastructure: '',
      hazards: '',
      actors: '',
      handling_equipment: '',
      traction: '',
      inclines: '',
    },
    fromRow: (row) => ({
      id: readId(row),
      name: readString(row, 'name'),
      description: readString(row, 'description'),
      maxSpeed: readNullableNumber(row, 'max_speed'),
      direction: readString(row, 'direction'),
      lanes: readString(row, 'lanes'),
      intersections: readString(row, 'intersections'),
      infrastructure: readString(row, 'infrastructure'),
      hazards: readString(row, 'hazards'),
      actors: readString(row, 'actors'),
      handlingEquipment: readString(row, 'handling_equipment'),
      traction: readString(row, 'traction'),
      inclines: readString(row, 'inclines'),
    }),
  },
  environment: {
    table: 'environments',
    columns: ['name', 'description', 'region', 'climate', 'terrain'],
    defaults: { description: '', region: '', climate: '', terrain: '' },
    fromRow: (row) => ({
      id: readId(row),
      name: readString(row, 'name'),
      description: readString(row, 'description'),
      region: readString(row, 'region'),
      climate: readString(row, 'climate'),
      terrain: readString(row, 'terrain'),
    }),
  },
  trailer: {
    table: 'trailers',
    columns: [
      'name',
      'description',
      'trailer_type',
      'length',
      'max_weight',
      'axle_count',
    ],
    defaults: {
      description: '',
      trailer_type: '',
      length: null,
      max_weight: null,
      axle_count: null,
    },
    fromRow: (row) => ({
      id: readId(row),
      name: readString(row, 'name'),
      description: readString(row, 'description'),
      trailerType: readString(row, 'trailer_type'),
      length: readNullableNumber(row, 'length'),
      maxWeight: readNullableNumber(row, 'max_weight'),
      axleCount: readNullableNumber(row, 'axle_count'),
    }),
  },
  technical_readiness_level: {
    table: 'technical_readiness_levels',
    columns: ['level', 'name', 'description'],
    defaults: { description: '' },
    fromRow: (row) => ({
      id: readId(row),
      level: readNumber(row, 'level'),
      name: readString(row, 'name'),
      description: readString(row, 'description'),
    }),
  },
  readiness_assessment: {
    table: 'readiness_assessments',
    columns: [
      'technical_function_id',
      'readiness_level_id',
      'vehicle_platform_id',
      'odd_id',
      'environment_id',
      'trailer_id',
      'assessor',
      'notes',
      'confidence',
      'assessment_date',
      'next_review_date',
      'target_trl',
    ],
    defaults: {
      trailer_id: null,
      assessor: '',
      notes: '',
      confidence: 3,
      assessment_date: '',
      next_review_date: null,
      target_trl: null,
    },
    fromRow: (row) => ({
      id: readId(row),
      technicalFunctionId: readNumber(row, 'technical_function_id'),
      readinessLevelId: readNumber(row, 'readiness_level_id'),
      vehiclePlatformId: readNumber(row, 'vehicle_platform_id'),
      oddId: readNumber(row, 'odd_id'),
      environmentId: readNumber(row, 'environment_id'),
      trailerId: readNullableNumber(row, 'trailer_id'),
      assessor: readString(row, 'assessor'),
      notes: readString(row, 'notes'),
      confidence: readNumber(row, 'confidence', 3),
      assessmentDate: readString(row, 'assessment_date'),
      nextReviewDate: readNullableString(row, 'next_review_date'),
      targetTrl: readNullableNumber(row, 'target_trl'),
    }),
  },
};

/** Foreign keys on assessments, keyed by the configuration kind they reference. */
export const ASSESSMENT_REFERENCE_COLUMNS: Partial<Record<RecordKind, string>> =
  {
    technical_function: 'technical_function_id',
    technical_readiness_level: 'readiness_level_id',
    vehicle_platform: 'vehicle_platform_id',
    odd: 'odd_id',
    environment: 'environment_id',
    trailer: 'trailer_id',
  };
