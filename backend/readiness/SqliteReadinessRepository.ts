import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { DomainError, isDomainError } from '../reliability/DomainError';
import {
  LINK_MEMBER,
  type DependentCounts,
  type EntityType,
  type LinkTable,
  type NamedKind,
  type ReadinessAssessment,
  type RecordKind,
  type RecordMap,
  type RecordPatch,
  type TechnicalReadinessLevel,
} from './model';
import type {
  AssessmentFilter,
  InsertOptions,
  ReadinessRepository,
} from './ReadinessRepository';
import {
  ASSESSMENT_REFERENCE_COLUMNS,
  asRow,
  RECORD_CODECS,
  toRow,
  type Row,
  type SqlValue,
} from './recordCodecs';

const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

const MEMBER_COLUMN: Record<LinkTable, string> = {
  capability_product_features: 'product_feature_id',
  capability_technical_functions: 'technical_function_id',
};

const sqliteCode = (err: unknown): string | null =>
  err instanceof Error && 'code' in err && typeof err.code === 'string'
    ? err.code
    : null;

/** Translates driver errors into domain errors; domain errors pass through. */
const toDomainError = (err: unknown, operation: string): DomainError => {
  if (isDomainError(err)) return err;
  const code = sqliteCode(err) ?? '';
  const message = err instanceof Error ? err.message : String(err);

  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return new DomainError({
      code: 'DUPLICATE',
      message: `${operation}: a record with the same key already exists.`,
      cause: err,
    });
  }
  if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new DomainError({
      code: 'VALIDATION_ERROR',
      message: `${operation}: a referenced record does not exist.`,
      cause: err,
    });
  }
  if (code === 'SQLITE_CONSTRAINT_CHECK' || code === 'SQLITE_CONSTRAINT_NOTNULL') {
    return new DomainError({
      code: 'VALIDATION_ERROR',
      message: `${operation}: ${message}`,
      cause: err,
    });
  }
  return new DomainError({
    code: 'STORAGE_FAILURE',
    message: `${operation} failed: ${message}`,
    details: { sqliteCode: code || null },
    cause: err,
  });
};

const openDatabase = (filename: string): Database.Database => {
  try {
    const db = new Database(filename);
    db.pragma('foreign_keys = ON');
    db.exec(fs.readFileSync(SCHEMA_PATH, 'utf8'));
    return db;
  } catch (err) {
    throw toDomainError(err, `Opening ${filename}`);
  }
};

/**
 * better-sqlite3 backed repository. Statements are synchronous, so a batch
 * runs as one `db.transaction`; nested calls become savepoints.
 */
export class SqliteReadinessRepository implements ReadinessRepository {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = openDatabase(filename);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toDomainError(err, operation);
    }
  }

  private all(sql: string, ...params: SqlValue[]) {
    return this.db
      .prepare(sql)
      .all(...params)
      .map((row) => asRow(row));
  }

  private count(sql: string, ...params: SqlValue[]): number {
    const row = asRow(this.db.prepare(sql).get(...params));
    return Number(row.n ?? 0);
  }

  list<K extends RecordKind>(kind: K): RecordMap[K][] {
    const codec = RECORD_CODECS[kind];
    return this.guard(`Listing ${codec.table}`, () =>
      this.all(`SELECT * FROM ${codec.table} ORDER BY id`).map((row) =>
        codec.fromRow(row),
      ),
    );
  }

  findById<K extends RecordKind>(kind: K, id: number): RecordMap[K] | null {
    const codec = RECORD_CODECS[kind];
    return this.guard(`Reading ${codec.table}`, () => {
      const [row] = this.all(`SELECT * FROM ${codec.table} WHERE id = ?`, id);
      return row ? codec.fromRow(row) : null;
    });
  }

  findByName<K extends NamedKind>(kind: K, name: string): RecordMap[K] | null {
    const codec = RECORD_CODECS[kind];
    return this.guard(`Reading ${codec.table}`, () => {
      const [row] = this.all(
        `SELECT * FROM ${codec.table} WHERE name = ? LIMIT 1`,
        name,
      );
      return row ? codec.fromRow(row) : null;
    });
  }

  insert<K extends RecordKind>(
    kind: K,
    values: RecordPatch<K>,
    options: InsertOptions = {},
  ): RecordMap[K] {
    const codec = RECORD_CODECS[kind];
    return this.guard(`Inserting into ${codec.table}`, () => {
      const row: Row = { ...codec.defaults, ...toRow(codec, values) };
      if (options.id !== undefined) row.id = options.id;
      const columns = Object.keys(row);
      const sql = columns.length
        ? `INSERT INTO ${codec.table} (${columns.join(', ')}) VALUES (${columns
            .map(() => '?')
            .join(', ')})`
        : `INSERT INTO ${codec.table} DEFAULT VALUES`;
      const info = this.db.prepare(sql).run(...columns.map((c) => row[c]));
      const [stored] = this.all(
        `SELECT * FROM ${codec.table} WHERE id = ?`,
        Number(info.lastInsertRowid),
      );
      if (!stored) {
        throw new DomainError({
          code: 'STORAGE_FAILURE',
          message: `Inserted row missing from ${codec.table}.`,
        });
      }
      return codec.fromRow(stored);
    });
  }

  update<K extends RecordKind>(
    kind: K,
    id: number,
    patch: RecordPatch<K>,
  ): RecordMap[K] {
    const codec = RECORD_CODECS[kind];
    return this.guard(`Updating ${codec.table}`, () => {
      const changes = toRow(codec, patch);
      const columns = Object.keys(changes);
      if (columns.length) {
        this.db
          .prepare(
            `UPDATE ${codec.table} SET ${columns
              .map((c) => `${c} = ?`)
              .join(', ')} WHERE id = ?`,
          )
          .run(...columns.map((c) => changes[c]), id);
      }
      const updated = this.findById(kind, id);
      if (!updated) {
        throw new DomainError({
          code: 'NOT_FOUND',
          message: `No ${kind.replace(/_/g, ' ')} with id ${id}.`,
        });
      }
      return updated;
    });
  }

  delete(kind: RecordKind, id: number): boolean {
    const { table } = RECORD_CODECS[kind];
    return this.guard(`Deleting from ${table}`, () => {
      const info = this.db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
      return info.changes > 0;
    });
  }

  listDependents(kind: RecordKind, id: number): DependentCounts {
    return this.guard('Counting dependents', () => {
      const counts: DependentCounts = {
        capabilities: 0,
        productFeatures: 0,
        technicalFunctions: 0,
        assessments: 0,
      };
      if (kind === 'capability') {
        counts.productFeatures = this.count(
          'SELECT COUNT(*) AS n FROM capability_product_features WHERE capability_id = ?',
          id,
        );
        counts.technicalFunctions = this.count(
          'SELECT COUNT(*) AS n FROM capability_technical_functions WHERE capability_id = ?',
          id,
        );
      }
      if (kind === 'product_feature') {
        counts.capabilities = this.count(
          'SELECT COUNT(*) AS n FROM capability_product_features WHERE product_feature_id = ?',
          id,
        );
      }
      if (kind === 'technical_function') {
        counts.capabilities = this.count(
          'SELECT COUNT(*) AS n FROM capability_technical_functions WHERE technical_function_id = ?',
          id,
        );
      }
      const referenceColumn = ASSESSMENT_REFERENCE_COLUMNS[kind];
      if (referenceColumn) {
        counts.assessments = this.count(
          `SELECT COUNT(*) AS n FROM readiness_assessments WHERE ${referenceColumn} = ?`,
          id,
        );
      }
      return counts;
    });
  }

  linkedIds(table: LinkTable, from: EntityType, id: number): number[] {
    const member = MEMBER_COLUMN[table];
    if (from !== 'capability' && LINK_MEMBER[table] !== from) return [];
    const [whereColumn, selectColumn] =
      from === 'capability' ? ['capability_id', member] : [member, 'capability_id'];
    return this.guard(`Reading ${table}`, () =>
      this.all(
        `SELECT ${selectColumn} AS target FROM ${table} WHERE ${whereColumn} = ? ORDER BY ${selectColumn}`,
        id,
      ).map((row) => Number(row.target)),
    );
  }

  replaceLinks(
    table: LinkTable,
    from: EntityType,
    id: number,
    targetIds: readonly number[],
  ): void {
    const member = MEMBER_COLUMN[table];
    if (from !== 'capability' && LINK_MEMBER[table] !== from) {
      throw new DomainError({
        code: 'VALIDATION_ERROR',
        message: `${from} is not linked through ${table}.`,
      });
    }
    const ownerColumn = from === 'capability' ? 'capability_id' : member;
    this.transaction(() =>
      this.guard(`Writing ${table}`, () => {
        this.db.prepare(`DELETE FROM ${table} WHERE ${ownerColumn} = ?`).run(id);
        const insert = this.db.prepare(
          `INSERT OR IGNORE INTO ${table} (capability_id, ${member}) VALUES (?, ?)`,
        );
        for (const targetId of targetIds) {
          if (from === 'capability') insert.run(id, targetId);
          else insert.run(targetId, id);
        }
      }),
    );
  }

  listAssessments(filter?: AssessmentFilter): ReadinessAssessment[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];
    if (filter?.technicalFunctionIds) {
      if (filter.technicalFunctionIds.length === 0) return [];
      clauses.push(
        `technical_function_id IN (${filter.technicalFunctionIds.map(() => '?').join(', ')})`,
      );
      params.push(...filter.technicalFunctionIds);
    }
    if (filter?.vehiclePlatformId !== undefined) {
      clauses.push('vehicle_platform_id = ?');
      params.push(filter.vehiclePlatformId);
    }
    const where = clauses.length ? ` WHERE ${clauses.join(' AND ')}` : '';
    const codec = RECORD_CODECS.readiness_assessment;
    return this.guard('Listing readiness_assessments', () =>
      this.all(`SELECT * FROM readiness_assessments${where} ORDER BY id`, ...params).map(
        (row) => codec.fromRow(row),
      ),
    );
  }

  findReadinessLevel(level: number): TechnicalReadinessLevel | null {
    const codec = RECORD_CODECS.technical_readiness_level;
    return this.guard('Reading technical_readiness_levels', () => {
      const [row] = this.all(
        'SELECT * FROM technical_readiness_levels WHERE level = ?',
        level,
      );
      return row ? codec.fromRow(row) : null;
    });
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
