import { DomainError } from '../reliability/DomainError';
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
  RECORD_CODECS,
  toRow,
  type Row,
} from './recordCodecs';

type LinkRow = { capabilityId: number; memberId: number };

type Snapshot = {
  tables: Map<RecordKind, Map<number, Row>>;
  nextIds: Map<RecordKind, number>;
  links: Map<LinkTable, LinkRow[]>;
};

const RECORD_KINDS = Object.keys(RECORD_CODECS).filter(
  (kind): kind is RecordKind => kind in RECORD_CODECS,
);

/** Kinds whose entity rows point at a vehicle platform (cleared on delete). */
const PLATFORM_OWNERS: readonly RecordKind[] = [
  'product_feature',
  'capability',
  'technical_function',
];

const cloneTables = (tables: Snapshot['tables']) =>
  new Map(
    [...tables].map(([kind, rows]) => [
      kind,
      new Map([...rows].map(([id, row]) => [id, { ...row }])),
    ]),
  );

const cloneLinks = (links: Snapshot['links']) =>
  new Map([...links].map(([table, rows]) => [table, rows.map((r) => ({ ...r }))]));

/**
 * In-memory readiness repository.
 *
 * Rows are stored in the same snake_case shape the SQLite schema uses and go
 * through the shared record codecs, so both implementations read back
 * identical records. Transactions snapshot the whole store.
 */
export class InMemoryReadinessRepository implements ReadinessRepository {
  private tables: Snapshot['tables'] = new Map(
    RECORD_KINDS.map((kind) => [kind, new Map<number, Row>()]),
  );
  private nextIds: Snapshot['nextIds'] = new Map(
    RECORD_KINDS.map((kind) => [kind, 1]),
  );
  private links: Snapshot['links'] = new Map<LinkTable, LinkRow[]>([
    ['capability_product_features', []],
    ['capability_technical_functions', []],
  ]);

  private rows(kind: RecordKind): Map<number, Row> {
    const rows = this.tables.get(kind);
    if (!rows) throw new DomainError({ code: 'STORAGE_FAILURE', message: `Unknown table for ${kind}.` });
    return rows;
  }

  private linkRows(table: LinkTable): LinkRow[] {
    return this.links.get(table) ?? [];
  }

  list<K extends RecordKind>(kind: K): RecordMap[K][] {
    const codec = RECORD_CODECS[kind];
    return [...this.rows(kind).values()]
      .sort((a, b) => Number(a.id) - Number(b.id))
      .map((row) => codec.fromRow(row));
  }

  findById<K extends RecordKind>(kind: K, id: number): RecordMap[K] | null {
    const row = this.rows(kind).get(id);
    return row ? RECORD_CODECS[kind].fromRow(row) : null;
  }

  findByName<K extends NamedKind>(kind: K, name: string): RecordMap[K] | null {
    for (const row of this.rows(kind).values()) {
      if (row.name === name) return RECORD_CODECS[kind].fromRow(row);
    }
    return null;
  }

  private assertUnique(kind: RecordKind, row: Row, ignoreId?: number) {
    const uniqueColumn =
      kind === 'technical_readiness_level'
        ? 'level'
        : kind === 'readiness_assessment'
          ? null
          : 'name';
    if (!uniqueColumn || row[uniqueColumn] === undefined) return;
    for (const existing of this.rows(kind).values()) {
      if (existing.id === ignoreId) continue;
      if (existing[uniqueColumn] === row[uniqueColumn]) {
        throw new DomainError({
          code: 'DUPLICATE',
          message: `A ${kind.replace(/_/g, ' ')} with ${uniqueColumn} '${String(row[uniqueColumn])}' already exists.`,
        });
      }
    }
  }

  insert<K extends RecordKind>(
    kind: K,
    values: RecordPatch<K>,
    options: InsertOptions = {},
  ): RecordMap[K] {
    const codec = RECORD_CODECS[kind];
    const row = { ...codec.defaults, ...toRow(codec, values) };
    this.assertUnique(kind, row);

    const next = this.nextIds.get(kind) ?? 1;
    const id = options.id ?? next;
    if (this.rows(kind).has(id)) {
      throw new DomainError({
        code: 'DUPLICATE',
        message: `A ${kind.replace(/_/g, ' ')} with id ${id} already exists.`,
      });
    }
    this.nextIds.set(kind, Math.max(next, id + 1));
    const stored: Row = { ...row, id };
    this.rows(kind).set(id, stored);
    return codec.fromRow(stored);
  }

  update<K extends RecordKind>(
    kind: K,
    id: number,
    patch: RecordPatch<K>,
  ): RecordMap[K] {
    const codec = RECORD_CODECS[kind];
    const existing = this.rows(kind).get(id);
    if (!existing) {
      throw new DomainError({
        code: 'NOT_FOUND',
        message: `No ${kind.replace(/_/g, ' ')} with id ${id}.`,
      });
    }
    const changes = toRow(codec, patch);
    this.assertUnique(kind, changes, id);
    const next: Row = { ...existing, ...changes, id };
    this.rows(kind).set(id, next);
    return codec.fromRow(next);
  }

  delete(kind: RecordKind, id: number): boolean {
    if (!this.rows(kind).delete(id)) return false;

    if (kind === 'capability') {
      for (const table of this.links.keys()) {
        this.links.set(
          table,
          this.linkRows(table).filter((link) => link.capabilityId !== id),
        );
      }
    }
    if (kind === 'product_feature' || kind === 'technical_function') {
      const table: LinkTable =
        kind === 'product_feature'
          ? 'capability_product_features'
          : 'capability_technical_functions';
      this.links.set(
        table,
        this.linkRows(table).filter((link) => link.memberId !== id),
      );
    }

    const referenceColumn = ASSESSMENT_REFERENCE_COLUMNS[kind];
    if (referenceColumn) {
      const assessments = this.rows('readiness_assessment');
      for (const [assessmentId, row] of assessments) {
        if (row[referenceColumn] !== id) continue;
        // Trailers are optional on an assessment; everything else owns it.
        if (kind === 'trailer') assessments.set(assessmentId, { ...row, trailer_id: null });
        else assessments.delete(assessmentId);
      }
    }

    if (kind === 'vehicle_platform') {
      for (const owner of PLATFORM_OWNERS) {
        const rows = this.rows(owner);
        for (const [rowId, row] of rows) {
          if (row.vehicle_platform_id === id) {
            rows.set(rowId, { ...row, vehicle_platform_id: null });
          }
        }
      }
    }

    return true;
  }

  listDependents(kind: RecordKind, id: number): DependentCounts {
    const counts: DependentCounts = {
      capabilities: 0,
      productFeatures: 0,
      technicalFunctions: 0,
      assessments: 0,
    };

    if (kind === 'capability') {
      counts.productFeatures = this.linkedIds('capability_product_features', 'capability', id).length;
      counts.technicalFunctions = this.linkedIds('capability_technical_functions', 'capability', id).length;
    }
    if (kind === 'product_feature') {
      counts.capabilities = this.linkedIds('capability_product_features', 'product_feature', id).length;
    }
    if (kind === 'technical_function') {
      counts.capabilities = this.linkedIds('capability_technical_functions', 'technical_function', id).length;
    }

    const referenceColumn = ASSESSMENT_REFERENCE_COLUMNS[kind];
    if (referenceColumn) {
      for (const row of this.rows('readiness_assessment').values()) {
        if (row[referenceColumn] === id) counts.assessments += 1;
      }
    }
    return counts;
  }

  linkedIds(table: LinkTable, from: EntityType, id: number): number[] {
    const fromCapability = from === 'capability';
    if (!fromCapability && LINK_MEMBER[table] !== from) return [];
    return this.linkRows(table)
      .filter((link) => (fromCapability ? link.capabilityId : link.memberId) === id)
      .map((link) => (fromCapability ? link.memberId : link.capabilityId))
      .sort((a, b) => a - b);
  }

  replaceLinks(
    table: LinkTable,
    from: EntityType,
    id: number,
    targetIds: readonly number[],
  ): void {
    const fromCapability = from === 'capability';
    if (!fromCapability && LINK_MEMBER[table] !== from) {
      throw new DomainError({
        code: 'VALIDATION_ERROR',
        message: `${from} is not linked through ${table}.`,
      });
    }
    const kept = this.linkRows(table).filter(
      (link) => (fromCapability ? link.capabilityId : link.memberId) !== id,
    );
    for (const targetId of new Set(targetIds)) {
      kept.push(
        fromCapability
          ? { capabilityId: id, memberId: targetId }
          : { capabilityId: targetId, memberId: id },
      );
    }
    this.links.set(table, kept);
  }

  listAssessments(filter?: AssessmentFilter): ReadinessAssessment[] {
    const functionIds = filter?.technicalFunctionIds
      ? new Set(filter.technicalFunctionIds)
      : null;
    return this.list('readiness_assessment').filter(
      (assessment) =>
        (!functionIds || functionIds.has(assessment.technicalFunctionId)) &&
        (filter?.vehiclePlatformId === undefined ||
          assessment.vehiclePlatformId === filter.vehiclePlatformId),
    );
  }

  findReadinessLevel(level: number): TechnicalReadinessLevel | null {
    for (const row of this.rows('technical_readiness_level').values()) {
      if (row.level === level) {
        return RECORD_CODECS.technical_readiness_level.fromRow(row);
      }
    }
    return null;
  }

  transaction<T>(fn: () => T): T {
    const snapshot: Snapshot = {
      tables: cloneTables(this.tables),
      nextIds: new Map(this.nextIds),
      links: cloneLinks(this.links),
    };
    try {
      return fn();
    } catch (err) {
      this.tables = snapshot.tables;
      this.nextIds = snapshot.nextIds;
      this.links = snapshot.links;
      throw err;
    }
  }

  close(): void {
    // Nothing to release.
  }
}

export const createInMemoryReadinessRepository = (): InMemoryReadinessRepository =>
  new InMemoryReadinessRepository();
