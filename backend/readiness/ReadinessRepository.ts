import type {
  DependentCounts,
  EntityType,
  LinkTable,
  NamedKind,
  ReadinessAssessment,
  RecordKind,
  RecordMap,
  RecordPatch,
  TechnicalReadinessLevel,
} from './model';

export type InsertOptions = { id?: number };

export type AssessmentFilter = {
  technicalFunctionIds?: readonly number[];
  vehiclePlatformId?: number;
};

/**
 * Storage seam for the readiness schema.
 *
 * Responsibilities:
 * - Rows for every record kind, looked up by id or unique name.
 * - The two capability association tables.
 * - Referential clean-up on delete (association rows, owned assessments).
 * - Atomic `transaction` blocks; a thrown error rolls back every write made
 *   inside the block. Blocks may nest.
 *
 * Non-responsibilities:
 * - No dependency checks before delete (callers use `listDependents`).
 * - No name resolution or cascading of due dates / TRLs.
 */
export interface ReadinessRepository {
  list<K extends RecordKind>(kind: K): RecordMap[K][];
  findById<K extends RecordKind>(kind: K, id: number): RecordMap[K] | null;
  findByName<K extends NamedKind>(kind: K, name: string): RecordMap[K] | null;

  /**
   * Throws `DUPLICATE` when the name (or TRL level) is already taken, or when
   * `options.id` is in use. Without `options.id` the store assigns the id.
   */
  insert<K extends RecordKind>(
    kind: K,
    values: RecordPatch<K>,
    options?: InsertOptions,
  ): RecordMap[K];
  /** Throws `NOT_FOUND` when no row has the id. */
  update<K extends RecordKind>(
    kind: K,
    id: number,
    patch: RecordPatch<K>,
  ): RecordMap[K];
  delete(kind: RecordKind, id: number): boolean;

  listDependents(kind: RecordKind, id: number): DependentCounts;

  /** Ids on the other end of `table`, starting from an entity of type `from`. */
  linkedIds(table: LinkTable, from: EntityType, id: number): number[];
  /** Replaces every link of the given entity in `table` with `targetIds`. */
  replaceLinks(
    table: LinkTable,
    from: EntityType,
    id: number,
    targetIds: readonly number[],
  ): void;

  listAssessments(filter?: AssessmentFilter): ReadinessAssessment[];
  findReadinessLevel(level: number): TechnicalReadinessLevel | null;

  transaction<T>(fn: () => T): T;
  close(): void;
}
