import type { EntityKind } from './schema.js';

export type FieldValue = string | number | boolean | Date | null;
export type FieldMap = Record<string, FieldValue>;

export interface StoredRow {
  id: string;
  fields: FieldMap;
}

/**
 * Row-level access to the twelve synchronized tables, keyed by entity kind and
 * camelCase field names. Writes report collisions as StorageConstraintError
 * and dangling references as ReferentialIntegrityError.
 */
export interface EntityStore {
  findOne(kind: EntityKind, where: FieldMap): Promise<StoredRow | null>;
  find(kind: EntityKind, where?: FieldMap): Promise<StoredRow[]>;
  exists(kind: EntityKind, id: string): Promise<boolean>;
  count(kind: EntityKind): Promise<number>;

  /** Returns the new surrogate id. */
  insert(kind: EntityKind, fields: FieldMap): Promise<string>;
  update(kind: EntityKind, id: string, fields: FieldMap): Promise<void>;

  /**
   * Runs `work` so that a failure undoes only its own writes and leaves the
   * enclosing transaction usable.
   */
  savepoint<T>(work: () => Promise<T>): Promise<T>;
}

export interface StorageGateway {
  /** Autocommit store, for reads outside any unit of work. */
  readonly store: EntityStore;
  /** Commits when `work` resolves, rolls back when it rejects. */
  transaction<T>(work: (store: EntityStore) => Promise<T>): Promise<T>;
}

export const STORAGE_GATEWAY = Symbol('STORAGE_GATEWAY');

export function sameFieldValue(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  const left = a ?? null;
  const right = b ?? null;
  if (left instanceof Date || right instanceof Date) {
    return left instanceof Date && right instanceof Date && left.getTime() === right.getTime();
  }
  return left === right;
}
