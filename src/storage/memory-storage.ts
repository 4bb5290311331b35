import { Injectable } from '@nestjs/common';
import { ReferentialIntegrityError, StorageConstraintError } from '../raw/errors.js';
import { ENTITY_SCHEMA, uniqueKeySets } from './schema.js';
import type { EntityKind } from './schema.js';
import { sameFieldValue } from './entity-store.js';
import type { EntityStore, FieldMap, StorageGateway, StoredRow } from './entity-store.js';

interface UndoEntry {
  kind: EntityKind;
  id: string;
  /** Row before the write; null when the write was an insert. */
  previous: FieldMap | null;
}

/**
 * In-process StorageGateway with the same unique and foreign-key rules as the
 * Postgres schema. Transactions are undo journals with no isolation between
 * them; every operation yields once so concurrent callers interleave.
 */
@Injectable()
export class MemoryStorage implements StorageGateway {
  private readonly tables = new Map<EntityKind, Map<string, FieldMap>>();
  private sequence = 0;

  readonly store: EntityStore = new MemoryEntityStore(this, null);

  async transaction<T>(work: (store: EntityStore) => Promise<T>): Promise<T> {
    const journal: UndoEntry[] = [];
    try {
      return await work(new MemoryEntityStore(this, journal));
    } catch (error: unknown) {
      this.undo(journal, 0);
      throw error;
    }
  }

  table(kind: EntityKind): Map<string, FieldMap> {
    let table = this.tables.get(kind);
    if (!table) {
      table = new Map();
      this.tables.set(kind, table);
    }
    return table;
  }

  nextId(kind: EntityKind): string {
    this.sequence += 1;
    return `${kind}-${this.sequence}`;
  }

  undo(journal: UndoEntry[], mark: number): void {
    const entries = journal.splice(mark);
    for (const entry of entries.reverse()) {
      const table = this.table(entry.kind);
      if (entry.previous === null) table.delete(entry.id);
      else table.set(entry.id, entry.previous);
    }
  }

  checkWrite(kind: EntityKind, id: string, row: FieldMap): void {
    for (const parent of ENTITY_SCHEMA[kind].parents) {
      const ref = row[parent.field];
      if (ref === null || ref === undefined) continue;
      if (typeof ref !== 'string' || !this.table(parent.kind).has(ref)) {
        throw new ReferentialIntegrityError(
          `${kind}.${parent.field} references missing ${parent.kind} ${String(ref)}`,
        );
      }
    }

    for (const keySet of uniqueKeySets(kind)) {
      if (keySet.some((field) => row[field] === null || row[field] === undefined)) continue;
      for (const [otherId, other] of this.table(kind)) {
        if (otherId === id) continue;
        if (keySet.every((field) => sameFieldValue(row[field], other[field]))) {
          throw new StorageConstraintError(
            `duplicate ${kind} for (${keySet.join(', ')})`,
            `${kind}(${keySet.join(',')})`,
          );
        }
      }
    }
  }
}

class MemoryEntityStore implements EntityStore {
  constructor(
    private readonly db: MemoryStorage,
    private readonly journal: UndoEntry[] | null,
  ) {}

  async findOne(kind: EntityKind, where: FieldMap): Promise<StoredRow | null> {
    const rows = await this.find(kind, where);
    return rows[0] ?? null;
  }

  async find(kind: EntityKind, where: FieldMap = {}): Promise<StoredRow[]> {
    await tick();
    const conditions = Object.entries(where);
    const rows: StoredRow[] = [];
    for (const [id, fields] of this.db.table(kind)) {
      if (conditions.every(([field, value]) => sameFieldValue(fields[field], value))) {
        rows.push({ id, fields: { ...fields } });
      }
    }
    return rows;
  }

  async exists(kind: EntityKind, id: string): Promise<boolean> {
    await tick();
    return this.db.table(kind).has(id);
  }

  async count(kind: EntityKind): Promise<number> {
    await tick();
    return this.db.table(kind).size;
  }

  async insert(kind: EntityKind, fields: FieldMap): Promise<string> {
    await tick();
    const id = this.db.nextId(kind);
    const row = { ...fields };
    this.db.checkWrite(kind, id, row);
    this.db.table(kind).set(id, row);
    this.journal?.push({ kind, id, previous: null });
    return id;
  }

  async update(kind: EntityKind, id: string, fields: FieldMap): Promise<void> {
    await tick();
    const table = this.db.table(kind);
    const previous = table.get(id);
    if (!previous) return;
    const row = { ...previous, ...fields };
    this.db.checkWrite(kind, id, row);
    table.set(id, row);
    this.journal?.push({ kind, id, previous });
  }

  async savepoint<T>(work: () => Promise<T>): Promise<T> {
    const journal = this.journal;
    if (!journal) return work();
    const mark = journal.length;
    try {
      return await work();
    } catch (error: unknown) {
      this.db.undo(journal, mark);
      throw error;
    }
  }
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
