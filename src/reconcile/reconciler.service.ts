import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ReferentialIntegrityError, StorageConstraintError } from '../raw/errors.js';
import type { RawRecord } from '../raw/platform-client-interface.js';
import { sameFieldValue } from '../storage/entity-store.js';
import type { EntityStore, FieldMap, StoredRow } from '../storage/entity-store.js';
import { ENTITY_SCHEMA } from '../storage/schema.js';
import type { EntityKind } from '../storage/schema.js';
import { MAPPERS } from './mappers.js';

export type OutcomeStatus = 'created' | 'updated' | 'unchanged';

export interface Outcome {
  kind: EntityKind;
  status: OutcomeStatus;
  entityId: string;
}

export type Clock = () => Date;

export const RECONCILER_CLOCK = Symbol('RECONCILER_CLOCK');

/**
 * Lookup-or-insert of one external record by natural key.
 *
 * Storage is always the source of truth: every call looks up by the primary
 * key, then each secondary key, before inserting. A unique-key collision on
 * insert (a concurrent writer won) is retried once through lookup + update.
 * `updatedAt` is refreshed on every pass and never moves backwards.
 */
@Injectable()
export class ReconcilerService {
  private readonly logger = new Logger(ReconcilerService.name);
  private readonly clock: Clock;

  constructor(@Optional() @Inject(RECONCILER_CLOCK) clock?: Clock) {
    this.clock = clock ?? (() => new Date());
  }

  async reconcile(
    store: EntityStore,
    kind: EntityKind,
    raw: RawRecord,
    parents: FieldMap = {},
  ): Promise<Outcome> {
    const desired: FieldMap = { ...MAPPERS[kind](raw), ...parents };
    await this.assertParents(store, kind, parents);

    const existing = await this.lookup(store, kind, desired);
    if (existing) return this.applyUpdate(store, kind, existing, desired);

    const now = this.clock();
    try {
      const entityId = await store.insert(kind, { ...desired, createdAt: now, updatedAt: now });
      return { kind, status: 'created', entityId };
    } catch (error: unknown) {
      if (!(error instanceof StorageConstraintError)) throw error;

      const winner = await this.lookup(store, kind, desired);
      if (!winner) throw error;
      this.logger.debug(`${kind} insert collided with a concurrent writer, updating ${winner.id}`);
      return this.applyUpdate(store, kind, winner, desired);
    }
  }

  private async assertParents(store: EntityStore, kind: EntityKind, parents: FieldMap): Promise<void> {
    for (const ref of ENTITY_SCHEMA[kind].parents) {
      const value = parents[ref.field];
      if (value === undefined || value === null) {
        if (ref.required) {
          throw new ReferentialIntegrityError(`${kind} requires ${ref.field} (${ref.kind})`);
        }
        continue;
      }
      if (typeof value !== 'string' || !(await store.exists(ref.kind, value))) {
        throw new ReferentialIntegrityError(
          `${kind}.${ref.field} references unknown ${ref.kind} ${String(value)}`,
        );
      }
    }
  }

  private async lookup(store: EntityStore, kind: EntityKind, desired: FieldMap): Promise<StoredRow | null> {
    for (const keySet of ENTITY_SCHEMA[kind].naturalKeys) {
      const where: FieldMap = {};
      let complete = true;
      for (const field of keySet) {
        const value = desired[field];
        if (value === undefined || value === null) {
          complete = false;
          break;
        }
        where[field] = value;
      }
      if (!complete) continue;

      const row = await store.findOne(kind, where);
      if (row) return row;
    }
    return null;
  }

  private async applyUpdate(
    store: EntityStore,
    kind: EntityKind,
    existing: StoredRow,
    desired: FieldMap,
  ): Promise<Outcome> {
    const changed: FieldMap = {};
    for (const [field, value] of Object.entries(desired)) {
      if (!sameFieldValue(existing.fields[field], value)) changed[field] = value;
    }

    const now = this.clock();
    const lastSeen = existing.fields.updatedAt;
    const updatedAt = lastSeen instanceof Date && lastSeen > now ? lastSeen : now;

    const status: OutcomeStatus = Object.keys(changed).length > 0 ? 'updated' : 'unchanged';
    await store.update(kind, existing.id, { ...changed, updatedAt });
    return { kind, status, entityId: existing.id };
  }
}
