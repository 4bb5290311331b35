import type { Logger } from '@nestjs/common';
import { DataContractViolation, StorageConstraintError, describeError } from '../raw/errors.js';
import type { PaginatedFetcher } from '../raw/paginated-fetcher.js';
import type { RawRecord } from '../raw/platform-client-interface.js';
import { recordLabel } from '../reconcile/mappers.js';
import type { Outcome, ReconcilerService } from '../reconcile/reconciler.service.js';
import type { EntityStore, FieldMap } from '../storage/entity-store.js';
import type { EntityKind } from '../storage/schema.js';
import type { UnitStats } from './unit-stats.js';

/** Per-run collaborators handed down by the batch orchestrator. */
export interface HierarchyRun {
  fetcher: PaginatedFetcher;
  pageSize: number;
}

/**
 * Writes one child record inside a savepoint. Record-level failures are
 * counted and skipped; anything else (a missing parent included) aborts the unit.
 */
export async function reconcileChild(
  reconciler: ReconcilerService,
  store: EntityStore,
  stats: UnitStats,
  logger: Logger,
  kind: EntityKind,
  raw: RawRecord,
  parents: FieldMap,
): Promise<Outcome | null> {
  try {
    const outcome = await store.savepoint(() => reconciler.reconcile(store, kind, raw, parents));
    stats.record(outcome);
    return outcome;
  } catch (error: unknown) {
    if (error instanceof DataContractViolation || error instanceof StorageConstraintError) {
      const naturalKey = recordLabel(raw);
      stats.fail(kind, naturalKey, error);
      logger.warn(`Skipping ${kind} ${naturalKey ?? '(no key)'} in ${stats.unit}: ${describeError(error).message}`);
      return null;
    }
    throw error;
  }
}
