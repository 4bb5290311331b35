import { describeError } from '../raw/errors.js';
import type { ErrorDescription } from '../raw/errors.js';
import type { Outcome } from '../reconcile/reconciler.service.js';
import type { EntityKind } from '../storage/schema.js';

export interface KindStats {
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
}

export interface RecordFailure {
  kind: EntityKind;
  naturalKey: string | null;
  errorKind: string;
  message: string;
}

export type LinkStatus = 'linked' | 'unchanged' | 'unmatched' | 'ambiguous' | 'claimed';

export interface UnitReport {
  /** e.g. "repository acme/payments-api" */
  unit: string;
  status: 'committed' | 'failed';
  stats: Partial<Record<EntityKind, KindStats>>;
  failures: RecordFailure[];
  error?: ErrorDescription;
  link?: LinkStatus;
}

const emptyStats = (): KindStats => ({ created: 0, updated: 0, unchanged: 0, failed: 0 });

/** Per-unit counters, discarded when the unit's transaction rolls back. */
export class UnitStats {
  private stats: Partial<Record<EntityKind, KindStats>> = {};
  private failures: RecordFailure[] = [];
  private link?: LinkStatus;

  constructor(readonly unit: string) {}

  record(outcome: Outcome): void {
    this.bucket(outcome.kind)[outcome.status] += 1;
  }

  fail(kind: EntityKind, naturalKey: string | null, error: unknown): void {
    this.bucket(kind).failed += 1;
    const { kind: errorKind, message } = describeError(error);
    this.failures.push({ kind, naturalKey, errorKind, message });
  }

  linked(status: LinkStatus): void {
    this.link = status;
  }

  committed(): UnitReport {
    return {
      unit: this.unit,
      status: 'committed',
      stats: this.stats,
      failures: this.failures,
      ...(this.link ? { link: this.link } : {}),
    };
  }

  /** Nothing of the unit was kept, so per-record counts are dropped. */
  failed(error: unknown): UnitReport {
    this.stats = {};
    this.failures = [];
    return {
      unit: this.unit,
      status: 'failed',
      stats: {},
      failures: [],
      error: describeError(error),
    };
  }

  private bucket(kind: EntityKind): KindStats {
    const existing = this.stats[kind];
    if (existing) return existing;
    const created = emptyStats();
    this.stats[kind] = created;
    return created;
  }
}

export function sumStats(reports: readonly UnitReport[]): KindStats {
  const total = emptyStats();
  for (const report of reports) {
    for (const stats of Object.values(report.stats)) {
      if (!stats) continue;
      total.created += stats.created;
      total.updated += stats.updated;
      total.unchanged += stats.unchanged;
      total.failed += stats.failed;
    }
  }
  return total;
}
