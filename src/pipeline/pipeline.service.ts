import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { SYNC_CONFIG, assertCredentials } from '../config/sync.config.js';
import type { SyncConfig } from '../config/sync.config.js';
import { targetLabel } from '../config/sync-target.js';
import type { Platform, SyncTarget } from '../config/sync-target.js';
import { HostingHierarchyService } from '../hierarchy/hosting-hierarchy.service.js';
import { QualityHierarchyService } from '../hierarchy/quality-hierarchy.service.js';
import { sumStats } from '../hierarchy/unit-stats.js';
import type { KindStats, UnitReport } from '../hierarchy/unit-stats.js';
import { ConfigurationError, RunInProgressError, describeError } from '../raw/errors.js';
import type { ErrorDescription } from '../raw/errors.js';
import { PaginatedFetcher } from '../raw/paginated-fetcher.js';
import type { Sleep } from '../raw/paginated-fetcher.js';
import { RateLimiter } from '../raw/rate-limiter.js';

export const FETCHER_SLEEP = Symbol('FETCHER_SLEEP');

export interface RunOptions {
  /** Defaults to the configured targets. */
  targets?: readonly SyncTarget[];
  signal?: AbortSignal;
  /** Targets processed side by side; defaults to SYNC_CONCURRENCY. */
  concurrency?: number;
}

export type TargetStatus = 'succeeded' | 'failed' | 'skipped';

export interface TargetResult {
  target: string;
  platform: Platform;
  status: TargetStatus;
  error?: ErrorDescription;
  units: UnitReport[];
  counts: KindStats;
}

export interface RunTotals {
  targets: number;
  succeeded: number;
  failed: number;
  skipped: number;
  created: number;
  updated: number;
  unchanged: number;
  recordFailures: number;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  cancelled: boolean;
  targets: TargetResult[];
  totals: RunTotals;
}

type Fetchers = Record<Platform, PaginatedFetcher>;

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);
  private running = false;

  constructor(
    @Inject(SYNC_CONFIG) private readonly config: SyncConfig,
    private readonly hosting: HostingHierarchyService,
    private readonly quality: QualityHierarchyService,
    @Optional() @Inject(FETCHER_SLEEP) private readonly sleep?: Sleep,
  ) {}

  /**
   * Syncs every target, isolating failures per target. Only configuration
   * problems and an overlapping run reject; everything else ends up in the
   * summary. One run at a time per process, whoever triggers it.
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    const targets = options.targets ?? this.config.targets;
    if (targets.length === 0) {
      throw new ConfigurationError(`No sync targets configured (${this.config.targetsFile})`);
    }
    assertCredentials(this.config, targets);
    const concurrency = options.concurrency ?? this.config.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    if (this.running) {
      throw new RunInProgressError('A sync run is already in progress');
    }
    this.running = true;
    try {
      return await this.runTargets(targets, concurrency, options.signal);
    } finally {
      this.running = false;
    }
  }

  private async runTargets(
    targets: readonly SyncTarget[],
    concurrency: number,
    signal?: AbortSignal,
  ): Promise<RunSummary> {
    const fetchers = this.createFetchers();
    const started = Date.now();
    this.logger.log(`🚀 Sync run started: ${targets.length} targets, concurrency ${concurrency}`);

    const results: TargetResult[] = [];
    for (let i = 0; i < targets.length; i += concurrency) {
      const batch = targets.slice(i, i + concurrency);
      const settled = await Promise.allSettled(
        batch.map((target) => this.syncTarget(target, fetchers, signal)),
      );
      settled.forEach((outcome, index) => {
        const target = batch[index];
        results.push(
          outcome.status === 'fulfilled'
            ? outcome.value
            : failedResult(target, describeError(outcome.reason), []),
        );
      });
    }

    const finished = Date.now();
    const summary: RunSummary = {
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
      cancelled: signal?.aborted ?? false,
      targets: results,
      totals: summarize(results),
    };

    const { totals } = summary;
    this.logger.log(
      `🏁 Sync run finished in ${summary.durationMs}ms: ${totals.succeeded} succeeded, ${totals.failed} failed, ${totals.skipped} skipped`,
    );
    for (const [platform, fetcher] of Object.entries(fetchers)) {
      this.logger.debug(`Rate limiter ${platform}: ${JSON.stringify(fetcher.limiter.status())}`);
    }
    return summary;
  }

  private async syncTarget(
    target: SyncTarget,
    fetchers: Fetchers,
    signal?: AbortSignal,
  ): Promise<TargetResult> {
    const label = targetLabel(target);
    if (signal?.aborted) {
      this.logger.warn(`Skipping ${label}: run cancelled`);
      return { target: label, platform: target.platform, status: 'skipped', units: [], counts: sumStats([]) };
    }

    this.logger.log(`Syncing ${label}...`);
    try {
      const run = { fetcher: fetchers[target.platform], pageSize: this.config.pageSize };
      const units =
        target.platform === 'bitbucket'
          ? await this.hosting.sync(target, run)
          : await this.quality.sync(target, { ...run, metricKeys: this.config.metricKeys });

      const failedUnit = units.find((unit) => unit.status === 'failed');
      if (failedUnit) {
        const reason = failedUnit.error ?? { kind: 'UnknownError', message: 'unit failed' };
        const failed = units.filter((unit) => unit.status === 'failed').length;
        this.logger.warn(`❌ ${label}: ${failed}/${units.length} units failed`);
        return failedResult(target, { kind: reason.kind, message: `${failedUnit.unit}: ${reason.message}` }, units);
      }

      const counts = sumStats(units);
      this.logger.log(
        `✅ ${label}: ${counts.created} created, ${counts.updated} updated, ${counts.unchanged} unchanged, ${counts.failed} failed records`,
      );
      return { target: label, platform: target.platform, status: 'succeeded', units, counts };
    } catch (error: unknown) {
      this.logger.error(`❌ ${label} failed: ${describeError(error).message}`);
      throw error; // Re-throw to be caught by Promise.allSettled
    }
  }

  /** One limiter per platform, shared by every target of the run. */
  private createFetchers(): Fetchers {
    const fetcherFor = (platform: Platform) =>
      new PaginatedFetcher(
        new RateLimiter(platform, {
          quota: this.config.rateLimit,
          windowMs: this.config.rateWindowMs,
          baseBackoffMs: this.config.backoffBaseMs,
          maxBackoffMs: this.config.backoffMaxMs,
        }),
        {
          maxAttempts: this.config.retryAttempts,
          baseDelayMs: this.config.backoffBaseMs,
          maxDelayMs: this.config.backoffMaxMs,
          sleep: this.sleep,
        },
      );
    return { bitbucket: fetcherFor('bitbucket'), sonarcloud: fetcherFor('sonarcloud') };
  }
}

function failedResult(target: SyncTarget, error: ErrorDescription, units: UnitReport[]): TargetResult {
  return {
    target: targetLabel(target),
    platform: target.platform,
    status: 'failed',
    error,
    units,
    counts: sumStats(units),
  };
}

function summarize(results: readonly TargetResult[]): RunTotals {
  const totals: RunTotals = {
    targets: results.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    recordFailures: 0,
  };
  for (const result of results) {
    totals[result.status] += 1;
    totals.created += result.counts.created;
    totals.updated += result.counts.updated;
    totals.unchanged += result.counts.unchanged;
    totals.recordFailures += result.counts.failed;
  }
  return totals;
}

/** 0 when every target succeeded, 1 when any failed or was skipped. */
export function exitCodeFor(summary: RunSummary): 0 | 1 {
  return summary.totals.failed === 0 && summary.totals.skipped === 0 ? 0 : 1;
}
