import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { SYNC_CONFIG } from '../config/sync.config.js';
import type { SyncConfig } from '../config/sync.config.js';
import { PipelineService } from '../pipeline/pipeline.service.js';
import type { RunSummary } from '../pipeline/pipeline.service.js';
import { SyncRunRepo } from '../pipeline/sync-run.repo.js';
import { RunInProgressError, describeError } from '../raw/errors.js';

@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);

  constructor(
    @Inject(SYNC_CONFIG) private readonly config: SyncConfig,
    private readonly pipelineService: PipelineService,
    private readonly syncRunRepo: SyncRunRepo,
  ) {}

  // Run every day at 2 AM
  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  async handleDailySync(): Promise<void> {
    if (!this.config.scheduleEnabled) return;
    await this.triggerFullSync();
  }

  /** Runs the configured targets unless a run is already in flight. */
  async triggerFullSync(): Promise<RunSummary | null> {
    const controller = new AbortController();
    const timer = this.config.runTimeoutMs
      ? setTimeout(() => controller.abort(), this.config.runTimeoutMs)
      : undefined;
    this.logger.log('Starting scheduled sync...');

    try {
      const summary = await this.pipelineService.run({ signal: controller.signal });
      await this.syncRunRepo.record('schedule', summary);
      this.logger.log(`Scheduled sync completed: ${summary.totals.succeeded}/${summary.totals.targets} targets succeeded`);
      return summary;
    } catch (error: unknown) {
      if (error instanceof RunInProgressError) {
        this.logger.warn('Previous sync still running, skipping this tick');
        return null;
      }
      const { kind, message } = describeError(error);
      this.logger.error(`Scheduled sync failed (${kind}): ${message}`, error instanceof Error ? error.stack : undefined);
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
