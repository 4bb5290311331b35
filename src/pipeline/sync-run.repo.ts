import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { exitCodeFor } from './pipeline.service.js';
import type { RunSummary } from './pipeline.service.js';
import { SyncRun } from './sync-run.entity.js';
import type { RunTrigger } from './sync-run.entity.js';

@Injectable()
export class SyncRunRepo {
  constructor(
    @InjectRepository(SyncRun)
    private readonly repo: Repository<SyncRun>,
  ) {}

  async record(trigger: RunTrigger, summary: RunSummary): Promise<SyncRun> {
    return this.repo.save(
      this.repo.create({
        trigger,
        exitCode: exitCodeFor(summary),
        cancelled: summary.cancelled,
        startedAt: new Date(summary.startedAt),
        finishedAt: new Date(summary.finishedAt),
        targetCount: summary.totals.targets,
        failedCount: summary.totals.failed,
        skippedCount: summary.totals.skipped,
        summary,
      }),
    );
  }

  async latest(limit = 20): Promise<SyncRun[]> {
    return this.repo.find({ order: { startedAt: 'DESC' }, take: limit });
  }
}
