import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';
import type { RunSummary } from './pipeline.service.js';

export type RunTrigger = 'http' | 'cli' | 'schedule';

@Entity({ schema: 'sync', name: 'sync_runs' })
export class SyncRun {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('varchar', { length: 20 }) trigger!: RunTrigger;
  @Column('int', { name: 'exit_code' }) exitCode!: number;
  @Column('boolean', { default: false }) cancelled!: boolean;
  @Column('timestamptz', { name: 'started_at' }) startedAt!: Date;
  @Column('timestamptz', { name: 'finished_at' }) finishedAt!: Date;
  @Column('int', { name: 'target_count' }) targetCount!: number;
  @Column('int', { name: 'failed_count' }) failedCount!: number;
  @Column('int', { name: 'skipped_count' }) skippedCount!: number;
  @Column('jsonb') summary!: RunSummary;
  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' }) createdAt!: Date;
}
