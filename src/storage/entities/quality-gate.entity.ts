import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import type { QualityGateStatus } from '../enums.js';

@Entity({ schema: 'quality', name: 'quality_gates' })
export class QualityGateEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'analysis_project_id' }) analysisProjectId!: string;
  /** Analysis date of the snapshot the verdict belongs to, or 'latest'. */
  @Column('text', { name: 'analysis_key' }) analysisKey!: string;
  @Column('text') status!: QualityGateStatus;
  @Column('int', { name: 'condition_count', default: 0 }) conditionCount!: number;
  @Column('int', { name: 'failed_condition_count', default: 0 }) failedConditionCount!: number;
  @Column('boolean', { nullable: true, name: 'ignored_conditions' }) ignoredConditions!: boolean | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
