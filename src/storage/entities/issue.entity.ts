import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import type { IssueSeverity, IssueStatus, IssueType } from '../enums.js';

@Entity({ schema: 'quality', name: 'issues' })
export class IssueEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'analysis_project_id' }) analysisProjectId!: string;
  @Column('text') key!: string;
  @Column('text') rule!: string;
  @Column('text') severity!: IssueSeverity;
  @Column('text') type!: IssueType;
  @Column('text') status!: IssueStatus;
  @Column('text', { nullable: true }) resolution!: string | null;
  @Column('text', { nullable: true }) message!: string | null;
  @Column('text', { nullable: true }) component!: string | null;
  @Column('int', { nullable: true }) line!: number | null;
  @Column('text', { nullable: true }) effort!: string | null;
  @Column('text', { nullable: true }) author!: string | null;
  @Column('timestamptz', { nullable: true, name: 'creation_date' }) creationDate!: Date | null;
  @Column('timestamptz', { nullable: true, name: 'update_date' }) updateDate!: Date | null;
  @Column('timestamptz', { nullable: true, name: 'close_date' }) closeDate!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
