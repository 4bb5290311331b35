import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ schema: 'quality', name: 'analysis_projects' })
export class AnalysisProjectEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'organization_id' }) organizationId!: string;
  // unique: one analysis project per repository
  @Column('uuid', { nullable: true, name: 'linked_repository_id' }) linkedRepositoryId!: string | null;
  @Column('text') key!: string;
  @Column('text') name!: string;
  @Column('text', { nullable: true }) qualifier!: string | null;
  @Column('text', { nullable: true }) visibility!: string | null;
  @Column('timestamptz', { nullable: true, name: 'last_analysis_date' }) lastAnalysisDate!: Date | null;
  @Column('text', { nullable: true }) revision!: string | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
