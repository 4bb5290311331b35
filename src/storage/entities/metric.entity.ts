import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ schema: 'quality', name: 'metrics' })
export class MetricEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'analysis_project_id' }) analysisProjectId!: string;
  @Column('text', { name: 'metric_key' }) metricKey!: string;
  @Column('double precision', { nullable: true }) value!: number | null;
  @Column('text', { nullable: true, name: 'value_text' }) valueText!: string | null;
  @Column('boolean', { nullable: true, name: 'best_value' }) bestValue!: boolean | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
