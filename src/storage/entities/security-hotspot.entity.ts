import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import type { HotspotResolution, HotspotSeverity, HotspotStatus } from '../enums.js';

@Entity({ schema: 'quality', name: 'security_hotspots' })
export class SecurityHotspotEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'analysis_project_id' }) analysisProjectId!: string;
  @Column('text') key!: string;
  @Column('text', { nullable: true, name: 'rule_key' }) ruleKey!: string | null;
  @Column('text', { nullable: true }) component!: string | null;
  @Column('int', { nullable: true }) line!: number | null;
  @Column('text', { nullable: true }) message!: string | null;
  @Column('text') status!: HotspotStatus;
  @Column('text', { nullable: true }) resolution!: HotspotResolution | null;
  @Column('text') severity!: HotspotSeverity;
  @Column('text', { nullable: true, name: 'security_category' }) securityCategory!: string | null;
  @Column('text', { nullable: true }) author!: string | null;
  @Column('timestamptz', { nullable: true, name: 'creation_date' }) creationDate!: Date | null;
  @Column('timestamptz', { nullable: true, name: 'update_date' }) updateDate!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
