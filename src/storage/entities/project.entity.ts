import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ schema: 'hosting', name: 'projects' })
export class ProjectEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'workspace_id' }) workspaceId!: string;
  @Column('text') uuid!: string;
  @Column('text') key!: string;
  @Column('text') name!: string;
  @Column('text', { nullable: true }) description!: string | null;
  @Column('boolean', { nullable: true, name: 'is_private' }) isPrivate!: boolean | null;
  @Column('timestamptz', { nullable: true, name: 'created_on' }) createdOn!: Date | null;
  @Column('timestamptz', { nullable: true, name: 'updated_on' }) updatedOn!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
