import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

// pg returns BIGINT as a string
const bigintAsNumber = {
  to: (value: number | null) => value,
  from: (value: string | null) => (value === null ? null : Number(value)),
};

@Entity({ schema: 'hosting', name: 'repositories' })
export class RepositoryEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'workspace_id' }) workspaceId!: string;
  @Column('uuid', { nullable: true, name: 'project_id' }) projectId!: string | null;
  @Column('text') uuid!: string;
  @Column('text') slug!: string;
  @Column('text') name!: string;
  @Column('text', { nullable: true, name: 'full_name' }) fullName!: string | null;
  @Column('text', { nullable: true }) description!: string | null;
  @Column('boolean', { nullable: true, name: 'is_private' }) isPrivate!: boolean | null;
  @Column('text', { nullable: true }) language!: string | null;
  @Column('bigint', { nullable: true, name: 'size_bytes', transformer: bigintAsNumber })
  sizeBytes!: number | null;
  @Column('text', { nullable: true, name: 'main_branch' }) mainBranch!: string | null;
  @Column('timestamptz', { nullable: true, name: 'created_on' }) createdOn!: Date | null;
  @Column('timestamptz', { nullable: true, name: 'updated_on' }) updatedOn!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
