import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ schema: 'hosting', name: 'commits' })
export class CommitEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'repository_id' }) repositoryId!: string;
  @Column('text') hash!: string;
  @Column('text', { nullable: true }) message!: string | null;
  @Column('text', { nullable: true, name: 'author_raw' }) authorRaw!: string | null;
  @Column('text', { nullable: true, name: 'author_name' }) authorName!: string | null;
  @Column('timestamptz', { nullable: true, name: 'committed_at' }) committedAt!: Date | null;
  @Column('boolean', { name: 'is_merge', default: false }) isMerge!: boolean;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
