import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import type { PullRequestState } from '../enums.js';

@Entity({ schema: 'hosting', name: 'pull_requests' })
export class PullRequestEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'repository_id' }) repositoryId!: string;
  @Column('int') number!: number;
  @Column('text') title!: string;
  @Column('text', { nullable: true }) description!: string | null;
  @Column('text') state!: PullRequestState;
  @Column('text', { nullable: true, name: 'author_name' }) authorName!: string | null;
  @Column('text', { nullable: true, name: 'source_branch' }) sourceBranch!: string | null;
  @Column('text', { nullable: true, name: 'destination_branch' }) destinationBranch!: string | null;
  @Column('text', { nullable: true, name: 'merge_commit_hash' }) mergeCommitHash!: string | null;
  @Column('int', { nullable: true, name: 'comment_count' }) commentCount!: number | null;
  @Column('int', { nullable: true, name: 'task_count' }) taskCount!: number | null;
  @Column('timestamptz', { nullable: true, name: 'created_on' }) createdOn!: Date | null;
  @Column('timestamptz', { nullable: true, name: 'updated_on' }) updatedOn!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
