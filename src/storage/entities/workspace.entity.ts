import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ schema: 'hosting', name: 'workspaces' })
export class WorkspaceEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('text') uuid!: string;
  @Column('text') slug!: string;
  @Column('text') name!: string;
  @Column('boolean', { nullable: true, name: 'is_private' }) isPrivate!: boolean | null;
  @Column('timestamptz', { nullable: true, name: 'created_on' }) createdOn!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
