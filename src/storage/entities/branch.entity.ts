import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ schema: 'hosting', name: 'branches' })
export class BranchEntity {
  @PrimaryGeneratedColumn('uuid') id!: string;
  @Column('uuid', { name: 'repository_id' }) repositoryId!: string;
  @Column('text') name!: string;
  @Column('text', { nullable: true, name: 'target_hash' }) targetHash!: string | null;
  @Column('timestamptz', { nullable: true, name: 'target_date' }) targetDate!: Date | null;
  @Column('timestamptz', { name: 'created_at' }) createdAt!: Date;
  @Column('timestamptz', { name: 'updated_at' }) updatedAt!: Date;
}
