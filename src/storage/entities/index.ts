import type { ObjectLiteral, ObjectType } from 'typeorm';
import type { EntityKind } from '../schema.js';
import { WorkspaceEntity } from './workspace.entity.js';
import { ProjectEntity } from './project.entity.js';
import { RepositoryEntity } from './repository.entity.js';
import { CommitEntity } from './commit.entity.js';
import { PullRequestEntity } from './pull-request.entity.js';
import { BranchEntity } from './branch.entity.js';
import { OrganizationEntity } from './organization.entity.js';
import { AnalysisProjectEntity } from './analysis-project.entity.js';
import { IssueEntity } from './issue.entity.js';
import { SecurityHotspotEntity } from './security-hotspot.entity.js';
import { QualityGateEntity } from './quality-gate.entity.js';
import { MetricEntity } from './metric.entity.js';

export const ENTITY_TARGETS: Record<EntityKind, ObjectType<ObjectLiteral>> = {
  workspace: WorkspaceEntity,
  project: ProjectEntity,
  repository: RepositoryEntity,
  commit: CommitEntity,
  pullRequest: PullRequestEntity,
  branch: BranchEntity,
  organization: OrganizationEntity,
  analysisProject: AnalysisProjectEntity,
  issue: IssueEntity,
  securityHotspot: SecurityHotspotEntity,
  qualityGate: QualityGateEntity,
  metric: MetricEntity,
};

export const SYNC_ENTITIES = Object.values(ENTITY_TARGETS);

export {
  WorkspaceEntity,
  ProjectEntity,
  RepositoryEntity,
  CommitEntity,
  PullRequestEntity,
  BranchEntity,
  OrganizationEntity,
  AnalysisProjectEntity,
  IssueEntity,
  SecurityHotspotEntity,
  QualityGateEntity,
  MetricEntity,
};
