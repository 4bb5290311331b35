// Identity and reference rules per entity kind. Shared by both storage
// implementations (unique/foreign-key enforcement) and the reconciler (lookups).

export type HostingKind = 'workspace' | 'project' | 'repository' | 'commit' | 'pullRequest' | 'branch';
export type QualityKind =
  | 'organization'
  | 'analysisProject'
  | 'issue'
  | 'securityHotspot'
  | 'qualityGate'
  | 'metric';
export type EntityKind = HostingKind | QualityKind;

export interface ParentRef {
  field: string;
  kind: EntityKind;
  required: boolean;
}

export interface KindSchema {
  /** Lookup order: primary natural key first, then secondary keys. All unique. */
  naturalKeys: readonly (readonly string[])[];
  /** Unique column sets that are not used for identity lookups. */
  uniques?: readonly (readonly string[])[];
  parents: readonly ParentRef[];
}

export const ENTITY_SCHEMA: Record<EntityKind, KindSchema> = {
  workspace: {
    naturalKeys: [['uuid'], ['slug']],
    parents: [],
  },
  project: {
    naturalKeys: [['uuid'], ['workspaceId', 'key']],
    parents: [{ field: 'workspaceId', kind: 'workspace', required: true }],
  },
  repository: {
    naturalKeys: [['uuid'], ['workspaceId', 'slug']],
    parents: [
      { field: 'workspaceId', kind: 'workspace', required: true },
      { field: 'projectId', kind: 'project', required: false },
    ],
  },
  commit: {
    naturalKeys: [['hash']],
    parents: [{ field: 'repositoryId', kind: 'repository', required: true }],
  },
  pullRequest: {
    naturalKeys: [['repositoryId', 'number']],
    parents: [{ field: 'repositoryId', kind: 'repository', required: true }],
  },
  branch: {
    naturalKeys: [['repositoryId', 'name']],
    parents: [{ field: 'repositoryId', kind: 'repository', required: true }],
  },
  organization: {
    naturalKeys: [['key']],
    parents: [],
  },
  analysisProject: {
    naturalKeys: [['key']],
    // one analysis project per repository
    uniques: [['linkedRepositoryId']],
    parents: [
      { field: 'organizationId', kind: 'organization', required: true },
      { field: 'linkedRepositoryId', kind: 'repository', required: false },
    ],
  },
  issue: {
    naturalKeys: [['key']],
    parents: [{ field: 'analysisProjectId', kind: 'analysisProject', required: true }],
  },
  securityHotspot: {
    naturalKeys: [['key']],
    parents: [{ field: 'analysisProjectId', kind: 'analysisProject', required: true }],
  },
  qualityGate: {
    naturalKeys: [['analysisProjectId', 'analysisKey']],
    parents: [{ field: 'analysisProjectId', kind: 'analysisProject', required: true }],
  },
  metric: {
    naturalKeys: [['analysisProjectId', 'metricKey']],
    parents: [{ field: 'analysisProjectId', kind: 'analysisProject', required: true }],
  },
};

export const ENTITY_KINDS = Object.keys(ENTITY_SCHEMA).filter(isEntityKind);

export function isEntityKind(value: string): value is EntityKind {
  return Object.prototype.hasOwnProperty.call(ENTITY_SCHEMA, value);
}

export function uniqueKeySets(kind: EntityKind): readonly (readonly string[])[] {
  const schema = ENTITY_SCHEMA[kind];
  return [...schema.naturalKeys, ...(schema.uniques ?? [])];
}
