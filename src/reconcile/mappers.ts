import { isRawRecord } from '../raw/platform-client-interface.js';
import type { RawRecord } from '../raw/platform-client-interface.js';
import type { FieldMap } from '../storage/entity-store.js';
import type { EntityKind } from '../storage/schema.js';
import {
  HOTSPOT_RESOLUTIONS,
  HOTSPOT_SEVERITIES,
  HOTSPOT_STATUSES,
  ISSUE_SEVERITIES,
  ISSUE_STATUSES,
  ISSUE_TYPES,
  PULL_REQUEST_STATES,
  QUALITY_GATE_STATUSES,
} from '../storage/enums.js';
import {
  optionalBoolean,
  optionalDate,
  optionalEnum,
  optionalNumber,
  optionalString,
  pick,
  requireEnum,
  requireInt,
  requireString,
} from './raw-fields.js';

/**
 * Raw platform record -> business fields of one entity kind.
 * Parent references are not mapped here; the hierarchy services pass them in.
 */
export type Mapper = (raw: RawRecord) => FieldMap;

/* -------- Bitbucket -------- */

export const mapWorkspace: Mapper = (raw) => ({
  uuid: requireString(raw, 'uuid', 'workspace'),
  slug: requireString(raw, 'slug', 'workspace'),
  name: optionalString(raw, 'name') ?? requireString(raw, 'slug', 'workspace'),
  isPrivate: optionalBoolean(raw, 'is_private'),
  createdOn: optionalDate(raw, 'created_on', 'workspace'),
});

export const mapProject: Mapper = (raw) => ({
  uuid: requireString(raw, 'uuid', 'project'),
  key: requireString(raw, 'key', 'project'),
  name: requireString(raw, 'name', 'project'),
  description: optionalString(raw, 'description'),
  isPrivate: optionalBoolean(raw, 'is_private'),
  createdOn: optionalDate(raw, 'created_on', 'project'),
  updatedOn: optionalDate(raw, 'updated_on', 'project'),
});

export const mapRepository: Mapper = (raw) => ({
  uuid: requireString(raw, 'uuid', 'repository'),
  slug: requireString(raw, 'slug', 'repository'),
  name: optionalString(raw, 'name') ?? requireString(raw, 'slug', 'repository'),
  fullName: optionalString(raw, 'full_name'),
  description: optionalString(raw, 'description'),
  isPrivate: optionalBoolean(raw, 'is_private'),
  language: optionalString(raw, 'language'),
  sizeBytes: optionalNumber(raw, 'size'),
  mainBranch: optionalString(raw, 'mainbranch.name'),
  createdOn: optionalDate(raw, 'created_on', 'repository'),
  updatedOn: optionalDate(raw, 'updated_on', 'repository'),
});

export const mapCommit: Mapper = (raw) => {
  const parents = pick(raw, 'parents');
  return {
    hash: requireString(raw, 'hash', 'commit'),
    message: optionalString(raw, 'message'),
    authorRaw: optionalString(raw, 'author.raw'),
    authorName: optionalString(raw, 'author.user.display_name'),
    committedAt: optionalDate(raw, 'date', 'commit'),
    isMerge: Array.isArray(parents) && parents.length > 1,
  };
};

export const mapPullRequest: Mapper = (raw) => ({
  number: requireInt(raw, 'id', 'pullRequest'),
  title: requireString(raw, 'title', 'pullRequest'),
  description: optionalString(raw, 'description'),
  state: requireEnum(raw, 'state', PULL_REQUEST_STATES, 'pullRequest'),
  authorName: optionalString(raw, 'author.display_name'),
  sourceBranch: optionalString(raw, 'source.branch.name'),
  destinationBranch: optionalString(raw, 'destination.branch.name'),
  mergeCommitHash: optionalString(raw, 'merge_commit.hash'),
  commentCount: optionalNumber(raw, 'comment_count'),
  taskCount: optionalNumber(raw, 'task_count'),
  createdOn: optionalDate(raw, 'created_on', 'pullRequest'),
  updatedOn: optionalDate(raw, 'updated_on', 'pullRequest'),
});

export const mapBranch: Mapper = (raw) => ({
  name: requireString(raw, 'name', 'branch'),
  targetHash: optionalString(raw, 'target.hash'),
  targetDate: optionalDate(raw, 'target.date', 'branch'),
});

/* -------- SonarCloud -------- */

export const mapOrganization: Mapper = (raw) => ({
  key: requireString(raw, 'key', 'organization'),
  name: optionalString(raw, 'name') ?? requireString(raw, 'key', 'organization'),
  description: optionalString(raw, 'description'),
  url: optionalString(raw, 'url'),
});

export const mapAnalysisProject: Mapper = (raw) => ({
  key: requireString(raw, 'key', 'analysisProject'),
  name: optionalString(raw, 'name') ?? requireString(raw, 'key', 'analysisProject'),
  qualifier: optionalString(raw, 'qualifier'),
  visibility: optionalString(raw, 'visibility'),
  // projects/search says lastAnalysisDate, components/show says analysisDate
  lastAnalysisDate:
    optionalDate(raw, 'lastAnalysisDate', 'analysisProject') ??
    optionalDate(raw, 'analysisDate', 'analysisProject'),
  revision: optionalString(raw, 'revision'),
});

export const mapIssue: Mapper = (raw) => ({
  key: requireString(raw, 'key', 'issue'),
  rule: requireString(raw, 'rule', 'issue'),
  severity: requireEnum(raw, 'severity', ISSUE_SEVERITIES, 'issue'),
  type: requireEnum(raw, 'type', ISSUE_TYPES, 'issue'),
  status: requireEnum(raw, 'status', ISSUE_STATUSES, 'issue'),
  resolution: optionalString(raw, 'resolution'),
  message: optionalString(raw, 'message'),
  component: optionalString(raw, 'component'),
  line: optionalNumber(raw, 'line'),
  effort: optionalString(raw, 'effort'),
  author: optionalString(raw, 'author'),
  creationDate: optionalDate(raw, 'creationDate', 'issue'),
  updateDate: optionalDate(raw, 'updateDate', 'issue'),
  closeDate: optionalDate(raw, 'closeDate', 'issue'),
});

export const mapSecurityHotspot: Mapper = (raw) => ({
  key: requireString(raw, 'key', 'securityHotspot'),
  ruleKey: optionalString(raw, 'ruleKey'),
  component: optionalString(raw, 'component'),
  line: optionalNumber(raw, 'line'),
  message: optionalString(raw, 'message'),
  status: requireEnum(raw, 'status', HOTSPOT_STATUSES, 'securityHotspot'),
  resolution: optionalEnum(raw, 'resolution', HOTSPOT_RESOLUTIONS, 'securityHotspot'),
  severity: requireEnum(raw, 'vulnerabilityProbability', HOTSPOT_SEVERITIES, 'securityHotspot'),
  securityCategory: optionalString(raw, 'securityCategory'),
  author: optionalString(raw, 'author'),
  creationDate: optionalDate(raw, 'creationDate', 'securityHotspot'),
  updateDate: optionalDate(raw, 'updateDate', 'securityHotspot'),
});

/**
 * `projectStatus` of qualitygates/project_status. The hierarchy service adds
 * `analysisDate` from the owning project so each analysis gets its own row.
 */
export const mapQualityGate: Mapper = (raw) => {
  const conditions = pick(raw, 'conditions');
  const list: unknown[] = Array.isArray(conditions) ? conditions : [];
  return {
    analysisKey: optionalString(raw, 'analysisDate') ?? 'latest',
    status: requireEnum(raw, 'status', QUALITY_GATE_STATUSES, 'qualityGate'),
    conditionCount: list.length,
    failedConditionCount: list.filter((c) => isRawRecord(c) && c.status === 'ERROR').length,
    ignoredConditions: optionalBoolean(raw, 'ignoredConditions'),
  };
};

/** One entry of measures/component `component.measures`. */
export const mapMetric: Mapper = (raw) => {
  const measured = measuredValue(raw);
  return {
    metricKey: requireString(raw, 'metric', 'metric'),
    value: optionalNumber(measured, 'value'),
    valueText: optionalString(measured, 'value'),
    bestValue: optionalBoolean(measured, 'bestValue'),
  };
};

/**
 * The record holding a measure's value. `new_*` measures have no top-level
 * value and report it under `period` (or `periods[0]` on older servers).
 */
function measuredValue(raw: RawRecord): RawRecord {
  if (pick(raw, 'value') !== undefined) return raw;
  const period = pick(raw, 'period');
  if (isRawRecord(period)) return period;
  const periods = pick(raw, 'periods');
  const first: unknown = Array.isArray(periods) ? periods[0] : undefined;
  return isRawRecord(first) ? first : raw;
}

export const MAPPERS: Record<EntityKind, Mapper> = {
  workspace: mapWorkspace,
  project: mapProject,
  repository: mapRepository,
  commit: mapCommit,
  pullRequest: mapPullRequest,
  branch: mapBranch,
  organization: mapOrganization,
  analysisProject: mapAnalysisProject,
  issue: mapIssue,
  securityHotspot: mapSecurityHotspot,
  qualityGate: mapQualityGate,
  metric: mapMetric,
};

const LABEL_FIELDS = ['key', 'hash', 'uuid', 'slug', 'metric', 'name', 'id'];

/** Best-effort natural key of a raw record, for failure reports. */
export function recordLabel(raw: RawRecord): string | null {
  for (const field of LABEL_FIELDS) {
    const value = optionalString(raw, field);
    if (value) return value;
  }
  return null;
}
