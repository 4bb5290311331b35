import type { RawRecord } from '../raw/platform-client-interface.js';
import type { HostingData, QualityData } from './fake-clients.js';

// Raw records shaped like the platform payloads the mappers read

export const bbWorkspace = (slug: string): RawRecord => ({
  uuid: `{ws-${slug}}`,
  slug,
  name: `${slug} workspace`,
  is_private: true,
});

export const bbProject = (key: string): RawRecord => ({
  uuid: `{proj-${key}}`,
  key,
  name: `Project ${key}`,
  is_private: true,
});

export const bbRepository = (slug: string, projectKey: string): RawRecord => ({
  uuid: `{repo-${slug}}`,
  slug,
  name: slug,
  full_name: `acme/${slug}`,
  language: 'typescript',
  size: 2048,
  mainbranch: { name: 'main' },
  project: { key: projectKey },
  created_on: '2024-01-10T08:00:00+00:00',
});

export const bbCommit = (hash: string, parents = 1): RawRecord => ({
  hash,
  message: `commit ${hash}`,
  author: { raw: 'Dana <dana@example.com>', user: { display_name: 'Dana' } },
  date: '2024-03-01T12:00:00+00:00',
  parents: Array.from({ length: parents }, (_, i) => ({ hash: `${hash}-p${i}` })),
});

export const bbPullRequest = (id: number, state = 'OPEN'): RawRecord => ({
  id,
  title: `PR ${id}`,
  state,
  author: { display_name: 'Dana' },
  source: { branch: { name: `feature/${id}` } },
  destination: { branch: { name: 'main' } },
  comment_count: 2,
  task_count: 0,
});

export const bbBranch = (name: string): RawRecord => ({
  name,
  target: { hash: `tip-${name}`, date: '2024-03-02T09:30:00+00:00' },
});

export const scOrganization = (key: string): RawRecord => ({ key, name: `${key} org` });

export const scProject = (key: string, lastAnalysisDate = '2024-03-05T10:00:00+0000'): RawRecord => ({
  key,
  name: key,
  qualifier: 'TRK',
  visibility: 'private',
  lastAnalysisDate,
});

export const scIssue = (key: string, severity = 'MAJOR', status = 'OPEN'): RawRecord => ({
  key,
  rule: 'typescript:S1481',
  severity,
  type: 'CODE_SMELL',
  status,
  message: 'Remove unused variable',
  component: 'acme:api:src/index.ts',
  line: 12,
});

export const scHotspot = (key: string, vulnerabilityProbability = 'MEDIUM', status = 'TO_REVIEW'): RawRecord => ({
  key,
  ruleKey: 'typescript:S5332',
  component: 'acme:api:src/http.ts',
  status,
  vulnerabilityProbability,
  securityCategory: 'insecure-conf',
});

export const scMeasure = (metric: string, value: string): RawRecord => ({ metric, value });

/** Workspace "acme": project CORE with repositories "api" and "web". */
export function hostingData(): HostingData {
  return {
    workspaces: { acme: bbWorkspace('acme') },
    projects: { acme: [bbProject('CORE')] },
    repositories: { acme: [bbRepository('api', 'CORE'), bbRepository('web', 'CORE')] },
    commits: {
      'acme/api': [bbCommit('a1'), bbCommit('a2', 2)],
      'acme/web': [bbCommit('w1')],
    },
    pullRequests: { 'acme/api': [bbPullRequest(1), bbPullRequest(2, 'MERGED')] },
    branches: { 'acme/api': [bbBranch('main')], 'acme/web': [bbBranch('main')] },
  };
}

/** Organization "acme-org": analysis projects "acme:api" and "acme:web". */
export function qualityData(): QualityData {
  return {
    organizations: { 'acme-org': scOrganization('acme-org') },
    projects: { 'acme-org': [scProject('acme:api'), scProject('acme:web')] },
    issues: {
      'acme:api': [scIssue('i-1'), scIssue('i-2', 'CRITICAL', 'CONFIRMED'), scIssue('i-3', 'MINOR', 'CLOSED')],
    },
    hotspots: { 'acme:api': [scHotspot('h-1', 'HIGH'), scHotspot('h-2', 'CRITICAL', 'REVIEWED')] },
    gates: {
      'acme:api': {
        status: 'ERROR',
        conditions: [
          { metricKey: 'coverage', status: 'ERROR' },
          { metricKey: 'duplicated_lines_density', status: 'OK' },
        ],
        ignoredConditions: false,
      },
    },
    measures: {
      'acme:api': [scMeasure('coverage', '71.5'), scMeasure('duplicated_lines_density', '3.2')],
      'acme:web': [scMeasure('coverage', '88.0'), scMeasure('duplicated_lines_density', '1.0')],
    },
  };
}
