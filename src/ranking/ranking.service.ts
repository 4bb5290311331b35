import { Inject, Injectable, Logger } from '@nestjs/common';
import { STORAGE_GATEWAY } from '../storage/entity-store.js';
import type { FieldValue, StorageGateway, StoredRow } from '../storage/entity-store.js';
import { rank, severityWeight } from './ranking.js';
import type { Ranked, RankingInput } from './ranking.js';

export interface RankingEntry extends RankingInput {
  /** Surrogate id of the analysis project. */
  id: string;
  projectKey: string;
  name: string | null;
  linkedRepositoryId: string | null;
}

const OPEN_ISSUE_STATUSES = new Set(['OPEN', 'REOPENED', 'CONFIRMED']);

/** Read-only pass over reconciled quality data. */
@Injectable()
export class RankingService {
  private readonly logger = new Logger(RankingService.name);

  constructor(@Inject(STORAGE_GATEWAY) private readonly storage: StorageGateway) {}

  async computeRanking(): Promise<Ranked<RankingEntry>[]> {
    const { store } = this.storage;
    const projects = await store.find('analysisProject');
    const metrics = groupByProject(await store.find('metric'));
    const issues = groupByProject(await store.find('issue'));
    const hotspots = groupByProject(await store.find('securityHotspot'));

    const entries = projects.map((project): RankingEntry => {
      const own = metrics.get(project.id) ?? [];
      const metric = (key: string) => {
        const row = own.find((m) => m.fields.metricKey === key);
        return row ? numberOrNull(row.fields.value) : null;
      };
      const openIssues = (issues.get(project.id) ?? []).filter((i) =>
        OPEN_ISSUE_STATUSES.has(String(i.fields.status)),
      );

      return {
        id: project.id,
        projectKey: String(project.fields.key),
        name: stringOrNull(project.fields.name),
        linkedRepositoryId: stringOrNull(project.fields.linkedRepositoryId),
        coverage: metric('coverage'),
        duplication: metric('duplicated_lines_density'),
        newIssues: metric('new_violations') ?? openIssues.length,
        worstHotspot: worstSeverity(hotspots.get(project.id) ?? []),
      };
    });

    const ranked = rank(entries);
    this.logger.log(`Ranked ${ranked.length} analysis projects`);
    return ranked;
  }
}

function worstSeverity(hotspots: StoredRow[]): string | null {
  let worst: string | null = null;
  for (const hotspot of hotspots) {
    if (hotspot.fields.status === 'REVIEWED') continue;
    const severity = stringOrNull(hotspot.fields.severity);
    const weight = severityWeight(severity);
    if (weight === null) continue;
    if (worst === null || weight > (severityWeight(worst) ?? -1)) worst = severity;
  }
  return worst;
}

function groupByProject(rows: StoredRow[]): Map<string, StoredRow[]> {
  const groups = new Map<string, StoredRow[]>();
  for (const row of rows) {
    const projectId = stringOrNull(row.fields.analysisProjectId);
    if (!projectId) continue;
    const group = groups.get(projectId);
    if (group) group.push(row);
    else groups.set(projectId, [row]);
  }
  return groups;
}

function numberOrNull(value: FieldValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringOrNull(value: FieldValue | undefined): string | null {
  return typeof value === 'string' ? value : null;
}
