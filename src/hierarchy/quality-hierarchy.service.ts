import { Inject, Injectable, Logger } from '@nestjs/common';
import type { QualityTarget } from '../config/sync-target.js';
import { describeError } from '../raw/errors.js';
import { QUALITY_CLIENT } from '../raw/platform-client.tokens.js';
import type { QualityClient, RawRecord } from '../raw/platform-client-interface.js';
import { optionalString, requireString } from '../reconcile/raw-fields.js';
import { ReconcilerService } from '../reconcile/reconciler.service.js';
import { STORAGE_GATEWAY } from '../storage/entity-store.js';
import type { StorageGateway } from '../storage/entity-store.js';
import { RepositoryLinker } from './repository-linker.js';
import { reconcileChild } from './types.js';
import type { HierarchyRun } from './types.js';
import { UnitStats, sumStats } from './unit-stats.js';
import type { UnitReport } from './unit-stats.js';

export interface QualityRun extends HierarchyRun {
  metricKeys: string[];
}

/**
 * Organization -> analysis project -> {issue, hotspot, quality gate, metric}.
 *
 * The organization is its own unit; each analysis project with its children
 * and its repository cross-link is one more.
 */
@Injectable()
export class QualityHierarchyService {
  private readonly logger = new Logger(QualityHierarchyService.name);

  constructor(
    @Inject(QUALITY_CLIENT) private readonly client: QualityClient,
    @Inject(STORAGE_GATEWAY) private readonly storage: StorageGateway,
    private readonly reconciler: ReconcilerService,
    private readonly linker: RepositoryLinker,
  ) {}

  async sync(target: QualityTarget, run: QualityRun): Promise<UnitReport[]> {
    const org = target.organization;
    const { fetcher } = run;

    const organization = await fetcher.call(`organization ${org}`, () => this.client.getOrganization(org));
    const projects =
      target.scope === 'project' && target.project
        ? [await this.fetchProject(target.project, run)]
        : await fetcher.collect(`projects ${org}`, this.client.projects(org), run.pageSize);
    this.logger.log(`Organization ${org}: ${projects.length} analysis projects in scope`);

    const { organizationId, report } = await this.syncOrganizationUnit(org, organization);
    const reports = [report];
    for (const project of projects) {
      reports.push(await this.syncProjectUnit(organizationId, project, run));
    }
    return reports;
  }

  private fetchProject(projectKey: string, run: HierarchyRun): Promise<RawRecord> {
    return run.fetcher.call(`project ${projectKey}`, () => this.client.getProject(projectKey));
  }

  private async syncOrganizationUnit(
    org: string,
    organizationRaw: RawRecord,
  ): Promise<{ organizationId: string; report: UnitReport }> {
    const stats = new UnitStats(`organization ${org}`);
    try {
      const organization = await this.storage.transaction((store) =>
        this.reconciler.reconcile(store, 'organization', organizationRaw),
      );
      stats.record(organization);
      return { organizationId: organization.entityId, report: stats.committed() };
    } catch (error: unknown) {
      this.logger.error(`❌ organization ${org} rolled back: ${describeError(error).message}`);
      throw error;
    }
  }

  private async syncProjectUnit(
    organizationId: string,
    projectRaw: RawRecord,
    run: QualityRun,
  ): Promise<UnitReport> {
    const stats = new UnitStats(`analysis project ${optionalString(projectRaw, 'key') ?? '?'}`);
    try {
      const key = requireString(projectRaw, 'key', 'analysisProject');
      const { fetcher, pageSize } = run;
      const issues = await fetcher.collect(`issues ${key}`, this.client.issues(key), pageSize);
      const hotspots = await fetcher.collect(`hotspots ${key}`, this.client.hotspots(key), pageSize);
      const gate = await fetcher.call(`quality gate ${key}`, () => this.client.getQualityGate(key));
      const measures = await fetcher.call(`measures ${key}`, () =>
        this.client.getMeasures(key, run.metricKeys),
      );

      // A gate verdict belongs to one analysis snapshot
      const analysisDate =
        optionalString(projectRaw, 'lastAnalysisDate') ?? optionalString(projectRaw, 'analysisDate');
      const gateRaw: RawRecord = { ...gate, analysisDate };

      await this.storage.transaction(async (store) => {
        const project = await this.reconciler.reconcile(store, 'analysisProject', projectRaw, {
          organizationId,
        });
        stats.record(project);

        const children = { analysisProjectId: project.entityId };
        for (const raw of issues) {
          await reconcileChild(this.reconciler, store, stats, this.logger, 'issue', raw, children);
        }
        for (const raw of hotspots) {
          await reconcileChild(this.reconciler, store, stats, this.logger, 'securityHotspot', raw, children);
        }
        await reconcileChild(this.reconciler, store, stats, this.logger, 'qualityGate', gateRaw, children);
        for (const raw of measures) {
          await reconcileChild(this.reconciler, store, stats, this.logger, 'metric', raw, children);
        }

        stats.linked(await this.linker.link(store, project.entityId, key));
      });

      const report = stats.committed();
      const totals = sumStats([report]);
      this.logger.log(
        `✅ ${report.unit}: ${totals.created} created, ${totals.updated} updated, ${totals.unchanged} unchanged, ${totals.failed} failed`,
      );
      return report;
    } catch (error: unknown) {
      this.logger.error(`❌ ${stats.unit} failed: ${describeError(error).message}`);
      return stats.failed(error);
    }
  }
}
