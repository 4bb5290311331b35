import { Inject, Injectable, Logger } from '@nestjs/common';
import type { HostingTarget } from '../config/sync-target.js';
import { describeError } from '../raw/errors.js';
import { HOSTING_CLIENT } from '../raw/platform-client.tokens.js';
import type { HostingClient, RawRecord } from '../raw/platform-client-interface.js';
import { optionalString, requireString } from '../reconcile/raw-fields.js';
import { ReconcilerService } from '../reconcile/reconciler.service.js';
import { STORAGE_GATEWAY } from '../storage/entity-store.js';
import type { StorageGateway } from '../storage/entity-store.js';
import { reconcileChild } from './types.js';
import type { HierarchyRun } from './types.js';
import { UnitStats, sumStats } from './unit-stats.js';
import type { UnitReport } from './unit-stats.js';

interface WorkspaceUnit {
  workspaceId: string;
  /** project key -> surrogate id */
  projectIds: Map<string, string>;
  report: UnitReport;
}

/**
 * Workspace -> project -> repository -> {commit, pull request, branch}.
 *
 * The workspace and its projects form the first unit of work; each repository
 * with its children is a unit of its own. Network fetches for a unit finish
 * before its transaction opens.
 */
@Injectable()
export class HostingHierarchyService {
  private readonly logger = new Logger(HostingHierarchyService.name);

  constructor(
    @Inject(HOSTING_CLIENT) private readonly client: HostingClient,
    @Inject(STORAGE_GATEWAY) private readonly storage: StorageGateway,
    private readonly reconciler: ReconcilerService,
  ) {}

  async sync(target: HostingTarget, run: HierarchyRun): Promise<UnitReport[]> {
    const ws = target.workspace;
    const { fetcher } = run;

    const workspace = await fetcher.call(`workspace ${ws}`, () => this.client.getWorkspace(ws));
    const repositories = await this.fetchRepositories(target, run);
    const projects = await this.fetchProjects(target, repositories, run);
    this.logger.log(
      `Workspace ${ws}: ${projects.length} projects, ${repositories.length} repositories in scope`,
    );

    const unit = await this.syncWorkspaceUnit(ws, workspace, projects);
    const reports = [unit.report];
    for (const repository of repositories) {
      reports.push(await this.syncRepositoryUnit(ws, repository, unit, run));
    }
    return reports;
  }

  private fetchRepositories(target: HostingTarget, run: HierarchyRun): Promise<RawRecord[]> {
    const ws = target.workspace;
    if (target.scope === 'repository' && target.repository) {
      const slug = target.repository;
      return run.fetcher
        .call(`repository ${ws}/${slug}`, () => this.client.getRepository(ws, slug))
        .then((repository) => [repository]);
    }
    const projectKey = target.scope === 'project' ? target.project : undefined;
    return run.fetcher.collect(
      `repositories ${ws}${projectKey ? ` (project ${projectKey})` : ''}`,
      this.client.repositories(ws, projectKey),
      run.pageSize,
    );
  }

  private async fetchProjects(
    target: HostingTarget,
    repositories: RawRecord[],
    run: HierarchyRun,
  ): Promise<RawRecord[]> {
    const ws = target.workspace;
    if (target.scope === 'workspace') {
      return run.fetcher.collect(`projects ${ws}`, this.client.projects(ws), run.pageSize);
    }

    const keys =
      target.scope === 'project' && target.project
        ? [target.project]
        : [...new Set(repositories.map((r) => optionalString(r, 'project.key')).filter(isPresent))];

    const projects: RawRecord[] = [];
    for (const key of keys) {
      projects.push(await run.fetcher.call(`project ${ws}/${key}`, () => this.client.getProject(ws, key)));
    }
    return projects;
  }

  private async syncWorkspaceUnit(
    ws: string,
    workspaceRaw: RawRecord,
    projects: RawRecord[],
  ): Promise<WorkspaceUnit> {
    const stats = new UnitStats(`workspace ${ws}`);
    try {
      const unit = await this.storage.transaction(async (store) => {
        const workspace = await this.reconciler.reconcile(store, 'workspace', workspaceRaw);
        stats.record(workspace);

        const projectIds = new Map<string, string>();
        for (const raw of projects) {
          const outcome = await reconcileChild(this.reconciler, store, stats, this.logger, 'project', raw, {
            workspaceId: workspace.entityId,
          });
          const key = optionalString(raw, 'key');
          if (outcome && key) projectIds.set(key, outcome.entityId);
        }
        return { workspaceId: workspace.entityId, projectIds };
      });
      return { ...unit, report: stats.committed() };
    } catch (error: unknown) {
      // Repositories cannot attach without their workspace
      this.logger.error(`❌ workspace ${ws} rolled back: ${describeError(error).message}`);
      throw error;
    }
  }

  private async syncRepositoryUnit(
    ws: string,
    repositoryRaw: RawRecord,
    workspace: WorkspaceUnit,
    run: HierarchyRun,
  ): Promise<UnitReport> {
    const stats = new UnitStats(`repository ${ws}/${optionalString(repositoryRaw, 'slug') ?? '?'}`);
    try {
      const slug = requireString(repositoryRaw, 'slug', 'repository');
      const { fetcher, pageSize } = run;
      const commits = await fetcher.collect(`commits ${ws}/${slug}`, this.client.commits(ws, slug), pageSize);
      const pullRequests = await fetcher.collect(
        `pull requests ${ws}/${slug}`,
        this.client.pullRequests(ws, slug),
        pageSize,
      );
      const branches = await fetcher.collect(`branches ${ws}/${slug}`, this.client.branches(ws, slug), pageSize);

      const projectKey = optionalString(repositoryRaw, 'project.key');
      const parents = {
        workspaceId: workspace.workspaceId,
        projectId: projectKey ? (workspace.projectIds.get(projectKey) ?? null) : null,
      };

      await this.storage.transaction(async (store) => {
        const repository = await this.reconciler.reconcile(store, 'repository', repositoryRaw, parents);
        stats.record(repository);

        const children = { repositoryId: repository.entityId };
        for (const raw of commits) {
          await reconcileChild(this.reconciler, store, stats, this.logger, 'commit', raw, children);
        }
        for (const raw of pullRequests) {
          await reconcileChild(this.reconciler, store, stats, this.logger, 'pullRequest', raw, children);
        }
        for (const raw of branches) {
          await reconcileChild(this.reconciler, store, stats, this.logger, 'branch', raw, children);
        }
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

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}
