import { NonRetryableApiError } from '../../raw/errors.js';
import { ReconcilerService } from '../../reconcile/reconciler.service.js';
import { MemoryStorage } from '../../storage/memory-storage.js';
import type { EntityKind } from '../../storage/schema.js';
import { FakeHostingClient } from '../../testing/fake-clients.js';
import { bbPullRequest, hostingData } from '../../testing/fixtures.js';
import { testRun } from '../../testing/test-run.js';
import { HostingHierarchyService } from '../hosting-hierarchy.service.js';
import type { HostingTarget } from '../../config/sync-target.js';

const workspaceTarget: HostingTarget = { platform: 'bitbucket', scope: 'workspace', workspace: 'acme' };

const buildService = (client = new FakeHostingClient(hostingData())) => {
  const storage = new MemoryStorage();
  const service = new HostingHierarchyService(client, storage, new ReconcilerService());
  return { service, storage, client };
};

const HOSTING_KINDS: EntityKind[] = ['workspace', 'project', 'repository', 'commit', 'pullRequest', 'branch'];

const rowCounts = async (storage: MemoryStorage) =>
  Object.fromEntries(
    await Promise.all(HOSTING_KINDS.map(async (kind) => [kind, await storage.store.count(kind)] as const)),
  );

describe('HostingHierarchyService', () => {
  it('syncs a workspace unit and one unit per repository', async () => {
    const { service, storage } = buildService();

    const reports = await service.sync(workspaceTarget, testRun());

    expect(reports.map((r) => [r.unit, r.status])).toEqual([
      ['workspace acme', 'committed'],
      ['repository acme/api', 'committed'],
      ['repository acme/web', 'committed'],
    ]);
    expect(reports[1].stats).toEqual({
      repository: { created: 1, updated: 0, unchanged: 0, failed: 0 },
      commit: { created: 2, updated: 0, unchanged: 0, failed: 0 },
      pullRequest: { created: 2, updated: 0, unchanged: 0, failed: 0 },
      branch: { created: 1, updated: 0, unchanged: 0, failed: 0 },
    });
    expect(await rowCounts(storage)).toEqual({
      workspace: 1,
      project: 1,
      repository: 2,
      commit: 3,
      pullRequest: 2,
      branch: 2,
    });
  });

  it('attaches repositories to their workspace and project', async () => {
    const { service, storage } = buildService();

    await service.sync(workspaceTarget, testRun());

    const workspace = await storage.store.findOne('workspace', { slug: 'acme' });
    const project = await storage.store.findOne('project', { key: 'CORE' });
    const repository = await storage.store.findOne('repository', { slug: 'api' });
    expect(repository?.fields.workspaceId).toBe(workspace?.id);
    expect(repository?.fields.projectId).toBe(project?.id);
  });

  it('is idempotent across runs', async () => {
    const { service, storage } = buildService();
    await service.sync(workspaceTarget, testRun());
    const before = await rowCounts(storage);

    const reports = await service.sync(workspaceTarget, testRun());

    const created = reports.flatMap((r) => Object.values(r.stats)).reduce((sum, s) => sum + (s?.created ?? 0), 0);
    expect(created).toBe(0);
    expect(await rowCounts(storage)).toEqual(before);
  });

  it('skips an invalid child and keeps its siblings', async () => {
    const data = hostingData();
    data.pullRequests['acme/api'] = [bbPullRequest(1), bbPullRequest(3, 'ABANDONED'), bbPullRequest(4)];
    const { service, storage } = buildService(new FakeHostingClient(data));

    const reports = await service.sync(workspaceTarget, testRun());

    expect(reports[1].status).toBe('committed');
    expect(reports[1].stats.pullRequest).toEqual({ created: 2, updated: 0, unchanged: 0, failed: 1 });
    expect(reports[1].failures).toEqual([
      {
        kind: 'pullRequest',
        naturalKey: '3',
        errorKind: 'DataContractViolation',
        message:
          'pullRequest: "state" has value "ABANDONED" outside {OPEN, MERGED, DECLINED, SUPERSEDED}',
      },
    ]);
    expect(await storage.store.count('pullRequest')).toBe(2);
  });

  it('fails only the repository whose fetch fails', async () => {
    const client = new FakeHostingClient(hostingData());
    client.failures.set('commits acme/web', new NonRetryableApiError('HTTP 403', 403));
    const { service, storage } = buildService(client);

    const reports = await service.sync(workspaceTarget, testRun());

    expect(reports.map((r) => r.status)).toEqual(['committed', 'committed', 'failed']);
    expect(reports[2].error).toEqual({ kind: 'NonRetryableApiError', message: 'HTTP 403' });
    expect(reports[2].stats).toEqual({});
    expect((await storage.store.find('repository')).map((r) => r.fields.slug)).toEqual(['api']);
  });

  it('fails the target when the workspace cannot be fetched', async () => {
    const client = new FakeHostingClient(hostingData());
    client.failures.set('workspace acme', new NonRetryableApiError('HTTP 404', 404));
    const { service, storage } = buildService(client);

    await expect(service.sync(workspaceTarget, testRun())).rejects.toBeInstanceOf(NonRetryableApiError);
    expect(await storage.store.count('workspace')).toBe(0);
  });

  it('syncs a single repository with only the project it belongs to', async () => {
    const { service, client } = buildService();

    const reports = await service.sync(
      { platform: 'bitbucket', scope: 'repository', workspace: 'acme', repository: 'web' },
      testRun(),
    );

    expect(reports.map((r) => r.unit)).toEqual(['workspace acme', 'repository acme/web']);
    expect(client.calls).toContain('repository acme/web');
    expect(client.calls).toContain('project acme/CORE');
    expect(client.calls).not.toContain('projects acme');
  });
});
