import { QualityHierarchyService } from '../../hierarchy/quality-hierarchy.service.js';
import { RepositoryLinker } from '../../hierarchy/repository-linker.js';
import { ReconcilerService } from '../../reconcile/reconciler.service.js';
import { MemoryStorage } from '../../storage/memory-storage.js';
import { FakeQualityClient } from '../../testing/fake-clients.js';
import { qualityData, scMeasure } from '../../testing/fixtures.js';
import type { QualityData } from '../../testing/fake-clients.js';
import { testRun } from '../../testing/test-run.js';
import { RankingService } from '../ranking.service.js';

async function seed(data: QualityData): Promise<MemoryStorage> {
  const storage = new MemoryStorage();
  const quality = new QualityHierarchyService(
    new FakeQualityClient(data),
    storage,
    new ReconcilerService(),
    new RepositoryLinker(),
  );
  await quality.sync(
    { platform: 'sonarcloud', scope: 'organization', organization: 'acme-org' },
    { ...testRun(), metricKeys: ['coverage', 'duplicated_lines_density', 'new_violations'] },
  );
  return storage;
}

describe('RankingService', () => {
  it('ranks analysis projects from their stored metrics, issues and hotspots', async () => {
    const storage = await seed(qualityData());
    const service = new RankingService(storage);
    const web = await storage.store.findOne('analysisProject', { key: 'acme:web' });
    const api = await storage.store.findOne('analysisProject', { key: 'acme:api' });

    const ranking = await service.computeRanking();

    expect(ranking).toEqual([
      {
        id: web?.id,
        projectKey: 'acme:web',
        name: 'acme:web',
        linkedRepositoryId: null,
        coverage: 88,
        duplication: 1,
        newIssues: 0,
        worstHotspot: null,
        rank: 1,
      },
      {
        id: api?.id,
        projectKey: 'acme:api',
        name: 'acme:api',
        linkedRepositoryId: null,
        coverage: 71.5,
        duplication: 3.2,
        // i-1 OPEN and i-2 CONFIRMED; i-3 is closed
        newIssues: 2,
        // h-2 is CRITICAL but already reviewed
        worstHotspot: 'HIGH',
        rank: 2,
      },
    ]);
  });

  it('prefers the new_violations measure over counting open issues', async () => {
    const data = qualityData();
    data.measures['acme:api'].push(scMeasure('new_violations', '7'));
    const service = new RankingService(await seed(data));

    const ranking = await service.computeRanking();

    expect(ranking.find((e) => e.projectKey === 'acme:api')?.newIssues).toBe(7);
  });

  it('counts new issues from a measure reported under its period', async () => {
    const data = qualityData();
    data.measures['acme:api'].push({ metric: 'new_violations', period: { index: 1, value: '4' } });
    const service = new RankingService(await seed(data));

    const ranking = await service.computeRanking();

    expect(ranking.find((e) => e.projectKey === 'acme:api')?.newIssues).toBe(4);
  });

  it('returns an empty ranking when nothing has been synced', async () => {
    const service = new RankingService(new MemoryStorage());

    await expect(service.computeRanking()).resolves.toEqual([]);
  });
});
