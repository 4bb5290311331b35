import { BitbucketClient } from '../bitbucket-client.js';
import { DataContractViolation, NonRetryableApiError } from '../errors.js';
import type { ApiResponse, JsonTransport, RawRecord } from '../platform-client-interface.js';
import { SonarCloudClient } from '../sonarcloud-client.js';

type Params = Record<string, string | number> | undefined;

/** Replays canned bodies in order and records every request. */
class ScriptedTransport implements JsonTransport {
  readonly requests: Array<{ path: string; params: Params }> = [];

  constructor(readonly bodies: RawRecord[]) {}

  async get(path: string, params?: Record<string, string | number>): Promise<ApiResponse<RawRecord>> {
    this.requests.push({ path, params });
    const body = this.bodies.shift();
    if (!body) throw new Error(`unexpected request ${path}`);
    return { data: body, quota: { remaining: 99, resetAt: null } };
  }
}

describe('BitbucketClient', () => {
  it('requests the first page with pagelen and follows the next URL verbatim', async () => {
    const next = 'https://api.example.test/2.0/repositories/acme/api/commits?page=2';
    const http = new ScriptedTransport([{ values: [{ hash: 'a1' }], next }]);
    const client = new BitbucketClient(http);

    const first = await client.commits('acme', 'api')(null, 50);
    expect(first.data).toEqual({ records: [{ hash: 'a1' }], next });
    expect(first.quota).toEqual({ remaining: 99, resetAt: null });
    expect(http.requests[0]).toEqual({ path: 'repositories/acme/api/commits', params: { pagelen: 50 } });

    http.bodies.push({ values: [] });
    await client.commits('acme', 'api')(next, 50);
    expect(http.requests[1]).toEqual({ path: next, params: undefined });
  });

  it('filters repositories by project key', async () => {
    const http = new ScriptedTransport([{ values: [] }]);

    await new BitbucketClient(http).repositories('acme', 'CORE')(null, 10);

    expect(http.requests[0].path).toBe('repositories/acme?q=project.key%3D%22CORE%22');
  });

  it('asks for pull requests in every state', async () => {
    const http = new ScriptedTransport([{ values: [] }]);

    await new BitbucketClient(http).pullRequests('acme', 'api')(null, 10);

    expect(http.requests[0].path).toBe(
      'repositories/acme/api/pullrequests?state=OPEN&state=MERGED&state=DECLINED&state=SUPERSEDED',
    );
  });

  it('treats an empty next as the last page', async () => {
    const http = new ScriptedTransport([{ values: [{ name: 'main' }], next: '' }]);

    const page = await new BitbucketClient(http).branches('acme', 'api')(null, 10);

    expect(page.data.next).toBeNull();
  });

  it('rejects a page without values', async () => {
    const http = new ScriptedTransport([{ size: 0 }]);

    await expect(new BitbucketClient(http).projects('acme')(null, 10)).rejects.toBeInstanceOf(
      DataContractViolation,
    );
  });
});

describe('SonarCloudClient', () => {
  it('pages with p/ps and stops at paging.total', async () => {
    const http = new ScriptedTransport([
      { issues: [{ key: 'i-1' }, { key: 'i-2' }], paging: { pageIndex: 1, pageSize: 2, total: 3 } },
      { issues: [{ key: 'i-3' }], paging: { pageIndex: 2, pageSize: 2, total: 3 } },
    ]);
    const source = new SonarCloudClient(http).issues('acme:api');

    const first = await source(null, 2);
    const second = await source(first.data.next, 2);

    expect(first.data.next).toBe('2');
    expect(second.data).toEqual({ records: [{ key: 'i-3' }], next: null });
    expect(http.requests.map((r) => r.params)).toEqual([
      { componentKeys: 'acme:api', p: 1, ps: 2 },
      { componentKeys: 'acme:api', p: 2, ps: 2 },
    ]);
  });

  it('falls back to page fullness without paging info', async () => {
    const http = new ScriptedTransport([{ hotspots: [{ key: 'h-1' }, { key: 'h-2' }] }]);

    const page = await new SonarCloudClient(http).hotspots('acme:api')(null, 2);

    expect(page.data.next).toBe('2');
  });

  it('finds the organization by key', async () => {
    const http = new ScriptedTransport([{ organizations: [{ key: 'acme-org', name: 'Acme' }] }]);

    const response = await new SonarCloudClient(http).getOrganization('acme-org');

    expect(response.data).toEqual({ key: 'acme-org', name: 'Acme' });
    expect(http.requests[0]).toEqual({ path: 'organizations/search', params: { organizations: 'acme-org' } });
  });

  it('reports a missing organization as a 404', async () => {
    const http = new ScriptedTransport([{ organizations: [] }]);

    await expect(new SonarCloudClient(http).getOrganization('nobody')).rejects.toBeInstanceOf(
      NonRetryableApiError,
    );
  });

  it('unwraps the gate status and the component measures', async () => {
    const http = new ScriptedTransport([
      { projectStatus: { status: 'OK', conditions: [] } },
      { component: { key: 'acme:api', measures: [{ metric: 'coverage', value: '80.0' }] } },
    ]);
    const client = new SonarCloudClient(http);

    const gate = await client.getQualityGate('acme:api');
    const measures = await client.getMeasures('acme:api', ['coverage', 'ncloc']);

    expect(gate.data).toEqual({ status: 'OK', conditions: [] });
    expect(measures.data).toEqual([{ metric: 'coverage', value: '80.0' }]);
    expect(http.requests[1].params).toEqual({ component: 'acme:api', metricKeys: 'coverage,ncloc' });
  });
});
