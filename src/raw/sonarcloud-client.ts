import { DataContractViolation, NonRetryableApiError } from './errors.js';
import { isRawRecord } from './platform-client-interface.js';
import type {
  ApiResponse,
  JsonTransport,
  PageSource,
  QualityClient,
  RawRecord,
} from './platform-client-interface.js';

/**
 * SonarCloud Web API. Searches page with `p`/`ps` and report
 * `paging: { pageIndex, pageSize, total }`; the cursor is the next page index.
 */
export class SonarCloudClient implements QualityClient {
  constructor(private readonly http: JsonTransport) {}

  async getOrganization(organization: string): Promise<ApiResponse<RawRecord>> {
    const response = await this.http.get('organizations/search', { organizations: organization });
    const found = records(response.data, 'organizations').find((o) => o.key === organization);
    if (!found) {
      throw new NonRetryableApiError(`SonarCloud organization "${organization}" not found`, 404);
    }
    return { data: found, quota: response.quota };
  }

  async getProject(projectKey: string): Promise<ApiResponse<RawRecord>> {
    const response = await this.http.get('components/show', { component: projectKey });
    return { data: member(response.data, 'component'), quota: response.quota };
  }

  async getQualityGate(projectKey: string): Promise<ApiResponse<RawRecord>> {
    const response = await this.http.get('qualitygates/project_status', { projectKey });
    return { data: member(response.data, 'projectStatus'), quota: response.quota };
  }

  async getMeasures(projectKey: string, metricKeys: string[]): Promise<ApiResponse<RawRecord[]>> {
    const response = await this.http.get('measures/component', {
      component: projectKey,
      metricKeys: metricKeys.join(','),
    });
    const component = member(response.data, 'component');
    return { data: records(component, 'measures'), quota: response.quota };
  }

  projects(organization: string): PageSource {
    return this.pages('projects/search', 'components', { organization });
  }

  issues(projectKey: string): PageSource {
    return this.pages('issues/search', 'issues', { componentKeys: projectKey });
  }

  hotspots(projectKey: string): PageSource {
    return this.pages('hotspots/search', 'hotspots', { projectKey });
  }

  private pages(path: string, field: string, params: Record<string, string>): PageSource {
    return async (cursor, pageSize) => {
      const page = cursor === null ? 1 : Number(cursor);
      const response = await this.http.get(path, { ...params, p: page, ps: pageSize });
      const rows = records(response.data, field);

      const paging = response.data.paging;
      const total = isRawRecord(paging) && typeof paging.total === 'number' ? paging.total : null;
      const hasMore = total === null ? rows.length === pageSize : page * pageSize < total;

      return {
        data: { records: rows, next: hasMore ? String(page + 1) : null },
        quota: response.quota,
      };
    };
  }
}

function member(body: RawRecord, field: string): RawRecord {
  const value = body[field];
  if (!isRawRecord(value)) {
    throw new DataContractViolation(`SonarCloud response has no "${field}" object`, field);
  }
  return value;
}

function records(body: RawRecord, field: string): RawRecord[] {
  const value = body[field];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new DataContractViolation(`SonarCloud response field "${field}" is not an array`, field);
  }
  return value.filter(isRawRecord);
}
