import { DataContractViolation } from './errors.js';
import { isRawRecord } from './platform-client-interface.js';
import type {
  ApiResponse,
  HostingClient,
  JsonTransport,
  PageSource,
  RawRecord,
} from './platform-client-interface.js';

// Bitbucket only lists OPEN pull requests unless states are asked for explicitly
const PULL_REQUEST_STATES = ['OPEN', 'MERGED', 'DECLINED', 'SUPERSEDED'];

/**
 * Bitbucket Cloud REST 2.0. Pages carry `values` and an absolute `next` URL,
 * which is used as the cursor verbatim.
 */
export class BitbucketClient implements HostingClient {
  constructor(private readonly http: JsonTransport) {}

  getWorkspace(workspace: string): Promise<ApiResponse<RawRecord>> {
    return this.http.get(`workspaces/${enc(workspace)}`);
  }

  getProject(workspace: string, projectKey: string): Promise<ApiResponse<RawRecord>> {
    return this.http.get(`workspaces/${enc(workspace)}/projects/${enc(projectKey)}`);
  }

  getRepository(workspace: string, slug: string): Promise<ApiResponse<RawRecord>> {
    return this.http.get(`repositories/${enc(workspace)}/${enc(slug)}`);
  }

  projects(workspace: string): PageSource {
    return this.pages(`workspaces/${enc(workspace)}/projects`);
  }

  repositories(workspace: string, projectKey?: string): PageSource {
    const query = projectKey ? `?q=${encodeURIComponent(`project.key="${projectKey}"`)}` : '';
    return this.pages(`repositories/${enc(workspace)}${query}`);
  }

  commits(workspace: string, slug: string): PageSource {
    return this.pages(`repositories/${enc(workspace)}/${enc(slug)}/commits`);
  }

  pullRequests(workspace: string, slug: string): PageSource {
    const states = PULL_REQUEST_STATES.map((s) => `state=${s}`).join('&');
    return this.pages(`repositories/${enc(workspace)}/${enc(slug)}/pullrequests?${states}`);
  }

  branches(workspace: string, slug: string): PageSource {
    return this.pages(`repositories/${enc(workspace)}/${enc(slug)}/refs/branches`);
  }

  private pages(path: string): PageSource {
    return async (cursor, pageSize) => {
      const response = cursor
        ? await this.http.get(cursor)
        : await this.http.get(path, { pagelen: pageSize });

      const values = response.data.values;
      if (!Array.isArray(values)) {
        throw new DataContractViolation(`Bitbucket page for ${path} has no "values" array`, 'values');
      }
      const next = response.data.next;
      return {
        data: {
          records: values.filter(isRawRecord),
          next: typeof next === 'string' && next.length > 0 ? next : null,
        },
        quota: response.quota,
      };
    };
  }
}

function enc(segment: string): string {
  return encodeURIComponent(segment);
}
