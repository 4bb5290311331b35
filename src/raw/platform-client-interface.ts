// Abstractions over the Bitbucket and SonarCloud APIs used by the hierarchy services

export type RawRecord = Record<string, unknown>;

export interface QuotaInfo {
  remaining: number | null;
  /** Epoch millis at which the platform resets the quota. */
  resetAt: number | null;
}

export interface ApiResponse<T> {
  data: T;
  quota?: QuotaInfo;
}

export interface Page {
  records: RawRecord[];
  /** Opaque cursor for the next page; null on the last page. */
  next: string | null;
}

/** One paginated resource. `cursor` is null for the first page. */
export type PageSource = (
  cursor: string | null,
  pageSize: number,
) => Promise<ApiResponse<Page>>;

/** Minimal JSON-over-HTTP surface the platform clients are written against. */
export interface JsonTransport {
  get(path: string, params?: Record<string, string | number>): Promise<ApiResponse<RawRecord>>;
}

// Source hosting (workspace -> project -> repository -> commits/PRs/branches)
export interface HostingClient {
  getWorkspace(workspace: string): Promise<ApiResponse<RawRecord>>;
  getProject(workspace: string, projectKey: string): Promise<ApiResponse<RawRecord>>;
  getRepository(workspace: string, slug: string): Promise<ApiResponse<RawRecord>>;

  projects(workspace: string): PageSource;
  repositories(workspace: string, projectKey?: string): PageSource;
  commits(workspace: string, slug: string): PageSource;
  pullRequests(workspace: string, slug: string): PageSource;
  branches(workspace: string, slug: string): PageSource;
}

// Quality analysis (organization -> project -> issues/hotspots/gates/metrics)
export interface QualityClient {
  getOrganization(organization: string): Promise<ApiResponse<RawRecord>>;
  getProject(projectKey: string): Promise<ApiResponse<RawRecord>>;
  getQualityGate(projectKey: string): Promise<ApiResponse<RawRecord>>;
  getMeasures(projectKey: string, metricKeys: string[]): Promise<ApiResponse<RawRecord[]>>;

  projects(organization: string): PageSource;
  issues(projectKey: string): PageSource;
  hotspots(projectKey: string): PageSource;
}

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
