import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import {
  NonRetryableApiError,
  RateLimitExceeded,
  TransientNetworkError,
  DataContractViolation,
} from './errors.js';
import { isRawRecord } from './platform-client-interface.js';
import type {
  ApiResponse,
  JsonTransport,
  QuotaInfo,
  RawRecord,
} from './platform-client-interface.js';

export interface HttpTransportOptions {
  platform: string;
  baseURL: string;
  token?: string;
  timeoutMs: number;
}

/**
 * Bearer-authenticated JSON GETs against one platform. Failures are
 * translated into the sync error taxonomy so the fetcher can decide on retry.
 */
export class HttpTransport implements JsonTransport {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: HttpTransportOptions,
    client?: AxiosInstance,
  ) {
    this.client =
      client ??
      axios.create({
        baseURL: ensureTrailingSlash(options.baseURL),
        headers: {
          Accept: 'application/json',
          ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
        },
        timeout: options.timeoutMs,
      });
  }

  async get(
    path: string,
    params?: Record<string, string | number>,
  ): Promise<ApiResponse<RawRecord>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(path, { params });
    } catch (error: unknown) {
      throw classifyHttpError(this.options.platform, path, error);
    }

    if (!isRawRecord(response.data)) {
      throw new DataContractViolation(
        `${this.options.platform} GET ${path} returned a non-object body`,
      );
    }
    return { data: response.data, quota: readQuota(response.headers) };
  }
}

export function classifyHttpError(platform: string, path: string, error: unknown): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }

  const response = error.response;
  if (!response) {
    return new TransientNetworkError(
      `${platform} GET ${path}: ${error.code ?? 'network error'} ${error.message}`.trim(),
      undefined,
      { cause: error },
    );
  }

  const status = response.status;
  if (status === 429) {
    return new RateLimitExceeded(
      `${platform} GET ${path}: rate limited`,
      parseRetryAfter(headerString(response.headers['retry-after'])),
    );
  }
  if (status >= 500) {
    return new TransientNetworkError(`${platform} GET ${path}: HTTP ${status}`, status, {
      cause: error,
    });
  }
  return new NonRetryableApiError(`${platform} GET ${path}: HTTP ${status}`, status);
}

/** Retry-After as delta-seconds or an HTTP date, in milliseconds. */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export function readQuota(headers: AxiosResponse['headers']): QuotaInfo | undefined {
  const remaining = toNumber(headerString(headers['x-ratelimit-remaining']));
  const reset = toNumber(headerString(headers['x-ratelimit-reset']));
  if (remaining === null && reset === null) return undefined;
  // Reset is reported as epoch seconds
  return { remaining, resetAt: reset === null ? null : reset * 1000 };
}

function headerString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function toNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function ensureTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}
