import axios from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  DataContractViolation,
  NonRetryableApiError,
  RateLimitExceeded,
  TransientNetworkError,
} from '../errors.js';
import { HttpTransport, classifyHttpError, parseRetryAfter, readQuota } from '../http-transport.js';

const requestConfig = (): InternalAxiosRequestConfig => ({ headers: new axios.AxiosHeaders() });

const responseError = (status: number, headers: Record<string, string> = {}) => {
  const config = requestConfig();
  const response: AxiosResponse = { data: {}, status, statusText: String(status), headers, config };
  return new axios.AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
};

/** Answers every request with `status`/`data`, remembering each request config. */
const respondWith = (
  seen: InternalAxiosRequestConfig[],
  status: number,
  data: unknown,
  headers: Record<string, string> = {},
): AxiosAdapter => {
  return async (config) => {
    seen.push(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers, config };
    if (status >= 400) {
      throw new axios.AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
    }
    return response;
  };
};

describe('classifyHttpError', () => {
  it('maps 429 to RateLimitExceeded with the Retry-After delay', () => {
    const error = classifyHttpError('bitbucket', 'workspaces/acme', responseError(429, { 'retry-after': '3' }));

    expect(error).toBeInstanceOf(RateLimitExceeded);
    expect(error.message).toBe('bitbucket GET workspaces/acme: rate limited');
    expect(error instanceof RateLimitExceeded && error.retryAfterMs).toBe(3000);
  });

  it('maps 5xx to a retryable TransientNetworkError', () => {
    const error = classifyHttpError('sonarcloud', 'issues/search', responseError(503));

    expect(error).toBeInstanceOf(TransientNetworkError);
    expect(error instanceof TransientNetworkError && error.status).toBe(503);
  });

  it('maps other 4xx to NonRetryableApiError', () => {
    const error = classifyHttpError('bitbucket', 'repositories/acme/gone', responseError(404));

    expect(error).toBeInstanceOf(NonRetryableApiError);
    expect(error.message).toBe('bitbucket GET repositories/acme/gone: HTTP 404');
  });

  it('treats a request without a response as transient', () => {
    const timeout = new axios.AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', requestConfig());

    const error = classifyHttpError('sonarcloud', 'hotspots/search', timeout);

    expect(error).toBeInstanceOf(TransientNetworkError);
    expect(error.message).toBe('sonarcloud GET hotspots/search: ECONNABORTED timeout of 30000ms exceeded');
  });

  it('passes through errors that did not come from axios', () => {
    const original = new TypeError('boom');
    expect(classifyHttpError('bitbucket', 'x', original)).toBe(original);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT') - 5000;
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT', now)).toBe(5000);
  });

  it('ignores values it cannot read', () => {
    expect(parseRetryAfter('soon')).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
  });
});

describe('readQuota', () => {
  it('converts the reset header from epoch seconds', () => {
    expect(readQuota({ 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000000' })).toEqual({
      remaining: 0,
      resetAt: 1_700_000_000_000,
    });
  });

  it('returns undefined without rate-limit headers', () => {
    expect(readQuota({ 'content-type': 'application/json' })).toBeUndefined();
  });
});

describe('HttpTransport', () => {
  const options = { platform: 'bitbucket', baseURL: 'https://api.example.test/2.0', timeoutMs: 1000 };

  it('returns the JSON body with the reported quota', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = axios.create({
      baseURL: 'https://api.example.test/2.0/',
      adapter: respondWith(seen, 200, { slug: 'acme' }, { 'x-ratelimit-remaining': '41' }),
    });
    const transport = new HttpTransport(options, client);

    const response = await transport.get('workspaces/acme', { pagelen: 50 });

    expect(response).toEqual({ data: { slug: 'acme' }, quota: { remaining: 41, resetAt: null } });
    expect(seen[0].url).toBe('workspaces/acme');
    expect(seen[0].params).toEqual({ pagelen: 50 });
  });

  it('rejects a body that is not a JSON object', async () => {
    const client = axios.create({ adapter: respondWith([], 200, ['not', 'an', 'object']) });
    const transport = new HttpTransport(options, client);

    await expect(transport.get('workspaces/acme')).rejects.toBeInstanceOf(DataContractViolation);
  });

  it('classifies HTTP failures', async () => {
    const client = axios.create({ adapter: respondWith([], 401, { error: 'unauthorized' }) });
    const transport = new HttpTransport(options, client);

    await expect(transport.get('workspaces/acme')).rejects.toThrow('bitbucket GET workspaces/acme: HTTP 401');
  });
});
