import { NonRetryableApiError, RateLimitExceeded, TransientNetworkError } from '../errors.js';
import { PaginatedFetcher } from '../paginated-fetcher.js';
import type { FetcherOptions } from '../paginated-fetcher.js';
import type { ApiResponse, Page, PageSource, RawRecord } from '../platform-client-interface.js';
import { RateLimiter } from '../rate-limiter.js';

const records = (n: number): RawRecord[] => Array.from({ length: n }, (_, i) => ({ key: `r${i}` }));

/** Limiter and sleep share a fake clock; every sleep is recorded. */
const buildFetcher = (quota = 100, options: Partial<FetcherOptions> = {}, events?: string[]) => {
  const clock = { now: 0 };
  const sleeps: number[] = [];
  const limiter = new RateLimiter('sonarcloud', {
    quota,
    windowMs: 1000,
    baseBackoffMs: 100,
    maxBackoffMs: 1000,
    now: () => clock.now,
    random: () => 0,
  });
  const fetcher = new PaginatedFetcher(limiter, {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 1000,
    sleep: async (ms) => {
      sleeps.push(ms);
      events?.push(`wait ${ms}`);
      clock.now += ms;
    },
    ...options,
  });
  return { fetcher, limiter, sleeps, clock };
};

/** Offset-cursor source over `all`, logging each cursor it is asked for. */
const arraySource = (all: RawRecord[], cursors: Array<string | null>): PageSource => {
  return async (cursor, pageSize) => {
    cursors.push(cursor);
    const offset = cursor === null ? 0 : Number(cursor);
    const slice = all.slice(offset, offset + pageSize);
    const next = offset + pageSize < all.length ? String(offset + pageSize) : null;
    return { data: { records: slice, next } };
  };
};

const ok = <T>(data: T): ApiResponse<T> => ({ data });

describe('PaginatedFetcher', () => {
  // ------------------------------------------------------
  // Pagination
  // ------------------------------------------------------

  it('walks every page in platform order', async () => {
    const { fetcher } = buildFetcher();
    const cursors: Array<string | null> = [];

    const result = await fetcher.collect('issues', arraySource(records(5), cursors), 2);

    expect(result.map((r) => r.key)).toEqual(['r0', 'r1', 'r2', 'r3', 'r4']);
    expect(cursors).toEqual([null, '2', '4']);
  });

  it('stops on a short page even when a cursor is reported', async () => {
    const { fetcher } = buildFetcher();
    let calls = 0;
    const source: PageSource = async () => {
      calls += 1;
      return ok<Page>({ records: records(1), next: 'more' });
    };

    const result = await fetcher.collect('hotspots', source, 2);

    expect(result).toHaveLength(1);
    expect(calls).toBe(1);
  });

  it('stops on a full page without a next cursor', async () => {
    const { fetcher } = buildFetcher();
    const cursors: Array<string | null> = [];

    const result = await fetcher.collect('projects', arraySource(records(4), cursors), 2);

    expect(result).toHaveLength(4);
    expect(cursors).toEqual([null, '2']);
  });

  it('is lazy and restarts from the first page on every iteration', async () => {
    const { fetcher } = buildFetcher();
    const cursors: Array<string | null> = [];
    const sequence = fetcher.paginate('commits', arraySource(records(3), cursors), 2);
    expect(cursors).toEqual([]);

    const first: unknown[] = [];
    for await (const record of sequence) first.push(record.key);
    const second: unknown[] = [];
    for await (const record of sequence) second.push(record.key);

    expect(first).toEqual(['r0', 'r1', 'r2']);
    expect(second).toEqual(first);
    expect(cursors).toEqual([null, '2', null, '2']);
  });

  it('fetches only the pages a consumer reads', async () => {
    const { fetcher } = buildFetcher();
    const cursors: Array<string | null> = [];

    for await (const record of fetcher.paginate('commits', arraySource(records(6), cursors), 2)) {
      if (record.key === 'r1') break;
    }

    expect(cursors).toEqual([null]);
  });

  // ------------------------------------------------------
  // Retry policy
  // ------------------------------------------------------

  it('retries transient failures with exponential backoff', async () => {
    const { fetcher, sleeps } = buildFetcher();
    let attempts = 0;

    const result = await fetcher.call('gate', async () => {
      attempts += 1;
      if (attempts < 3) throw new TransientNetworkError('HTTP 503', 503);
      return ok({ status: 'OK' });
    });

    expect(result).toEqual({ status: 'OK' });
    expect(attempts).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('gives up after maxAttempts transient failures', async () => {
    const { fetcher, sleeps } = buildFetcher();
    let attempts = 0;

    await expect(
      fetcher.call('gate', async () => {
        attempts += 1;
        throw new TransientNetworkError('HTTP 502', 502);
      }),
    ).rejects.toBeInstanceOf(TransientNetworkError);

    expect(attempts).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('propagates non-retryable errors immediately', async () => {
    const { fetcher, sleeps } = buildFetcher();
    let attempts = 0;

    await expect(
      fetcher.call('project', async () => {
        attempts += 1;
        throw new NonRetryableApiError('HTTP 404', 404);
      }),
    ).rejects.toThrow('HTTP 404');

    expect(attempts).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('aborts a page walk on a non-retryable error mid-sequence', async () => {
    const { fetcher } = buildFetcher();
    const source: PageSource = async (cursor) => {
      if (cursor !== null) throw new NonRetryableApiError('HTTP 403', 403);
      return ok<Page>({ records: records(2), next: '2' });
    };

    await expect(fetcher.collect('issues', source, 2)).rejects.toBeInstanceOf(NonRetryableApiError);
  });

  it('feeds 429s to the limiter and retries once the backoff passes', async () => {
    const { fetcher, limiter, sleeps } = buildFetcher();
    let attempts = 0;

    const result = await fetcher.call('measures', async () => {
      attempts += 1;
      if (attempts === 1) throw new RateLimitExceeded('rate limited');
      return ok([{ metric: 'coverage', value: '80' }]);
    });

    expect(result).toEqual([{ metric: 'coverage', value: '80' }]);
    expect(sleeps).toEqual([50]);
    expect(limiter.status().consecutiveRateLimits).toBe(0);
  });

  it('gives up after too many consecutive 429s', async () => {
    const { fetcher, sleeps } = buildFetcher(100, { maxRateLimitRetries: 2 });

    await expect(
      fetcher.call('issues', async () => {
        throw new RateLimitExceeded('rate limited');
      }),
    ).rejects.toBeInstanceOf(RateLimitExceeded);

    expect(sleeps).toEqual([50, 100]);
  });

  it('blocks on exhausted quota headers before the next request', async () => {
    const { fetcher, sleeps } = buildFetcher();

    await fetcher.call('first', async () => ({ data: 1, quota: { remaining: 0, resetAt: 700 } }));
    await fetcher.call('second', async () => ok(2));

    expect(sleeps).toEqual([700]);
  });

  // ------------------------------------------------------
  // Rate-limit compliance
  // ------------------------------------------------------

  it('never issues more than the budget before waiting', async () => {
    const events: string[] = [];
    const { fetcher } = buildFetcher(2, {}, events);

    for (let i = 0; i < 5; i += 1) {
      await fetcher.call(`call ${i}`, async () => {
        events.push('call');
        return ok(i);
      });
    }

    expect(events).toEqual(['call', 'call', 'wait 1000', 'call', 'call', 'wait 1000', 'call']);
  });
});
