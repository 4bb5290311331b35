import { Logger } from '@nestjs/common';
import { RateLimitExceeded, TransientNetworkError } from './errors.js';
import type { RateLimiter } from './rate-limiter.js';
import type { ApiResponse, Page, PageSource, RawRecord } from './platform-client-interface.js';

export type Sleep = (ms: number) => Promise<void>;

export interface FetcherOptions {
  /** Attempts per request for transient failures (first try included). */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Consecutive 429s tolerated for one request before giving up. */
  maxRateLimitRetries?: number;
  sleep?: Sleep;
}

const DEFAULT_MAX_RATE_LIMIT_RETRIES = 8;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Issues platform requests through a RateLimiter.
 *
 * Every request waits for a granted slot first. Transient failures retry the
 * same request with exponential backoff; 429s feed the limiter and retry;
 * anything else (NonRetryableApiError included) propagates immediately.
 */
export class PaginatedFetcher {
  private readonly logger = new Logger(PaginatedFetcher.name);
  private readonly sleep: Sleep;
  private readonly maxRateLimitRetries: number;

  constructor(
    readonly limiter: RateLimiter,
    private readonly options: FetcherOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES;
  }

  async call<T>(operation: string, request: () => Promise<ApiResponse<T>>): Promise<T> {
    let attempt = 0;
    let rateLimited = 0;

    for (;;) {
      await this.waitForSlot();
      try {
        const response = await request();
        this.limiter.noteSuccess();
        if (response.quota) this.limiter.observeQuota(response.quota);
        return response.data;
      } catch (error: unknown) {
        if (error instanceof RateLimitExceeded) {
          rateLimited += 1;
          if (rateLimited > this.maxRateLimitRetries) throw error;
          const delay = this.limiter.noteRateLimited(error.retryAfterMs);
          this.logger.warn(
            `⏳ ${operation} rate limited (${rateLimited}/${this.maxRateLimitRetries}), backing off ${delay}ms`,
          );
          continue;
        }

        attempt += 1;
        if (error instanceof TransientNetworkError && attempt < this.options.maxAttempts) {
          const delay = Math.min(
            this.options.maxDelayMs,
            this.options.baseDelayMs * 2 ** (attempt - 1),
          );
          this.logger.warn(
            `⏳ ${operation} failed (${error.message}), attempt ${attempt}/${this.options.maxAttempts}, waiting ${delay}ms`,
          );
          await this.sleep(delay);
          continue;
        }
        throw error;
      }
    }
  }

  /**
   * Lazy record sequence over a paginated resource. Each iteration starts
   * again from the first page. Ends when a page has no next cursor or holds
   * fewer records than `pageSize`.
   */
  paginate(operation: string, source: PageSource, pageSize: number): AsyncIterable<RawRecord> {
    return {
      [Symbol.asyncIterator]: () => this.walk(operation, source, pageSize),
    };
  }

  async collect(operation: string, source: PageSource, pageSize: number): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    for await (const record of this.paginate(operation, source, pageSize)) {
      records.push(record);
    }
    return records;
  }

  private async *walk(
    operation: string,
    source: PageSource,
    pageSize: number,
  ): AsyncGenerator<RawRecord> {
    let cursor: string | null = null;
    let pageNumber = 0;

    do {
      pageNumber += 1;
      const current: string | null = cursor;
      const page: Page = await this.call(`${operation} [page ${pageNumber}]`, () =>
        source(current, pageSize),
      );
      yield* page.records;
      if (page.records.length < pageSize) return;
      cursor = page.next;
    } while (cursor !== null);
  }

  private async waitForSlot(): Promise<void> {
    for (let wait = this.limiter.acquire(); wait > 0; wait = this.limiter.acquire()) {
      await this.sleep(wait);
    }
  }
}
