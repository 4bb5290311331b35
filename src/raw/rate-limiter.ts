import type { QuotaInfo } from './platform-client-interface.js';

export interface RateLimiterOptions {
  /** Requests allowed per rolling window. */
  quota: number;
  windowMs: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  now?: () => number;
  random?: () => number;
}

export interface RateLimiterStatus {
  platform: string;
  used: number;
  quota: number;
  consecutiveRateLimits: number;
  blockedForMs: number;
}

/**
 * Request budget for one platform + credential pair.
 *
 * Two independent waits are tracked: the sliding-window token budget and the
 * backoff imposed by explicit quota signals (429, exhausted rate-limit headers).
 * `acquire()` reports the larger of the two and only counts a call when
 * neither applies. It is synchronous, so concurrent callers on the event loop
 * can never spend the same token twice.
 */
export class RateLimiter {
  private readonly calls: number[] = [];
  private consecutiveRateLimits = 0;
  private backoffUntil = 0;
  private quotaResetAt = 0;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(
    readonly platform: string,
    private readonly options: RateLimiterOptions,
  ) {
    if (!Number.isInteger(options.quota) || options.quota < 1) {
      throw new RangeError(`Rate limit quota must be a positive integer, got ${options.quota}`);
    }
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  /** Milliseconds to wait before the next call; 0 means the call was granted. */
  acquire(): number {
    const now = this.now();
    this.prune(now);

    const tokenWait =
      this.calls.length < this.options.quota
        ? 0
        : this.calls[0] + this.options.windowMs - now;
    const signalWait = Math.max(this.backoffUntil, this.quotaResetAt) - now;
    const wait = Math.max(tokenWait, signalWait, 0);

    if (wait > 0) return wait;
    this.calls.push(now);
    return 0;
  }

  /**
   * Register a quota-exceeded response. Returns the backoff applied:
   * exponential in the number of consecutive signals, capped, jittered to
   * 50-100% of the capped delay, and never shorter than Retry-After.
   */
  noteRateLimited(retryAfterMs?: number): number {
    this.consecutiveRateLimits += 1;
    const exponent = this.consecutiveRateLimits - 1;
    const capped = Math.min(
      this.options.maxBackoffMs,
      this.options.baseBackoffMs * 2 ** exponent,
    );
    const jittered = Math.round(capped * (0.5 + this.random() * 0.5));
    const delay = Math.max(jittered, retryAfterMs ?? 0);

    this.backoffUntil = Math.max(this.backoffUntil, this.now() + delay);
    return delay;
  }

  noteSuccess(): void {
    this.consecutiveRateLimits = 0;
  }

  /** Header-reported quota; zero remaining blocks until the reported reset. */
  observeQuota(quota: QuotaInfo): void {
    if (quota.remaining === 0 && quota.resetAt !== null && quota.resetAt > this.now()) {
      this.quotaResetAt = Math.max(this.quotaResetAt, quota.resetAt);
    }
  }

  status(): RateLimiterStatus {
    const now = this.now();
    this.prune(now);
    return {
      platform: this.platform,
      used: this.calls.length,
      quota: this.options.quota,
      consecutiveRateLimits: this.consecutiveRateLimits,
      blockedForMs: Math.max(this.backoffUntil - now, this.quotaResetAt - now, 0),
    };
  }

  private prune(now: number): void {
    const windowStart = now - this.options.windowMs;
    while (this.calls.length > 0 && this.calls[0] <= windowStart) {
      this.calls.shift();
    }
  }
}
