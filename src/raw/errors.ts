// Error taxonomy shared by the fetch, reconcile and orchestration layers.

export type SyncErrorKind =
  | 'TransientNetworkError'
  | 'RateLimitExceeded'
  | 'NonRetryableApiError'
  | 'DataContractViolation'
  | 'ReferentialIntegrityError'
  | 'StorageConstraintError'
  | 'ConfigurationError'
  | 'RunInProgressError';

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or 5xx. Retried with backoff. */
export class TransientNetworkError extends SyncError {
  readonly kind = 'TransientNetworkError' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** HTTP 429 or an equivalent quota signal. Always retryable. */
export class RateLimitExceeded extends SyncError {
  readonly kind = 'RateLimitExceeded' as const;

  constructor(
    message: string,
    readonly retryAfterMs?: number,
  ) {
    super(message);
  }
}

/** 4xx other than 429. Aborts the current fetch. */
export class NonRetryableApiError extends SyncError {
  readonly kind = 'NonRetryableApiError' as const;

  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
  }
}

/** Missing required field or enum value outside its closed set. */
export class DataContractViolation extends SyncError {
  readonly kind = 'DataContractViolation' as const;

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }
}

export class ReferentialIntegrityError extends SyncError {
  readonly kind = 'ReferentialIntegrityError' as const;
}

/** Unique or foreign-key violation reported by storage on write. */
export class StorageConstraintError extends SyncError {
  readonly kind = 'StorageConstraintError' as const;

  constructor(
    message: string,
    readonly constraint?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Fatal for the whole run: bad config, missing credentials, unreachable storage. */
export class ConfigurationError extends SyncError {
  readonly kind = 'ConfigurationError' as const;
}

/** A sync run was requested while another one is still in flight. */
export class RunInProgressError extends SyncError {
  readonly kind = 'RunInProgressError' as const;
}

export interface ErrorDescription {
  kind: string;
  message: string;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof SyncError) return { kind: error.kind, message: error.message };
  if (error instanceof Error) return { kind: error.name || 'Error', message: error.message };
  return { kind: 'UnknownError', message: String(error) };
}
