export interface ApiErrorDetails {
  endpoint: string;
  url?: string;
  status?: number;
}

export abstract class ApiError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly details: ApiErrorDetails,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
  }
}

export type RetryableReason = 'network' | 'timeout' | 'rate_limited' | 'server_error';

/** Transient failure; the caller retries on a later tick. */
export class RetryableApiError extends ApiError {
  readonly retryable = true;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    public readonly reason: RetryableReason,
    details: ApiErrorDetails,
    options?: { cause?: unknown; retryAfterMs?: number }
  ) {
    super(message, details, options);
    this.name = 'RetryableApiError';
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

export type PermanentReason = 'not_found' | 'unauthorized' | 'client_error' | 'malformed';

/** Failure tied to one request target; retrying it in the same cycle will not help. */
export class PermanentApiError extends ApiError {
  readonly retryable = false;

  constructor(
    message: string,
    public readonly reason: PermanentReason,
    details: ApiErrorDetails,
    options?: { cause?: unknown }
  ) {
    super(message, details, options);
    this.name = 'PermanentApiError';
  }
}

export class MalformedResponseError extends PermanentApiError {
  constructor(
    message: string,
    details: ApiErrorDetails,
    public readonly payload: unknown,
    public readonly issues: string[]
  ) {
    super(message, 'malformed', details);
    this.name = 'MalformedResponseError';
  }
}
