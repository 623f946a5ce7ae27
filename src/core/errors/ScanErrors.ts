/**
 * Error taxonomy for the scan client.
 *
 * Every error carries a `kind` so callers can switch on it without
 * instanceof chains, and a `retryable` flag that drives backoff.
 */
export type ScanErrorKind =
  | 'connection_failure'
  | 'rate_limited'
  | 'client_error'
  | 'malformed_event'
  | 'retries_exhausted'
  | 'canceled';

export abstract class ScanError extends Error {
  abstract readonly kind: ScanErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Could not establish a connection, or it dropped before a terminal event.
 * Also used for 5xx responses.
 */
export class ConnectionFailureError extends ScanError {
  readonly kind = 'connection_failure' as const;
  readonly retryable = true;

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

/**
 * HTTP 429. Never retried locally; escalates to the cooldown tracker.
 */
export class RateLimitedError extends ScanError {
  readonly kind = 'rate_limited' as const;
  readonly retryable = false;

  constructor(readonly retryAfterSeconds: number) {
    super(`Rate limited - retry after ${retryAfterSeconds}s`);
  }
}

/**
 * 4xx other than 429, or a response the client cannot interpret.
 */
export class ClientError extends ScanError {
  readonly kind = 'client_error' as const;
  readonly retryable = false;

  constructor(message: string, readonly status?: number, readonly code?: string) {
    super(message);
  }
}

export class MalformedEventError extends ScanError {
  readonly kind = 'malformed_event' as const;
  readonly retryable = false;

  constructor(readonly eventName: string, detail: string) {
    super(`Malformed '${eventName}' event: ${detail}`);
  }
}

export class StreamRetriesExhaustedError extends ScanError {
  readonly kind = 'retries_exhausted' as const;
  readonly retryable = true;

  constructor(readonly attempts: number, readonly lastError: Error | null) {
    super(
      `Connection lost after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${
        lastError?.message ?? 'unknown error'
      }`
    );
  }
}

export class JobCanceledError extends ScanError {
  readonly kind = 'canceled' as const;
  readonly retryable = false;

  constructor(message = 'Job canceled') {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
