/**
 * Exponential backoff for connection-level failures
 */
import { JobCanceledError, ScanError } from '../core/errors/ScanErrors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

// 3 attempts total: wait 2s before the second, 4s before the third
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 8000,
  multiplier: 2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  onLog?: (log: RetryLog) => void;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

/**
 * Delay to wait after the given (1-based) failed attempt
 */
export function backoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.initialDelayMs * Math.pow(config.multiplier, Math.max(0, attempt - 1));
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Executes a function with exponential backoff retry logic.
 * Errors that are not connection failures are rethrown immediately; once attempts
 * run out the last error is rethrown unchanged so callers can classify it.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { onLog, signal, sleep: sleepFn = sleep } = options;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error;

      if (signal?.aborted || !isRetryableError(error)) {
        throw error;
      }

      const delay = backoffDelay(attempt, config);
      const hasNext = attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: hasNext ? delay : 0,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: hasNext ? delay : undefined,
      });

      if (!hasNext) {
        break;
      }

      await sleepFn(delay, signal);
    }
  }

  throw lastError;
}

/**
 * Sleep utility function; rejects with JobCanceledError when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new JobCanceledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new JobCanceledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Create structured error log in JSON format
 */
export function createErrorLog(
  timestamp: Date,
  attempt: number,
  operation: string,
  error: string,
  nextRetryInMs?: number
) {
  return {
    timestamp: timestamp.toISOString(),
    attempt,
    operation,
    error,
    next_retry_in_ms: nextRetryInMs,
    severity: attempt >= 3 ? 'HIGH' : 'MEDIUM',
  };
}

/**
 * Check if an error is a connection-level failure worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ScanError) {
    return error.kind === 'connection_failure';
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return false;
  }

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';
  const errorCode =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code.toLowerCase()
      : '';

  // Retryable errors
  const retryablePatterns = [
    'timeout',
    'etimedout',
    'econnrefused',
    'econnreset',
    'epipe',
    'ehostunreach',
    'enetunreach',
    'eai_again',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
    'premature close',
  ];

  return retryablePatterns.some(
    (pattern) => errorMessage.includes(pattern) || errorCode === pattern
  );
}
