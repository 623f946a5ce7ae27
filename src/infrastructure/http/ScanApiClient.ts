import fetch, { RequestInit, Response } from 'node-fetch';
import FormData from 'form-data';
import { z } from 'zod';
import { IScanClient, ConsumeStreamOptions } from '../../core/interfaces/IScanClient.js';
import { ScanJob, StreamHandle, SubmitResult } from '../../core/entities/ScanJob.js';
import { BookMetadata, StreamEvent, isTerminalEvent } from '../../core/entities/StreamEvent.js';
import {
  ClientError,
  ConnectionFailureError,
  JobCanceledError,
  MalformedEventError,
  RateLimitedError,
  ScanError,
  StreamRetriesExhaustedError,
  errorMessage,
} from '../../core/errors/ScanErrors.js';
import {
  withRetry,
  backoffDelay,
  sleep,
  createErrorLog,
  isRetryableError,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  RetryLog,
  SleepFn,
} from '../../utils/retry.js';
import { SseDecoder, RawSseEvent } from './SseDecoder.js';
import { BookListSchema, parseStreamEvent } from './StreamEventParser.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ScanApiClientOptions {
  baseUrl: string;
  deviceId: string;
  fetch?: FetchFn;
  retryConfig?: RetryConfig;
  connectTimeoutMs?: number;
  idleTimeoutMs?: number;
  defaultRetryAfterSeconds?: number;
  userAgent?: string;
  sleep?: SleepFn;
  debug?: boolean;
}

const SubmitResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      jobId: z.string().min(1),
      sseUrl: z.string().min(1),
      authToken: z.string().nullish(),
    })
    .nullish(),
});

const ProblemDetailsSchema = z.object({
  title: z.string().nullish(),
  detail: z.string().nullish(),
  message: z.string().nullish(),
  code: z.string().nullish(),
  retryAfterMs: z.number().nullish(),
  error: z
    .union([
      z.string(),
      z.object({ message: z.string().nullish(), code: z.string().nullish() }),
    ])
    .nullish(),
});

type ProblemDetails = z.infer<typeof ProblemDetailsSchema>;

// Shared by every connection attempt of one consumeStream call
interface StreamCursor {
  lastEventId?: string;
  seenIds: Set<string>;
}

const ResultsEnvelopeSchema = z.union([
  BookListSchema,
  z.object({ data: BookListSchema }).transform((envelope) => envelope.data),
  z.object({ books: BookListSchema }).transform((envelope) => envelope.books),
  z.object({ results: BookListSchema }).transform((envelope) => envelope.results),
]);

/**
 * Client for the spine recognition service: submit, stream, results, cleanup
 */
export class ScanApiClient implements IScanClient {
  private baseUrl: string;
  private deviceId: string;
  private fetchFn: FetchFn;
  private retryConfig: RetryConfig;
  private connectTimeoutMs: number;
  private idleTimeoutMs: number;
  private defaultRetryAfterSeconds: number;
  private userAgent: string;
  private sleepFn: SleepFn;
  private debug: boolean;

  constructor(options: ScanApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.deviceId = options.deviceId;
    this.fetchFn = options.fetch || fetch;
    this.retryConfig = options.retryConfig || DEFAULT_RETRY_CONFIG;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 30000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 90000;
    this.defaultRetryAfterSeconds = options.defaultRetryAfterSeconds ?? 60;
    this.userAgent = options.userAgent || 'spine-scan-client/1.0.0';
    this.sleepFn = options.sleep || sleep;
    this.debug = options.debug ?? false;
  }

  async submit(job: ScanJob, signal?: AbortSignal): Promise<SubmitResult> {
    return withRetry(() => this.submitOnce(job, signal), this.retryConfig, {
      signal,
      sleep: this.sleepFn,
      onLog: (log) => this.logAttempt('submit', log),
    });
  }

  async *consumeStream(
    handle: StreamHandle,
    options: ConsumeStreamOptions = {}
  ): AsyncGenerator<StreamEvent> {
    const maxAttempts = options.maxAttempts ?? this.retryConfig.maxAttempts;
    const { signal } = options;
    const cursor: StreamCursor = { seenIds: new Set() };
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        await this.sleepFn(backoffDelay(attempt - 1, this.retryConfig), signal);
      }
      if (signal?.aborted) {
        throw new JobCanceledError();
      }

      try {
        for await (const event of this.openStream(handle, cursor, signal)) {
          yield event;
          if (isTerminalEvent(event)) {
            return;
          }
        }
        throw new ConnectionFailureError('Stream ended before a terminal event');
      } catch (error) {
        if (signal?.aborted) {
          throw new JobCanceledError();
        }
        if (!isRetryableError(error)) {
          throw error;
        }

        lastError = error instanceof Error ? error : new Error(String(error));
        const hasNext = attempt < maxAttempts;
        console.error(
          '[ScanApiClient]',
          JSON.stringify(
            createErrorLog(
              new Date(),
              attempt,
              `stream:${handle.jobId}`,
              lastError.message,
              hasNext ? backoffDelay(attempt, this.retryConfig) : undefined
            )
          )
        );
      }
    }

    throw new StreamRetriesExhaustedError(maxAttempts, lastError);
  }

  async fetchResults(
    resultsUrl: string,
    authToken?: string,
    signal?: AbortSignal
  ): Promise<BookMetadata[]> {
    const url = this.resolveUrl(resultsUrl);

    return withRetry(
      async () => {
        const response = await this.send(
          url,
          { method: 'GET', headers: this.headers(authToken, { Accept: 'application/json' }) },
          signal
        );
        if (!response.ok) {
          throw await this.errorFromResponse(response);
        }

        const parsed = ResultsEnvelopeSchema.safeParse(await this.readJson(response));
        if (!parsed.success) {
          throw new ClientError('Invalid results payload', response.status);
        }
        return parsed.data;
      },
      this.retryConfig,
      { signal, sleep: this.sleepFn, onLog: (log) => this.logAttempt('fetchResults', log) }
    );
  }

  async cleanup(jobId: string, authToken?: string): Promise<void> {
    const url = `${this.baseUrl}/v3/jobs/scans/${encodeURIComponent(jobId)}/cleanup`;

    try {
      const response = await this.send(url, { method: 'DELETE', headers: this.headers(authToken) });
      if (response.ok || response.status === 404) {
        this.debugLog(`Cleaned up job ${jobId} (${response.status})`);
        return;
      }
      console.error(`[ScanApiClient] ✗ Cleanup of job ${jobId} returned ${response.status}`);
    } catch (error) {
      console.error(`[ScanApiClient] ✗ Cleanup of job ${jobId} failed:`, errorMessage(error));
    }
  }

  private async submitOnce(job: ScanJob, signal?: AbortSignal): Promise<SubmitResult> {
    const form = new FormData();
    form.append('photos[]', job.imageBytes, { filename: 'spine.jpg', contentType: 'image/jpeg' });

    const response = await this.send(
      `${this.baseUrl}/v3/jobs/scans`,
      {
        method: 'POST',
        headers: {
          ...this.headers(undefined, { Accept: 'application/json' }),
          'X-Device-ID': job.deviceIdentifier,
          ...form.getHeaders(),
        },
        body: form,
      },
      signal
    );

    if (!response.ok) {
      throw await this.errorFromResponse(response);
    }

    const parsed = SubmitResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success || !parsed.data.success || !parsed.data.data) {
      throw new ClientError('Invalid server response', response.status);
    }

    const { jobId, sseUrl, authToken } = parsed.data.data;
    this.debugLog(`Submitted ${job.localId} as job ${jobId}`);

    return {
      jobId,
      sseUrl: this.resolveUrl(sseUrl),
      authToken: authToken ?? undefined,
    };
  }

  /**
   * One connection attempt. Ends normally when the body ends; throws
   * ConnectionFailureError when the connection cannot be opened or stalls.
   */
  private async *openStream(
    handle: StreamHandle,
    cursor: StreamCursor,
    signal?: AbortSignal
  ): AsyncGenerator<StreamEvent> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.send(
        handle.sseUrl,
        {
          method: 'GET',
          headers: this.headers(handle.authToken, {
            Accept: 'text/event-stream',
            'Cache-Control': 'no-cache',
            ...(cursor.lastEventId !== undefined ? { 'Last-Event-ID': cursor.lastEventId } : {}),
          }),
        },
        controller.signal,
        controller
      );

      if (!response.ok) {
        throw await this.errorFromResponse(response);
      }

      const decoder = new SseDecoder();
      const iterator = response.body[Symbol.asyncIterator]();

      for (;;) {
        const next = await this.nextChunk(iterator, controller.signal);
        if (next.done) {
          break;
        }
        for (const raw of decoder.push(next.value)) {
          const event = this.acceptEvent(raw, cursor, handle.jobId);
          if (event) {
            yield event;
          }
        }
      }

      for (const raw of decoder.flush()) {
        const event = this.acceptEvent(raw, cursor, handle.jobId);
        if (event) {
          yield event;
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      // Closes the connection if we stopped early
      controller.abort();
    }
  }

  /**
   * Drops events replayed after a reconnect and moves the resume cursor
   */
  private acceptEvent(raw: RawSseEvent, cursor: StreamCursor, jobId: string): StreamEvent | null {
    if (raw.id !== undefined) {
      if (cursor.seenIds.has(raw.id)) {
        this.debugLog(`Skipping replayed event ${raw.id} for job ${jobId}`);
        return null;
      }
      cursor.seenIds.add(raw.id);
      cursor.lastEventId = raw.id;
    }
    return this.toStreamEvent(raw, jobId);
  }

  private toStreamEvent(raw: RawSseEvent, jobId: string): StreamEvent | null {
    try {
      const event = parseStreamEvent(raw.event, raw.data);
      if (event.type === 'unknown') {
        this.debugLog(`Ignoring unknown event '${event.name}' for job ${jobId}`);
      }
      return event;
    } catch (error) {
      if (error instanceof MalformedEventError) {
        console.error(`[ScanApiClient] ✗ Skipping event for job ${jobId}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Next body chunk, or ConnectionFailureError if nothing arrives within the idle timeout
   */
  private nextChunk(
    iterator: AsyncIterator<string | Buffer>,
    signal: AbortSignal
  ): Promise<IteratorResult<string | Buffer>> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new JobCanceledError());
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(new JobCanceledError());
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        reject(new ConnectionFailureError(`Stream idle for ${this.idleTimeoutMs}ms`));
      }, this.idleTimeoutMs);

      signal.addEventListener('abort', onAbort, { once: true });

      iterator.next().then(
        (result) => {
          clearTimeout(timer);
          signal.removeEventListener('abort', onAbort);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          signal.removeEventListener('abort', onAbort);
          reject(new ConnectionFailureError(`Stream dropped: ${errorMessage(error)}`));
        }
      );
    });
  }

  /**
   * Issue a request bounded by the connect timeout. Resolves once headers arrive.
   */
  private send(
    url: string,
    init: RequestInit,
    signal?: AbortSignal,
    controller: AbortController = new AbortController()
  ): Promise<Response> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new JobCanceledError());
        return;
      }

      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        fn();
      };

      const onAbort = () => {
        settle(() => reject(new JobCanceledError()));
        controller.abort();
      };
      const timer = setTimeout(() => {
        settle(() =>
          reject(new ConnectionFailureError(`Connection timed out after ${this.connectTimeoutMs}ms`))
        );
        controller.abort();
      }, this.connectTimeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.fetchFn(url, { ...init, signal: controller.signal }).then(
        (response) => settle(() => resolve(response)),
        (error: unknown) =>
          settle(() =>
            reject(new ConnectionFailureError(`Request to ${url} failed: ${errorMessage(error)}`))
          )
      );
    });
  }

  private async errorFromResponse(response: Response): Promise<ScanError> {
    const problem = await this.readProblem(response);

    if (response.status === 429) {
      const fromBody =
        problem?.retryAfterMs != null ? Math.ceil(problem.retryAfterMs / 1000) : undefined;
      return new RateLimitedError(
        parseRetryAfter(response.headers.get('retry-after')) ??
          fromBody ??
          this.defaultRetryAfterSeconds
      );
    }

    const message = problemMessage(problem) || `HTTP ${response.status} ${response.statusText}`.trim();

    if (response.status >= 500) {
      return new ConnectionFailureError(`Server error ${response.status}: ${message}`, response.status);
    }

    return new ClientError(message, response.status, problemCode(problem));
  }

  private async readProblem(response: Response): Promise<ProblemDetails | null> {
    try {
      const parsed = ProblemDetailsSchema.safeParse(JSON.parse(await response.text()));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.debugLog(`Error body for ${response.status} is not JSON: ${errorMessage(error)}`);
      return null;
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return JSON.parse(await response.text());
    } catch (error) {
      throw new ClientError(`Invalid server response: ${errorMessage(error)}`, response.status);
    }
  }

  private headers(authToken?: string, extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'X-Device-ID': this.deviceId,
      ...extra,
    };
    if (authToken) {
      headers.Authorization = `Bearer ${authToken}`;
    }
    return headers;
  }

  private resolveUrl(value: string): string {
    return new URL(value, `${this.baseUrl}/`).toString();
  }

  private logAttempt(operation: string, log: RetryLog): void {
    if (log.success) {
      if (log.attempt > 1) {
        this.debugLog(`${operation} succeeded on attempt ${log.attempt}`);
      }
      return;
    }
    console.error(
      '[ScanApiClient]',
      JSON.stringify(
        createErrorLog(log.timestamp, log.attempt, operation, log.error ?? 'unknown error', log.nextRetryInMs)
      )
    );
  }

  private debugLog(message: string): void {
    if (this.debug) {
      console.error(`[ScanApiClient] ${message}`);
    }
  }
}

/**
 * Retry-After as delta seconds or an HTTP date; null when absent or unusable
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

function problemMessage(problem: ProblemDetails | null): string | undefined {
  if (!problem) return undefined;
  if (typeof problem.error === 'string') return problem.error;
  return problem.detail || problem.error?.message || problem.message || problem.title || undefined;
}

function problemCode(problem: ProblemDetails | null): string | undefined {
  if (!problem) return undefined;
  if (problem.code) return problem.code;
  if (problem.error && typeof problem.error !== 'string') return problem.error.code ?? undefined;
  return undefined;
}
