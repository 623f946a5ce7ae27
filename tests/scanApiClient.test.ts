import { Readable } from 'stream';
import FormData from 'form-data';
import { Headers, RequestInit, Response } from 'node-fetch';
import { ScanApiClient, parseRetryAfter } from '../src/infrastructure/http/ScanApiClient.js';
import { ScanJob } from '../src/core/entities/ScanJob.js';
import { StreamEvent } from '../src/core/entities/StreamEvent.js';
import {
  ClientError,
  ConnectionFailureError,
  JobCanceledError,
  RateLimitedError,
  StreamRetriesExhaustedError,
} from '../src/core/errors/ScanErrors.js';

const BASE_URL = 'https://scan.test';
const SSE_URL = `${BASE_URL}/v3/jobs/scans/job-1/stream`;

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function sseResponse(chunks: string[]): Response {
  return new Response(Readable.from(chunks), {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

function sseEvent(name: string, data: unknown): string {
  return `event: ${name}\ndata: ${JSON.stringify(data)}\n\n`;
}

function makeJob(): ScanJob {
  return {
    localId: 'local-1',
    imageBytes: Buffer.from('jpeg-bytes'),
    deviceIdentifier: 'device-abc',
    createdAt: new Date(),
    status: 'queued',
  };
}

async function collect(iterable: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of iterable) {
    events.push(event);
  }
  return events;
}

function headersOf(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}

describe('ScanApiClient', () => {
  let fetchMock: jest.Mock<Promise<Response>, [string, RequestInit?]>;
  let sleepMock: jest.Mock<Promise<void>, [number, AbortSignal?]>;
  let client: ScanApiClient;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();
    sleepMock = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
    client = new ScanApiClient({
      baseUrl: `${BASE_URL}/`,
      deviceId: 'device-abc',
      fetch: fetchMock,
      sleep: sleepMock,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('submit', () => {
    test('should upload the photo and resolve relative stream URLs', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(202, {
          success: true,
          data: {
            jobId: 'job-1',
            sseUrl: '/v3/jobs/scans/job-1/stream',
            authToken: 'test-token',
            statusUrl: null,
          },
        })
      );

      const result = await client.submit(makeJob());

      expect(result).toEqual({
        jobId: 'job-1',
        sseUrl: SSE_URL,
        authToken: 'test-token',
      });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/v3/jobs/scans`);
      expect(init?.method).toBe('POST');
      expect(headersOf(init).get('x-device-id')).toBe('device-abc');

      const body = init?.body;
      expect(body).toBeInstanceOf(FormData);
      if (body instanceof FormData) {
        const encoded = body.getBuffer().toString();
        expect(encoded).toContain('name="photos[]"; filename="spine.jpg"');
        expect(encoded).toContain('Content-Type: image/jpeg');
        expect(encoded).toContain('jpeg-bytes');
      }
    });

    test('should raise RateLimitedError from the Retry-After header', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(429, { success: false }, { 'Retry-After': '30' }));

      const error = await client.submit(makeJob()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      if (error instanceof RateLimitedError) {
        expect(error.retryAfterSeconds).toBe(30);
      }
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('should fall back to retryAfterMs in the body, then to the default', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(429, { success: false, retryAfterMs: 120000 }))
        .mockResolvedValueOnce(new Response('', { status: 429 }));

      await expect(client.submit(makeJob())).rejects.toMatchObject({ retryAfterSeconds: 120 });
      await expect(client.submit(makeJob())).rejects.toMatchObject({ retryAfterSeconds: 60 });
    });

    test('should retry server errors with 2s and 4s backoff', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('', { status: 503 }))
        .mockResolvedValueOnce(new Response('', { status: 502 }))
        .mockResolvedValueOnce(
          jsonResponse(200, { success: true, data: { jobId: 'job-1', sseUrl: SSE_URL } })
        );

      const result = await client.submit(makeJob());

      expect(result.jobId).toBe('job-1');
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(sleepMock.mock.calls.map((call) => call[0])).toEqual([2000, 4000]);
    });

    test('should give up after three connection failures', async () => {
      fetchMock.mockRejectedValue(
        Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' })
      );

      await expect(client.submit(makeJob())).rejects.toBeInstanceOf(ConnectionFailureError);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('should map problem details to ClientError without retrying', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(413, {
          success: false,
          title: 'Payload Too Large',
          detail: 'Image exceeds 10MB',
          code: 'IMAGE_TOO_LARGE',
        })
      );

      const error = await client.submit(makeJob()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ClientError);
      if (error instanceof ClientError) {
        expect(error.message).toBe('Image exceeds 10MB');
        expect(error.status).toBe(413);
        expect(error.code).toBe('IMAGE_TOO_LARGE');
      }
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('should reject an unsuccessful envelope', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { success: false }));

      await expect(client.submit(makeJob())).rejects.toThrow('Invalid server response');
    });

    test('should time out a request that never answers', async () => {
      client = new ScanApiClient({
        baseUrl: BASE_URL,
        deviceId: 'device-abc',
        fetch: fetchMock,
        sleep: sleepMock,
        connectTimeoutMs: 20,
      });
      fetchMock.mockImplementation(() => new Promise<Response>(() => undefined));

      await expect(client.submit(makeJob())).rejects.toThrow('Connection timed out after 20ms');
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  describe('consumeStream', () => {
    const handle = { jobId: 'job-1', sseUrl: SSE_URL, authToken: 'test-token' };

    test('should yield events in order and stop at the terminal event', async () => {
      fetchMock.mockResolvedValueOnce(
        sseResponse([
          sseEvent('progress', { message: 'Looking for spines' }),
          sseEvent('result', { title: 'Dune', author: 'Frank Herbert' }),
          sseEvent('completed', { resultsUrl: '/v3/jobs/scans/job-1/results' }),
          sseEvent('progress', { message: 'too late' }),
        ])
      );

      const events = await collect(client.consumeStream(handle));

      expect(events.map((e) => e.type)).toEqual(['progress', 'book_result', 'completed']);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(SSE_URL);
      const headers = headersOf(init);
      expect(headers.get('accept')).toBe('text/event-stream');
      expect(headers.get('authorization')).toBe('Bearer test-token');
      expect(headers.get('x-device-id')).toBe('device-abc');
    });

    test('should skip malformed events and ignore unknown ones', async () => {
      fetchMock.mockResolvedValueOnce(
        sseResponse([
          'event: progress\ndata: not-json\n\n',
          sseEvent('thumbnail_ready', {}),
          ': heartbeat\n\n',
          sseEvent('error', { message: 'Vision model failed', code: 'AI_ERROR' }),
        ])
      );

      const events = await collect(client.consumeStream(handle));

      expect(events).toEqual([
        { type: 'unknown', name: 'thumbnail_ready' },
        { type: 'failed', message: 'Vision model failed', code: 'AI_ERROR', retryable: false },
      ]);
    });

    test('should reconnect after a dropped stream and a server error', async () => {
      fetchMock
        .mockResolvedValueOnce(sseResponse([sseEvent('progress', { message: 'first' })]))
        .mockResolvedValueOnce(new Response('', { status: 503 }))
        .mockResolvedValueOnce(sseResponse([sseEvent('completed', { books: [] })]));

      const events = await collect(client.consumeStream(handle));

      expect(events.map((e) => e.type)).toEqual(['progress', 'completed']);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(sleepMock.mock.calls.map((call) => call[0])).toEqual([2000, 4000]);
    });

    test('should resume from the last event id and drop replayed events', async () => {
      const dune = { title: 'Dune', author: 'Frank Herbert' };
      const emma = { title: 'Emma', author: 'Jane Austen' };
      fetchMock
        .mockResolvedValueOnce(sseResponse([`id: 1\n${sseEvent('result', dune)}`]))
        .mockResolvedValueOnce(
          sseResponse([
            `id: 1\n${sseEvent('result', dune)}`,
            `id: 2\n${sseEvent('result', emma)}`,
            `id: 3\n${sseEvent('completed', {})}`,
          ])
        );

      const events = await collect(client.consumeStream(handle));

      expect(events.map((e) => (e.type === 'book_result' ? e.book.title : e.type))).toEqual([
        'Dune',
        'Emma',
        'completed',
      ]);
      expect(headersOf(fetchMock.mock.calls[0][1]).get('last-event-id')).toBeNull();
      expect(headersOf(fetchMock.mock.calls[1][1]).get('last-event-id')).toBe('1');
    });

    test('should throw StreamRetriesExhaustedError after three dropped connections', async () => {
      fetchMock.mockImplementation(async () => sseResponse([sseEvent('ping', {})]));

      const error = await collect(client.consumeStream(handle)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StreamRetriesExhaustedError);
      if (error instanceof StreamRetriesExhaustedError) {
        expect(error.attempts).toBe(3);
        expect(error.message).toBe(
          'Connection lost after 3 attempts: Stream ended before a terminal event'
        );
      }
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('should honour a custom attempt ceiling', async () => {
      fetchMock.mockImplementation(async () => new Response('', { status: 500 }));

      await expect(collect(client.consumeStream(handle, { maxAttempts: 1 }))).rejects.toThrow(
        'Connection lost after 1 attempt: Server error 500: HTTP 500 Internal Server Error'
      );
      expect(sleepMock).not.toHaveBeenCalled();
    });

    test('should not retry a 4xx on open', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(404, { detail: 'Job not found' }));

      await expect(collect(client.consumeStream(handle))).rejects.toThrow(ClientError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test('should treat a silent connection as dropped', async () => {
      client = new ScanApiClient({
        baseUrl: BASE_URL,
        deviceId: 'device-abc',
        fetch: fetchMock,
        sleep: sleepMock,
        idleTimeoutMs: 20,
      });
      fetchMock.mockImplementation(async () => new Response(new Readable({ read() {} }), { status: 200 }));

      await expect(collect(client.consumeStream(handle, { maxAttempts: 1 }))).rejects.toThrow(
        'Connection lost after 1 attempt: Stream idle for 20ms'
      );
    });

    test('should stop with JobCanceledError when the signal aborts', async () => {
      const body = new Readable({ read() {} });
      body.push(sseEvent('progress', { message: 'working' }));
      fetchMock.mockResolvedValueOnce(new Response(body, { status: 200 }));

      const controller = new AbortController();
      const seen: StreamEvent[] = [];

      const run = (async () => {
        for await (const event of client.consumeStream(handle, { signal: controller.signal })) {
          seen.push(event);
          controller.abort();
        }
      })();

      await expect(run).rejects.toBeInstanceOf(JobCanceledError);
      expect(seen).toEqual([{ type: 'progress', message: 'working' }]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('fetchResults', () => {
    const book = { title: 'Piranesi', author: 'Susanna Clarke' };

    test('should accept a data envelope', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { data: [book] }));

      const books = await client.fetchResults('/v3/jobs/scans/job-1/results', 'test-token');

      expect(books).toEqual([book]);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/v3/jobs/scans/job-1/results`);
      expect(headersOf(init).get('authorization')).toBe('Bearer test-token');
    });

    test('should accept a bare array', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, [book, book]));

      await expect(client.fetchResults(`${BASE_URL}/results`)).resolves.toHaveLength(2);
    });

    test('should reject a payload that is not a book list', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { status: 'done' }));

      await expect(client.fetchResults('/results')).rejects.toThrow('Invalid results payload');
    });
  });

  describe('cleanup', () => {
    test('should DELETE the cleanup endpoint with the token', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 204 }));

      await client.cleanup('job-1', 'test-token');

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/v3/jobs/scans/job-1/cleanup`);
      expect(init?.method).toBe('DELETE');
      expect(headersOf(init).get('authorization')).toBe('Bearer test-token');
    });

    test('should treat 404 as already cleaned up', async () => {
      fetchMock.mockResolvedValueOnce(new Response('', { status: 404 }));

      await expect(client.cleanup('job-1')).resolves.toBeUndefined();
    });

    test('should swallow server and network failures', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('', { status: 500 }))
        .mockRejectedValueOnce(new Error('socket hang up'));

      await expect(client.cleanup('job-1')).resolves.toBeUndefined();
      await expect(client.cleanup('job-1')).resolves.toBeUndefined();
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('parseRetryAfter', () => {
    test('should read delta seconds', () => {
      expect(parseRetryAfter('45')).toBe(45);
    });

    test('should read an HTTP date', () => {
      const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
      expect(parseRetryAfter('Wed, 21 Oct 2026 07:29:30 GMT', now)).toBe(90);
    });

    test('should return null for missing or unusable values', () => {
      expect(parseRetryAfter(null)).toBeNull();
      expect(parseRetryAfter('soon')).toBeNull();
    });
  });
});
