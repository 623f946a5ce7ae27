import { z } from 'zod';
import { BookMetadata, StreamEvent } from '../../core/entities/StreamEvent.js';
import { MalformedEventError } from '../../core/errors/ScanErrors.js';

// The service sends null for absent optional fields as often as it omits them
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

export const BookMetadataSchema: z.ZodType<BookMetadata, z.ZodTypeDef, unknown> = z.object({
  title: z.string(),
  author: z.string(),
  isbn: optionalString,
  coverUrl: optionalString,
  publisher: optionalString,
  publishedDate: optionalString,
  pageCount: optionalNumber,
  format: optionalString,
  confidence: optionalNumber,
});

export const BookListSchema = z.array(BookMetadataSchema);

const ProgressSchema = z.object({ message: z.string() });

const CompletedSchema = z.object({
  resultsUrl: optionalString,
  books: z.unknown().optional(),
});

const SegmentedSchema = z.object({
  image: z.string().min(1),
  totalBooks: z.number().int().nonnegative(),
});

const BookProgressSchema = z.object({
  current: z.number().int(),
  total: z.number().int(),
  stage: optionalString,
});

const ErrorSchema = z.object({
  message: optionalString,
  code: optionalString,
  retryable: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  jobId: optionalString,
});

const EnrichmentDegradedSchema = z.object({
  jobId: optionalString,
  isbn: optionalString,
  title: optionalString,
  reason: optionalString,
  fallbackSource: optionalString,
  timestamp: optionalString,
});

function parseJson(eventName: string, data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    throw new MalformedEventError(eventName, 'data is not valid JSON');
  }
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  eventName: string,
  data: string
): T {
  const result = schema.safeParse(parseJson(eventName, data));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new MalformedEventError(eventName, `${where}${issue?.message ?? 'invalid payload'}`);
  }
  return result.data;
}

/**
 * Loose JSON read for events whose payload is optional
 */
function parseLenient(data: string): unknown {
  if (data.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(data);
  } catch {
    return {};
  }
}

/**
 * Translate one raw SSE event into a StreamEvent.
 *
 * Throws MalformedEventError when a known event carries an unusable
 * payload. Unknown event names map to `unknown` and never throw.
 */
export function parseStreamEvent(eventName: string, data: string): StreamEvent {
  switch (eventName) {
    case 'progress': {
      const { message } = parseWith(ProgressSchema, eventName, data);
      return { type: 'progress', message };
    }

    case 'result':
      return { type: 'book_result', book: parseWith(BookMetadataSchema, eventName, data) };

    case 'complete':
    case 'completed': {
      const parsed = CompletedSchema.safeParse(parseLenient(data));
      if (!parsed.success) {
        return { type: 'completed' };
      }
      // An inline array that does not decode is treated as absent
      const books = BookListSchema.safeParse(parsed.data.books);
      return {
        type: 'completed',
        resultsUrl: parsed.data.resultsUrl,
        books: parsed.data.books !== undefined && books.success ? books.data : undefined,
      };
    }

    case 'error': {
      const parsed = ErrorSchema.safeParse(parseLenient(data));
      if (!parsed.success) {
        return { type: 'failed', message: 'Unknown error', retryable: false };
      }
      return {
        type: 'failed',
        message: parsed.data.message ?? 'Unknown error',
        code: parsed.data.code,
        retryable: parsed.data.retryable,
      };
    }

    case 'canceled':
    case 'cancelled':
      return { type: 'canceled' };

    case 'segmented': {
      const { image, totalBooks } = parseWith(SegmentedSchema, eventName, data);
      const previewImage = Buffer.from(image, 'base64');
      if (previewImage.length === 0) {
        throw new MalformedEventError(eventName, 'image is not base64');
      }
      return { type: 'segmented_preview', previewImage, totalDetected: totalBooks };
    }

    case 'book_progress': {
      const { current, total, stage } = parseWith(BookProgressSchema, eventName, data);
      return { type: 'book_progress', currentIndex: current, totalCount: total, stage };
    }

    case 'enrichment_degraded': {
      const { reason, ...partial } = parseWith(EnrichmentDegradedSchema, eventName, data);
      return { type: 'enrichment_degraded', reason, partial };
    }

    case 'ping':
      return { type: 'ping' };

    default:
      return { type: 'unknown', name: eventName };
  }
}
