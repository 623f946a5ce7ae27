/**
 * Book metadata delivered by the recognition service
 */
export interface BookMetadata {
  title: string;
  author: string;
  isbn?: string;
  coverUrl?: string;
  publisher?: string;
  publishedDate?: string;
  pageCount?: number;
  format?: string;
  confidence?: number;
}

export interface EnrichmentDegradedInfo {
  jobId?: string;
  isbn?: string;
  title?: string;
  fallbackSource?: string;
  timestamp?: string;
}

/**
 * One message received over a job's event stream
 */
export type StreamEvent =
  | { type: 'progress'; message: string }
  | { type: 'book_result'; book: BookMetadata }
  | { type: 'segmented_preview'; previewImage: Buffer; totalDetected: number }
  | { type: 'book_progress'; currentIndex: number; totalCount: number; stage?: string }
  | { type: 'enrichment_degraded'; reason?: string; partial: EnrichmentDegradedInfo }
  | { type: 'completed'; resultsUrl?: string; books?: BookMetadata[] }
  | { type: 'failed'; message: string; code?: string; retryable: boolean }
  | { type: 'canceled' }
  | { type: 'ping' }
  | { type: 'unknown'; name: string };

export type TerminalStreamEvent = Extract<StreamEvent, { type: 'completed' | 'failed' | 'canceled' }>;

export function isTerminalEvent(event: StreamEvent): event is TerminalStreamEvent {
  return event.type === 'completed' || event.type === 'failed' || event.type === 'canceled';
}
