import { ICatalogStore, IScanProgressSink } from '../core/interfaces/ICatalogStore.js';
import { ScanJob } from '../core/entities/ScanJob.js';
import { BookMetadata, EnrichmentDegradedInfo } from '../core/entities/StreamEvent.js';

export interface ReporterSummary {
  completed: number;
  failed: number;
  books: number;
}

type WriteFn = (line: string) => void;

/**
 * Prints progress to stderr and results to stdout
 */
export class ConsoleReporter implements ICatalogStore, IScanProgressSink {
  private labels: Map<string, string> = new Map();
  private summary: ReporterSummary = { completed: 0, failed: 0, books: 0 };

  constructor(
    private out: WriteFn = (line) => process.stdout.write(`${line}\n`),
    private err: WriteFn = (line) => process.stderr.write(`${line}\n`)
  ) {}

  /**
   * Name a job after the file it came from
   */
  track(job: ScanJob, label: string): void {
    this.labels.set(job.localId, label);
  }

  saveBooks(job: ScanJob, books: BookMetadata[]): void {
    this.summary.completed++;
    this.summary.books += books.length;

    this.err(`✅ ${this.label(job)}: ${books.length} book${books.length === 1 ? '' : 's'} found`);
    for (const book of books) {
      this.out(formatBook(book));
    }
    this.labels.delete(job.localId);
  }

  recordFailure(job: ScanJob, reason: string): void {
    this.summary.failed++;
    this.err(`❌ ${this.label(job)}: ${reason}`);
    this.labels.delete(job.localId);
  }

  onProgress(job: ScanJob, message: string): void {
    this.err(`   ${this.label(job)}: ${message}`);
  }

  onSegmentedPreview(job: ScanJob, _previewImage: Buffer, totalDetected: number): void {
    this.err(`   ${this.label(job)}: detected ${totalDetected} spines`);
  }

  onBookProgress(job: ScanJob, currentIndex: number, totalCount: number, stage?: string): void {
    this.err(`   ${this.label(job)}: book ${currentIndex}/${totalCount}${stage ? ` (${stage})` : ''}`);
  }

  onEnrichmentDegraded(job: ScanJob, reason: string | undefined, partial: EnrichmentDegradedInfo): void {
    const subject = partial.title || partial.isbn || 'a book';
    this.err(`⚠️  ${this.label(job)}: limited metadata for ${subject}${reason ? ` (${reason})` : ''}`);
  }

  getSummary(): ReporterSummary {
    return { ...this.summary };
  }

  private label(job: ScanJob): string {
    return this.labels.get(job.localId) ?? job.localId.slice(0, 8);
  }
}

export function formatBook(book: BookMetadata): string {
  const parts = [`${book.title} by ${book.author}`];
  if (book.isbn) {
    parts.push(`ISBN ${book.isbn}`);
  }
  if (book.confidence !== undefined) {
    parts.push(`${Math.round(book.confidence * 100)}%`);
  }
  return parts.join(' | ');
}
