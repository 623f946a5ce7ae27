import { ScanJob } from '../entities/ScanJob.js';
import { BookMetadata, EnrichmentDegradedInfo } from '../entities/StreamEvent.js';

/**
 * Receives the terminal result of each job, exactly once
 */
export interface ICatalogStore {
  saveBooks(job: ScanJob, books: BookMetadata[]): void | Promise<void>;

  recordFailure(job: ScanJob, reason: string): void | Promise<void>;
}

/**
 * Live feedback while a job streams. Every hook is optional.
 */
export interface IScanProgressSink {
  onProgress?(job: ScanJob, message: string): void;
  onSegmentedPreview?(job: ScanJob, previewImage: Buffer, totalDetected: number): void;
  onBookProgress?(job: ScanJob, currentIndex: number, totalCount: number, stage?: string): void;
  onEnrichmentDegraded?(job: ScanJob, reason: string | undefined, partial: EnrichmentDegradedInfo): void;
}
