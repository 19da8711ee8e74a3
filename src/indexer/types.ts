/**
 * Indexer types for mdquery
 */

import type { ExtractionFailure, ExtractionWarning } from '../extraction/types.js';

/**
 * Progress event types for indexing
 */
export type IndexingEventType =
  | 'started'
  | 'files_listed'
  | 'file_indexed'
  | 'file_skipped'
  | 'file_failed'
  | 'deleted'
  | 'completed';

/**
 * Progress event emitted during indexing
 */
export interface IndexingProgressEvent {
  type: IndexingEventType;
  /** Root directory being indexed */
  root: string;
  /** File the event is about (if applicable) */
  currentFile?: string;
  /** Files discovered by the walk */
  totalFiles?: number;
  /** Files examined so far */
  filesProcessed?: number;
  /** Failure message (for file_failed) */
  error?: string;
  timestamp: Date;
}

/**
 * Per-file failure recorded in the run report. Covers extraction failures
 * and commit failures alike.
 */
export interface IndexFailure {
  path: string;
  code: ExtractionFailure['code'] | 'READ_FAILED' | 'COMMIT_FAILED';
  message: string;
}

/**
 * Outcome of one indexing run
 */
export interface IndexRunReport {
  root: string;
  /** Files examined by the run */
  filesProcessed: number;
  /** Files left untouched or only given a bookkeeping update */
  filesSkipped: number;
  created: number;
  updated: number;
  deleted: number;
  /** Bookkeeping-only updates (timestamp changed, bytes did not) */
  touched: number;
  warnings: ExtractionWarning[];
  failures: IndexFailure[];
  durationMs: number;
  /** Whether the run stopped early on its abort signal */
  cancelled: boolean;
}

/**
 * Indexing options
 */
export interface IndexingOptions {
  /** Descend into subdirectories (default true) */
  recursive?: boolean;
  /** Re-extract files even when size and modification time match */
  force?: boolean;
  /** Checked between file commits */
  signal?: AbortSignal;
  onProgress?: (event: IndexingProgressEvent) => void;
}

/**
 * Indexer error
 */
export class IndexerError extends Error {
  constructor(
    message: string,
    public readonly code: IndexerErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'IndexerError';
  }
}

/**
 * Indexer error codes
 */
export enum IndexerErrorCode {
  /** Root directory does not exist */
  ROOT_NOT_FOUND = 'ROOT_NOT_FOUND',
  /** Root path is not a directory */
  ROOT_NOT_DIRECTORY = 'ROOT_NOT_DIRECTORY',
  /** A directory could not be read during the walk */
  TRAVERSAL_FAILED = 'TRAVERSAL_FAILED',
  /** Run was cancelled before it started */
  CANCELLED = 'CANCELLED',
}
