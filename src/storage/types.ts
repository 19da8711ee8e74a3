/**
 * Storage types for mdquery
 *
 * Row shapes follow the table columns (snake_case); inputs and summaries
 * used by other components are camelCase.
 */

import type {
  DialectName,
  ExtractedLink,
  ExtractedTag,
  FrontmatterEntry,
  FrontmatterFormat,
  Heading,
} from '../extraction/types.js';

/**
 * Row of the `files` table
 */
export interface FileRecord {
  id: number;
  path: string;
  filename: string;
  directory: string;
  file_size: number;
  mtime_ms: number;
  modified_date: string;
  created_date: string | null;
  content_hash: string;
  word_count: number;
  heading_count: number;
  title: string;
  dialect: string;
  frontmatter_format: FrontmatterFormat | null;
  indexed_at: string;
}

/**
 * Bookkeeping used to decide whether a file must be re-extracted
 */
export interface FileState {
  id: number;
  path: string;
  fileSize: number;
  mtimeMs: number;
  contentHash: string;
}

/**
 * File system facts captured when a file is read
 */
export interface FileStat {
  fileSize: number;
  mtimeMs: number;
  modifiedDate: string;
  createdDate: string | null;
}

/**
 * Everything written for one document in one transaction
 */
export interface DocumentCommit {
  path: string;
  stat: FileStat;
  contentHash: string;
  title: string;
  dialect: DialectName;
  frontmatterFormat: FrontmatterFormat | null;
  frontmatter: FrontmatterEntry[];
  tags: ExtractedTag[];
  links: ExtractedLink[];
  headings: Heading[];
  body: string;
  wordCount: number;
}

/**
 * Directory previously indexed into the store
 */
export interface IndexedRoot {
  path: string;
  recursive: boolean;
  lastIndexedAt: string;
}

export interface CommitResult {
  id: number;
  created: boolean;
}

/**
 * Row counts of the user-visible tables
 */
export interface StoreStats {
  documents: number;
  frontmatterEntries: number;
  tags: number;
  distinctTags: number;
  links: number;
  generation: number;
  schemaVersion: number;
}

export interface ColumnDescription {
  name: string;
  type: string;
  notNull: boolean;
  primaryKey: boolean;
}

export interface TableDescription {
  name: string;
  kind: 'table' | 'view' | 'virtual';
  columns: ColumnDescription[];
  rowCount?: number;
}

/**
 * Queryable tables and views with their columns
 */
export interface SchemaDescription {
  schemaVersion: number;
  tables: TableDescription[];
}

/**
 * Storage error
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/**
 * Storage error codes
 */
export enum StorageErrorCode {
  /** Database initialization failed */
  INIT_FAILED = 'INIT_FAILED',
  /** Another connection holds a conflicting lock */
  LOCKED = 'LOCKED',
  /** The store file is damaged or not a database */
  CORRUPT = 'CORRUPT',
  /** Disk or file system failure */
  IO_FAILED = 'IO_FAILED',
  /** Transaction failed */
  TRANSACTION_FAILED = 'TRANSACTION_FAILED',
  /** Recovery was attempted and failed; an explicit rebuild is required */
  UNRECOVERABLE = 'UNRECOVERABLE',
  /** The store has been closed */
  CLOSED = 'CLOSED',
}

/**
 * SQLite result codes of the underlying driver error, if any
 */
export function sqliteCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Map a driver error to a StorageError, keeping StorageErrors as they are
 */
export function toStorageError(error: unknown, message: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  const detail = cause !== undefined ? `${message}: ${cause.message}` : message;
  const code = sqliteCode(error) ?? '';

  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) {
    return new StorageError(detail, StorageErrorCode.LOCKED, cause);
  }
  if (code.startsWith('SQLITE_CORRUPT') || code === 'SQLITE_NOTADB') {
    return new StorageError(detail, StorageErrorCode.CORRUPT, cause);
  }
  if (
    code.startsWith('SQLITE_IOERR') ||
    code === 'SQLITE_FULL' ||
    code.startsWith('SQLITE_CANTOPEN') ||
    code.startsWith('SQLITE_READONLY')
  ) {
    return new StorageError(detail, StorageErrorCode.IO_FAILED, cause);
  }
  return new StorageError(detail, StorageErrorCode.TRANSACTION_FAILED, cause);
}
