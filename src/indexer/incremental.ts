/**
 * Incremental indexer for mdquery
 *
 * Decides per file whether it must be re-extracted:
 * 1. Size and modification time match the stored row: skip
 * 2. Content hash matches the stored hash: bookkeeping update only
 * 3. Otherwise extract and commit the document with all its dependents
 *
 * Documents whose file was not seen by the walk are deleted afterwards.
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { dirname, resolve } from 'node:path';
import pLimit from 'p-limit';
import type { DialectRegistry } from '../extraction/registry.js';
import type { ExtractionWarning } from '../extraction/types.js';
import type { DocumentStore } from '../storage/store.js';
import { StorageError, StorageErrorCode, type DocumentCommit, type FileStat } from '../storage/types.js';
import { createSilentLogger, withLogging, type MdqueryLogger } from '../logging/logger.js';
import { walkMarkdownFiles, type WalkedFile } from './walker.js';
import {
  type IndexFailure,
  type IndexingOptions,
  type IndexingProgressEvent,
  type IndexRunReport,
  IndexerError,
  IndexerErrorCode,
} from './types.js';

export interface IncrementalIndexerOptions {
  extensions: readonly string[];
  excludePatterns: readonly string[];
  /** Files read and extracted at once */
  concurrency: number;
  /** Files committed per transaction */
  batchSize: number;
  logger?: MdqueryLogger;
}

/**
 * What a run does with one file, decided before anything is written
 */
type FilePlan =
  | { kind: 'skip'; path: string }
  /** Listed by the walk, gone before it could be read */
  | { kind: 'vanished'; path: string }
  | { kind: 'touch'; path: string; stat: FileStat }
  | { kind: 'extract'; path: string; commit: DocumentCommit; warnings: ExtractionWarning[] }
  | { kind: 'failed'; failure: IndexFailure };

type ExtractPlan = Extract<FilePlan, { kind: 'extract' }>;

type Emit = (
  event: Partial<IndexingProgressEvent> & { type: IndexingProgressEvent['type'] }
) => void;

/**
 * Store-level faults end the run; anything else is a per-file failure
 */
const FATAL_STORAGE_CODES: ReadonlySet<StorageErrorCode> = new Set([
  StorageErrorCode.CORRUPT,
  StorageErrorCode.LOCKED,
  StorageErrorCode.IO_FAILED,
  StorageErrorCode.CLOSED,
  StorageErrorCode.UNRECOVERABLE,
]);

function isFatal(error: unknown): boolean {
  return error instanceof StorageError && FATAL_STORAGE_CODES.has(error.code);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hashContent(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export class IncrementalIndexer {
  private readonly logger: MdqueryLogger;

  constructor(
    private readonly store: DocumentStore,
    private readonly registry: DialectRegistry,
    private readonly options: IncrementalIndexerOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Bring the store in line with the markdown files under a directory
   *
   * @throws IndexerError when the root is missing, is not a directory or
   *   cannot be traversed
   * @throws StorageError on store-level faults
   */
  async indexDirectory(root: string, options: IndexingOptions = {}): Promise<IndexRunReport> {
    const absoluteRoot = resolve(root);
    const recursive = options.recursive ?? true;
    const force = options.force ?? false;

    return withLogging(
      this.logger,
      'indexDirectory',
      () => this.run(absoluteRoot, recursive, force, options),
      { root: absoluteRoot, recursive, force }
    );
  }

  /**
   * Drop every stored document, then index the directory from scratch
   */
  async rebuildIndex(root: string, options: IndexingOptions = {}): Promise<IndexRunReport> {
    await this.checkRoot(resolve(root));
    const cleared = this.store.clear();
    this.logger.info({ cleared }, 'Cleared store for rebuild');
    return this.indexDirectory(root, { ...options, force: true });
  }

  private async checkRoot(root: string): Promise<void> {
    let stats;
    try {
      stats = await fs.stat(root);
    } catch (error) {
      throw new IndexerError(
        `Directory not found: ${root}`,
        IndexerErrorCode.ROOT_NOT_FOUND,
        error instanceof Error ? error : undefined
      );
    }
    if (!stats.isDirectory()) {
      throw new IndexerError(`Not a directory: ${root}`, IndexerErrorCode.ROOT_NOT_DIRECTORY);
    }
  }

  private async run(
    root: string,
    recursive: boolean,
    force: boolean,
    options: IndexingOptions
  ): Promise<IndexRunReport> {
    const startTime = Date.now();
    const { signal, onProgress } = options;

    const emit: Emit = (event) => {
      if (onProgress) {
        onProgress({ root, timestamp: new Date(), ...event });
      }
    };

    await this.checkRoot(root);
    if (signal?.aborted) {
      throw new IndexerError(`Indexing of ${root} cancelled before it started`, IndexerErrorCode.CANCELLED);
    }

    const report: IndexRunReport = {
      root,
      filesProcessed: 0,
      filesSkipped: 0,
      created: 0,
      updated: 0,
      deleted: 0,
      touched: 0,
      warnings: [],
      failures: [],
      durationMs: 0,
      cancelled: false,
    };

    emit({ type: 'started' });

    const files = await walkMarkdownFiles(root, {
      recursive,
      extensions: this.options.extensions,
      excludePatterns: this.options.excludePatterns,
    });
    emit({ type: 'files_listed', totalFiles: files.length });

    const vanished = new Set<string>();
    const limit = pLimit(this.options.concurrency);
    const batchSize = this.options.batchSize;
    const windowSize = Math.max(this.options.concurrency, batchSize);

    for (let start = 0; start < files.length && !report.cancelled; start += windowSize) {
      const window = files.slice(start, start + windowSize);
      const plans = await Promise.all(window.map((file) => limit(() => this.plan(file, force))));

      let pending: ExtractPlan[] = [];
      for (const plan of plans) {
        if (signal?.aborted) {
          report.cancelled = true;
          break;
        }
        report.filesProcessed++;

        switch (plan.kind) {
          case 'skip':
            report.filesSkipped++;
            emit({ type: 'file_skipped', currentFile: plan.path, filesProcessed: report.filesProcessed });
            break;
          case 'vanished':
            vanished.add(plan.path);
            this.logger.debug({ path: plan.path }, 'File removed during the run');
            break;
          case 'touch':
            this.applyTouch(plan, report);
            emit({ type: 'file_skipped', currentFile: plan.path, filesProcessed: report.filesProcessed });
            break;
          case 'failed':
            report.failures.push(plan.failure);
            emit({
              type: 'file_failed',
              currentFile: plan.failure.path,
              filesProcessed: report.filesProcessed,
              error: plan.failure.message,
            });
            break;
          case 'extract':
            pending.push(plan);
            if (pending.length >= batchSize) {
              this.commitBatch(pending, report, emit);
              pending = [];
            }
            break;
        }
      }
      // A started batch is committed whole even when cancellation arrives
      this.commitBatch(pending, report, emit);
    }

    if (!report.cancelled) {
      const seen = files.map((file) => file.path).filter((path) => !vanished.has(path));
      this.removeTombstones(root, recursive, seen, report, signal, emit);
    }
    if (!report.cancelled) {
      this.store.recordRoot(root, recursive);
    }

    report.durationMs = Date.now() - startTime;
    emit({ type: 'completed', totalFiles: files.length, filesProcessed: report.filesProcessed });
    this.logger.info(
      {
        filesProcessed: report.filesProcessed,
        filesSkipped: report.filesSkipped,
        created: report.created,
        updated: report.updated,
        deleted: report.deleted,
        touched: report.touched,
        warnings: report.warnings.length,
        failures: report.failures.length,
        cancelled: report.cancelled,
      },
      'Index run finished'
    );
    return report;
  }

  /**
   * Stat, hash and extract one file. Never throws.
   */
  private async plan(file: WalkedFile, force: boolean): Promise<FilePlan> {
    const path = file.path;
    try {
      const stats = await fs.stat(path);
      const stat: FileStat = {
        fileSize: stats.size,
        mtimeMs: stats.mtimeMs,
        modifiedDate: stats.mtime.toISOString(),
        createdDate: stats.birthtimeMs > 0 ? stats.birthtime.toISOString() : null,
      };

      const stored = this.store.getFileState(path);
      if (
        !force &&
        stored !== null &&
        stored.fileSize === stat.fileSize &&
        stored.mtimeMs === stat.mtimeMs
      ) {
        return { kind: 'skip', path };
      }

      const bytes = await fs.readFile(path);
      const contentHash = hashContent(bytes);
      if (!force && stored !== null && stored.contentHash === contentHash) {
        return { kind: 'touch', path, stat };
      }

      const outcome = this.registry.extract(path, bytes);
      if (!outcome.success) {
        return { kind: 'failed', failure: outcome.failure };
      }

      const doc = outcome.document;
      return {
        kind: 'extract',
        path,
        warnings: doc.warnings,
        commit: {
          path,
          stat,
          contentHash,
          title: doc.title,
          dialect: doc.dialect,
          frontmatterFormat: doc.frontmatterFormat,
          frontmatter: doc.frontmatter,
          tags: doc.tags,
          links: doc.links,
          headings: doc.headings,
          body: doc.body,
          wordCount: doc.wordCount,
        },
      };
    } catch (error) {
      if (isFatal(error)) throw error;
      if (isNotFound(error)) {
        return { kind: 'vanished', path };
      }
      return {
        kind: 'failed',
        failure: { path, code: 'READ_FAILED', message: errorMessage(error) },
      };
    }
  }

  private applyTouch(plan: Extract<FilePlan, { kind: 'touch' }>, report: IndexRunReport): void {
    try {
      this.store.touchDocument(plan.path, plan.stat);
      report.touched++;
      report.filesSkipped++;
    } catch (error) {
      if (isFatal(error)) throw error;
      report.failures.push({ path: plan.path, code: 'COMMIT_FAILED', message: errorMessage(error) });
    }
  }

  private commitBatch(
    batch: ExtractPlan[],
    report: IndexRunReport,
    emit: Emit
  ): void {
    if (batch.length === 0) return;
    try {
      const results = this.store.commitDocuments(batch.map((plan) => plan.commit));
      results.forEach((result, i) => {
        const plan = batch[i];
        if (plan === undefined) return;
        if (result.created) {
          report.created++;
        } else {
          report.updated++;
        }
        report.warnings.push(...plan.warnings);
        emit({ type: 'file_indexed', currentFile: plan.path, filesProcessed: report.filesProcessed });
      });
    } catch (error) {
      if (isFatal(error)) throw error;
      for (const plan of batch) {
        this.logger.warn({ path: plan.path, err: errorMessage(error) }, 'Commit failed');
        report.failures.push({ path: plan.path, code: 'COMMIT_FAILED', message: errorMessage(error) });
        emit({ type: 'file_failed', currentFile: plan.path, error: errorMessage(error) });
      }
    }
  }

  private removeTombstones(
    root: string,
    recursive: boolean,
    seenPaths: string[],
    report: IndexRunReport,
    signal: AbortSignal | undefined,
    emit: Emit
  ): void {
    const seen = new Set(seenPaths);
    const stored = this.store
      .listPaths(root)
      .filter((path) => recursive || dirname(path) === root);

    for (const path of stored) {
      if (seen.has(path)) continue;
      if (signal?.aborted) {
        report.cancelled = true;
        return;
      }
      if (this.store.deleteDocument(path)) {
        report.deleted++;
        emit({ type: 'deleted', currentFile: path });
      }
    }
  }
}
