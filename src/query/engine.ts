/**
 * Read-only query engine
 *
 * Validates a statement and hands it to a pool of worker threads, each with
 * its own read-only connection, where it runs inside one read transaction.
 * A statement still running at its deadline has its worker terminated,
 * which ends the read transaction and releases its snapshot.
 */

import { toPlainText } from '../extraction/markdown.js';
import type { FuzzyConfig, QueryConfig } from '../config/schema.js';
import { createSilentLogger, type MdqueryLogger } from '../logging/logger.js';
import type { DocumentStore } from '../storage/store.js';
import {
  StorageError,
  StorageErrorCode,
  sqliteCode,
  toStorageError,
  type SchemaDescription,
} from '../storage/types.js';
import { bestWindowMatch, normalizeForMatch } from './fuzzy.js';
import { rewriteTextSearch } from './rewrite.js';
import { validateQuery, type ValidatedQuery } from './validator.js';
import { QueryWorkerPool } from './worker-pool.js';
import type { QueryWorkerFailure, WorkerCell } from './worker-protocol.js';
import {
  type ExecuteOptions,
  type FuzzyField,
  type FuzzyMatch,
  type FuzzySearchOptions,
  type QueryError,
  type QueryOutcome,
  type QueryParams,
  type QueryResult,
  type QueryRow,
  type QueryValue,
  QueryExecutionError,
  QueryExecutionErrorCode,
  QueryValidationError,
  QueryValidationErrorCode,
} from './types.js';

export interface QueryEngineOptions {
  query: QueryConfig;
  fuzzy: FuzzyConfig;
  logger?: MdqueryLogger;
  /** Worker threads running queries at once; default 1 */
  workers?: number;
  /** Milliseconds a worker connection waits on a lock; default 5000 */
  busyTimeoutMs?: number;
}

/**
 * Outcome plus the generation of the snapshot the rows were read from
 */
export interface GenerationalOutcome {
  outcome: QueryOutcome;
  /** null when the query never reached the store */
  generation: number | null;
}

const RESOURCE_CODES: ReadonlySet<string> = new Set(['SQLITE_NOMEM', 'SQLITE_TOOBIG']);

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

type BindArgs = unknown[];

interface PreparedRequest {
  validated: ValidatedQuery;
  limit: number;
  timeoutMs: number;
  args: BindArgs;
}

export class QueryEngine {
  private readonly logger: MdqueryLogger;
  private readonly pool: QueryWorkerPool;

  constructor(
    private readonly store: DocumentStore,
    private readonly options: QueryEngineOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.pool = new QueryWorkerPool({
      databasePath: store.databasePath,
      size: options.workers ?? 1,
      busyTimeoutMs: options.busyTimeoutMs ?? 5000,
      logger: this.logger,
    });
  }

  /**
   * Stop the query workers; pending queries fail with StorageError CLOSED
   */
  async close(): Promise<void> {
    await this.pool.close();
  }

  /**
   * Validate without executing
   *
   * @throws QueryValidationError
   */
  validate(sql: string): ValidatedQuery {
    return validateQuery(sql, this.options.query);
  }

  /**
   * Validate and run a query. Validation and execution faults come back as
   * a failed outcome; store-level faults are thrown as StorageError.
   */
  async execute(sql: string, options: ExecuteOptions = {}): Promise<QueryOutcome> {
    return (await this.executeAtGeneration(sql, options)).outcome;
  }

  /**
   * Every check `execute` makes before touching the store
   *
   * @returns the first problem found, or null
   */
  check(sql: string, options: ExecuteOptions = {}): QueryError | null {
    try {
      this.prepareRequest(sql, options);
      return null;
    } catch (error) {
      return toQueryError(error);
    }
  }

  /**
   * Row limit applied when the caller gives none
   */
  effectiveLimit(limit: number | undefined): number {
    return limit ?? this.options.query.defaultLimit;
  }

  private prepareRequest(
    sql: string,
    options: ExecuteOptions
  ): PreparedRequest {
    return {
      validated: this.validate(sql),
      limit: this.resolveLimit(options.limit),
      timeoutMs: this.resolveTimeout(options.timeoutMs),
      args: bindArgs(options.params),
    };
  }

  async executeAtGeneration(sql: string, options: ExecuteOptions = {}): Promise<GenerationalOutcome> {
    let request: PreparedRequest;
    try {
      request = this.prepareRequest(sql, options);
    } catch (error) {
      return { outcome: { success: false, error: toQueryError(error) }, generation: null };
    }
    const { validated, limit, timeoutMs, args } = request;
    const rewrite = this.options.query.rewriteTextSearch ? rewriteTextSearch(validated) : null;

    const start = performance.now();
    try {
      const reply = await this.pool.run(
        { sql: validated.sql, rewrittenSql: rewrite?.sql ?? null, args, limit },
        timeoutMs
      );
      if (!reply.ok) {
        throw fromWorkerFailure(reply.error);
      }
      if (reply.rewriteError !== null) {
        this.logger.debug(
          { column: rewrite?.column, err: reply.rewriteError },
          'Full-text rewrite rejected, running original statement'
        );
      }
      const rows = reply.rows.map(toQueryRow);
      const result: QueryResult = {
        columns: reply.columns,
        rows,
        rowCount: rows.length,
        executionTimeMs: Math.max(0, performance.now() - start),
        truncated: reply.truncated,
        rewritten: reply.rewritten,
      };
      return { outcome: { success: true, result, cached: false }, generation: reply.generation };
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const queryError = toQueryError(error);
      if (queryError instanceof QueryExecutionError && queryError.code === QueryExecutionErrorCode.TIMEOUT) {
        this.logger.warn({ timeoutMs, sql: validated.sql }, 'Query timed out');
      }
      return { outcome: { success: false, error: queryError }, generation: null };
    }
  }

  private resolveLimit(limit: number | undefined): number {
    const { defaultLimit, maxLimit } = this.options.query;
    if (limit === undefined) return defaultLimit;
    if (!Number.isInteger(limit) || limit < 1 || limit > maxLimit) {
      throw new QueryValidationError(
        `Limit must be an integer between 1 and ${maxLimit}, got ${limit}`,
        QueryValidationErrorCode.INVALID_LIMIT
      );
    }
    return limit;
  }

  private resolveTimeout(timeoutMs: number | undefined): number {
    if (timeoutMs === undefined) return this.options.query.timeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new QueryValidationError(
        `Timeout must be a positive number of milliseconds, got ${timeoutMs}`,
        QueryValidationErrorCode.INVALID_LIMIT
      );
    }
    return timeoutMs;
  }

  /**
   * Documents whose title, headings or content approximately contain the
   * text, best score first
   *
   * @throws QueryValidationError on empty text or an invalid option
   */
  fuzzySearch(text: string, options: FuzzySearchOptions = {}): FuzzyMatch[] {
    const needle = normalizeForMatch(text);
    if (needle === '') {
      throw new QueryValidationError('Search text cannot be empty', QueryValidationErrorCode.EMPTY);
    }
    const threshold = options.threshold ?? this.options.fuzzy.threshold;
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new QueryValidationError(
        `Threshold must be between 0 and 1, got ${threshold}`,
        QueryValidationErrorCode.INVALID_PARAMS
      );
    }
    const fields: FuzzyField[] = options.fields ?? this.options.fuzzy.fields;
    if (fields.length === 0) {
      throw new QueryValidationError('At least one field is required', QueryValidationErrorCode.INVALID_PARAMS);
    }
    const limit = this.resolveLimit(options.limit);
    const withContent = fields.includes('content');

    const documents = this.store.readTransaction((conn) =>
      conn
        .prepare(
          `SELECT f.path AS path, f.title AS title, c.headings AS headings${
            withContent ? ', c.content AS content' : ''
          }
           FROM content_fts c JOIN files f ON f.id = c.rowid`
        )
        .all() as { path: string; title: string; headings: string; content?: string }[]
    );

    const matches: FuzzyMatch[] = [];
    for (const doc of documents) {
      let best: FuzzyMatch | null = null;
      for (const field of fields) {
        const candidates =
          field === 'title'
            ? [doc.title]
            : field === 'headings'
              ? doc.headings.split('\n')
              : [toPlainText(doc.content ?? '')];
        for (const candidate of candidates) {
          const { score, window } = bestWindowMatch(needle, candidate);
          if (best === null || score > best.score) {
            best = { path: doc.path, title: doc.title, score, field, snippet: window };
          }
        }
      }
      if (best !== null && best.score >= threshold && best.score > 0) {
        matches.push(best);
      }
    }

    matches.sort((a, b) => b.score - a.score || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    return matches.slice(0, limit);
  }

  describeSchema(includeCounts = false): SchemaDescription {
    return this.store.describeSchema(includeCounts);
  }
}

/**
 * Arguments for better-sqlite3: positional values spread, named values as
 * one object. Booleans bind as 1 and 0.
 */
function bindArgs(params: QueryParams | undefined): BindArgs {
  if (params === undefined) return [];
  const toSql = (value: unknown): unknown => (typeof value === 'boolean' ? (value ? 1 : 0) : value);

  if (Array.isArray(params)) {
    return params.map(toSql);
  }
  const named: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    const name = key.replace(/^[:@$]/, '');
    if (!PARAM_NAME.test(name)) {
      throw new QueryValidationError(`Invalid parameter name: ${key}`, QueryValidationErrorCode.INVALID_PARAMS);
    }
    named[name] = toSql(value);
  }
  return Object.keys(named).length === 0 ? [] : [named];
}

function toCell(value: WorkerCell): QueryValue {
  return value instanceof Uint8Array ? Buffer.from(value.buffer, value.byteOffset, value.byteLength) : value;
}

function toQueryRow(row: Record<string, WorkerCell>): QueryRow {
  const converted: QueryRow = {};
  for (const [column, value] of Object.entries(row)) {
    converted[column] = toCell(value);
  }
  return converted;
}

/**
 * Error for a failure reported by a query worker. Store-level faults come
 * back as StorageError.
 */
export function fromWorkerFailure(failure: QueryWorkerFailure): Error {
  switch (failure.kind) {
    case 'not_reader':
      return new QueryValidationError(failure.message, QueryValidationErrorCode.NOT_READ_ONLY);
    case 'bind':
      return new QueryValidationError(`Invalid parameters: ${failure.message}`, QueryValidationErrorCode.INVALID_PARAMS);
    case 'sqlite': {
      const cause = Object.assign(new Error(failure.message), { code: failure.code });
      const mapped = toStorageError(cause, 'Read transaction failed');
      return mapped.code === StorageErrorCode.TRANSACTION_FAILED ? cause : mapped;
    }
    case 'other':
      return new QueryExecutionError(`Query failed: ${failure.message}`, QueryExecutionErrorCode.ENGINE_FAULT);
  }
}

export function toQueryError(error: unknown): QueryError {
  if (error instanceof QueryValidationError || error instanceof QueryExecutionError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  const message = cause?.message ?? String(error);

  // better-sqlite3 reports binding mistakes as RangeError or TypeError
  if (error instanceof RangeError || error instanceof TypeError) {
    return new QueryValidationError(`Invalid parameters: ${message}`, QueryValidationErrorCode.INVALID_PARAMS, cause);
  }
  const code = sqliteCode(error);
  if (code !== null && RESOURCE_CODES.has(code)) {
    return new QueryExecutionError(`Query exceeded a resource limit: ${message}`, QueryExecutionErrorCode.RESOURCE_LIMIT, cause);
  }
  return new QueryExecutionError(`Query failed: ${message}`, QueryExecutionErrorCode.ENGINE_FAULT, cause);
}
