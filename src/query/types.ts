/**
 * Query engine types
 */

/**
 * Value bound to a `?` or `:name` placeholder
 */
export type QueryParamValue = string | number | bigint | boolean | null;

/**
 * Positional or named parameters
 */
export type QueryParams = QueryParamValue[] | Record<string, QueryParamValue>;

/**
 * Typed cell value as returned by the store
 */
export type QueryValue = string | number | bigint | Buffer | null;

export type QueryRow = Record<string, QueryValue>;

export interface QueryResult {
  columns: string[];
  rows: QueryRow[];
  rowCount: number;
  executionTimeMs: number;
  /** Rows were cut off at the applied limit */
  truncated: boolean;
  /** Full-text rewrite applied to the executed statement */
  rewritten: boolean;
}

export interface ExecuteOptions {
  params?: QueryParams;
  /** Row cap; defaults to the configured default limit */
  limit?: number;
  /** Milliseconds before the query is cancelled */
  timeoutMs?: number;
}

/**
 * Query validation error: the statement is rejected before execution
 */
export class QueryValidationError extends Error {
  constructor(
    message: string,
    public readonly code: QueryValidationErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

export enum QueryValidationErrorCode {
  EMPTY = 'EMPTY',
  /** Unterminated literal or quoted identifier */
  MALFORMED = 'MALFORMED',
  TOO_LONG = 'TOO_LONG',
  MULTIPLE_STATEMENTS = 'MULTIPLE_STATEMENTS',
  COMMENT = 'COMMENT',
  /** Top-level verb is not SELECT or WITH ... SELECT */
  NOT_READ_ONLY = 'NOT_READ_ONLY',
  FORBIDDEN_KEYWORD = 'FORBIDDEN_KEYWORD',
  TABLE_NOT_ALLOWED = 'TABLE_NOT_ALLOWED',
  TOO_COMPLEX = 'TOO_COMPLEX',
  INVALID_PARAMS = 'INVALID_PARAMS',
  INVALID_LIMIT = 'INVALID_LIMIT',
}

/**
 * Query execution error: a validated statement failed while running
 */
export class QueryExecutionError extends Error {
  constructor(
    message: string,
    public readonly code: QueryExecutionErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'QueryExecutionError';
  }
}

export enum QueryExecutionErrorCode {
  TIMEOUT = 'TIMEOUT',
  RESOURCE_LIMIT = 'RESOURCE_LIMIT',
  ENGINE_FAULT = 'ENGINE_FAULT',
}

export type QueryError = QueryValidationError | QueryExecutionError;

export type QueryOutcome =
  | { success: true; result: QueryResult; cached: boolean }
  | { success: false; error: QueryError };

/**
 * Options for fuzzy search
 */
export interface FuzzySearchOptions {
  threshold?: number;
  fields?: FuzzyField[];
  limit?: number;
}

export type FuzzyField = 'title' | 'headings' | 'content';

export interface FuzzyMatch {
  path: string;
  title: string;
  score: number;
  /** Field holding the best window */
  field: FuzzyField;
  /** Best-matching window of text */
  snippet: string;
}
