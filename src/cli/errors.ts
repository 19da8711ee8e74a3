/**
 * CLI error types and handlers
 *
 * Maps core errors to exit codes and prints either a readable message with
 * a suggested next step or, under --json, an error object on stderr.
 */

import { ConfigurationError } from '../config/config.js';
import { IndexerError } from '../indexer/types.js';
import { QueryExecutionError, QueryValidationError } from '../query/types.js';
import { StorageError, StorageErrorCode } from '../storage/types.js';

/**
 * Actionable error description for humans and scripts alike
 */
export interface ActionableError {
  error: string;
  code?: string;
  action_required?: string;
  command?: string;
  hint?: string;
}

/**
 * CLI exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  /** Invalid arguments or configuration */
  INVALID_ARGS = 2,
  /** Directory not found */
  NOT_FOUND = 3,
  /** Query rejected by validation */
  QUERY_REJECTED = 4,
  /** Query failed while running */
  QUERY_FAILED = 5,
  /** Store locked, corrupt or unreadable */
  STORAGE_ERROR = 6,
}

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly cause?: Error,
    public readonly details?: ActionableError
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Error for invalid command arguments
 */
export class InvalidArgumentError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.INVALID_ARGS, cause);
    this.name = 'InvalidArgumentError';
  }
}

const STORAGE_ACTIONS: Partial<Record<StorageErrorCode, Omit<ActionableError, 'error' | 'code'>>> = {
  [StorageErrorCode.LOCKED]: {
    action_required: 'Wait for the running index job to finish and retry',
  },
  [StorageErrorCode.UNRECOVERABLE]: {
    action_required: 'Rebuild the index from its directory',
    command: 'mdquery rebuild <dir>',
  },
  [StorageErrorCode.CORRUPT]: {
    action_required: 'Rebuild the index from its directory',
    command: 'mdquery rebuild <dir>',
  },
  [StorageErrorCode.INIT_FAILED]: {
    action_required: 'Check storage.databasePath and its directory permissions',
    hint: 'Set MDQUERY_DATABASE_PATH to use another store',
  },
};

/**
 * Exit code and description for any error reaching the CLI
 */
export function describeError(error: unknown): { exitCode: ExitCode; details: ActionableError } {
  if (error instanceof CLIError) {
    return { exitCode: error.exitCode, details: error.details ?? { error: error.message } };
  }
  if (error instanceof ConfigurationError) {
    return {
      exitCode: ExitCode.INVALID_ARGS,
      details: { error: error.message, code: error.code, action_required: 'Fix the configuration' },
    };
  }
  if (error instanceof QueryValidationError) {
    return { exitCode: ExitCode.QUERY_REJECTED, details: { error: error.message, code: error.code } };
  }
  if (error instanceof QueryExecutionError) {
    return { exitCode: ExitCode.QUERY_FAILED, details: { error: error.message, code: error.code } };
  }
  if (error instanceof IndexerError) {
    return { exitCode: ExitCode.NOT_FOUND, details: { error: error.message, code: error.code } };
  }
  if (error instanceof StorageError) {
    return {
      exitCode: ExitCode.STORAGE_ERROR,
      details: { error: error.message, code: error.code, ...STORAGE_ACTIONS[error.code] },
    };
  }
  return {
    exitCode: ExitCode.GENERAL_ERROR,
    details: { error: error instanceof Error ? error.message : String(error) },
  };
}

/**
 * Render an error description for stderr
 */
export function formatError(details: ActionableError, json = false): string {
  if (json) {
    return JSON.stringify({ error: details }, null, 2);
  }

  const lines: string[] = [`Error: ${details.error}`];
  if (details.action_required !== undefined) {
    lines.push('', `Action required: ${details.action_required}`);
  }
  if (details.command !== undefined) {
    lines.push('', `Run: ${details.command}`);
  }
  if (details.hint !== undefined) {
    lines.push('', `Hint: ${details.hint}`);
  }
  return lines.join('\n');
}

/**
 * Handle an error and exit the process with appropriate code
 */
export function handleError(error: unknown, json = false): never {
  const { exitCode, details } = describeError(error);
  console.error(formatError(details, json));
  process.exit(exitCode);
}
