/**
 * Structured JSON logger for mdquery
 *
 * Provides configurable logging with:
 * - JSON output format
 * - Configurable log levels (debug/info/warn/error)
 * - Optional file output
 * - Timestamps and context metadata
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';
import { createWriteStream } from 'node:fs';
import { LoggingConfig } from '../config/schema.js';

/**
 * Log level type
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Context metadata for log entries
 */
export interface LogContext {
  /** Component emitting the entry */
  component?: string;
  /** Operation name */
  operation?: string;
  /** Document path for per-file entries */
  path?: string;
  [key: string]: unknown;
}

export type MdqueryLogger = Logger;

/**
 * Where log lines go when no file is configured
 */
export type LogStream = 'stdout' | 'stderr';

function createDestination(
  config: LoggingConfig,
  stream: LogStream
): DestinationStream | undefined {
  if (config.file !== undefined && config.file !== '') {
    return createWriteStream(config.file, { flags: 'a' });
  }
  if (stream === 'stderr') {
    return pino.destination(2);
  }
  return undefined;
}

function createLoggerOptions(config: LoggingConfig, stream: LogStream): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'mdquery',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: stream === 'stderr' ? 2 : 1,
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 *
 * @param stream - Console stream used when no log file is configured.
 *   The CLI logs to stderr so stdout carries only command output.
 */
export function createLogger(
  config: LoggingConfig,
  stream: LogStream = 'stdout'
): MdqueryLogger {
  const options = createLoggerOptions(config, stream);
  // pino rejects an explicit destination combined with a transport
  if (options.transport !== undefined) {
    return pino(options);
  }

  const destination = createDestination(config, stream);
  if (destination !== undefined) {
    return pino(options, destination);
  }
  return pino(options);
}

/**
 * Logger that discards everything; used by tests and library callers
 * that do not pass one
 */
export function createSilentLogger(): MdqueryLogger {
  return pino({ level: 'silent' });
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  logger: MdqueryLogger,
  context: LogContext
): MdqueryLogger {
  return logger.child(context);
}

export function logOperationStart(
  logger: MdqueryLogger,
  operation: string,
  context?: LogContext
): void {
  logger.info({ operation, ...context }, `Starting ${operation}`);
}

export function logOperationComplete(
  logger: MdqueryLogger,
  operation: string,
  durationMs: number,
  context?: LogContext
): void {
  logger.info(
    { operation, durationMs, ...context },
    `Completed ${operation} in ${durationMs}ms`
  );
}

export function logOperationError(
  logger: MdqueryLogger,
  operation: string,
  error: Error,
  context?: LogContext
): void {
  logger.error(
    {
      operation,
      error: {
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      ...context,
    },
    `Failed ${operation}: ${error.message}`
  );
}

/**
 * Run an async operation, logging its start, completion and failure
 */
export async function withLogging<T>(
  logger: MdqueryLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const start = Date.now();
  logOperationStart(logger, operation, context);

  try {
    const result = await fn();
    logOperationComplete(logger, operation, Date.now() - start, context);
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logOperationError(logger, operation, err, context);
    throw error;
  }
}
