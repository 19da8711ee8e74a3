/**
 * CLI command: query
 *
 * Run a read-only SQL query against the index.
 */

import { Command } from 'commander';
import { withContext, type GlobalOptions } from '../context.js';
import { formatQueryResult, isResultFormat, RESULT_FORMATS } from '../output.js';
import { handleError, InvalidArgumentError } from '../errors.js';
import { parsePositiveInt, parseQueryParams } from '../params.js';

/**
 * Query command options
 */
interface QueryOptions {
  param?: string[];
  arg?: string[];
  limit?: string;
  timeout?: string;
  format: string;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function executeQuery(sql: string, options: QueryOptions, global: GlobalOptions): Promise<void> {
  const isJson = options.format === 'json';

  try {
    const format = options.format;
    if (!isResultFormat(format)) {
      throw new InvalidArgumentError(
        `Unknown format "${format}"; expected one of ${RESULT_FORMATS.join(', ')}`
      );
    }
    const params = parseQueryParams(options.param, options.arg);
    const limit = parsePositiveInt(options.limit, '--limit');
    const timeoutMs = parsePositiveInt(options.timeout, '--timeout');

    const outcome = await withContext(global, ({ coordinator }) =>
      coordinator.query(sql, {
        ...(params !== undefined ? { params } : {}),
        ...(limit !== undefined ? { limit } : {}),
        ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      })
    );
    if (!outcome.success) {
      handleError(outcome.error, isJson);
    }
    console.log(formatQueryResult(outcome.result, format, outcome.cached));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the query command with the program
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run a read-only SQL query against the index')
    .argument('<sql>', 'SELECT statement')
    .option('-p, --param <name=value>', 'Named parameter (repeatable)', collect)
    .option('-a, --arg <value>', 'Positional parameter (repeatable)', collect)
    .option('-l, --limit <n>', 'Maximum rows to return')
    .option('-t, --timeout <ms>', 'Cancel the query after this many milliseconds')
    .option('--format <format>', `Output format (${RESULT_FORMATS.join(', ')})`, 'table')
    .action(async (sql: string, options: QueryOptions, command: Command) => {
      await executeQuery(sql, options, command.optsWithGlobals<GlobalOptions>());
    });
}
