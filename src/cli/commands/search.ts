/**
 * CLI command: search
 *
 * Full-text search over titles, headings and bodies, or approximate
 * matching with --fuzzy.
 */

import { Command } from 'commander';
import { buildTextSearchQuery } from '../../query/search.js';
import { withContext, type GlobalOptions } from '../context.js';
import { formatFuzzyMatches, formatQueryResult } from '../output.js';
import { handleError } from '../errors.js';
import { parseFuzzyFields, parsePositiveInt, parseThreshold } from '../params.js';

interface SearchOptions {
  fuzzy?: boolean;
  threshold?: string;
  fields?: string;
  limit?: string;
  json?: boolean;
}

async function executeSearch(text: string, options: SearchOptions, global: GlobalOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const limit = parsePositiveInt(options.limit, '--limit');

    if (options.fuzzy === true) {
      const threshold = parseThreshold(options.threshold);
      const fields = parseFuzzyFields(options.fields);
      const matches = await withContext(global, ({ coordinator }) =>
        coordinator.fuzzySearch(text, {
          ...(threshold !== undefined ? { threshold } : {}),
          ...(fields !== undefined ? { fields } : {}),
          ...(limit !== undefined ? { limit } : {}),
        })
      );
      console.log(formatFuzzyMatches(matches, { json: isJson }));
      return;
    }

    const { sql, params } = buildTextSearchQuery(text);
    const outcome = await withContext(global, ({ coordinator }) =>
      coordinator.query(sql, { params, ...(limit !== undefined ? { limit } : {}) })
    );
    if (!outcome.success) {
      handleError(outcome.error, isJson);
    }
    console.log(formatQueryResult(outcome.result, isJson ? 'json' : 'table', outcome.cached));
  } catch (error) {
    handleError(error, isJson);
  }
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search document titles, headings and content')
    .argument('<text>', 'Text to look for')
    .option('--fuzzy', 'Approximate matching instead of exact substrings')
    .option('--threshold <n>', 'Minimum fuzzy score between 0 and 1')
    .option('--fields <list>', 'Fuzzy fields: title, headings, content (comma separated)')
    .option('-l, --limit <n>', 'Maximum results')
    .option('--json', 'Output in JSON format')
    .action(async (text: string, options: SearchOptions, command: Command) => {
      await executeSearch(text, options, command.optsWithGlobals<GlobalOptions>());
    });
}
