/**
 * CLI commands: backlinks, broken-links, orphans, most-linked, tagged,
 * frontmatter, recent and template
 *
 * Ready-made lookups over the link graph, tags, frontmatter and timestamps.
 * Each one runs a canned statement through the same query path as `query`.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import {
  QUERY_TEMPLATES,
  buildBacklinksQuery,
  buildBrokenLinksQuery,
  buildFrontmatterQuery,
  buildMostLinkedQuery,
  buildOrphanedFilesQuery,
  buildRecentFilesQuery,
  buildTagQuery,
  findTemplate,
  type CannedQuery,
} from '../../query/canned.js';
import { withContext, type GlobalOptions } from '../context.js';
import { formatQueryResult, formatTemplates, isResultFormat, RESULT_FORMATS } from '../output.js';
import { handleError, InvalidArgumentError } from '../errors.js';
import { parsePositiveInt, parseQueryParams } from '../params.js';

interface FindOptions {
  limit?: string;
  format: string;
}

interface TaggedOptions extends FindOptions {
  any?: boolean;
}

interface RecentOptions extends FindOptions {
  days: string;
}

interface TemplateOptions extends FindOptions {
  param?: string[];
  list?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function runCanned(
  build: () => CannedQuery,
  options: FindOptions,
  global: GlobalOptions
): Promise<void> {
  const isJson = options.format === 'json';

  try {
    const format = options.format;
    if (!isResultFormat(format)) {
      throw new InvalidArgumentError(
        `Unknown format "${format}"; expected one of ${RESULT_FORMATS.join(', ')}`
      );
    }
    const limit = parsePositiveInt(options.limit, '--limit');
    const { sql, params } = build();

    const outcome = await withContext(global, ({ coordinator }) =>
      coordinator.query(sql, { params, ...(limit !== undefined ? { limit } : {}) })
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
 * Named parameters for a template, every one of them required
 */
export function templateQuery(name: string, pairs: readonly string[] = []): CannedQuery {
  const template = findTemplate(name);
  if (template === null) {
    throw new InvalidArgumentError(
      `Unknown template "${name}"; expected one of ${QUERY_TEMPLATES.map((t) => t.name).join(', ')}`
    );
  }
  const parsed = parseQueryParams(pairs);
  const params = parsed === undefined || Array.isArray(parsed) ? {} : parsed;
  const missing = template.params.filter((param) => !(param in params));
  if (missing.length > 0) {
    throw new InvalidArgumentError(
      `Template "${name}" needs ${missing.map((param) => `--param ${param}=...`).join(', ')}`
    );
  }
  const unknown = Object.keys(params).filter((param) => !template.params.includes(param));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(`Template "${name}" takes no parameter ${unknown.join(', ')}`);
  }
  return { sql: template.sql, params };
}

function withResultOptions(command: Command): Command {
  return command
    .option('-l, --limit <n>', 'Maximum rows to return')
    .option('--format <format>', `Output format (${RESULT_FORMATS.join(', ')})`, 'table');
}

export function registerFindCommands(program: Command): void {
  withResultOptions(
    program
      .command('backlinks')
      .description('List documents linking to a document')
      .argument('<path>', 'Path of the linked document')
  ).action(async (path: string, options: FindOptions, command: Command) => {
    await runCanned(() => buildBacklinksQuery(resolve(path)), options, command.optsWithGlobals<GlobalOptions>());
  });

  withResultOptions(
    program.command('broken-links').description('List internal links that resolve to no indexed document')
  ).action(async (options: FindOptions, command: Command) => {
    await runCanned(buildBrokenLinksQuery, options, command.optsWithGlobals<GlobalOptions>());
  });

  withResultOptions(
    program.command('orphans').description('List documents no other document links to')
  ).action(async (options: FindOptions, command: Command) => {
    await runCanned(buildOrphanedFilesQuery, options, command.optsWithGlobals<GlobalOptions>());
  });

  withResultOptions(
    program.command('most-linked').description('List documents by number of incoming links')
  ).action(async (options: FindOptions, command: Command) => {
    await runCanned(buildMostLinkedQuery, options, command.optsWithGlobals<GlobalOptions>());
  });

  withResultOptions(
    program
      .command('tagged')
      .description('List documents carrying every tag given')
      .argument('<tags...>', 'Tags, with or without a leading #')
      .option('--any', 'Match documents carrying any of the tags')
  ).action(async (tags: string[], options: TaggedOptions, command: Command) => {
    await runCanned(
      () => buildTagQuery(tags, options.any === true ? 'any' : 'all'),
      options,
      command.optsWithGlobals<GlobalOptions>()
    );
  });

  withResultOptions(
    program
      .command('frontmatter')
      .description('List documents by frontmatter key, optionally holding a value')
      .argument('<key>', 'Frontmatter key')
      .argument('[value]', 'Value to match; array values match any element')
  ).action(async (key: string, value: string | undefined, options: FindOptions, command: Command) => {
    await runCanned(() => buildFrontmatterQuery(key, value), options, command.optsWithGlobals<GlobalOptions>());
  });

  withResultOptions(
    program
      .command('recent')
      .description('List recently modified documents, newest first')
      .option('-d, --days <n>', 'How many days back', '7')
  ).action(async (options: RecentOptions, command: Command) => {
    await runCanned(
      () => buildRecentFilesQuery(parsePositiveInt(options.days, '--days') ?? 7),
      options,
      command.optsWithGlobals<GlobalOptions>()
    );
  });

  withResultOptions(
    program
      .command('template')
      .description('Run a named query template, or list them')
      .argument('[name]', 'Template name')
      .option('-p, --param <name=value>', 'Template parameter (repeatable)', collect)
      .option('--list', 'List the templates')
  ).action(async (name: string | undefined, options: TemplateOptions, command: Command) => {
    if (options.list === true || name === undefined) {
      console.log(formatTemplates(QUERY_TEMPLATES, { json: options.format === 'json' }));
      return;
    }
    await runCanned(() => templateQuery(name, options.param), options, command.optsWithGlobals<GlobalOptions>());
  });
}
