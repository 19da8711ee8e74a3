/**
 * Output formatting for CLI
 *
 * Formatters return strings; commands decide where they go. Query results
 * render as an aligned table, CSV, a markdown table or JSON.
 */

import chalk from 'chalk';
import type { CoordinatorStatus } from '../coordinator/coordinator.js';
import type { IndexRunReport } from '../indexer/types.js';
import type { QueryTemplate } from '../query/canned.js';
import type { FuzzyMatch, QueryResult, QueryValue } from '../query/types.js';
import type { SchemaDescription } from '../storage/types.js';

export type ResultFormat = 'table' | 'csv' | 'markdown' | 'json';

export const RESULT_FORMATS: readonly ResultFormat[] = ['table', 'csv', 'markdown', 'json'];

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
  /** Suppress non-essential output */
  quiet?: boolean;
}

export function isResultFormat(value: string): value is ResultFormat {
  return RESULT_FORMATS.some((format) => format === value);
}

function displayValue(value: QueryValue): string {
  if (value === null) return 'NULL';
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  return String(value);
}

function toJsonValue(value: QueryValue): string | number | null {
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (typeof value === 'bigint') return value.toString();
  return value;
}

function rowValues(result: QueryResult): QueryValue[][] {
  return result.rows.map((row) => result.columns.map((column) => row[column] ?? null));
}

export function formatTable(result: QueryResult): string {
  const cells = rowValues(result).map((values) =>
    values.map((value) => displayValue(value).replace(/\r?\n/g, ' '))
  );
  const widths = result.columns.map((column, i) =>
    Math.max(column.length, ...cells.map((row) => (row[i] ?? '').length))
  );
  const line = (values: string[]): string =>
    values.map((value, i) => value.padEnd(widths[i] ?? 0)).join(' | ').trimEnd();

  const lines = [
    line(result.columns),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(line),
  ];
  const noun = result.rowCount === 1 ? 'row' : 'rows';
  const suffix = result.truncated ? ', truncated at limit' : '';
  lines.push(`(${result.rowCount} ${noun}${suffix})`);
  return lines.join('\n');
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(result: QueryResult): string {
  const toCsv = (value: QueryValue): string => {
    if (value === null) return '';
    if (Buffer.isBuffer(value)) return value.toString('base64');
    return String(value);
  };
  return [
    result.columns.map(csvField).join(','),
    ...rowValues(result).map((values) => values.map((value) => csvField(toCsv(value))).join(',')),
  ].join('\n');
}

function markdownCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
}

export function formatMarkdown(result: QueryResult): string {
  const row = (values: string[]): string => `| ${values.map(markdownCell).join(' | ')} |`;
  return [
    row(result.columns),
    `| ${result.columns.map(() => '---').join(' | ')} |`,
    ...rowValues(result).map((values) =>
      row(values.map((value) => (value === null ? '' : displayValue(value))))
    ),
  ].join('\n');
}

export function formatJson(result: QueryResult, cached = false): string {
  return JSON.stringify(
    {
      columns: result.columns,
      rows: result.rows.map((row) => {
        const out: Record<string, string | number | null> = {};
        for (const column of result.columns) {
          out[column] = toJsonValue(row[column] ?? null);
        }
        return out;
      }),
      rowCount: result.rowCount,
      truncated: result.truncated,
      rewritten: result.rewritten,
      cached,
      executionTimeMs: result.executionTimeMs,
    },
    null,
    2
  );
}

export function formatQueryResult(result: QueryResult, format: ResultFormat, cached = false): string {
  switch (format) {
    case 'table':
      return formatTable(result);
    case 'csv':
      return formatCsv(result);
    case 'markdown':
      return formatMarkdown(result);
    case 'json':
      return formatJson(result, cached);
  }
}

/**
 * Format an index run report
 */
export function formatIndexReport(report: IndexRunReport, options: OutputOptions = {}): string {
  if (options.json === true) {
    return JSON.stringify(report, null, 2);
  }

  const heading = report.cancelled ? chalk.yellow('Indexing cancelled:') : chalk.green('Indexing complete:');
  const lines = [
    heading,
    `  Directory: ${report.root}`,
    `  Files processed: ${report.filesProcessed}`,
    `  Skipped: ${report.filesSkipped} (${report.touched} timestamp-only)`,
    `  Created: ${report.created}`,
    `  Updated: ${report.updated}`,
    `  Deleted: ${report.deleted}`,
    `  Duration: ${(report.durationMs / 1000).toFixed(2)}s`,
  ];

  if (report.warnings.length > 0) {
    lines.push('', chalk.yellow(`Warnings (${report.warnings.length}):`));
    for (const warning of report.warnings) {
      lines.push(`  ${warning.path}: ${warning.message}`);
    }
  }
  if (report.failures.length > 0) {
    lines.push('', chalk.red(`Failures (${report.failures.length}):`));
    for (const failure of report.failures) {
      lines.push(`  ${failure.path} [${failure.code}]: ${failure.message}`);
    }
  }
  return lines.join('\n');
}

export function formatStatus(status: CoordinatorStatus, options: OutputOptions = {}): string {
  if (options.json === true) {
    return JSON.stringify(status, null, 2);
  }

  const stateColor =
    status.state === 'healthy' ? chalk.green : status.state === 'recovering' ? chalk.yellow : chalk.red;
  const lines = [`Store: ${status.databasePath}`, `State: ${stateColor(status.state)}`];

  if (status.lastRecoveryError !== null) {
    lines.push(`Last recovery error: ${status.lastRecoveryError}`);
  }
  if (status.stats !== null) {
    const { stats } = status;
    lines.push(
      `Documents: ${stats.documents}`,
      `Frontmatter entries: ${stats.frontmatterEntries}`,
      `Tags: ${stats.tags} (${stats.distinctTags} distinct)`,
      `Links: ${stats.links}`,
      `Generation: ${stats.generation}`,
      `Schema version: ${stats.schemaVersion}`
    );
  }
  if (status.cache !== null) {
    const { cache } = status;
    lines.push(
      `Cache: ${cache.size}/${cache.maxEntries} entries, ${cache.hits} hits, ${cache.misses} misses, ` +
        `${cache.staleEvictions} stale evictions`
    );
  } else {
    lines.push('Cache: disabled');
  }
  if (status.roots.length > 0) {
    lines.push('Indexed directories:');
    for (const root of status.roots) {
      lines.push(`  ${root.path}${root.recursive ? '' : ' (top level only)'} - ${root.lastIndexedAt}`);
    }
  }
  return lines.join('\n');
}

export function formatSchema(schema: SchemaDescription, options: OutputOptions = {}): string {
  if (options.json === true) {
    return JSON.stringify(schema, null, 2);
  }

  const lines = [`Schema version ${schema.schemaVersion}`];
  for (const table of schema.tables) {
    const count = table.rowCount !== undefined ? ` - ${table.rowCount} rows` : '';
    lines.push('', chalk.bold(`${table.name} (${table.kind})${count}`));
    for (const column of table.columns) {
      const flags = [column.primaryKey ? 'PK' : '', column.notNull ? 'NOT NULL' : '']
        .filter((flag) => flag !== '')
        .join(', ');
      lines.push(`  ${column.name} ${column.type}${flags !== '' ? ` [${flags}]` : ''}`);
    }
  }
  return lines.join('\n');
}

export function formatFuzzyMatches(matches: FuzzyMatch[], options: OutputOptions = {}): string {
  if (options.json === true) {
    return JSON.stringify({ matches }, null, 2);
  }
  if (matches.length === 0) {
    return 'No matches found.';
  }
  return matches
    .map(
      (match) =>
        `${(match.score * 100).toFixed(1)}%  ${match.path}\n      ${match.field}: ${match.snippet}`
    )
    .join('\n');
}

export function formatTemplates(templates: readonly QueryTemplate[], options: OutputOptions = {}): string {
  if (options.json === true) {
    return JSON.stringify({ templates }, null, 2);
  }
  return templates
    .map((template) => {
      const params = template.params.map((param) => ` ${param}=...`).join('');
      return `${chalk.bold(template.name)}${params}\n      ${template.description}`;
    })
    .join('\n');
}
