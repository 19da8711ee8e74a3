/**
 * Frontmatter splitting and normalization
 *
 * Recognizes three delimiter styles at the very start of a document:
 * - YAML between `---` and `---` (or `...`)
 * - TOML between `+++` and `+++`
 * - JSON object opened by a `{` line and closed by a `}` line
 */

import { parse as parseYaml } from 'yaml';
import { parse as parseToml } from 'smol-toml';
import type {
  FrontmatterEntry,
  FrontmatterFormat,
  FrontmatterValueType,
} from './types.js';

export interface FrontmatterSplit {
  format: FrontmatterFormat | null;
  /** Text between the delimiters (JSON keeps its braces) */
  raw: string;
  body: string;
}

export type FrontmatterData = Record<string, unknown>;

export type FrontmatterParseResult =
  | { ok: true; data: FrontmatterData }
  | { ok: false; reason: string };

const DATE_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

function normalizeNewlines(input: string): string {
  return input.replace(/\r\n?/g, '\n');
}

function findClosingLine(lines: string[], accepted: readonly string[]): number {
  for (let i = 1; i < lines.length; i++) {
    const line = (lines[i] ?? '').trimEnd();
    if (accepted.includes(line)) {
      return i;
    }
  }
  return -1;
}

/**
 * Split a decoded document into its frontmatter block and body.
 * An opening delimiter without a closing one is not frontmatter.
 */
export function splitFrontmatter(text: string): FrontmatterSplit {
  const normalized = normalizeNewlines(text);
  const input = normalized.startsWith('\ufeff') ? normalized.slice(1) : normalized;
  const lines = input.split('\n');
  const first = (lines[0] ?? '').trimEnd();

  let format: FrontmatterFormat | null = null;
  let end = -1;
  if (first === '---') {
    format = 'yaml';
    end = findClosingLine(lines, ['---', '...']);
  } else if (first === '+++') {
    format = 'toml';
    end = findClosingLine(lines, ['+++']);
  } else if (first === '{') {
    format = 'json';
    end = findClosingLine(lines, ['}']);
  }

  if (format === null || end === -1) {
    return { format: null, raw: '', body: input };
  }

  const inner = format === 'json' ? lines.slice(0, end + 1) : lines.slice(1, end);
  return {
    format,
    raw: inner.join('\n'),
    body: lines.slice(end + 1).join('\n'),
  };
}

/**
 * Quote unquoted `[[Note]]` values so YAML does not read them as nested
 * flow sequences
 */
export function quoteWikilinkValues(raw: string): string {
  return raw
    .split('\n')
    .map((line) => {
      const trimmed = line.trim();
      if (trimmed === '' || trimmed.startsWith('#')) return line;

      const listMatch = /^(\s*-\s*)(\[\[[^\n]*\]\])(\s*(?:#.*)?)$/.exec(line);
      if (listMatch) {
        return `${listMatch[1] ?? ''}"${listMatch[2] ?? ''}"${listMatch[3] ?? ''}`;
      }

      const kvMatch = /^(\s*[^:\n]+:\s*)(\[\[[^\n]*\]\])(\s*(?:#.*)?)$/.exec(line);
      if (kvMatch) {
        return `${kvMatch[1] ?? ''}"${kvMatch[2] ?? ''}"${kvMatch[3] ?? ''}`;
      }

      return line;
    })
    .join('\n');
}

function isRecord(value: unknown): value is FrontmatterData {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Parse the raw block of a split. Never throws.
 */
export function parseFrontmatterBlock(split: FrontmatterSplit): FrontmatterParseResult {
  if (split.format === null) {
    return { ok: true, data: {} };
  }
  if (split.raw.trim() === '') {
    return { ok: true, data: {} };
  }

  let parsed: unknown;
  try {
    switch (split.format) {
      case 'yaml':
        parsed = parseYaml(quoteWikilinkValues(split.raw));
        break;
      case 'toml':
        parsed = parseToml(split.raw);
        break;
      case 'json':
        parsed = JSON.parse(split.raw);
        break;
    }
  } catch (error) {
    return {
      ok: false,
      reason: `${split.format.toUpperCase()} frontmatter could not be parsed: ${
        error instanceof Error ? error.message : String(error)
      }`,
    };
  }

  if (parsed === null || parsed === undefined) {
    return { ok: true, data: {} };
  }
  if (!isRecord(parsed)) {
    return {
      ok: false,
      reason: `${split.format.toUpperCase()} frontmatter must be a mapping of keys to values`,
    };
  }
  return { ok: true, data: parsed };
}

/**
 * JSON replacer that renders dates as ISO strings
 */
function jsonWithDates(_key: string, value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

function formatDate(value: Date): string {
  // TOML local dates override toISOString with their own shorter form
  return value.toISOString();
}

/**
 * Classify one frontmatter value and render it in canonical text form
 */
export function normalizeValue(value: unknown): { value: string; type: FrontmatterValueType } {
  if (value === null || value === undefined) {
    return { value: '', type: 'string' };
  }
  if (value instanceof Date) {
    return { value: formatDate(value), type: 'date' };
  }
  if (Array.isArray(value)) {
    return { value: JSON.stringify(value, jsonWithDates), type: 'array' };
  }
  switch (typeof value) {
    case 'boolean':
      return { value: value ? 'true' : 'false', type: 'boolean' };
    case 'number':
      return { value: String(value), type: 'number' };
    case 'bigint':
      return { value: value.toString(), type: 'number' };
    case 'string':
      return { value, type: DATE_PATTERN.test(value.trim()) ? 'date' : 'string' };
    case 'object':
      return { value: JSON.stringify(value, jsonWithDates), type: 'object' };
    default:
      return { value: String(value), type: 'string' };
  }
}

/**
 * Flatten parsed frontmatter into one entry per top-level key
 */
export function toFrontmatterEntries(data: FrontmatterData): FrontmatterEntry[] {
  return Object.entries(data).map(([key, raw]) => ({ key, ...normalizeValue(raw) }));
}
