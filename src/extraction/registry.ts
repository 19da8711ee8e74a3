/**
 * Dialect registry and extraction entry point
 *
 * Dispatch walks an explicit ordered list, most specific first, and picks
 * the first dialect whose `canHandle` accepts the document. The generic
 * dialect is always last and accepts everything.
 */

import { MarkdownDialect } from './dialects/base.js';
import { GenericDialect } from './dialects/generic.js';
import { NoteAppDialect } from './dialects/note-app.js';
import { StaticSiteDialect } from './dialects/static-site.js';
import { WikiLinkDialect } from './dialects/wiki-link.js';
import type { ExtractionOutcome } from './types.js';

/**
 * Decode raw bytes as UTF-8, reporting bytes that are not valid text
 */
export function decodeText(rawBytes: Uint8Array): { text: string } | { error: string } {
  try {
    // A leading BOM is dropped by the decoder
    const text = new TextDecoder('utf-8', { fatal: true }).decode(rawBytes);
    return { text };
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }
}

export class DialectRegistry {
  private readonly fallback = new GenericDialect();
  private dialects: MarkdownDialect[] = [];

  constructor(dialects: MarkdownDialect[] = defaultDialects()) {
    for (const dialect of dialects) {
      this.register(dialect);
    }
  }

  /**
   * Register a dialect. It is consulted after those registered before it
   * and always before the generic fallback.
   */
  register(dialect: MarkdownDialect): void {
    if (this.dialects.some((existing) => existing.name === dialect.name)) {
      throw new Error(`Dialect already registered: ${dialect.name}`);
    }
    this.dialects.push(dialect);
  }

  /**
   * Dialect names in dispatch order, fallback included
   */
  getDialectNames(): string[] {
    return [...this.dialects.map((dialect) => dialect.name), this.fallback.name];
  }

  /**
   * First dialect that recognizes the document
   */
  select(path: string, text: string): MarkdownDialect {
    return this.dialects.find((dialect) => dialect.canHandle(path, text)) ?? this.fallback;
  }

  /**
   * Extract one file. Pure: no I/O, no shared state, safe to run for many
   * files at once. Never throws.
   */
  extract(path: string, rawBytes: Uint8Array): ExtractionOutcome {
    const decoded = decodeText(rawBytes);
    if ('error' in decoded) {
      return {
        success: false,
        failure: {
          path,
          code: 'DECODE_FAILED',
          message: `Not valid UTF-8 text: ${decoded.error}`,
        },
      };
    }
    if (decoded.text.includes('\u0000')) {
      return {
        success: false,
        failure: { path, code: 'BINARY_CONTENT', message: 'File contains NUL bytes' },
      };
    }

    const dialect = this.select(path, decoded.text);
    try {
      return { success: true, document: dialect.parse(path, decoded.text) };
    } catch (error) {
      return {
        success: false,
        failure: {
          path,
          code: 'PARSE_FAILED',
          message: `${dialect.name} dialect failed: ${
            error instanceof Error ? error.message : String(error)
          }`,
        },
      };
    }
  }
}

/**
 * Built-in dialects in dispatch order (generic fallback excluded)
 */
export function defaultDialects(): MarkdownDialect[] {
  return [new NoteAppDialect(), new StaticSiteDialect(), new WikiLinkDialect()];
}

export function createDialectRegistry(extra: MarkdownDialect[] = []): DialectRegistry {
  return new DialectRegistry([...extra, ...defaultDialects()]);
}
