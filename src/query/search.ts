/**
 * Canned full-text search statement
 *
 * Built for the query engine like any client statement: it goes through the
 * same validation, cache and row limit as hand-written SQL.
 */

import type { QueryParams } from './types.js';

export interface TextSearchQuery {
  sql: string;
  params: QueryParams;
}

/**
 * Shortest term the trigram index can answer
 */
export const MIN_MATCH_LENGTH = 3;

/**
 * Quote text as one FTS5 phrase
 */
export function toFtsPhrase(text: string): string {
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Statement listing documents whose title, headings or body contain `text`,
 * best match first. Terms too short for the trigram index fall back to a
 * substring scan ordered by path.
 */
export function buildTextSearchQuery(text: string): TextSearchQuery {
  const term = text.trim();
  if ([...term].length >= MIN_MATCH_LENGTH) {
    return {
      sql: `SELECT f.path AS path, f.title AS title,
  snippet(content_fts, -1, '[', ']', '...', 12) AS snippet
FROM content_fts JOIN files f ON f.id = content_fts.rowid
WHERE content_fts MATCH ?
ORDER BY rank, f.path`,
      params: [toFtsPhrase(term)],
    };
  }

  const pattern = `%${term}%`;
  return {
    sql: `SELECT f.path AS path, f.title AS title, NULL AS snippet
FROM files f JOIN content_fts c ON c.rowid = f.id
WHERE c.title LIKE ? OR c.headings LIKE ? OR c.content LIKE ?
ORDER BY f.path`,
    params: [pattern, pattern, pattern],
  };
}
