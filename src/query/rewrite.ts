/**
 * Full-text rewrite of substring searches
 *
 * `content LIKE '%term%'` on a `content_fts` column is answered by a
 * full scan. When the LIKE is one of the AND-ed conditions of the WHERE
 * clause, adding `content_fts MATCH '"term"'` next to it lets SQLite use
 * the trigram index first. The LIKE stays in place, so the rewritten query
 * returns exactly the rows of the original: every row the LIKE accepts
 * contains the term and therefore matches the trigram phrase.
 */

import { FTS_COLUMNS, FTS_TABLE } from '../storage/schema.js';
import type { SqlToken } from './tokenizer.js';
import type { ValidatedQuery } from './validator.js';

export interface RewriteResult {
  sql: string;
  /** Column whose LIKE was paired with a MATCH */
  column: string;
  term: string;
}

/**
 * Words whose presence rules the rewrite out
 */
const BLOCKING_WORDS: ReadonlySet<string> = new Set([
  'or',
  'not',
  'match',
  'glob',
  'regexp',
  'escape',
  'union',
  'except',
  'intersect',
  'with',
  'between',
  'case',
]);

/**
 * Words ending a WHERE clause
 */
const CLAUSE_END_WORDS: ReadonlySet<string> = new Set(['group', 'order', 'limit', 'having', 'window']);

const TERM_START_WORDS: ReadonlySet<string> = new Set(['where', 'and']);
const TERM_END_WORDS: ReadonlySet<string> = new Set(['and', ...CLAUSE_END_WORDS]);

const MIN_TERM_LENGTH = 3;

const FTS_COLUMN_SET: ReadonlySet<string> = new Set(FTS_COLUMNS);

/**
 * `%term%` with a plain term, or null
 */
function substringTerm(pattern: string): string | null {
  const match = /^%([^%_'"]+)%$/.exec(pattern);
  if (match === null) return null;
  const term = match[1];
  if (term === undefined || [...term].length < MIN_TERM_LENGTH) return null;
  return term;
}

function isPunct(token: SqlToken | undefined, text: string): boolean {
  return token !== undefined && token.type === 'punct' && token.text === text;
}

function isWord(token: SqlToken | undefined, words: ReadonlySet<string>): boolean {
  return token !== undefined && token.type === 'word' && words.has(token.value);
}

/**
 * Parenthesis depth at each token
 */
function depths(tokens: SqlToken[]): number[] {
  const result: number[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, ')')) depth--;
    result.push(depth);
    if (isPunct(token, '(')) depth++;
  }
  return result;
}

function isColumnName(token: SqlToken | undefined): token is SqlToken {
  return (
    token !== undefined &&
    (token.type === 'word' || token.type === 'identifier') &&
    FTS_COLUMN_SET.has(token.value)
  );
}

/**
 * Pair the first `LIKE '%term%'` that is a top-level WHERE condition with a
 * full-text MATCH, or return null when the query does not qualify
 */
export function rewriteTextSearch(query: ValidatedQuery): RewriteResult | null {
  const { tokens, tables } = query;

  if (tokens.some((token) => token.type === 'word' && BLOCKING_WORDS.has(token.value))) {
    return null;
  }
  // Subqueries
  if (tokens.filter((token) => token.type === 'word' && token.value === 'select').length !== 1) {
    return null;
  }

  const ftsRefs = tables.filter((table) => table.name === FTS_TABLE);
  const ftsRef = ftsRefs[0];
  if (ftsRefs.length !== 1 || ftsRef === undefined) return null;
  const qualifier = ftsRef.alias ?? FTS_TABLE;
  const onlyTable = tables.length === 1;
  const depth = depths(tokens);
  const whereIndex = tokens.findIndex(
    (token, index) => token.type === 'word' && token.value === 'where' && depth[index] === 0
  );
  if (whereIndex === -1) return null;

  for (let i = 0; i < tokens.length; i++) {
    const like = tokens[i];
    const literal = tokens[i + 1];
    if (like === undefined || like.type !== 'word' || like.value !== 'like') continue;
    if (literal === undefined || literal.type !== 'string') continue;

    const column = tokens[i - 1];
    if (!isColumnName(column)) continue;

    // Unqualified columns resolve to the FTS table only when it is alone
    let start = column.start;
    let first = i - 1;
    if (isPunct(tokens[i - 2], '.')) {
      const owner = tokens[i - 3];
      if (owner === undefined || owner.value !== qualifier) continue;
      start = owner.start;
      first = i - 3;
    } else if (!onlyTable) {
      continue;
    }

    // Only a whole top-level condition of the WHERE clause
    if (first <= whereIndex || depth[first] !== 0 || !isWord(tokens[first - 1], TERM_START_WORDS)) continue;
    const next = tokens[i + 2];
    if (next !== undefined && !isWord(next, TERM_END_WORDS)) continue;
    const clauseEnded = tokens
      .slice(whereIndex, first)
      .some((token, offset) => depth[whereIndex + offset] === 0 && isWord(token, CLAUSE_END_WORDS));
    if (clauseEnded) continue;

    const term = substringTerm(literal.value);
    if (term === null) continue;

    const original = query.sql.slice(start, literal.end);
    const match = `${qualifier}.${FTS_TABLE} MATCH '${column.value} : "${term}"'`;
    return {
      sql: `${query.sql.slice(0, start)}(${original} AND ${match})${query.sql.slice(literal.end)}`,
      column: column.value,
      term,
    };
  }

  return null;
}
