/**
 * Lexer for the SQL subset accepted by the query engine
 *
 * Only tokenizes: it tells words from string literals, quoted identifiers
 * and punctuation, so that validation never mistakes text inside a literal
 * for a keyword or a statement separator.
 */

export type SqlTokenType =
  | 'word'
  | 'identifier'
  | 'string'
  | 'number'
  | 'param'
  | 'punct'
  | 'comment';

export interface SqlToken {
  type: SqlTokenType;
  /** Source text of the token */
  text: string;
  /**
   * Lower-cased word, unquoted identifier or unescaped string value.
   * Equal to `text` for other token types.
   */
  value: string;
  start: number;
  end: number;
}

export class SqlLexError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(message);
    this.name = 'SqlLexError';
  }
}

const WORD_START = /[\p{L}_]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;
const TWO_CHAR_OPERATORS = new Set(['<=', '>=', '<>', '!=', '==', '||', '<<', '>>', '->']);

function readQuoted(sql: string, start: number, close: string): { end: number; value: string } {
  let value = '';
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql.charAt(i);
    if (ch === close) {
      // A doubled closing quote escapes itself, except for [brackets]
      if (close !== ']' && sql.charAt(i + 1) === close) {
        value += close;
        i += 2;
        continue;
      }
      return { end: i + 1, value };
    }
    value += ch;
    i++;
  }
  throw new SqlLexError(`Unterminated ${close === "'" ? 'string literal' : 'quoted identifier'}`, start);
}

/**
 * Split SQL text into tokens, whitespace dropped
 *
 * @throws SqlLexError on an unterminated literal or identifier
 */
export function tokenize(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let i = 0;

  const push = (type: SqlTokenType, start: number, end: number, value?: string): void => {
    const text = sql.slice(start, end);
    tokens.push({ type, text, value: value ?? text, start, end });
  };

  while (i < sql.length) {
    const ch = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      push('comment', i, end);
      i = end;
      continue;
    }
    if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      const end = close === -1 ? sql.length : close + 2;
      push('comment', i, end);
      i = end;
      continue;
    }

    if (ch === "'") {
      const { end, value } = readQuoted(sql, i, "'");
      push('string', i, end, value);
      i = end;
      continue;
    }
    if (ch === '"' || ch === '`' || ch === '[') {
      const { end, value } = readQuoted(sql, i, ch === '[' ? ']' : ch);
      push('identifier', i, end, value.toLowerCase());
      i = end;
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && DIGIT.test(next))) {
      let end = i + 1;
      while (end < sql.length && /[0-9a-fA-FxX.]/.test(sql.charAt(end))) end++;
      if (/[eE]/.test(sql.charAt(end - 1)) && /[-+]/.test(sql.charAt(end))) {
        end++;
        while (end < sql.length && DIGIT.test(sql.charAt(end))) end++;
      }
      push('number', i, end);
      i = end;
      continue;
    }

    if (ch === '?') {
      let end = i + 1;
      while (end < sql.length && DIGIT.test(sql.charAt(end))) end++;
      push('param', i, end);
      i = end;
      continue;
    }
    if ((ch === ':' || ch === '@' || ch === '$') && WORD_START.test(next)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql.charAt(end))) end++;
      push('param', i, end);
      i = end;
      continue;
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql.charAt(end))) end++;
      push('word', i, end, sql.slice(i, end).toLowerCase());
      i = end;
      continue;
    }

    if (TWO_CHAR_OPERATORS.has(ch + next)) {
      push('punct', i, i + 2);
      i += 2;
      continue;
    }
    push('punct', i, i + 1);
    i++;
  }

  return tokens;
}

/**
 * Canonical text of a token list: tokens joined by single spaces, each kept
 * exactly as written. Case is preserved because unquoted names and aliases
 * become result column names.
 */
export function normalizeTokens(tokens: SqlToken[]): string {
  return tokens.map((token) => token.text).join(' ');
}

/**
 * Index of the token closing the parenthesis opened at `openIndex`, or -1
 */
export function findClosingParen(tokens: SqlToken[], openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || token.type !== 'punct') continue;
    if (token.text === '(') depth++;
    if (token.text === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
