/**
 * Read-only query validation
 *
 * Runs before the statement reaches SQLite. A query passes only if it is a
 * single SELECT (optionally preceded by a non-recursive WITH clause) whose
 * table references all name allow-listed tables, views or its own CTEs.
 */

import { QUERYABLE_TABLES, QUERYABLE_VIEWS } from '../storage/schema.js';
import {
  SqlLexError,
  findClosingParen,
  tokenize,
  type SqlToken,
} from './tokenizer.js';
import { QueryValidationError, QueryValidationErrorCode } from './types.js';

export interface ValidatorLimits {
  maxQueryLength: number;
  maxJoins: number;
}

/**
 * Table or view named in a FROM or JOIN clause
 */
export interface TableReference {
  name: string;
  alias: string | null;
}

export interface ValidatedQuery {
  /** Statement text without a trailing semicolon */
  sql: string;
  tokens: SqlToken[];
  tables: TableReference[];
  cteNames: string[];
  joinCount: number;
}

/**
 * Words that never appear in an accepted query outside literals
 */
const FORBIDDEN_KEYWORDS: ReadonlySet<string> = new Set([
  'insert',
  'update',
  'delete',
  'drop',
  'create',
  'alter',
  'pragma',
  'attach',
  'detach',
  'vacuum',
  'reindex',
  'analyze',
  'begin',
  'commit',
  'rollback',
  'savepoint',
  'release',
  'truncate',
  'returning',
  'materialized',
  'load_extension',
]);

/**
 * Forbidden as a statement, allowed as the string function replace(x, y, z)
 */
const FUNCTION_ONLY_KEYWORDS: ReadonlySet<string> = new Set(['replace']);

/**
 * Read-only table-valued functions usable in FROM
 */
const ALLOWED_TABLE_FUNCTIONS: ReadonlySet<string> = new Set(['json_each', 'json_tree']);

/**
 * Words that end a table reference instead of naming its alias
 */
const CLAUSE_KEYWORDS: ReadonlySet<string> = new Set([
  'where',
  'group',
  'order',
  'limit',
  'offset',
  'having',
  'window',
  'join',
  'inner',
  'left',
  'right',
  'full',
  'outer',
  'cross',
  'natural',
  'on',
  'using',
  'union',
  'except',
  'intersect',
  'indexed',
  'not',
]);

const MAX_NESTING = 32;

export const ALLOWED_TABLES: ReadonlySet<string> = new Set<string>([
  ...QUERYABLE_TABLES,
  ...QUERYABLE_VIEWS,
]);

function reject(message: string, code: QueryValidationErrorCode): never {
  throw new QueryValidationError(message, code);
}

function isPunct(token: SqlToken | undefined, text: string): boolean {
  return token !== undefined && token.type === 'punct' && token.text === text;
}

function isWord(token: SqlToken | undefined, value?: string): boolean {
  return token !== undefined && token.type === 'word' && (value === undefined || token.value === value);
}

function isName(token: SqlToken | undefined): token is SqlToken {
  return token !== undefined && (token.type === 'word' || token.type === 'identifier');
}

/**
 * Collect the names declared by the WITH clause starting at `withIndex`
 */
function readCteNames(tokens: SqlToken[], withIndex: number): string[] {
  const names: string[] = [];
  let i = withIndex + 1;

  if (isWord(tokens[i], 'recursive')) {
    reject('WITH RECURSIVE is not permitted', QueryValidationErrorCode.NOT_READ_ONLY);
  }

  for (;;) {
    const nameToken = tokens[i];
    if (!isName(nameToken)) break;
    names.push(nameToken.value);
    i++;

    if (isPunct(tokens[i], '(')) {
      const close = findClosingParen(tokens, i);
      if (close === -1) break;
      i = close + 1;
    }
    if (!isWord(tokens[i], 'as')) break;
    i++;
    if (isWord(tokens[i], 'not') || isWord(tokens[i], 'materialized')) {
      reject('MATERIALIZED hints are not permitted', QueryValidationErrorCode.FORBIDDEN_KEYWORD);
    }
    if (!isPunct(tokens[i], '(')) break;
    const close = findClosingParen(tokens, i);
    if (close === -1) break;
    i = close + 1;

    if (!isPunct(tokens[i], ',')) break;
    i++;
  }

  return names;
}

/**
 * Read the table list following FROM or JOIN at `index`
 *
 * @returns table references found and the number of comma joins
 */
function readTableList(
  tokens: SqlToken[],
  index: number,
  allowComma: boolean
): { tables: TableReference[]; commaJoins: number } {
  const tables: TableReference[] = [];
  let commaJoins = 0;
  let i = index;

  for (;;) {
    const token = tokens[i];
    let name: string | null = null;

    if (isPunct(token, '(')) {
      // A subquery's own FROM clauses are read separately; a parenthesized
      // table list is read here
      const inner = tokens[i + 1];
      if (!isWord(inner, 'select') && !isWord(inner, 'with') && !isWord(inner, 'values')) {
        const nested = readTableList(tokens, i + 1, true);
        tables.push(...nested.tables);
        commaJoins += nested.commaJoins;
      }
      const close = findClosingParen(tokens, i);
      if (close === -1) break;
      i = close + 1;
    } else if (isName(token)) {
      name = token.value;
      i++;
      if (isPunct(tokens[i], '.')) {
        const qualified = tokens[i + 1];
        if (name !== 'main' || !isName(qualified)) {
          reject(`Table not allowed: ${name}.${qualified?.value ?? ''}`, QueryValidationErrorCode.TABLE_NOT_ALLOWED);
        }
        name = qualified.value;
        i += 2;
      }
      if (isPunct(tokens[i], '(')) {
        if (!ALLOWED_TABLE_FUNCTIONS.has(name)) {
          reject(`Table-valued function not allowed: ${name}`, QueryValidationErrorCode.TABLE_NOT_ALLOWED);
        }
        const close = findClosingParen(tokens, i);
        if (close === -1) break;
        i = close + 1;
        name = null;
      }
    } else {
      break;
    }

    let alias: string | null = null;
    if (isWord(tokens[i], 'as') && isName(tokens[i + 1])) {
      alias = tokens[i + 1]?.value ?? null;
      i += 2;
    } else {
      const candidate = tokens[i];
      if (isName(candidate) && !(candidate.type === 'word' && CLAUSE_KEYWORDS.has(candidate.value))) {
        alias = candidate.value;
        i++;
      }
    }

    if (name !== null) {
      tables.push({ name, alias });
    }

    if (allowComma && isPunct(tokens[i], ',')) {
      commaJoins++;
      i++;
      continue;
    }
    break;
  }

  return { tables, commaJoins };
}

/**
 * Validate a query against the read-only subset
 *
 * @throws QueryValidationError describing the first violation found
 */
export function validateQuery(sql: string, limits: ValidatorLimits): ValidatedQuery {
  if (sql.trim() === '') {
    reject('Query cannot be empty', QueryValidationErrorCode.EMPTY);
  }
  if (sql.length > limits.maxQueryLength) {
    reject(
      `Query is ${sql.length} characters long; the maximum is ${limits.maxQueryLength}`,
      QueryValidationErrorCode.TOO_LONG
    );
  }

  let tokens: SqlToken[];
  try {
    tokens = tokenize(sql);
  } catch (error) {
    if (error instanceof SqlLexError) {
      throw new QueryValidationError(
        `${error.message} at position ${error.position}`,
        QueryValidationErrorCode.MALFORMED,
        error
      );
    }
    throw error;
  }

  if (tokens.some((token) => token.type === 'comment')) {
    reject('SQL comments are not permitted', QueryValidationErrorCode.COMMENT);
  }

  // One trailing semicolon is tolerated
  let statementEnd = sql.length;
  const last = tokens[tokens.length - 1];
  if (last !== undefined && isPunct(last, ';')) {
    statementEnd = last.start;
    tokens = tokens.slice(0, -1);
  }
  if (tokens.some((token) => isPunct(token, ';'))) {
    reject('Only a single statement is permitted', QueryValidationErrorCode.MULTIPLE_STATEMENTS);
  }
  if (tokens.length === 0) {
    reject('Query cannot be empty', QueryValidationErrorCode.EMPTY);
  }

  const verb = tokens[0];
  if (!isWord(verb, 'select') && !isWord(verb, 'with')) {
    reject(
      `Only SELECT queries are permitted, got ${verb?.text.toUpperCase() ?? 'nothing'}`,
      QueryValidationErrorCode.NOT_READ_ONLY
    );
  }

  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;
    if (isPunct(token, '(')) {
      depth++;
      if (depth > MAX_NESTING) {
        reject(`Nesting deeper than ${MAX_NESTING} levels`, QueryValidationErrorCode.TOO_COMPLEX);
      }
    } else if (isPunct(token, ')')) {
      depth--;
    } else if (token.type === 'word') {
      if (FORBIDDEN_KEYWORDS.has(token.value)) {
        reject(`Keyword not permitted: ${token.value.toUpperCase()}`, QueryValidationErrorCode.FORBIDDEN_KEYWORD);
      }
      if (FUNCTION_ONLY_KEYWORDS.has(token.value) && !isPunct(tokens[i + 1], '(')) {
        reject(`Keyword not permitted: ${token.value.toUpperCase()}`, QueryValidationErrorCode.FORBIDDEN_KEYWORD);
      }
    }
  }

  const cteNames: string[] = [];
  const tables: TableReference[] = [];
  let joinCount = 0;

  for (let i = 0; i < tokens.length; i++) {
    if (isWord(tokens[i], 'with')) {
      cteNames.push(...readCteNames(tokens, i));
    }
  }

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isWord(token, 'join')) {
      joinCount++;
      tables.push(...readTableList(tokens, i + 1, false).tables);
    } else if (isWord(token, 'in') && isName(tokens[i + 1])) {
      // `x IN name` reads every row of a table
      tables.push(...readTableList(tokens, i + 1, false).tables);
    } else if (isWord(token, 'from') && !isWord(tokens[i - 1], 'distinct')) {
      const list = readTableList(tokens, i + 1, true);
      joinCount += list.commaJoins;
      tables.push(...list.tables);
    }
  }

  const known = new Set(cteNames);
  for (const table of tables) {
    if (!ALLOWED_TABLES.has(table.name) && !known.has(table.name)) {
      reject(
        `Table not allowed: ${table.name}. Queryable: ${[...ALLOWED_TABLES].join(', ')}`,
        QueryValidationErrorCode.TABLE_NOT_ALLOWED
      );
    }
  }

  if (joinCount > limits.maxJoins) {
    reject(
      `Query joins ${joinCount} tables; the maximum is ${limits.maxJoins}`,
      QueryValidationErrorCode.TOO_COMPLEX
    );
  }

  return {
    sql: sql.slice(0, statementEnd).trimEnd(),
    tokens,
    tables,
    cteNames,
    joinCount,
  };
}
