import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createConfig } from '../../../src/config/config.js';
import { QueryEngine, fromWorkerFailure, toQueryError } from '../../../src/query/engine.js';
import { buildTextSearchQuery } from '../../../src/query/search.js';
import {
  QueryExecutionErrorCode,
  QueryValidationError,
  QueryValidationErrorCode,
  type QueryOutcome,
  type QueryResult,
} from '../../../src/query/types.js';
import { DocumentStore } from '../../../src/storage/store.js';
import { StorageError, StorageErrorCode, type DocumentCommit } from '../../../src/storage/types.js';
import { createWorkspace, type Workspace } from '../../helpers.js';

function doc(path: string, title: string, body: string, headings: string[]): DocumentCommit {
  return {
    path,
    stat: { fileSize: body.length, mtimeMs: 1, modifiedDate: '2024-01-01T00:00:00.000Z', createdDate: null },
    contentHash: `hash-${path}`,
    title,
    dialect: 'generic',
    frontmatterFormat: null,
    frontmatter: [],
    tags: [],
    links: [],
    headings: headings.map((text, index) => ({ level: index === 0 ? 1 : 2, text, line: index + 1 })),
    body,
    wordCount: 0,
  };
}

function expectSuccess(outcome: QueryOutcome): QueryResult {
  if (!outcome.success) {
    throw new Error(`expected success, got ${outcome.error.message}`);
  }
  return outcome.result;
}

function errorCode(outcome: QueryOutcome): string | null {
  return outcome.success ? null : outcome.error.code;
}

describe('QueryEngine', () => {
  const config = createConfig();
  let workspace: Workspace;
  let store: DocumentStore;
  let engine: QueryEngine;

  beforeAll(() => {
    workspace = createWorkspace('mdquery-engine-');
    store = DocumentStore.open(workspace.databasePath);
    store.commitDocuments([
      doc('/notes/alpha.md', 'Alpha Plans', 'The quick brown fox jumps over the lazy dog.', [
        'Alpha Plans',
        'Next Steps',
      ]),
      doc('/notes/beta.md', 'Beta Review', 'Nothing to see here.', ['Beta Review']),
      doc('/notes/gamma.md', 'Gamma', 'A quick note about brownies.', []),
    ]);
    engine = new QueryEngine(store, { query: config.query, fuzzy: config.fuzzy });
  });

  afterAll(async () => {
    await engine.close();
    store.close();
    workspace.cleanup();
  });

  describe('execute', () => {
    it('returns columns and typed rows', async () => {
      const result = expectSuccess(await engine.execute('SELECT path, word_count FROM files ORDER BY path'));
      expect(result.columns).toEqual(['path', 'word_count']);
      expect(result.rows).toEqual([
        { path: '/notes/alpha.md', word_count: 0 },
        { path: '/notes/beta.md', word_count: 0 },
        { path: '/notes/gamma.md', word_count: 0 },
      ]);
      expect(result.rowCount).toBe(3);
      expect(result.truncated).toBe(false);
      expect(result.rewritten).toBe(false);
    });

    it('flags truncation only when rows remain past the limit', async () => {
      const cut = expectSuccess(await engine.execute('SELECT path FROM files ORDER BY path', { limit: 2 }));
      expect(cut.rows).toEqual([{ path: '/notes/alpha.md' }, { path: '/notes/beta.md' }]);
      expect(cut.truncated).toBe(true);

      const exact = expectSuccess(await engine.execute('SELECT path FROM files', { limit: 3 }));
      expect(exact.rowCount).toBe(3);
      expect(exact.truncated).toBe(false);
    });

    it('binds positional and named parameters', async () => {
      const positional = expectSuccess(
        await engine.execute('SELECT path FROM files WHERE title = ?', { params: ['Beta Review'] })
      );
      expect(positional.rows).toEqual([{ path: '/notes/beta.md' }]);

      const named = expectSuccess(
        await engine.execute('SELECT path FROM files WHERE title = :title', { params: { ':title': 'Gamma' } })
      );
      expect(named.rows).toEqual([{ path: '/notes/gamma.md' }]);

      const flag = expectSuccess(await engine.execute('SELECT ? AS v', { params: [true] }));
      expect(flag.rows).toEqual([{ v: 1 }]);
    });

    it('reports parameter mistakes as invalid parameters', async () => {
      expect(errorCode(await engine.execute('SELECT path FROM files WHERE title = ?'))).toBe(
        QueryValidationErrorCode.INVALID_PARAMS
      );
      expect(
        errorCode(await engine.execute('SELECT :x AS v', { params: { 'bad-name': 1 } }))
      ).toBe(QueryValidationErrorCode.INVALID_PARAMS);
    });

    it('rejects limits and timeouts out of range', async () => {
      expect(errorCode(await engine.execute('SELECT 1', { limit: 0 }))).toBe(QueryValidationErrorCode.INVALID_LIMIT);
      expect(errorCode(await engine.execute('SELECT 1', { limit: 10001 }))).toBe(
        QueryValidationErrorCode.INVALID_LIMIT
      );
      expect(errorCode(await engine.execute('SELECT 1', { timeoutMs: -1 }))).toBe(
        QueryValidationErrorCode.INVALID_LIMIT
      );
    });

    it('refuses writes and leaves the store unchanged', async () => {
      const generation = store.getGeneration();
      expect(errorCode(await engine.execute('DROP TABLE files'))).toBe(QueryValidationErrorCode.NOT_READ_ONLY);
      expect(errorCode(await engine.execute('SELECT 1; DELETE FROM files'))).toBe(
        QueryValidationErrorCode.MULTIPLE_STATEMENTS
      );
      expect(store.getStats().documents).toBe(3);
      expect(store.getGeneration()).toBe(generation);
    });

    it('reports statements SQLite cannot run as engine faults', async () => {
      const outcome = await engine.execute('SELECT nosuch FROM files');
      expect(errorCode(outcome)).toBe(QueryExecutionErrorCode.ENGINE_FAULT);
      expect(outcome.success ? '' : outcome.error.message).toContain('no such column: nosuch');
    });

    it('runs substring searches through the full-text index with identical rows', async () => {
      const sql = "SELECT title FROM content_fts WHERE content LIKE '%quick%' ORDER BY title";
      const rewritten = expectSuccess(await engine.execute(sql));
      expect(rewritten.rewritten).toBe(true);
      expect(rewritten.rows).toEqual([{ title: 'Alpha Plans' }, { title: 'Gamma' }]);

      const plain = new QueryEngine(store, {
        query: { ...config.query, rewriteTextSearch: false },
        fuzzy: config.fuzzy,
      });
      const original = expectSuccess(await plain.execute(sql));
      await plain.close();
      expect(original.rewritten).toBe(false);
      expect(original.rows).toEqual(rewritten.rows);
    });

    it('runs LIKE outside the WHERE conditions unchanged', async () => {
      const selected = expectSuccess(
        await engine.execute("SELECT title, content LIKE '%quick%' AS hit FROM content_fts ORDER BY title")
      );
      expect(selected.rewritten).toBe(false);
      expect(selected.rows).toEqual([
        { title: 'Alpha Plans', hit: 1 },
        { title: 'Beta Review', hit: 0 },
        { title: 'Gamma', hit: 1 },
      ]);

      const compared = expectSuccess(
        await engine.execute("SELECT title FROM content_fts WHERE content LIKE '%zzzz%' = 0 ORDER BY title")
      );
      expect(compared.rewritten).toBe(false);
      expect(compared.rows).toEqual([{ title: 'Alpha Plans' }, { title: 'Beta Review' }, { title: 'Gamma' }]);
    });

    it('cancels a query that runs past its deadline without blocking the caller', async () => {
      const list = JSON.stringify(Array.from({ length: 200 }, (_, index) => index));
      let ticked = false;
      setTimeout(() => {
        ticked = true;
      }, 20);

      const outcome = await engine.execute(
        'SELECT COUNT(*) AS n FROM json_each(:list) a, json_each(:list) b, json_each(:list) c',
        { params: { list }, timeoutMs: 50 }
      );
      expect(errorCode(outcome)).toBe(QueryExecutionErrorCode.TIMEOUT);
      expect(ticked).toBe(true);

      // A fresh worker serves the next query
      expect(expectSuccess(await engine.execute('SELECT COUNT(*) AS n FROM files')).rows).toEqual([{ n: 3 }]);
    });

    it('reports the generation the rows were read at', async () => {
      const { outcome, generation } = await engine.executeAtGeneration('SELECT 1 AS one');
      expect(expectSuccess(outcome).rows).toEqual([{ one: 1 }]);
      expect(generation).toBe(store.getGeneration());
      expect((await engine.executeAtGeneration('DELETE FROM files')).generation).toBeNull();
    });
  });

  describe('check and effectiveLimit', () => {
    it('finds problems without touching the store', () => {
      expect(engine.check('SELECT 1')).toBeNull();
      expect(engine.check('DELETE FROM files')?.code).toBe(QueryValidationErrorCode.NOT_READ_ONLY);
      expect(engine.check('SELECT 1', { limit: -5 })?.code).toBe(QueryValidationErrorCode.INVALID_LIMIT);
    });

    it('falls back to the default limit', () => {
      expect(engine.effectiveLimit(undefined)).toBe(100);
      expect(engine.effectiveLimit(5)).toBe(5);
    });
  });

  describe('text search statement', () => {
    it('matches substrings through the trigram index', async () => {
      const { sql, params } = buildTextSearchQuery(' brown ');
      expect(params).toEqual(['"brown"']);
      const result = expectSuccess(await engine.execute(sql, { params }));
      expect(result.columns).toEqual(['path', 'title', 'snippet']);
      expect(result.rows.map((row) => row.path).sort()).toEqual(['/notes/alpha.md', '/notes/gamma.md']);
    });

    it('falls back to LIKE for terms shorter than a trigram', async () => {
      const { sql, params } = buildTextSearchQuery('fo');
      expect(params).toEqual(['%fo%', '%fo%', '%fo%']);
      const result = expectSuccess(await engine.execute(sql, { params }));
      expect(result.rows).toEqual([{ path: '/notes/alpha.md', title: 'Alpha Plans', snippet: null }]);
    });
  });

  describe('fuzzySearch', () => {
    it('matches titles approximately', () => {
      const matches = engine.fuzzySearch('alpha plan');
      expect(matches).toHaveLength(1);
      expect(matches[0]).toMatchObject({
        path: '/notes/alpha.md',
        title: 'Alpha Plans',
        field: 'title',
        snippet: 'alpha plans',
      });
      // 9 shared bigrams out of 9 + 10
      expect(matches[0]?.score).toBeCloseTo(18 / 19, 10);
    });

    it('searches body text when asked', () => {
      const matches = engine.fuzzySearch('quick brwn', { fields: ['content'], threshold: 0.7 });
      expect(matches.map((match) => [match.path, match.field, match.snippet])).toEqual([
        ['/notes/alpha.md', 'content', 'quick brown'],
      ]);
    });

    it('validates its options', () => {
      expect(() => engine.fuzzySearch('   ')).toThrow(QueryValidationError);
      expect(() => engine.fuzzySearch('x', { threshold: 2 })).toThrow('Threshold must be between 0 and 1');
      expect(() => engine.fuzzySearch('x', { fields: [] })).toThrow('At least one field is required');
    });
  });

  it('describes the schema through the store', () => {
    const schema = engine.describeSchema(true);
    expect(schema.tables.find((table) => table.name === 'files')?.rowCount).toBe(3);
  });
});

describe('worker failures', () => {
  it('reports a full disk as a store fault, not a query limit', () => {
    const error = fromWorkerFailure({ kind: 'sqlite', message: 'database or disk is full', code: 'SQLITE_FULL' });
    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ code: StorageErrorCode.IO_FAILED });
  });

  it('reports an oversized value as a resource limit', () => {
    const error = fromWorkerFailure({ kind: 'sqlite', message: 'string or blob too big', code: 'SQLITE_TOOBIG' });
    expect(toQueryError(error)).toMatchObject({
      code: QueryExecutionErrorCode.RESOURCE_LIMIT,
      message: 'Query exceeded a resource limit: string or blob too big',
    });
  });

  it('reports a statement that writes as not read-only', () => {
    expect(fromWorkerFailure({ kind: 'not_reader', message: 'Only read statements are allowed', code: null })).toMatchObject({
      code: QueryValidationErrorCode.NOT_READ_ONLY,
    });
  });
});
