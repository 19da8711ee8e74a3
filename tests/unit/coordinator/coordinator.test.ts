import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { Coordinator } from '../../../src/coordinator/coordinator.js';
import { QueryValidationError, type QueryOutcome, type QueryRow } from '../../../src/query/types.js';
import { DocumentStore } from '../../../src/storage/store.js';
import { StorageError, StorageErrorCode } from '../../../src/storage/types.js';
import { createWorkspace, testConfig, type Workspace } from '../../helpers.js';

const PATHS_SQL = 'SELECT path FROM files ORDER BY path';

function rowsOf(outcome: QueryOutcome): QueryRow[] {
  if (!outcome.success) throw outcome.error;
  return outcome.result.rows;
}

function cachedOf(outcome: QueryOutcome): boolean {
  if (!outcome.success) throw outcome.error;
  return outcome.cached;
}

async function storageCodeOf(promise: Promise<unknown>): Promise<StorageErrorCode | null> {
  try {
    await promise;
    return null;
  } catch (error) {
    if (error instanceof StorageError) return error.code;
    throw error;
  }
}

describe('Coordinator', () => {
  let workspace: Workspace;
  let coordinator: Coordinator;
  let alpha: string;
  let beta: string;

  beforeEach(async () => {
    workspace = createWorkspace('mdquery-coordinator-');
    alpha = workspace.write('a.md', '# Alpha\n\nHello world');
    beta = workspace.write('b.md', '# Beta\n\nSecond note');
    coordinator = await Coordinator.open({ config: testConfig(workspace.databasePath) });
  });

  afterEach(async () => {
    await coordinator.close();
    workspace.cleanup();
  });

  it('answers repeated queries from the cache', async () => {
    await coordinator.index(workspace.docs);

    const first = await coordinator.query(PATHS_SQL);
    expect(rowsOf(first)).toEqual([{ path: alpha }, { path: beta }]);
    expect(cachedOf(first)).toBe(false);

    const second = await coordinator.query(PATHS_SQL);
    expect(rowsOf(second)).toEqual([{ path: alpha }, { path: beta }]);
    expect(cachedOf(second)).toBe(true);

    const status = await coordinator.status();
    expect(status.cache).toMatchObject({ hits: 1, size: 1 });
  });

  it('stops serving cached results once the index changes', async () => {
    await coordinator.index(workspace.docs);
    await coordinator.query(PATHS_SQL);

    workspace.remove('b.md');
    await coordinator.index(workspace.docs);

    const after = await coordinator.query(PATHS_SQL);
    expect(cachedOf(after)).toBe(false);
    expect(rowsOf(after)).toEqual([{ path: alpha }]);
  });

  it('keys the cache on parameters', async () => {
    await coordinator.index(workspace.docs);
    const sql = 'SELECT title FROM files WHERE path = :path';

    const a = await coordinator.query(sql, { params: { path: alpha } });
    const b = await coordinator.query(sql, { params: { path: beta } });
    expect(rowsOf(a)).toEqual([{ title: 'Alpha' }]);
    expect(rowsOf(b)).toEqual([{ title: 'Beta' }]);
    expect(cachedOf(b)).toBe(false);
  });

  it('does not share cached results between aliases that differ in case', async () => {
    await coordinator.index(workspace.docs);

    const upper = await coordinator.query('SELECT path AS Path FROM files ORDER BY path');
    expect(upper.success ? upper.result.columns : []).toEqual(['Path']);

    const lower = await coordinator.query('SELECT path AS path FROM files ORDER BY path');
    expect(cachedOf(lower)).toBe(false);
    expect(lower.success ? lower.result.columns : []).toEqual(['path']);
    expect(rowsOf(lower)).toEqual([{ path: alpha }, { path: beta }]);
  });

  it('returns validation failures without touching the store', async () => {
    await coordinator.index(workspace.docs);
    const outcome = await coordinator.query('DELETE FROM files');
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(QueryValidationError);
    }
    expect(rowsOf(await coordinator.query('SELECT COUNT(*) AS n FROM files'))).toEqual([{ n: 2 }]);
  });

  it('runs many queries at once', async () => {
    await coordinator.index(workspace.docs);
    const outcomes = await Promise.all(
      Array.from({ length: 12 }, (_, i) => coordinator.query(`SELECT ${i} AS n, COUNT(*) AS c FROM files`))
    );
    expect(outcomes.map((outcome) => rowsOf(outcome)[0])).toEqual(
      Array.from({ length: 12 }, (_, i) => ({ n: i, c: 2 }))
    );
  });

  it('reports status with store statistics and indexed directories', async () => {
    await coordinator.index(workspace.docs);
    const status = await coordinator.status();

    expect(status.state).toBe('healthy');
    expect(status.databasePath).toBe(workspace.databasePath);
    expect(status.stats?.documents).toBe(2);
    expect(status.roots.map((root) => root.path)).toEqual([workspace.docs]);
    expect(status.indexing).toBe(false);
    expect(status.lastRecoveryError).toBeNull();
  });

  it('describes the schema and searches by similarity', async () => {
    await coordinator.index(workspace.docs);

    const schema = await coordinator.describeSchema();
    expect(schema.tables.map((table) => table.name)).toEqual([
      'files',
      'frontmatter',
      'tags',
      'links',
      'content_fts',
      'files_with_metadata',
      'tag_summary',
      'link_summary',
    ]);

    const matches = await coordinator.fuzzySearch('Alpha', { fields: ['title'] });
    expect(matches[0]).toMatchObject({ path: alpha, score: 1, field: 'title' });
  });

  it('rebuilds from scratch', async () => {
    await coordinator.index(workspace.docs);
    const report = await coordinator.rebuild(workspace.docs);
    expect(report).toMatchObject({ created: 2, updated: 0, deleted: 0 });
    expect(rowsOf(await coordinator.query(PATHS_SQL))).toEqual([{ path: alpha }, { path: beta }]);
  });

  it('repairs a store whose full-text index lost a row', async () => {
    await coordinator.index(workspace.docs);
    const raw = new Database(workspace.databasePath);
    raw.prepare('DELETE FROM content_fts WHERE rowid = (SELECT id FROM files WHERE path = ?)').run(beta);
    raw.close();

    expect(await coordinator.verify()).toBe('healthy');
    expect(rowsOf(await coordinator.query(PATHS_SQL))).toEqual([{ path: alpha }]);

    const report = await coordinator.index(workspace.docs);
    expect(report.created).toBe(1);
    expect(rowsOf(await coordinator.query(PATHS_SQL))).toEqual([{ path: alpha }, { path: beta }]);
  });

  it('refuses work after close', async () => {
    await coordinator.close();
    expect(await storageCodeOf(coordinator.query(PATHS_SQL))).toBe(StorageErrorCode.CLOSED);
  });
});

describe('Coordinator recovery', () => {
  let workspace: Workspace;

  beforeEach(() => {
    workspace = createWorkspace('mdquery-recovery-');
    workspace.write('a.md', '# Alpha');
    workspace.write('b.md', '# Beta');
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it('rebuilds a store file that is not a database', async () => {
    fs.mkdirSync(path.dirname(workspace.databasePath), { recursive: true });
    fs.writeFileSync(workspace.databasePath, 'this is not a database file '.repeat(64));

    const coordinator = await Coordinator.open({
      config: testConfig(workspace.databasePath),
      roots: [{ path: workspace.docs, recursive: true }],
    });
    try {
      expect(coordinator.health).toBe('healthy');
      expect(rowsOf(await coordinator.query('SELECT COUNT(*) AS n FROM files'))).toEqual([{ n: 2 }]);
    } finally {
      await coordinator.close();
    }
  });

  it('becomes unrecoverable when the store cannot be recreated, until a rebuild', async () => {
    let opens = 0;
    const coordinator = await Coordinator.open({
      config: testConfig(workspace.databasePath),
      openStore: (file, options) => {
        opens++;
        if (opens <= 2) {
          throw new StorageError('file is not a database', StorageErrorCode.CORRUPT);
        }
        return DocumentStore.open(file, options);
      },
    });

    try {
      expect(coordinator.health).toBe('unrecoverable');
      expect((await coordinator.status()).lastRecoveryError).toBe(
        'file is not a database; rebuild failed: file is not a database'
      );
      expect(await storageCodeOf(coordinator.query('SELECT 1'))).toBe(StorageErrorCode.UNRECOVERABLE);

      const report = await coordinator.rebuild(workspace.docs);
      expect(report.created).toBe(2);
      expect(coordinator.health).toBe('healthy');
      expect(rowsOf(await coordinator.query('SELECT COUNT(*) AS n FROM files'))).toEqual([{ n: 2 }]);
    } finally {
      await coordinator.close();
    }
  });
});
