import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import Database from 'better-sqlite3';
import { Coordinator } from '../../src/coordinator/coordinator.js';
import { QueryValidationError, type QueryOutcome, type QueryRow } from '../../src/query/types.js';
import { createWorkspace, testConfig, type Workspace } from '../helpers.js';

const TAG_COUNTS_SQL = 'SELECT tag, COUNT(*) AS n FROM tags GROUP BY tag ORDER BY tag';
const TAGS_OF_SQL =
  'SELECT t.tag FROM tags t JOIN files f ON f.id = t.file_id WHERE f.path = :path ORDER BY t.tag';

function rowsOf(outcome: QueryOutcome): QueryRow[] {
  if (!outcome.success) throw outcome.error;
  return outcome.result.rows;
}

function cachedOf(outcome: QueryOutcome): boolean {
  if (!outcome.success) throw outcome.error;
  return outcome.cached;
}

describe('indexing and querying a collection', () => {
  let workspace: Workspace;
  let coordinator: Coordinator;
  let a: string;
  let b: string;
  let c: string;

  async function generation(): Promise<number | undefined> {
    return (await coordinator.status()).stats?.generation;
  }

  async function tagsOf(file: string): Promise<string[]> {
    const rows = rowsOf(await coordinator.query(TAGS_OF_SQL, { params: { path: file } }));
    return rows.map((row) => String(row.tag));
  }

  beforeEach(async () => {
    workspace = createWorkspace('mdquery-scenario-');
    a = workspace.write('A.md', '---\ntags: [foo, bar]\n---\n# A\n\nThe original text.');
    b = workspace.write('B.md', '# B\n\nSee [the first note](A.md).');
    c = workspace.write('C.md', '---\ntitle: [unclosed\n---\n# C\n\nStill indexed.');
    coordinator = await Coordinator.open({ config: testConfig(workspace.databasePath) });
  });

  afterEach(async () => {
    await coordinator.close();
    workspace.cleanup();
  });

  it('indexes documents with tags, links and extraction warnings', async () => {
    const report = await coordinator.index(workspace.docs);

    expect(report).toMatchObject({ filesProcessed: 3, created: 3, updated: 0, deleted: 0, failures: [] });
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatchObject({ path: c, code: 'MALFORMED_FRONTMATTER' });

    expect(rowsOf(await coordinator.query('SELECT COUNT(*) AS n FROM tags'))).toEqual([{ n: 2 }]);
    expect(await tagsOf(a)).toEqual(['bar', 'foo']);
    expect(
      rowsOf(
        await coordinator.query(
          'SELECT f.path, l.link_target FROM links l JOIN files f ON f.id = l.file_id'
        )
      )
    ).toEqual([{ path: b, link_target: 'A.md' }]);
    expect(
      rowsOf(
        await coordinator.query(
          'SELECT COUNT(*) AS n FROM frontmatter fm JOIN files f ON f.id = fm.file_id WHERE f.path = ?',
          { params: [c] }
        )
      )
    ).toEqual([{ n: 0 }]);
    expect(
      rowsOf(await coordinator.query('SELECT title FROM files WHERE path = ?', { params: [c] }))
    ).toEqual([{ title: 'C' }]);
  });

  it('changes nothing when re-indexing an unchanged directory', async () => {
    await coordinator.index(workspace.docs);
    const before = await generation();

    const report = await coordinator.index(workspace.docs);
    expect(report).toMatchObject({ filesProcessed: 3, created: 0, updated: 0, deleted: 0, filesSkipped: 3 });
    expect(await generation()).toBe(before);
  });

  it('replaces the rows of an edited document in one generation step', async () => {
    await coordinator.index(workspace.docs);
    const before = await generation();

    workspace.write('A.md', '---\ntags: [foo, baz]\n---\n# A\n\nThe revised text, now longer.');
    const report = await coordinator.index(workspace.docs);

    expect(report).toMatchObject({ updated: 1, created: 0, filesSkipped: 2 });
    expect(await generation()).toBe((before ?? 0) + 1);
    expect(await tagsOf(a)).toEqual(['baz', 'foo']);

    const search = (term: string): Promise<QueryOutcome> =>
      coordinator.query(
        `SELECT f.path FROM content_fts c JOIN files f ON f.id = c.rowid WHERE c.content LIKE '%${term}%'`
      );
    expect(rowsOf(await search('revised'))).toEqual([{ path: a }]);
    expect(rowsOf(await search('original'))).toEqual([]);
  });

  it('misses the cache after a new document changes a cached aggregate', async () => {
    await coordinator.index(workspace.docs);
    const first = await coordinator.query(TAG_COUNTS_SQL);
    expect(rowsOf(first)).toEqual([
      { tag: 'bar', n: 1 },
      { tag: 'foo', n: 1 },
    ]);
    expect(cachedOf(await coordinator.query(TAG_COUNTS_SQL))).toBe(true);

    workspace.write('D.md', '---\ntags: [foo]\n---\nAnother note.');
    await coordinator.index(workspace.docs);

    const after = await coordinator.query(TAG_COUNTS_SQL);
    expect(cachedOf(after)).toBe(false);
    expect(rowsOf(after)).toEqual([
      { tag: 'bar', n: 1 },
      { tag: 'foo', n: 2 },
    ]);
  });

  it('returns the same rows from the cache as from a fresh execution', async () => {
    await coordinator.index(workspace.docs);
    const fresh = await coordinator.query('SELECT path, title, content_hash FROM files ORDER BY path');
    const cached = await coordinator.query('SELECT path, title, content_hash FROM files ORDER BY path');

    expect(cachedOf(cached)).toBe(true);
    expect(JSON.stringify(rowsOf(cached))).toBe(JSON.stringify(rowsOf(fresh)));
  });

  it('rejects statements that could modify the store and leaves it untouched', async () => {
    await coordinator.index(workspace.docs);
    const before = await generation();
    const bytes = fs.readFileSync(workspace.databasePath);

    const statements = [
      'DROP TABLE files',
      'DELETE FROM files',
      "UPDATE files SET title = 'x'",
      "INSERT INTO tags VALUES (1, 'x', 'content')",
      'SELECT 1; DELETE FROM files',
      'SELECT * FROM sqlite_master',
      'SELECT * FROM schema_version',
      "ATTACH DATABASE 'other.db' AS other",
      'PRAGMA writable_schema = 1',
    ];
    for (const sql of statements) {
      const outcome = await coordinator.query(sql);
      expect(outcome.success, sql).toBe(false);
      if (!outcome.success) {
        expect(outcome.error, sql).toBeInstanceOf(QueryValidationError);
      }
    }

    expect(await generation()).toBe(before);
    expect(fs.readFileSync(workspace.databasePath).equals(bytes)).toBe(true);
    expect(rowsOf(await coordinator.query('SELECT COUNT(*) AS n FROM files'))).toEqual([{ n: 3 }]);
  });

  it('removes every dependent row when a document is deleted', async () => {
    await coordinator.index(workspace.docs);
    workspace.remove('A.md');
    workspace.remove('B.md');

    const report = await coordinator.index(workspace.docs);
    expect(report.deleted).toBe(2);

    const counts = rowsOf(
      await coordinator.query(
        `SELECT
           (SELECT COUNT(*) FROM files) AS files,
           (SELECT COUNT(*) FROM tags) AS tags,
           (SELECT COUNT(*) FROM links) AS links,
           (SELECT COUNT(*) FROM frontmatter) AS frontmatter,
           (SELECT COUNT(*) FROM content_fts) AS fts`
      )
    );
    expect(counts).toEqual([{ files: 1, tags: 0, links: 0, frontmatter: 0, fts: 1 }]);
    expect(await coordinator.verify()).toBe('healthy');
  });

  it('never shows a half-written document to concurrent readers', async () => {
    await coordinator.index(workspace.docs);

    const raw = new Database(workspace.databasePath);
    try {
      raw.exec('BEGIN IMMEDIATE');
      const fileId = raw.prepare('SELECT id FROM files WHERE path = ?').pluck().get(a);
      raw.prepare('DELETE FROM tags WHERE file_id = ?').run(fileId);
      const insert = raw.prepare("INSERT INTO tags (file_id, tag, source) VALUES (?, ?, 'frontmatter')");
      insert.run(fileId, 'baz');
      insert.run(fileId, 'qux');
      raw.exec("UPDATE index_state SET value = value + 1 WHERE key = 'generation'");

      const during = await Promise.all(Array.from({ length: 5 }, () => tagsOf(a)));
      expect(during).toEqual(Array.from({ length: 5 }, () => ['bar', 'foo']));

      raw.exec('COMMIT');
      expect(await tagsOf(a)).toEqual(['baz', 'qux']);
    } finally {
      raw.close();
    }
  });

  it('serves either the old or the new tag set while a re-index runs', async () => {
    await coordinator.index(workspace.docs);
    workspace.write('A.md', '---\ntags: [alpha, beta, gamma]\n---\n# A\n\nRewritten body text.');

    const [report, ...reads] = await Promise.all([
      coordinator.index(workspace.docs),
      ...Array.from({ length: 5 }, () => tagsOf(a)),
    ]);

    expect(report.updated).toBe(1);
    for (const tags of reads) {
      expect([
        ['bar', 'foo'],
        ['alpha', 'beta', 'gamma'],
      ]).toContainEqual(tags);
    }
    expect(await tagsOf(a)).toEqual(['alpha', 'beta', 'gamma']);
  });
});
