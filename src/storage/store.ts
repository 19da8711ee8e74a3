/**
 * SQLite index store for mdquery
 *
 * One write connection and one read-only connection over the same file in
 * WAL mode. Writers take the write lock up front (BEGIN IMMEDIATE); readers
 * run in deferred transactions and see one consistent snapshot. The
 * full-text row of a document is written and deleted in the same
 * transaction as its `files` row.
 */

import Database, { Database as DatabaseType } from 'better-sqlite3';
import { resolve, dirname, basename } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import {
  CREATE_TABLES,
  FTS_TABLE,
  QUERYABLE_TABLES,
  QUERYABLE_VIEWS,
  SCHEMA_VERSION,
  runMigrations,
} from './schema.js';
import {
  CommitResult,
  DocumentCommit,
  FileRecord,
  FileStat,
  FileState,
  IndexedRoot,
  SchemaDescription,
  StorageError,
  StorageErrorCode,
  StoreStats,
  TableDescription,
  sqliteCode,
  toStorageError,
} from './types.js';

export interface StoreOptions {
  /** Milliseconds a connection waits on a lock before SQLITE_BUSY */
  busyTimeoutMs?: number;
}

/**
 * Read-only view handed to read transactions
 */
export type ReadConnection = Pick<DatabaseType, 'prepare'>;

export class DocumentStore {
  private closed = false;

  private constructor(
    private readonly db: DatabaseType,
    private readonly reader: DatabaseType,
    readonly databasePath: string
  ) {}

  /**
   * Open (creating if needed) the store at a path
   *
   * @throws StorageError CORRUPT when the file is not a usable database,
   *   INIT_FAILED for any other initialization failure
   */
  static open(databasePath: string, options: StoreOptions = {}): DocumentStore {
    const absolutePath = resolve(databasePath);
    const busyTimeout = options.busyTimeoutMs ?? 5000;

    const parentDir = dirname(absolutePath);
    if (!existsSync(parentDir)) {
      mkdirSync(parentDir, { recursive: true });
    }

    let db: DatabaseType | undefined;
    try {
      db = new Database(absolutePath, { timeout: busyTimeout });
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.pragma('synchronous = NORMAL');
      db.exec(CREATE_TABLES);

      const versionResult = db
        .prepare('SELECT version FROM schema_version LIMIT 1')
        .get() as { version: number } | undefined;

      if (versionResult === undefined) {
        db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
      } else if (versionResult.version > SCHEMA_VERSION) {
        throw new StorageError(
          `Store at ${absolutePath} has schema version ${versionResult.version}, newer than supported ${SCHEMA_VERSION}`,
          StorageErrorCode.INIT_FAILED
        );
      } else if (versionResult.version < SCHEMA_VERSION) {
        runMigrations(db, versionResult.version);
      }

      const reader = new Database(absolutePath, {
        readonly: true,
        fileMustExist: true,
        timeout: busyTimeout,
      });
      return new DocumentStore(db, reader, absolutePath);
    } catch (error) {
      db?.close();
      const mapped = toStorageError(error, `Failed to initialize store at ${absolutePath}`);
      if (mapped.code === StorageErrorCode.CORRUPT || mapped.code === StorageErrorCode.INIT_FAILED) {
        throw mapped;
      }
      throw new StorageError(mapped.message, StorageErrorCode.INIT_FAILED, mapped.cause);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StorageError('Store is closed', StorageErrorCode.CLOSED);
    }
  }

  /**
   * Run `fn` in a read transaction on the read-only connection.
   * Every statement inside sees the same snapshot.
   */
  readTransaction<T>(fn: (conn: ReadConnection) => T): T {
    this.ensureOpen();
    try {
      return this.reader.transaction(() => fn(this.reader)).deferred();
    } catch (error) {
      throw rethrowStorage(error, 'Read transaction failed');
    }
  }

  /**
   * Run `fn` in a write transaction holding the write lock from the start.
   * All of it commits or none of it does.
   */
  writeTransaction<T>(fn: (conn: DatabaseType) => T): T {
    this.ensureOpen();
    try {
      return this.db.transaction(() => fn(this.db)).immediate();
    } catch (error) {
      throw toStorageError(error, 'Write transaction failed');
    }
  }

  // ==================== Generation ====================

  getGeneration(conn: ReadConnection = this.reader): number {
    this.ensureOpen();
    const row = conn
      .prepare("SELECT value FROM index_state WHERE key = 'generation'")
      .get() as { value: number } | undefined;
    return row?.value ?? 0;
  }

  private bumpGeneration(conn: DatabaseType): void {
    conn.prepare("UPDATE index_state SET value = value + 1 WHERE key = 'generation'").run();
  }

  // ==================== Documents ====================

  getFileState(path: string): FileState | null {
    this.ensureOpen();
    const row = this.db
      .prepare('SELECT id, path, file_size, mtime_ms, content_hash FROM files WHERE path = ?')
      .get(path) as
      | { id: number; path: string; file_size: number; mtime_ms: number; content_hash: string }
      | undefined;
    if (row === undefined) return null;
    return {
      id: row.id,
      path: row.path,
      fileSize: row.file_size,
      mtimeMs: row.mtime_ms,
      contentHash: row.content_hash,
    };
  }

  getDocument(path: string): FileRecord | null {
    this.ensureOpen();
    const row = this.reader.prepare('SELECT * FROM files WHERE path = ?').get(path) as
      | FileRecord
      | undefined;
    return row ?? null;
  }

  /**
   * Paths of stored documents, optionally limited to those under a directory
   */
  listPaths(underDirectory?: string): string[] {
    this.ensureOpen();
    const rows = this.db.prepare('SELECT path FROM files ORDER BY path').all() as {
      path: string;
    }[];
    const paths = rows.map((row) => row.path);
    if (underDirectory === undefined) return paths;
    const prefix = underDirectory.endsWith('/') ? underDirectory : `${underDirectory}/`;
    return paths.filter((path) => path.startsWith(prefix));
  }

  /**
   * Write a batch of documents in one transaction, bumping the generation
   * once for the batch
   */
  commitDocuments(commits: DocumentCommit[]): CommitResult[] {
    if (commits.length === 0) return [];
    return this.writeTransaction((conn) => {
      const results = commits.map((commit) => this.writeDocument(conn, commit));
      this.bumpGeneration(conn);
      return results;
    });
  }

  commitDocument(commit: DocumentCommit): CommitResult {
    const [result] = this.commitDocuments([commit]);
    if (result === undefined) {
      throw new StorageError(`Commit of ${commit.path} returned no result`, StorageErrorCode.TRANSACTION_FAILED);
    }
    return result;
  }

  private writeDocument(conn: DatabaseType, commit: DocumentCommit): CommitResult {
    const now = new Date().toISOString();
    const existing = conn.prepare('SELECT id FROM files WHERE path = ?').get(commit.path) as
      | { id: number }
      | undefined;

    const columns = {
      path: commit.path,
      filename: basename(commit.path),
      directory: dirname(commit.path),
      file_size: commit.stat.fileSize,
      mtime_ms: commit.stat.mtimeMs,
      modified_date: commit.stat.modifiedDate,
      created_date: commit.stat.createdDate,
      content_hash: commit.contentHash,
      word_count: commit.wordCount,
      heading_count: commit.headings.length,
      title: commit.title,
      dialect: commit.dialect,
      frontmatter_format: commit.frontmatterFormat,
      indexed_at: now,
    };

    let id: number;
    if (existing === undefined) {
      const info = conn
        .prepare(
          `INSERT INTO files (path, filename, directory, file_size, mtime_ms, modified_date,
             created_date, content_hash, word_count, heading_count, title, dialect,
             frontmatter_format, indexed_at)
           VALUES (@path, @filename, @directory, @file_size, @mtime_ms, @modified_date,
             @created_date, @content_hash, @word_count, @heading_count, @title, @dialect,
             @frontmatter_format, @indexed_at)`
        )
        .run(columns);
      id = Number(info.lastInsertRowid);
    } else {
      id = existing.id;
      conn
        .prepare(
          `UPDATE files SET filename = @filename, directory = @directory, file_size = @file_size,
             mtime_ms = @mtime_ms, modified_date = @modified_date, created_date = @created_date,
             content_hash = @content_hash, word_count = @word_count,
             heading_count = @heading_count, title = @title, dialect = @dialect,
             frontmatter_format = @frontmatter_format, indexed_at = @indexed_at
           WHERE id = @id`
        )
        .run({ ...columns, id });
      this.deleteDependents(conn, id);
    }

    const insertFrontmatter = conn.prepare(
      'INSERT OR REPLACE INTO frontmatter (file_id, key, value, value_type) VALUES (?, ?, ?, ?)'
    );
    for (const entry of commit.frontmatter) {
      insertFrontmatter.run(id, entry.key, entry.value, entry.type);
    }

    const insertTag = conn.prepare(
      'INSERT OR IGNORE INTO tags (file_id, tag, source) VALUES (?, ?, ?)'
    );
    for (const tag of commit.tags) {
      insertTag.run(id, tag.tag, tag.source);
    }

    const insertLink = conn.prepare(
      `INSERT INTO links (file_id, link_text, link_target, link_type, is_internal)
       VALUES (?, ?, ?, ?, ?)`
    );
    for (const link of commit.links) {
      insertLink.run(id, link.text, link.target, link.kind, link.isInternal ? 1 : 0);
    }

    conn
      .prepare(
        `INSERT INTO ${FTS_TABLE} (rowid, file_id, title, content, headings) VALUES (?, ?, ?, ?, ?)`
      )
      .run(id, id, commit.title, commit.body, commit.headings.map((h) => h.text).join('\n'));

    return { id, created: existing === undefined };
  }

  private deleteDependents(conn: DatabaseType, id: number): void {
    conn.prepare('DELETE FROM frontmatter WHERE file_id = ?').run(id);
    conn.prepare('DELETE FROM tags WHERE file_id = ?').run(id);
    conn.prepare('DELETE FROM links WHERE file_id = ?').run(id);
    conn.prepare(`DELETE FROM ${FTS_TABLE} WHERE rowid = ?`).run(id);
  }

  /**
   * Update size and timestamps of a document whose bytes did not change
   */
  touchDocument(path: string, stat: FileStat): boolean {
    return this.writeTransaction((conn) => {
      const info = conn
        .prepare(
          `UPDATE files SET file_size = ?, mtime_ms = ?, modified_date = ?, created_date = ?
           WHERE path = ?`
        )
        .run(stat.fileSize, stat.mtimeMs, stat.modifiedDate, stat.createdDate, path);
      if (info.changes > 0) {
        this.bumpGeneration(conn);
      }
      return info.changes > 0;
    });
  }

  /**
   * Delete a document and everything that belongs to it
   */
  deleteDocument(path: string): boolean {
    return this.writeTransaction((conn) => {
      const row = conn.prepare('SELECT id FROM files WHERE path = ?').get(path) as
        | { id: number }
        | undefined;
      if (row === undefined) return false;
      conn.prepare(`DELETE FROM ${FTS_TABLE} WHERE rowid = ?`).run(row.id);
      // frontmatter, tags and links cascade
      conn.prepare('DELETE FROM files WHERE id = ?').run(row.id);
      this.bumpGeneration(conn);
      return true;
    });
  }

  /**
   * Remove every document
   */
  clear(): number {
    return this.writeTransaction((conn) => {
      conn.prepare(`DELETE FROM ${FTS_TABLE}`).run();
      const info = conn.prepare('DELETE FROM files').run();
      this.bumpGeneration(conn);
      return info.changes;
    });
  }

  // ==================== Roots ====================

  recordRoot(root: string, recursive: boolean): void {
    this.writeTransaction((conn) => {
      conn
        .prepare(
          `INSERT INTO indexed_roots (path, recursive, last_indexed_at) VALUES (?, ?, ?)
           ON CONFLICT(path) DO UPDATE SET recursive = excluded.recursive,
             last_indexed_at = excluded.last_indexed_at`
        )
        .run(root, recursive ? 1 : 0, new Date().toISOString());
    });
  }

  listRoots(): IndexedRoot[] {
    this.ensureOpen();
    const rows = this.db
      .prepare('SELECT path, recursive, last_indexed_at FROM indexed_roots ORDER BY path')
      .all() as { path: string; recursive: number; last_indexed_at: string }[];
    return rows.map((row) => ({
      path: row.path,
      recursive: row.recursive === 1,
      lastIndexedAt: row.last_indexed_at,
    }));
  }

  // ==================== Health ====================

  /**
   * Run SQLite's integrity check plus the full-text index check.
   * Returns the problems found; empty means healthy.
   */
  checkIntegrity(): string[] {
    this.ensureOpen();
    const problems: string[] = [];
    try {
      const rows = this.db.pragma('integrity_check') as { integrity_check: string }[];
      for (const row of rows) {
        if (row.integrity_check !== 'ok') {
          problems.push(row.integrity_check);
        }
      }
      const orphans = this.db
        .prepare(
          `SELECT
             (SELECT COUNT(*) FROM ${FTS_TABLE} WHERE rowid NOT IN (SELECT id FROM files)) AS fts,
             (SELECT COUNT(*) FROM files WHERE id NOT IN (SELECT rowid FROM ${FTS_TABLE})) AS missing`
        )
        .get() as { fts: number; missing: number };
      if (orphans.fts > 0) problems.push(`${orphans.fts} full-text rows without a document`);
      if (orphans.missing > 0) problems.push(`${orphans.missing} documents without a full-text row`);
      const violations = this.db.pragma('foreign_key_check') as unknown[];
      if (violations.length > 0) problems.push(`${violations.length} foreign key violations`);
      this.db.prepare(`INSERT INTO ${FTS_TABLE} (${FTS_TABLE}) VALUES ('integrity-check')`).run();
    } catch (error) {
      const mapped = toStorageError(error, 'Integrity check failed');
      if (mapped.code === StorageErrorCode.LOCKED) {
        throw mapped;
      }
      problems.push(mapped.message);
    }
    return problems;
  }

  /**
   * Structural repair: rebuild indexes and the full-text index and drop
   * orphaned rows
   */
  repair(): void {
    this.writeTransaction((conn) => {
      conn.exec('REINDEX');
      conn.prepare(`DELETE FROM ${FTS_TABLE} WHERE rowid NOT IN (SELECT id FROM files)`).run();
      conn.prepare('DELETE FROM frontmatter WHERE file_id NOT IN (SELECT id FROM files)').run();
      conn.prepare('DELETE FROM tags WHERE file_id NOT IN (SELECT id FROM files)').run();
      conn.prepare('DELETE FROM links WHERE file_id NOT IN (SELECT id FROM files)').run();
      // Documents missing their full-text row are dropped; the next run re-creates them
      conn
        .prepare(`DELETE FROM files WHERE id NOT IN (SELECT rowid FROM ${FTS_TABLE})`)
        .run();
      conn.prepare(`INSERT INTO ${FTS_TABLE} (${FTS_TABLE}) VALUES ('rebuild')`).run();
      this.bumpGeneration(conn);
    });
  }

  // ==================== Introspection ====================

  describeSchema(includeCounts = false): SchemaDescription {
    return this.readTransaction((conn) => {
      const tables: TableDescription[] = [];
      const names: { name: string; kind: TableDescription['kind'] }[] = [
        ...QUERYABLE_TABLES.map((name) => ({
          name,
          kind: name === FTS_TABLE ? ('virtual' as const) : ('table' as const),
        })),
        ...QUERYABLE_VIEWS.map((name) => ({ name, kind: 'view' as const })),
      ];

      for (const { name, kind } of names) {
        const columns = conn.prepare(`PRAGMA table_info(${name})`).all() as {
          name: string;
          type: string;
          notnull: number;
          pk: number;
        }[];
        const table: TableDescription = {
          name,
          kind,
          columns: columns.map((column) => ({
            name: column.name,
            type: column.type === '' ? 'ANY' : column.type,
            notNull: column.notnull === 1,
            primaryKey: column.pk > 0,
          })),
        };
        if (includeCounts) {
          const row = conn.prepare(`SELECT COUNT(*) AS count FROM ${name}`).get() as {
            count: number;
          };
          table.rowCount = row.count;
        }
        tables.push(table);
      }

      return { schemaVersion: SCHEMA_VERSION, tables };
    });
  }

  getStats(): StoreStats {
    return this.readTransaction((conn) => {
      const row = conn
        .prepare(
          `SELECT
             (SELECT COUNT(*) FROM files) AS documents,
             (SELECT COUNT(*) FROM frontmatter) AS frontmatter_entries,
             (SELECT COUNT(*) FROM tags) AS tags,
             (SELECT COUNT(DISTINCT tag) FROM tags) AS distinct_tags,
             (SELECT COUNT(*) FROM links) AS links,
             (SELECT version FROM schema_version LIMIT 1) AS schema_version`
        )
        .get() as {
        documents: number;
        frontmatter_entries: number;
        tags: number;
        distinct_tags: number;
        links: number;
        schema_version: number;
      };
      return {
        documents: row.documents,
        frontmatterEntries: row.frontmatter_entries,
        tags: row.tags,
        distinctTags: row.distinct_tags,
        links: row.links,
        generation: this.getGeneration(conn),
        schemaVersion: row.schema_version,
      };
    });
  }

  /**
   * Close both connections
   */
  close(): void {
    if (!this.closed) {
      this.reader.close();
      this.db.close();
      this.closed = true;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

function rethrowStorage(error: unknown, message: string): unknown {
  // Store-level faults become StorageErrors; statement errors raised by the
  // callback pass through untouched
  if (sqliteCode(error) === null) {
    return error;
  }
  const mapped = toStorageError(error, message);
  return mapped.code === StorageErrorCode.TRANSACTION_FAILED ? error : mapped;
}
