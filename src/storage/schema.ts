/**
 * Index store schema
 *
 * `content_fts` uses the trigram tokenizer so substring `LIKE` predicates on
 * its columns can be answered from the index.
 */

import type { Database as DatabaseType } from 'better-sqlite3';

/**
 * Schema version for migrations
 * Increment this when adding new tables/columns
 */
export const SCHEMA_VERSION = 1;

/**
 * Tables a client query may read
 */
export const QUERYABLE_TABLES = ['files', 'frontmatter', 'tags', 'links', 'content_fts'] as const;

/**
 * Convenience views a client query may read
 */
export const QUERYABLE_VIEWS = ['files_with_metadata', 'tag_summary', 'link_summary'] as const;

export const FTS_TABLE = 'content_fts';

/**
 * Full-text columns of `content_fts`
 */
export const FTS_COLUMNS = ['title', 'content', 'headings'] as const;

export const CREATE_TABLES = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);

-- Store-wide counters (generation)
CREATE TABLE IF NOT EXISTS index_state (
  key TEXT PRIMARY KEY,
  value INTEGER NOT NULL
);

-- Directories indexed into this store, re-indexed on recovery
CREATE TABLE IF NOT EXISTS indexed_roots (
  path TEXT PRIMARY KEY,
  recursive INTEGER NOT NULL CHECK (recursive IN (0, 1)),
  last_indexed_at TEXT NOT NULL
);

-- One row per indexed document
CREATE TABLE IF NOT EXISTS files (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  path TEXT NOT NULL UNIQUE,
  filename TEXT NOT NULL,
  directory TEXT NOT NULL,
  file_size INTEGER NOT NULL,
  mtime_ms REAL NOT NULL,
  modified_date TEXT NOT NULL,
  created_date TEXT,
  content_hash TEXT NOT NULL,
  word_count INTEGER NOT NULL DEFAULT 0,
  heading_count INTEGER NOT NULL DEFAULT 0,
  title TEXT NOT NULL,
  dialect TEXT NOT NULL DEFAULT 'generic',
  frontmatter_format TEXT CHECK (frontmatter_format IN ('yaml', 'toml', 'json')),
  indexed_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS frontmatter (
  file_id INTEGER NOT NULL REFERENCES files(id) ON DELETE CASCADE,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  value_type TEXT NOT NULL
    CHECK (value_type IN ('string', 'number', 'boolean', 'array', 'date', 'object')),
  PRIMARY KEY (file_id, key)
);

CREATE TABLE IF NOT EXISTS tags (
  file_id INTEGER NOT NULL REFERENCES files(id) ON DELETE CASCADE,
  tag TEXT NOT NULL,
  source TEXT NOT NULL CHECK (source IN ('frontmatter', 'content', 'dialect')),
  PRIMARY KEY (file_id, tag, source)
);

CREATE TABLE IF NOT EXISTS links (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_id INTEGER NOT NULL REFERENCES files(id) ON DELETE CASCADE,
  link_text TEXT,
  link_target TEXT NOT NULL,
  link_type TEXT NOT NULL
    CHECK (link_type IN ('markdown', 'reference', 'autolink', 'wikilink', 'embed', 'shortcode')),
  is_internal INTEGER NOT NULL CHECK (is_internal IN (0, 1))
);

-- rowid mirrors files.id
CREATE VIRTUAL TABLE IF NOT EXISTS content_fts USING fts5(
  file_id UNINDEXED,
  title,
  content,
  headings,
  tokenize = 'trigram'
);

CREATE INDEX IF NOT EXISTS idx_files_directory ON files(directory);
CREATE INDEX IF NOT EXISTS idx_frontmatter_key ON frontmatter(key, value);
CREATE INDEX IF NOT EXISTS idx_tags_tag ON tags(tag);
CREATE INDEX IF NOT EXISTS idx_links_file ON links(file_id);
CREATE INDEX IF NOT EXISTS idx_links_target ON links(link_target);

CREATE VIEW IF NOT EXISTS files_with_metadata AS
SELECT
  f.id,
  f.path,
  f.filename,
  f.directory,
  f.title,
  f.dialect,
  f.file_size,
  f.modified_date,
  f.created_date,
  f.word_count,
  f.heading_count,
  f.indexed_at,
  (SELECT fm.value FROM frontmatter fm WHERE fm.file_id = f.id AND fm.key = 'description') AS description,
  (SELECT fm.value FROM frontmatter fm WHERE fm.file_id = f.id AND fm.key = 'author') AS author,
  (SELECT COUNT(DISTINCT t.tag) FROM tags t WHERE t.file_id = f.id) AS tag_count,
  (SELECT group_concat(tag, ',') FROM (
    SELECT DISTINCT t.tag FROM tags t WHERE t.file_id = f.id ORDER BY t.tag
  )) AS tag_list,
  (SELECT COUNT(*) FROM links l WHERE l.file_id = f.id) AS link_count
FROM files f;

CREATE VIEW IF NOT EXISTS tag_summary AS
SELECT
  tag,
  COUNT(DISTINCT file_id) AS file_count,
  group_concat(DISTINCT source) AS sources
FROM tags
GROUP BY tag;

CREATE VIEW IF NOT EXISTS link_summary AS
SELECT
  link_target,
  link_type,
  is_internal,
  COUNT(*) AS link_count,
  COUNT(DISTINCT file_id) AS source_file_count
FROM links
GROUP BY link_target, link_type, is_internal;

INSERT OR IGNORE INTO index_state (key, value) VALUES ('generation', 0);
`;

/**
 * Forward migrations keyed by the version they produce
 */
const MIGRATIONS: { version: number; up: (db: DatabaseType) => void }[] = [];

/**
 * Bring an existing store up to SCHEMA_VERSION
 */
export function runMigrations(db: DatabaseType, fromVersion: number): void {
  for (const migration of MIGRATIONS) {
    if (migration.version > fromVersion && migration.version <= SCHEMA_VERSION) {
      migration.up(db);
    }
  }
  db.prepare('UPDATE schema_version SET version = ?').run(SCHEMA_VERSION);
}
