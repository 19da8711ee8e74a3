/**
 * Canned statements over the link graph, tags, frontmatter and timestamps
 *
 * Like the text search statement these are plain client statements: they
 * go through the same validation, cache and row limit as hand-written SQL.
 * Each uses named parameters, so the same text doubles as a query template.
 *
 * Links are stored with their raw target. A link resolves to a document
 * when, ignoring case, an anchor and leading `./` or `../`, the document's
 * path ends with `/target` or `/target.md`.
 */

import { normalizeTag } from '../extraction/tags.js';
import { QueryValidationError, QueryValidationErrorCode, type QueryParamValue } from './types.js';

export interface CannedQuery {
  sql: string;
  params: Record<string, QueryParamValue>;
}

export interface QueryTemplate {
  name: string;
  description: string;
  sql: string;
  /** Named parameters the statement expects, without the leading colon */
  params: readonly string[];
}

/**
 * Internal links with the target they point at, lower-cased and stripped of
 * its anchor and relative prefix
 */
const RESOLVED_LINKS = `resolved AS (
  SELECT l.id AS link_id, l.file_id AS source_id, l.link_target AS link_target, l.link_type AS link_type,
    ltrim(lower(CASE WHEN instr(l.link_target, '#') > 0
      THEN substr(l.link_target, 1, instr(l.link_target, '#') - 1)
      ELSE l.link_target END), './') AS target
  FROM links l
  WHERE l.is_internal = 1
)`;

function pointsAt(file: string): string {
  return `(r.target <> '' AND (substr(lower(${file}.path), -length(r.target) - 1) = '/' || r.target
    OR substr(lower(${file}.path), -length(r.target) - 4) = '/' || r.target || '.md'))`;
}

export const BACKLINKS_SQL = `WITH ${RESOLVED_LINKS}
SELECT s.path AS path, s.title AS title, r.link_target AS link_target, r.link_type AS link_type
FROM resolved r
JOIN files s ON s.id = r.source_id
JOIN files t ON ${pointsAt('t')}
WHERE t.path = :path
ORDER BY s.path, r.link_id`;

export const BROKEN_LINKS_SQL = `WITH ${RESOLVED_LINKS}
SELECT s.path AS path, r.link_target AS link_target, r.link_type AS link_type
FROM resolved r
JOIN files s ON s.id = r.source_id
WHERE r.target <> '' AND r.link_type <> 'embed'
  AND NOT EXISTS (SELECT 1 FROM files t WHERE ${pointsAt('t')})
ORDER BY s.path, r.link_id`;

export const ORPHANED_FILES_SQL = `WITH ${RESOLVED_LINKS}
SELECT f.path AS path, f.title AS title
FROM files f
WHERE NOT EXISTS (SELECT 1 FROM resolved r WHERE r.source_id <> f.id AND ${pointsAt('f')})
ORDER BY f.path`;

export const MOST_LINKED_SQL = `WITH ${RESOLVED_LINKS}
SELECT f.path AS path, f.title AS title, COUNT(DISTINCT r.source_id) AS backlink_count
FROM files f
JOIN resolved r ON r.source_id <> f.id AND ${pointsAt('f')}
GROUP BY f.id
ORDER BY backlink_count DESC, f.path`;

export const TAGS_ANY_SQL = `SELECT f.path AS path, f.title AS title
FROM files f
WHERE f.id IN (SELECT t.file_id FROM tags t WHERE t.tag IN (SELECT value FROM json_each(:tags)))
ORDER BY f.path`;

export const TAGS_ALL_SQL = `SELECT f.path AS path, f.title AS title
FROM files f
WHERE (SELECT COUNT(DISTINCT t.tag) FROM tags t
    WHERE t.file_id = f.id AND t.tag IN (SELECT value FROM json_each(:tags)))
  = (SELECT COUNT(DISTINCT value) FROM json_each(:tags))
ORDER BY f.path`;

export const FRONTMATTER_KEY_SQL = `SELECT f.path AS path, f.title AS title, fm.value AS value
FROM files f JOIN frontmatter fm ON fm.file_id = f.id
WHERE fm.key = :key
ORDER BY f.path`;

export const FRONTMATTER_VALUE_SQL = `SELECT f.path AS path, f.title AS title, fm.value AS value
FROM files f JOIN frontmatter fm ON fm.file_id = f.id
WHERE fm.key = :key
  AND (fm.value = :value OR (fm.value_type = 'array'
    AND EXISTS (SELECT 1 FROM json_each(fm.value) j WHERE CAST(j.value AS TEXT) = :value)))
ORDER BY f.path`;

export const RECENT_FILES_SQL = `SELECT path, title, modified_date
FROM files
WHERE mtime_ms >= (CAST(strftime('%s', 'now') AS INTEGER) - :days * 86400) * 1000
ORDER BY mtime_ms DESC, path`;

export const TAG_COUNTS_SQL = `SELECT tag, file_count
FROM tag_summary
ORDER BY file_count DESC, tag`;

export type TagMatch = 'all' | 'any';

/**
 * Documents linking to the document at `path`
 */
export function buildBacklinksQuery(path: string): CannedQuery {
  return { sql: BACKLINKS_SQL, params: { path } };
}

/**
 * Internal links that resolve to no indexed document. Embeds are left out:
 * they usually point at files other than markdown.
 */
export function buildBrokenLinksQuery(): CannedQuery {
  return { sql: BROKEN_LINKS_SQL, params: {} };
}

/**
 * Documents no other document links to
 */
export function buildOrphanedFilesQuery(): CannedQuery {
  return { sql: ORPHANED_FILES_SQL, params: {} };
}

/**
 * Documents by number of distinct documents linking to them
 */
export function buildMostLinkedQuery(): CannedQuery {
  return { sql: MOST_LINKED_SQL, params: {} };
}

/**
 * Documents carrying all, or any, of the tags. Tags are normalized the way
 * the indexer stores them.
 *
 * @throws QueryValidationError when no tag is left after normalizing
 */
export function buildTagQuery(tags: readonly string[], match: TagMatch = 'all'): CannedQuery {
  const normalized = [...new Set(tags.map(normalizeTag).filter((tag) => tag !== ''))];
  if (normalized.length === 0) {
    throw new QueryValidationError('At least one tag is required', QueryValidationErrorCode.INVALID_PARAMS);
  }
  return {
    sql: match === 'all' ? TAGS_ALL_SQL : TAGS_ANY_SQL,
    params: { tags: JSON.stringify(normalized) },
  };
}

/**
 * Documents with a frontmatter key, optionally holding a value. An array
 * value matches when any element equals it.
 */
export function buildFrontmatterQuery(key: string, value?: string): CannedQuery {
  return value === undefined
    ? { sql: FRONTMATTER_KEY_SQL, params: { key } }
    : { sql: FRONTMATTER_VALUE_SQL, params: { key, value } };
}

/**
 * Documents modified within the last `days` days, newest first
 */
export function buildRecentFilesQuery(days: number): CannedQuery {
  return { sql: RECENT_FILES_SQL, params: { days } };
}

export const QUERY_TEMPLATES: readonly QueryTemplate[] = [
  { name: 'backlinks', description: 'Documents linking to :path', sql: BACKLINKS_SQL, params: ['path'] },
  { name: 'broken-links', description: 'Internal links to no indexed document', sql: BROKEN_LINKS_SQL, params: [] },
  { name: 'orphans', description: 'Documents nothing links to', sql: ORPHANED_FILES_SQL, params: [] },
  { name: 'most-linked', description: 'Documents by incoming links', sql: MOST_LINKED_SQL, params: [] },
  {
    name: 'tags-all',
    description: 'Documents with every tag in the JSON array :tags',
    sql: TAGS_ALL_SQL,
    params: ['tags'],
  },
  {
    name: 'tags-any',
    description: 'Documents with any tag in the JSON array :tags',
    sql: TAGS_ANY_SQL,
    params: ['tags'],
  },
  {
    name: 'frontmatter-key',
    description: 'Documents whose frontmatter has :key',
    sql: FRONTMATTER_KEY_SQL,
    params: ['key'],
  },
  {
    name: 'frontmatter-value',
    description: 'Documents whose frontmatter :key holds :value',
    sql: FRONTMATTER_VALUE_SQL,
    params: ['key', 'value'],
  },
  {
    name: 'recent',
    description: 'Documents modified in the last :days days',
    sql: RECENT_FILES_SQL,
    params: ['days'],
  },
  { name: 'tag-counts', description: 'Tags by number of documents', sql: TAG_COUNTS_SQL, params: [] },
];

export function findTemplate(name: string): QueryTemplate | null {
  return QUERY_TEMPLATES.find((template) => template.name === name) ?? null;
}
