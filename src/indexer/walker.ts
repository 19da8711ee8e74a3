/**
 * Directory traversal for the indexer
 */

import { promises as fs } from 'node:fs';
import { join, extname, relative, sep } from 'node:path';
import { minimatch } from 'minimatch';
import { IndexerError, IndexerErrorCode } from './types.js';

/**
 * Directories never descended into
 */
export const EXCLUDED_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  '.obsidian',
  '.trash',
  '__pycache__',
  '.cache',
  '.mdquery',
]);

/**
 * Editor and temp file names never indexed
 */
export const EXCLUDED_FILE_PATTERNS: readonly string[] = ['*~', '*.tmp', '*.swp', '.#*'];

export interface WalkOptions {
  recursive: boolean;
  /** Lower-case extensions with leading dot */
  extensions: readonly string[];
  /** minimatch globs matched against the root-relative path */
  excludePatterns: readonly string[];
}

export interface WalkedFile {
  /** Absolute path */
  path: string;
  /** Root-relative path with forward slashes */
  relativePath: string;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

export function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) =>
    minimatch(relativePath, pattern, { dot: true, matchBase: true })
  );
}

/**
 * List the markdown files under a root directory, sorted by path
 *
 * @throws IndexerError TRAVERSAL_FAILED when a directory cannot be read
 */
export async function walkMarkdownFiles(root: string, options: WalkOptions): Promise<WalkedFile[]> {
  const extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
  const filePatterns = [...EXCLUDED_FILE_PATTERNS, ...options.excludePatterns];
  const files: WalkedFile[] = [];

  async function scan(dir: string): Promise<void> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new IndexerError(
        `Could not read directory ${dir}`,
        IndexerErrorCode.TRAVERSAL_FAILED,
        error instanceof Error ? error : undefined
      );
    }

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const relPath = toPosix(relative(root, fullPath));

      if (entry.isDirectory()) {
        if (!options.recursive || EXCLUDED_DIRECTORIES.has(entry.name)) {
          continue;
        }
        if (isExcluded(relPath, options.excludePatterns)) {
          continue;
        }
        await scan(fullPath);
      } else if (entry.isFile()) {
        if (!extensions.has(extname(entry.name).toLowerCase())) {
          continue;
        }
        if (isExcluded(relPath, filePatterns)) {
          continue;
        }
        files.push({ path: fullPath, relativePath: relPath });
      }
    }
  }

  await scan(root);
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
