/**
 * Shared test helpers: temporary workspaces with a markdown tree and a store
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createConfig } from '../src/config/config.js';
import type { MdqueryConfig } from '../src/config/schema.js';
import { DialectRegistry } from '../src/extraction/registry.js';
import { IncrementalIndexer } from '../src/indexer/incremental.js';
import { DocumentStore } from '../src/storage/store.js';

export interface Workspace {
  /** Temporary directory holding everything */
  dir: string;
  /** Markdown tree root */
  docs: string;
  databasePath: string;
  write(relativePath: string, content: string): string;
  remove(relativePath: string): void;
  cleanup(): void;
}

export function createWorkspace(prefix = 'mdquery-test-'): Workspace {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const docs = path.join(dir, 'docs');
  fs.mkdirSync(docs);

  return {
    dir,
    docs,
    databasePath: path.join(dir, 'store', 'index.db'),
    write(relativePath: string, content: string): string {
      const full = path.join(docs, relativePath);
      fs.mkdirSync(path.dirname(full), { recursive: true });
      fs.writeFileSync(full, content);
      return full;
    },
    remove(relativePath: string): void {
      fs.rmSync(path.join(docs, relativePath));
    },
    cleanup(): void {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function testConfig(databasePath: string, overrides: Record<string, unknown> = {}): MdqueryConfig {
  return createConfig({
    ...overrides,
    storage: { databasePath },
  });
}

export function createIndexer(
  store: DocumentStore,
  overrides: Partial<{ concurrency: number; batchSize: number; excludePatterns: string[] }> = {}
): IncrementalIndexer {
  return new IncrementalIndexer(store, new DialectRegistry(), {
    extensions: ['.md', '.markdown'],
    excludePatterns: overrides.excludePatterns ?? [],
    concurrency: overrides.concurrency ?? 2,
    batchSize: overrides.batchSize ?? 1,
  });
}

/**
 * Move a file's modification time so the stat shortcut does not apply
 */
export function bumpMtime(file: string, seconds = 10): void {
  const stat = fs.statSync(file);
  const next = new Date(stat.mtimeMs + seconds * 1000);
  fs.utimesSync(file, next, next);
}
