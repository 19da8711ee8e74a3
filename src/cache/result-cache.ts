/**
 * Query result cache
 *
 * Entries are keyed by a fingerprint of the normalized statement, its
 * parameters and the row limit, and remember the store generation they were
 * read at. An entry from another generation is stale: it is dropped on
 * lookup and reported as a miss. A TTL bounds how long any entry lives and
 * the least recently used entry is evicted when the cache is full.
 */

import { createHash } from 'node:crypto';
import { normalizeTokens, tokenize } from '../query/tokenizer.js';
import type { QueryParams, QueryResult, QueryRow, QueryValue } from '../query/types.js';

export interface ResultCacheOptions {
  maxEntries: number;
  ttlMs: number;
  /** Millisecond wall clock */
  now?: () => number;
}

export interface CacheEntry {
  fingerprint: string;
  result: QueryResult;
  generation: number;
  storedAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Entries dropped because the generation moved on */
  staleEvictions: number;
  /** Entries dropped because their TTL ran out */
  expiredEvictions: number;
  /** Entries dropped to make room */
  capacityEvictions: number;
  size: number;
  maxEntries: number;
}

/**
 * LRU map: iteration order is least to most recently used
 */
class LRUCache<K, V> {
  private cache = new Map<K, V>();

  constructor(
    private readonly maxSize: number,
    private readonly onEvict: () => void
  ) {}

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value !== undefined) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, value);
    }
    return value;
  }

  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
        this.onEvict();
      }
    }
    this.cache.set(key, value);
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

/**
 * Normalized statement text; falls back to whitespace collapsing for text
 * the lexer cannot read
 */
function normalizeSql(sql: string): string {
  try {
    return normalizeTokens(tokenize(sql.trim().replace(/;\s*$/, '')));
  } catch {
    return sql.trim().replace(/\s+/g, ' ');
  }
}

function stableParams(params: QueryParams | undefined): string {
  if (params === undefined) return '[]';
  const encode = (value: unknown): string =>
    typeof value === 'bigint' ? `${value.toString()}n` : JSON.stringify(value);
  if (Array.isArray(params)) {
    return `[${params.map(encode).join(',')}]`;
  }
  const keys = Object.keys(params).sort();
  return `{${keys.map((key) => `${JSON.stringify(key)}:${encode(params[key])}`).join(',')}}`;
}

/**
 * Cache key for a query
 */
export function fingerprint(sql: string, params: QueryParams | undefined, limit: number): string {
  return createHash('sha256')
    .update(normalizeSql(sql))
    .update('\u0000')
    .update(stableParams(params))
    .update('\u0000')
    .update(String(limit))
    .digest('hex');
}

function cloneValue(value: QueryValue): QueryValue {
  return Buffer.isBuffer(value) ? Buffer.from(value) : value;
}

function cloneResult(result: QueryResult): QueryResult {
  return {
    ...result,
    columns: [...result.columns],
    rows: result.rows.map((row) => {
      const copy: QueryRow = {};
      for (const [key, value] of Object.entries(row)) {
        copy[key] = cloneValue(value);
      }
      return copy;
    }),
  };
}

export class ResultCache {
  private readonly entries: LRUCache<string, CacheEntry>;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private staleEvictions = 0;
  private expiredEvictions = 0;
  private capacityEvictions = 0;

  constructor(private readonly options: ResultCacheOptions) {
    this.entries = new LRUCache(options.maxEntries, () => {
      this.capacityEvictions++;
    });
    this.now = options.now ?? Date.now;
  }

  /**
   * Cached result valid at `currentGeneration`, or null on a miss
   */
  lookup(key: string, currentGeneration: number): QueryResult | null {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      this.misses++;
      return null;
    }
    if (entry.generation !== currentGeneration) {
      this.entries.delete(key);
      this.staleEvictions++;
      this.misses++;
      return null;
    }
    if (this.now() - entry.storedAt >= this.options.ttlMs) {
      this.entries.delete(key);
      this.expiredEvictions++;
      this.misses++;
      return null;
    }
    this.hits++;
    return cloneResult(entry.result);
  }

  store(key: string, result: QueryResult, generation: number): void {
    this.entries.set(key, {
      fingerprint: key,
      result: cloneResult(result),
      generation,
      storedAt: this.now(),
    });
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      staleEvictions: this.staleEvictions,
      expiredEvictions: this.expiredEvictions,
      capacityEvictions: this.capacityEvictions,
      size: this.entries.size,
      maxEntries: this.options.maxEntries,
    };
  }
}
