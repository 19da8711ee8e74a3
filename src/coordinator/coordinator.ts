/**
 * Concurrency coordinator
 *
 * Owns the store and everything built on it. Index runs are serialized
 * behind one mutex; queries run through a bounded pool. Lock contention is
 * retried with backoff. Corruption moves the coordinator to `recovering`:
 * it first repairs the store in place, then rebuilds it from the indexed
 * directories, and ends `healthy` or `unrecoverable`. While recovering, new
 * work waits; once unrecoverable, only an explicit rebuild is accepted.
 */

import { existsSync, rmSync } from 'node:fs';
import pLimit from 'p-limit';
import { ResultCache, fingerprint, type CacheStats } from '../cache/result-cache.js';
import type { MdqueryConfig } from '../config/schema.js';
import { DialectRegistry } from '../extraction/registry.js';
import { IncrementalIndexer } from '../indexer/incremental.js';
import { IndexerError } from '../indexer/types.js';
import type { IndexingOptions, IndexRunReport } from '../indexer/types.js';
import { createChildLogger, createSilentLogger, type MdqueryLogger } from '../logging/logger.js';
import { QueryEngine } from '../query/engine.js';
import type {
  ExecuteOptions,
  FuzzyMatch,
  FuzzySearchOptions,
  QueryOutcome,
} from '../query/types.js';
import { DocumentStore, type StoreOptions } from '../storage/store.js';
import {
  StorageError,
  StorageErrorCode,
  type IndexedRoot,
  type SchemaDescription,
  type StoreStats,
} from '../storage/types.js';
import { AsyncMutex } from './mutex.js';
import { withRetry, type RetryConfig } from './retry.js';

export type HealthState = 'healthy' | 'recovering' | 'unrecoverable';

export interface CoordinatorOptions {
  config: MdqueryConfig;
  logger?: MdqueryLogger;
  registry?: DialectRegistry;
  /** Directories to re-index when the store has to be rebuilt */
  roots?: { path: string; recursive: boolean }[];
  sleep?: (ms: number) => Promise<void>;
  openStore?: (path: string, options: StoreOptions) => DocumentStore;
}

export interface CoordinatorStatus {
  state: HealthState;
  databasePath: string;
  stats: StoreStats | null;
  cache: CacheStats | null;
  roots: IndexedRoot[];
  activeQueries: number;
  queuedQueries: number;
  indexing: boolean;
  lastRecoveryError: string | null;
}

/**
 * Store plus the components bound to it; replaced as a whole on rebuild
 */
interface Components {
  store: DocumentStore;
  engine: QueryEngine;
  indexer: IncrementalIndexer;
}

function isCorruption(error: unknown): error is StorageError {
  return error instanceof StorageError && error.code === StorageErrorCode.CORRUPT;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Coordinator {
  private components: Components | null = null;
  private state: HealthState = 'healthy';
  private recovery: Promise<void> | null = null;
  private lastRecoveryError: string | null = null;
  private readonly cache: ResultCache | null;
  private readonly writeLock = new AsyncMutex();
  private readonly queryPool: ReturnType<typeof pLimit>;
  private readonly registry: DialectRegistry;
  private readonly logger: MdqueryLogger;
  private readonly roots = new Map<string, boolean>();
  private readonly retryConfig: RetryConfig;
  private readonly openStore: (path: string, options: StoreOptions) => DocumentStore;

  private constructor(private readonly options: CoordinatorOptions) {
    const { config } = options;
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: 'coordinator',
    });
    this.registry = options.registry ?? new DialectRegistry();
    this.queryPool = pLimit(config.coordinator.workerPoolSize);
    this.cache = config.cache.enabled
      ? new ResultCache({ maxEntries: config.cache.maxEntries, ttlMs: config.cache.ttlMs })
      : null;
    this.retryConfig = {
      maxRetries: config.coordinator.maxRetries,
      baseDelayMs: config.coordinator.retryBaseDelayMs,
      maxDelayMs: config.coordinator.retryBaseDelayMs * 16,
      jitter: true,
    };
    this.openStore = options.openStore ?? ((path, storeOptions) => DocumentStore.open(path, storeOptions));
    for (const root of options.roots ?? []) {
      this.roots.set(root.path, root.recursive);
    }
  }

  /**
   * Open the configured store. A store that is not a usable database is
   * recovered before this resolves.
   *
   * @throws StorageError when the store cannot be opened for other reasons
   */
  static async open(options: CoordinatorOptions): Promise<Coordinator> {
    const coordinator = new Coordinator(options);
    try {
      coordinator.components = coordinator.build(coordinator.openStore(
        options.config.storage.databasePath,
        { busyTimeoutMs: options.config.coordinator.busyTimeoutMs }
      ));
      for (const root of coordinator.components.store.listRoots()) {
        coordinator.roots.set(root.path, root.recursive);
      }
    } catch (error) {
      if (!isCorruption(error)) throw error;
      await coordinator.recover(error);
    }
    return coordinator;
  }

  private build(store: DocumentStore): Components {
    const { config, logger } = this.options;
    const base = logger ?? createSilentLogger();
    return {
      store,
      engine: new QueryEngine(store, {
        query: config.query,
        fuzzy: config.fuzzy,
        logger: createChildLogger(base, { component: 'query' }),
        workers: config.coordinator.workerPoolSize,
        busyTimeoutMs: config.coordinator.busyTimeoutMs,
      }),
      indexer: new IncrementalIndexer(store, this.registry, {
        extensions: config.indexing.extensions,
        excludePatterns: config.indexing.excludePatterns,
        concurrency: config.indexing.concurrency,
        batchSize: config.indexing.batchSize,
        logger: createChildLogger(base, { component: 'indexer' }),
      }),
    };
  }

  get health(): HealthState {
    return this.state;
  }

  // ==================== Guards ====================

  /**
   * Wait out a recovery in progress; fail when the store is unrecoverable
   */
  private async ready(): Promise<Components> {
    if (this.recovery !== null) {
      await this.recovery;
    }
    if (this.state === 'unrecoverable') {
      throw new StorageError(
        `Store at ${this.options.config.storage.databasePath} is unrecoverable; run a rebuild`,
        StorageErrorCode.UNRECOVERABLE
      );
    }
    return this.current();
  }

  /**
   * Run an operation; on corruption recover and run it once more
   */
  private async withRecovery<T>(operation: () => Promise<T>): Promise<T> {
    await this.ready();
    try {
      return await operation();
    } catch (error) {
      if (!isCorruption(error)) throw error;
      await this.recover(error);
      await this.ready();
      return operation();
    }
  }

  private retry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, this.retryConfig, {
      sleep: this.options.sleep,
      onRetry: (attempt, delayMs, error) => {
        this.logger.warn({ attempt, delayMs, err: error.message }, 'Store locked, retrying');
      },
    });
  }

  // ==================== Queries ====================

  /**
   * Execute a read-only query, answering from the cache when the store has
   * not changed since the result was stored
   */
  async query(sql: string, options: ExecuteOptions = {}): Promise<QueryOutcome> {
    return this.withRecovery(() =>
      this.queryPool(async () => {
        const { engine, store } = await this.ready();
        const problem = engine.check(sql, options);
        if (problem !== null) {
          return { success: false, error: problem };
        }

        const key = fingerprint(sql, options.params, engine.effectiveLimit(options.limit));
        return this.retry(async () => {
          if (this.cache !== null) {
            const generation = store.readTransaction((conn) => store.getGeneration(conn));
            const cached = this.cache.lookup(key, generation);
            if (cached !== null) {
              return { success: true, result: cached, cached: true };
            }
          }
          const { outcome, generation } = await engine.executeAtGeneration(sql, options);
          if (outcome.success && generation !== null && this.cache !== null) {
            this.cache.store(key, outcome.result, generation);
          }
          return outcome;
        });
      })
    );
  }

  async fuzzySearch(text: string, options: FuzzySearchOptions = {}): Promise<FuzzyMatch[]> {
    return this.withRecovery(() =>
      this.queryPool(async () => {
        const { engine } = await this.ready();
        return this.retry(async () => engine.fuzzySearch(text, options));
      })
    );
  }

  async describeSchema(includeCounts = false): Promise<SchemaDescription> {
    return this.withRecovery(() =>
      this.queryPool(async () => {
        const { engine } = await this.ready();
        return this.retry(async () => engine.describeSchema(includeCounts));
      })
    );
  }

  // ==================== Indexing ====================

  /**
   * Index a directory. Runs one at a time per coordinator.
   */
  async index(root: string, options: IndexingOptions = {}): Promise<IndexRunReport> {
    const report = await this.withRecovery(() =>
      this.writeLock.runExclusive(() =>
        this.retry(() => this.current().indexer.indexDirectory(root, options))
      )
    );
    this.roots.set(report.root, options.recursive ?? true);
    return report;
  }

  /**
   * Clear the store and index a directory from scratch. Accepted in every
   * state; from `unrecoverable` the store file is recreated first.
   */
  async rebuild(root: string, options: IndexingOptions = {}): Promise<IndexRunReport> {
    if (this.recovery !== null) {
      await this.recovery;
    }
    const report = await this.writeLock.runExclusive(async () => {
      if (this.state === 'unrecoverable' || this.components === null) {
        await this.recreateStore();
        this.state = 'healthy';
        this.lastRecoveryError = null;
      }
      const { indexer } = this.current();
      return this.retry(() => indexer.rebuildIndex(root, options));
    });
    this.cache?.clear();
    this.roots.set(report.root, options.recursive ?? true);
    return report;
  }

  /**
   * Components in use now; recovery may have replaced them since `ready()`
   */
  private current(): Components {
    if (this.components === null) {
      throw new StorageError('Store is not open', StorageErrorCode.CLOSED);
    }
    return this.components;
  }

  // ==================== Health ====================

  /**
   * Run the integrity check; problems start recovery
   *
   * @returns the state after any recovery
   */
  async verify(): Promise<HealthState> {
    const { store } = await this.ready();
    let problems: string[];
    try {
      problems = store.checkIntegrity();
    } catch (error) {
      if (!isCorruption(error)) throw error;
      problems = [error.message];
    }
    if (problems.length > 0) {
      await this.recover(
        new StorageError(`Integrity check failed: ${problems.join('; ')}`, StorageErrorCode.CORRUPT)
      );
    }
    return this.state;
  }

  /**
   * Start recovery, or join the one in progress
   */
  private recover(cause: StorageError): Promise<void> {
    if (this.recovery === null) {
      this.state = 'recovering';
      this.logger.error({ err: cause.message }, 'Store corruption detected, recovering');
      this.recovery = this.writeLock
        .runExclusive(() => this.runRecovery(cause))
        .finally(() => {
          this.recovery = null;
        });
    }
    return this.recovery;
  }

  private async runRecovery(cause: StorageError): Promise<void> {
    this.cache?.clear();

    // 1. Repair in place
    const components = this.components;
    if (components !== null && !components.store.isClosed) {
      try {
        let problems = components.store.checkIntegrity();
        if (problems.length > 0) {
          components.store.repair();
          problems = components.store.checkIntegrity();
        }
        if (problems.length === 0) {
          this.logger.info('Store repaired in place');
          this.state = 'healthy';
          this.lastRecoveryError = null;
          return;
        }
        this.logger.warn({ problems }, 'Repair left problems, rebuilding');
      } catch (error) {
        this.logger.warn({ err: errorMessage(error) }, 'Repair failed, rebuilding');
      }
      try {
        for (const root of components.store.listRoots()) {
          this.roots.set(root.path, root.recursive);
        }
      } catch (error) {
        this.logger.warn({ err: errorMessage(error) }, 'Indexed directories unreadable');
      }
    }

    // 2. Rebuild from the indexed directories
    try {
      await this.recreateStore();
      const { indexer } = this.current();
      for (const [path, recursive] of this.roots) {
        try {
          await indexer.indexDirectory(path, { recursive, force: true });
        } catch (error) {
          if (!(error instanceof IndexerError)) throw error;
          this.logger.warn({ root: path, err: error.message }, 'Skipping directory during rebuild');
        }
      }
      this.state = 'healthy';
      this.lastRecoveryError = null;
      this.logger.info({ roots: this.roots.size }, 'Store rebuilt');
    } catch (error) {
      this.state = 'unrecoverable';
      this.lastRecoveryError = `${cause.message}; rebuild failed: ${errorMessage(error)}`;
      this.logger.error({ err: this.lastRecoveryError }, 'Store is unrecoverable');
    }
  }

  /**
   * Delete the store file and its journal files and open an empty store
   */
  private async recreateStore(): Promise<void> {
    const path = this.options.config.storage.databasePath;
    const previous = this.components;
    this.components = null;
    if (previous !== null) {
      await previous.engine.close();
      previous.store.close();
    }
    for (const file of [path, `${path}-wal`, `${path}-shm`]) {
      if (existsSync(file)) {
        rmSync(file, { force: true });
      }
    }
    this.components = this.build(
      this.openStore(path, { busyTimeoutMs: this.options.config.coordinator.busyTimeoutMs })
    );
  }

  // ==================== Status ====================

  async status(): Promise<CoordinatorStatus> {
    if (this.recovery !== null) {
      await this.recovery;
    }
    let stats: StoreStats | null = null;
    let roots: IndexedRoot[] = [];
    if (this.state === 'healthy' && this.components !== null) {
      stats = this.components.store.getStats();
      roots = this.components.store.listRoots();
    }
    return {
      state: this.state,
      databasePath: this.options.config.storage.databasePath,
      stats,
      cache: this.cache?.getStats() ?? null,
      roots,
      activeQueries: this.queryPool.activeCount,
      queuedQueries: this.queryPool.pendingCount,
      indexing: this.writeLock.isLocked,
      lastRecoveryError: this.lastRecoveryError,
    };
  }

  async close(): Promise<void> {
    const components = this.components;
    this.components = null;
    this.cache?.clear();
    if (components !== null) {
      await components.engine.close();
      components.store.close();
    }
  }
}
