/**
 * mdquery - incremental markdown indexing with a read-only SQL surface
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/logger.js';

// Extraction exports
export * from './extraction/index.js';

// Storage exports
export * from './storage/types.js';
export { DocumentStore, type StoreOptions, type ReadConnection } from './storage/store.js';
export { SCHEMA_VERSION, QUERYABLE_TABLES, QUERYABLE_VIEWS, FTS_COLUMNS } from './storage/schema.js';

// Indexer exports
export * from './indexer/types.js';
export { IncrementalIndexer, hashContent, type IncrementalIndexerOptions } from './indexer/incremental.js';
export { walkMarkdownFiles, EXCLUDED_DIRECTORIES, EXCLUDED_FILE_PATTERNS } from './indexer/walker.js';

// Query exports
export * from './query/types.js';
export { QueryEngine, type QueryEngineOptions, type GenerationalOutcome } from './query/engine.js';
export { validateQuery, ALLOWED_TABLES, type ValidatedQuery, type TableReference } from './query/validator.js';
export { rewriteTextSearch } from './query/rewrite.js';
export { diceCoefficient, bestWindowMatch } from './query/fuzzy.js';
export { buildTextSearchQuery, type TextSearchQuery } from './query/search.js';
export * from './query/canned.js';

// Cache exports
export { ResultCache, fingerprint, type CacheStats } from './cache/result-cache.js';

// Coordinator exports
export {
  Coordinator,
  type CoordinatorOptions,
  type CoordinatorStatus,
  type HealthState,
} from './coordinator/coordinator.js';
export { withRetry, calculateDelay, type RetryConfig } from './coordinator/retry.js';
export { AsyncMutex } from './coordinator/mutex.js';

export { createEngineContext, type EngineContext, type EngineContextOptions } from './context.js';

// Version info
export const VERSION = '0.1.0';
