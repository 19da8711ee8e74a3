/**
 * Configuration schema for mdquery
 *
 * Validates configuration using Zod and provides TypeScript types.
 */

import { z } from 'zod';
import { getDefaultDatabasePath } from './paths.js';

/**
 * Index store configuration
 */
export const StorageConfigSchema = z.object({
  databasePath: z.string().min(1).default(getDefaultDatabasePath()),
});

/**
 * Indexing configuration
 */
export const IndexingConfigSchema = z.object({
  /** File extensions treated as markdown documents */
  extensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9]+$/))
    .min(1)
    .default(['.md', '.markdown', '.mdown', '.mkd', '.mdx']),
  /** Extra minimatch globs excluded on top of the built-in list */
  excludePatterns: z.array(z.string()).default([]),
  /** Files read and extracted in parallel within one run */
  concurrency: z.number().int().min(1).max(64).default(4),
  /** Files committed per storage transaction */
  batchSize: z.number().int().min(1).max(500).default(1),
});

/**
 * Query engine configuration
 */
export const QueryConfigSchema = z.object({
  defaultLimit: z.number().int().min(1).default(100),
  maxLimit: z.number().int().min(1).default(10000),
  timeoutMs: z.number().int().min(1).default(30000),
  maxQueryLength: z.number().int().min(16).default(10000),
  maxJoins: z.number().int().min(0).default(8),
  rewriteTextSearch: z.boolean().default(true),
});

/**
 * Result cache configuration
 */
export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxEntries: z.number().int().min(1).default(100),
  ttlMs: z.number().int().min(1).default(5 * 60 * 1000),
});

/**
 * Concurrency coordinator configuration
 */
export const CoordinatorConfigSchema = z.object({
  /** Queries executing at once; further queries wait in the queue */
  workerPoolSize: z.number().int().min(1).max(64).default(4),
  /** Retries on lock contention before surfacing a StorageError */
  maxRetries: z.number().int().min(0).max(20).default(5),
  retryBaseDelayMs: z.number().int().min(1).default(50),
  /** SQLite busy timeout applied to every connection */
  busyTimeoutMs: z.number().int().min(0).default(5000),
});

/**
 * Fuzzy search configuration
 */
export const FuzzyConfigSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.6),
  fields: z
    .array(z.enum(['title', 'headings', 'content']))
    .min(1)
    .default(['title', 'headings']),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Complete mdquery configuration schema
 */
export const MdqueryConfigSchema = z
  .object({
    storage: StorageConfigSchema.default({}),
    indexing: IndexingConfigSchema.default({}),
    query: QueryConfigSchema.default({}),
    cache: CacheConfigSchema.default({}),
    coordinator: CoordinatorConfigSchema.default({}),
    fuzzy: FuzzyConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .refine((config) => config.query.defaultLimit <= config.query.maxLimit, {
    message: 'query.defaultLimit must not exceed query.maxLimit',
    path: ['query', 'defaultLimit'],
  });

/**
 * TypeScript types derived from schemas
 */
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;
export type FuzzyConfig = z.infer<typeof FuzzyConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type MdqueryConfig = z.infer<typeof MdqueryConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: MdqueryConfig = MdqueryConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): MdqueryConfig {
  return MdqueryConfigSchema.parse(config);
}

/**
 * Safe validation that returns result object instead of throwing
 */
export function safeValidateConfig(
  config: unknown
): z.SafeParseReturnType<unknown, MdqueryConfig> {
  return MdqueryConfigSchema.safeParse(config);
}
