/**
 * Configuration loader for mdquery
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema. The core never calls this
 * itself; it only receives the resolved object.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join, extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import {
  MdqueryConfig,
  MdqueryConfigSchema,
  DEFAULT_CONFIG,
} from './schema.js';
import { getConfigDir } from './paths.js';

/**
 * Configuration error codes
 */
export enum ConfigurationErrorCode {
  /** A value failed schema validation */
  INVALID_VALUE = 'INVALID_VALUE',
  /** A configuration file could not be read or parsed */
  FILE_UNREADABLE = 'FILE_UNREADABLE',
  /** A supplied path does not exist or is of the wrong kind */
  INVALID_PATH = 'INVALID_PATH',
}

/**
 * Invalid settings or paths supplied by a collaborator. Never retried.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigurationErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Configuration file names to search for (in order of priority)
 */
const CONFIG_FILE_NAMES = [
  'mdquery.config.json',
  'mdquery.config.yaml',
  'mdquery.config.yml',
  'mdquery.json',
  '.mdqueryrc.json',
];

/**
 * Global configuration file
 */
const GLOBAL_CONFIG_FILE = join(getConfigDir(), 'config.json');

/**
 * Map of environment variable names to configuration paths
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  MDQUERY_DATABASE_PATH: ['storage', 'databasePath'],
  MDQUERY_INDEX_CONCURRENCY: ['indexing', 'concurrency'],
  MDQUERY_QUERY_DEFAULT_LIMIT: ['query', 'defaultLimit'],
  MDQUERY_QUERY_MAX_LIMIT: ['query', 'maxLimit'],
  MDQUERY_QUERY_TIMEOUT_MS: ['query', 'timeoutMs'],
  MDQUERY_CACHE_ENABLED: ['cache', 'enabled'],
  MDQUERY_CACHE_MAX_ENTRIES: ['cache', 'maxEntries'],
  MDQUERY_CACHE_TTL_MS: ['cache', 'ttlMs'],
  MDQUERY_WORKER_POOL_SIZE: ['coordinator', 'workerPoolSize'],
  MDQUERY_FUZZY_THRESHOLD: ['fuzzy', 'threshold'],
  MDQUERY_LOG_LEVEL: ['logging', 'level'],
  MDQUERY_LOG_FILE: ['logging', 'file'],
  MDQUERY_LOG_PRETTY: ['logging', 'pretty'],
};

/**
 * Configuration paths holding numbers
 */
const NUMERIC_PATHS = new Set([
  'indexing.concurrency',
  'query.defaultLimit',
  'query.maxLimit',
  'query.timeoutMs',
  'cache.maxEntries',
  'cache.ttlMs',
  'coordinator.workerPoolSize',
  'fuzzy.threshold',
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown
): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string[]): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.has(path.join('.'))) {
    const num = Number(value);
    if (!Number.isNaN(num)) return num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Find a configuration file in the start directory or up the tree,
 * falling back to the global config file
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(currentDir, '..');
    if (parent === currentDir) break;
    currentDir = parent;
  }

  if (existsSync(GLOBAL_CONFIG_FILE)) {
    return GLOBAL_CONFIG_FILE;
  }

  return null;
}

/**
 * Load configuration from a JSON or YAML file
 */
function loadFileConfig(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    const ext = extname(filePath).toLowerCase();
    parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Failed to load configuration from ${filePath}: ${message}`,
      ConfigurationErrorCode.FILE_UNREADABLE,
      error instanceof Error ? error : undefined
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(
      `Configuration file ${filePath} must contain an object`,
      ConfigurationErrorCode.FILE_UNREADABLE
    );
  }
  return parsed;
}

/**
 * Render zod issues as one line per offending path
 */
function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration to merge */
  overrides?: Record<string, unknown>;
}

/**
 * Load and validate mdquery configuration
 *
 * Later sources override earlier ones: defaults, configuration file,
 * MDQUERY_* environment variables, explicit overrides.
 *
 * @throws ConfigurationError when a file cannot be read or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): MdqueryConfig {
  let config: Record<string, unknown> = { ...DEFAULT_CONFIG };

  if (options.skipFile !== true) {
    const configPath = options.configPath ?? findConfigFile(options.searchDir);
    if (configPath !== null) {
      if (!existsSync(configPath)) {
        throw new ConfigurationError(
          `Configuration file not found: ${configPath}`,
          ConfigurationErrorCode.INVALID_PATH
        );
      }
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env ?? process.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  return validate(config);
}

/**
 * Create a configuration from defaults plus partial overrides
 */
export function createConfig(overrides: Record<string, unknown> = {}): MdqueryConfig {
  return validate(deepMerge({ ...DEFAULT_CONFIG }, overrides));
}

function validate(config: Record<string, unknown>): MdqueryConfig {
  const result = MdqueryConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${describeIssues(result.error)}`,
      ConfigurationErrorCode.INVALID_VALUE,
      result.error
    );
  }
  return result.data;
}
