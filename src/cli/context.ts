/**
 * CLI context manager
 *
 * Loads configuration, logs to stderr and opens the coordinator for one
 * command, closing it again whatever the command's outcome.
 */

import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import { createEngineContext, type EngineContext } from '../context.js';

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  config?: string;
  database?: string;
  logLevel?: string;
}

export function toLoadOptions(global: GlobalOptions): LoadConfigOptions {
  const overrides: Record<string, unknown> = {};
  if (global.database !== undefined) {
    overrides.storage = { databasePath: global.database };
  }
  if (global.logLevel !== undefined) {
    overrides.logging = { level: global.logLevel };
  }
  return {
    ...(global.config !== undefined ? { configPath: global.config } : {}),
    overrides,
  };
}

/**
 * Run a function with an engine context, ensuring cleanup on exit
 */
export async function withContext<T>(
  global: GlobalOptions,
  fn: (context: EngineContext) => Promise<T>
): Promise<T> {
  const config = loadConfig(toLoadOptions(global));
  const context = await createEngineContext(config, { logStream: 'stderr' });
  try {
    return await fn(context);
  } finally {
    await context.close();
  }
}
