/**
 * Engine context
 *
 * Wires a resolved configuration into a logger and a coordinator. Shared by
 * the CLI and by library callers that do not assemble the pieces themselves.
 */

import type { MdqueryConfig } from './config/schema.js';
import { Coordinator, type CoordinatorOptions } from './coordinator/coordinator.js';
import { createLogger, type LogStream, type MdqueryLogger } from './logging/logger.js';

export interface EngineContext {
  config: MdqueryConfig;
  logger: MdqueryLogger;
  coordinator: Coordinator;
  close(): Promise<void>;
}

export interface EngineContextOptions extends Omit<CoordinatorOptions, 'config' | 'logger'> {
  /** Logger to use instead of one built from `config.logging` */
  logger?: MdqueryLogger;
  /** Console stream for a logger built from `config.logging` */
  logStream?: LogStream;
}

export async function createEngineContext(
  config: MdqueryConfig,
  options: EngineContextOptions = {}
): Promise<EngineContext> {
  const { logger: suppliedLogger, logStream, ...coordinatorOptions } = options;
  const logger = suppliedLogger ?? createLogger(config.logging, logStream);
  const coordinator = await Coordinator.open({ ...coordinatorOptions, config, logger });

  return {
    config,
    logger,
    coordinator,
    async close(): Promise<void> {
      await coordinator.close();
    },
  };
}
