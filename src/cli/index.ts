#!/usr/bin/env node
/**
 * mdquery CLI entry point
 *
 * Index markdown directories and query them with read-only SQL.
 */

import { Command } from 'commander';
import { registerIndexCommand } from './commands/index.js';
import { registerRebuildCommand } from './commands/rebuild.js';
import { registerQueryCommand } from './commands/query.js';
import { registerSchemaCommand } from './commands/schema.js';
import { registerStatusCommand } from './commands/status.js';
import { registerSearchCommand } from './commands/search.js';
import { registerFindCommands } from './commands/find.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('mdquery')
    .description('Index markdown files and query them with SQL')
    .version('0.1.0')
    .option('--config <path>', 'Configuration file')
    .option('--database <path>', 'Index store location')
    .option('--log-level <level>', 'debug, info, warn or error');

  registerIndexCommand(program);
  registerRebuildCommand(program);
  registerQueryCommand(program);
  registerSchemaCommand(program);
  registerStatusCommand(program);
  registerSearchCommand(program);
  registerFindCommands(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander handles most errors, but catch any unexpected ones
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void main();
