/**
 * CLI command: status
 *
 * Store health, document counts, generation and cache statistics.
 */

import { Command } from 'commander';
import { withContext, type GlobalOptions } from '../context.js';
import { formatStatus } from '../output.js';
import { handleError } from '../errors.js';

interface StatusOptions {
  verify?: boolean;
  json?: boolean;
}

async function executeStatus(options: StatusOptions, global: GlobalOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const status = await withContext(global, async ({ coordinator }) => {
      if (options.verify === true) {
        await coordinator.verify();
      }
      return coordinator.status();
    });
    console.log(formatStatus(status, { json: isJson }));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the status command with the program
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show store health and statistics')
    .option('--verify', 'Run an integrity check first, repairing the store if needed')
    .option('--json', 'Output in JSON format')
    .action(async (options: StatusOptions, command: Command) => {
      await executeStatus(options, command.optsWithGlobals<GlobalOptions>());
    });
}
