/**
 * CLI command: rebuild
 *
 * Clear the store and index a directory from scratch. Also the way out of
 * an unrecoverable store.
 */

import { Command } from 'commander';
import { withContext, type GlobalOptions } from '../context.js';
import { formatIndexReport } from '../output.js';
import { createProgressDisplay } from '../progress.js';
import { handleError } from '../errors.js';
import { abortOnInterrupt } from './index.js';

interface RebuildOptions {
  recursive?: boolean;
  json?: boolean;
  quiet?: boolean;
}

async function executeRebuild(dir: string, options: RebuildOptions, global: GlobalOptions): Promise<void> {
  const isJson = options.json === true;
  const progress = createProgressDisplay({ json: isJson, quiet: options.quiet === true });
  const interrupt = abortOnInterrupt();

  try {
    const report = await withContext(global, ({ coordinator }) =>
      coordinator.rebuild(dir, {
        recursive: options.recursive !== false,
        signal: interrupt.signal,
        onProgress: progress.createCallback(),
      })
    );
    progress.finish();
    if (options.quiet !== true || isJson) {
      console.log(formatIndexReport(report, { json: isJson }));
    }
  } catch (error) {
    progress.finish();
    handleError(error, isJson);
  } finally {
    interrupt.dispose();
  }
}

export function registerRebuildCommand(program: Command): void {
  program
    .command('rebuild')
    .description('Drop every indexed document and index a directory from scratch')
    .argument('<dir>', 'Directory to index')
    .option('--no-recursive', 'Only index files directly inside the directory')
    .option('--json', 'Output in JSON format')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (dir: string, options: RebuildOptions, command: Command) => {
      await executeRebuild(dir, options, command.optsWithGlobals<GlobalOptions>());
    });
}
