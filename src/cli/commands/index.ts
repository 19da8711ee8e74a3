/**
 * CLI command: index
 *
 * Bring the index in line with the markdown files under a directory.
 */

import { Command } from 'commander';
import { withContext, type GlobalOptions } from '../context.js';
import { formatIndexReport } from '../output.js';
import { createProgressDisplay } from '../progress.js';
import { handleError } from '../errors.js';

/**
 * Index command options
 */
interface IndexOptions {
  recursive?: boolean;
  force?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Abort controller tripped by Ctrl-C; a second Ctrl-C exits at once
 */
export function abortOnInterrupt(): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    process.stderr.write('\nStopping after the current commit (Ctrl-C again to exit)\n');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}

async function executeIndex(dir: string, options: IndexOptions, global: GlobalOptions): Promise<void> {
  const isJson = options.json === true;
  const progress = createProgressDisplay({ json: isJson, quiet: options.quiet === true });
  const interrupt = abortOnInterrupt();

  try {
    const report = await withContext(global, ({ coordinator }) =>
      coordinator.index(dir, {
        recursive: options.recursive !== false,
        force: options.force === true,
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

/**
 * Register the index command with the program
 */
export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Index the markdown files under a directory')
    .argument('<dir>', 'Directory to index')
    .option('--no-recursive', 'Only index files directly inside the directory')
    .option('-f, --force', 'Re-extract every file, even unchanged ones')
    .option('--json', 'Output in JSON format')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (dir: string, options: IndexOptions, command: Command) => {
      await executeIndex(dir, options, command.optsWithGlobals<GlobalOptions>());
    });
}
