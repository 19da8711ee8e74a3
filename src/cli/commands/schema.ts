/**
 * CLI command: schema
 *
 * List the tables and views a query may read.
 */

import { Command } from 'commander';
import { withContext, type GlobalOptions } from '../context.js';
import { formatSchema } from '../output.js';
import { handleError } from '../errors.js';

interface SchemaOptions {
  counts?: boolean;
  json?: boolean;
}

async function executeSchema(options: SchemaOptions, global: GlobalOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const schema = await withContext(global, ({ coordinator }) =>
      coordinator.describeSchema(options.counts === true)
    );
    console.log(formatSchema(schema, { json: isJson }));
  } catch (error) {
    handleError(error, isJson);
  }
}

export function registerSchemaCommand(program: Command): void {
  program
    .command('schema')
    .description('Describe the queryable tables and views')
    .option('-c, --counts', 'Include row counts')
    .option('--json', 'Output in JSON format')
    .action(async (options: SchemaOptions, command: Command) => {
      await executeSchema(options, command.optsWithGlobals<GlobalOptions>());
    });
}
