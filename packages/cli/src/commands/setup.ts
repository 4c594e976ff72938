/**
 * Setup Command - quarry setup
 *
 * Defines the tracking tables and runs database/setup.surql when present.
 *
 * @module packages/cli/commands/setup
 */

import { ensureBootstrapSchema } from '@quarry/core';
import { withOperator, type CommandContext } from './context.js';
import { ExitCodes, createSpinner, formatSuccess, printJson, type ExitCode } from './utils.js';

export interface SetupCommandOptions {
  json?: boolean;
}

export async function setupCommand(options: SetupCommandOptions, context: CommandContext): Promise<ExitCode> {
  const spinner = createSpinner('Defining tracking tables...', options.json);
  try {
    await withOperator(context, (db) => ensureBootstrapSchema(db, context.paths));
  } finally {
    spinner?.stop();
  }

  if (options.json) {
    printJson({ success: true, namespace: context.database.namespace, database: context.database.database });
  } else {
    formatSuccess(`Bootstrap schema applied to ${context.database.namespace}/${context.database.database}`);
  }
  return ExitCodes.SUCCESS;
}
