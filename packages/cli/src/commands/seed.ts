/**
 * Seed Command - quarry seed
 *
 * @module packages/cli/commands/seed
 */

import { applySeed, toProjectPath } from '@quarry/core';
import { withOperator, type CommandContext } from './context.js';
import { ExitCodes, formatSuccess, printJson, type ExitCode } from './utils.js';

export interface SeedCommandOptions {
  json?: boolean;
}

export async function seedCommand(options: SeedCommandOptions, context: CommandContext): Promise<ExitCode> {
  await withOperator(context, (db) => applySeed(db, context.paths));

  const seedFile = toProjectPath(context.paths, context.paths.seedFile);
  if (options.json) {
    printJson({ success: true, file: seedFile });
  } else {
    formatSuccess(`Seeded from ${seedFile}`);
  }
  return ExitCodes.SUCCESS;
}
