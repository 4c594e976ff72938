/**
 * Apply Command - quarry apply <path>
 *
 * Runs one schema file directly, optionally recording it in the ledger.
 *
 * @module packages/cli/commands/apply
 */

import path from 'node:path';
import {
  MigrationLedger,
  createSurrealTrackingStores,
  toProjectPath,
} from '@quarry/core';
import { withOperator, type CommandContext } from './context.js';
import { ExitCodes, formatInfo, formatSuccess, printJson, type ExitCode } from './utils.js';

export interface ApplyCommandOptions {
  track?: boolean;
  json?: boolean;
}

export async function applyCommand(
  file: string,
  options: ApplyCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const absolute = path.resolve(file);
  const track = options.track ?? false;

  const outcome = await withOperator(context, (db) =>
    new MigrationLedger({
      db,
      store: createSurrealTrackingStores(db).ledger,
      paths: context.paths,
      logger: context.logger,
    }).applyOne(absolute, track)
  );

  const display = toProjectPath(context.paths, absolute);
  if (options.json) {
    printJson({ success: true, file: display, tracked: track, outcome });
  } else if (outcome === 'skipped') {
    formatInfo(`${display} already applied`);
  } else {
    formatSuccess(`Applied ${display}${track ? ' (tracked)' : ''}`);
  }
  return ExitCodes.SUCCESS;
}
