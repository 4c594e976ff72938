/**
 * Status Command - quarry status
 *
 * Lists migration ledger rows, oldest first.
 *
 * @module packages/cli/commands/status
 */

import chalk from 'chalk';
import {
  MigrationLedger,
  createSurrealTrackingStores,
  type MigrationRecord,
} from '@quarry/core';
import { withOperator, type CommandContext } from './context.js';
import { ExitCodes, printJson, type ExitCode } from './utils.js';

export interface StatusCommandOptions {
  json?: boolean;
}

/**
 * One line per applied migration: time, file, short hash
 */
export function formatLedger(records: readonly MigrationRecord[]): string {
  if (records.length === 0) {
    return 'No migrations applied.';
  }
  const width = Math.max(...records.map((r) => r.appliedAt.length));
  const lines = [chalk.bold(`Applied migrations (${records.length}):`)];
  for (const record of records) {
    lines.push(`  ${chalk.dim(record.appliedAt.padEnd(width))}  ${record.file}  ${chalk.dim(record.id.slice(0, 12))}`);
  }
  return lines.join('\n');
}

export async function statusCommand(options: StatusCommandOptions, context: CommandContext): Promise<ExitCode> {
  const records = await withOperator(context, (db) =>
    new MigrationLedger({
      db,
      store: createSurrealTrackingStores(db).ledger,
      paths: context.paths,
      logger: context.logger,
    }).status()
  );

  if (options.json) {
    printJson({ success: true, migrations: records });
  } else {
    console.log(formatLedger(records));
  }
  return ExitCodes.SUCCESS;
}
