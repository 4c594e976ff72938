/**
 * Migrate Command - quarry migrate
 *
 * Applies every migration file whose content hash is not yet in the ledger.
 *
 * @module packages/cli/commands/migrate
 */

import chalk from 'chalk';
import {
  MigrationLedger,
  createSurrealTrackingStores,
  type MigrateResult,
  type MigrationFileResult,
} from '@quarry/core';
import { withOperator, type CommandContext } from './context.js';
import { ExitCodes, Symbols, createSpinner, printJson, type ExitCode } from './utils.js';

export interface MigrateCommandOptions {
  dryRun?: boolean;
  failFast?: boolean;
  json?: boolean;
}

function formatFile(file: MigrationFileResult): string {
  switch (file.status) {
    case 'applied':
      return `  ${chalk.green(Symbols.success)} ${file.file}`;
    case 'skipped':
      return chalk.dim(`  ${Symbols.skipped} ${file.file} (already applied)`);
    case 'pending':
      return `  ${chalk.yellow(Symbols.pending)} ${file.file}`;
    case 'failed':
      return `  ${chalk.red(Symbols.error)} ${file.file}: ${file.error ?? 'failed'}`;
  }
}

/**
 * Human-readable migrate summary
 */
export function formatMigrateResult(result: MigrateResult, dryRun: boolean): string {
  const lines: string[] = [];
  if (result.usedLegacySource) {
    lines.push(chalk.yellow(`${Symbols.warning} database/migrations is empty; using database/schema`));
  }
  if (result.files.length === 0) {
    lines.push('No migration files found.');
    return lines.join('\n');
  }

  lines.push(chalk.bold(dryRun ? 'Pending migrations (dry run):' : 'Migrations:'));
  for (const file of result.files) {
    lines.push(formatFile(file));
  }
  if (!dryRun) {
    lines.push('');
    lines.push(`applied ${result.applied}, skipped ${result.skipped}, failed ${result.failed}`);
  }
  return lines.join('\n');
}

export async function migrateCommand(options: MigrateCommandOptions, context: CommandContext): Promise<ExitCode> {
  const dryRun = options.dryRun ?? false;
  const spinner = createSpinner(dryRun ? 'Listing migrations...' : 'Applying migrations...', options.json);

  let result: MigrateResult;
  try {
    result = await withOperator(context, (db) =>
      new MigrationLedger({
        db,
        store: createSurrealTrackingStores(db).ledger,
        paths: context.paths,
        logger: context.logger,
      }).migrateAll({ dryRun, failFast: options.failFast ?? false })
    );
  } finally {
    spinner?.stop();
  }

  if (options.json) {
    printJson({ success: result.failed === 0, ...result });
  } else {
    console.log(formatMigrateResult(result, dryRun));
  }
  return result.failed > 0 ? ExitCodes.EXECUTION_ERROR : ExitCodes.SUCCESS;
}
