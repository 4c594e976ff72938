/**
 * Diff Command - quarry diff
 *
 * Compares database/schema against the local snapshots without touching the
 * database.
 *
 * @module packages/cli/commands/diff
 */

import chalk from 'chalk';
import {
  SnapshotStore,
  buildCatalogSnapshot,
  collectSchemaFiles,
  diffSchema,
  removedEntities,
  snapshotFromFiles,
  type EntityKey,
  type FileDiff,
} from '@quarry/core';
import type { CommandContext } from './context.js';
import { ExitCodes, printJson, type ExitCode } from './utils.js';

export interface DiffCommandOptions {
  json?: boolean;
}

export interface SchemaDiffReport {
  files: FileDiff;
  stale: EntityKey[];
  hasChanges: boolean;
}

const OperationSymbols = {
  added: '+',
  modified: '~',
  removed: '-',
} as const;

const OperationColors = {
  added: chalk.green,
  modified: chalk.yellow,
  removed: chalk.red,
} as const;

/**
 * Compute the file diff and the stale entities from local state only
 */
export async function computeSchemaDiff(context: Pick<CommandContext, 'paths'>): Promise<SchemaDiffReport> {
  const store = new SnapshotStore(context.paths);
  const files = await collectSchemaFiles(context.paths);

  const fileDiff = diffSchema(await store.loadSchema(), snapshotFromFiles(files));
  const stale = removedEntities(await store.loadCatalog(), buildCatalogSnapshot(files));

  return {
    files: fileDiff,
    stale,
    hasChanges:
      fileDiff.added.length + fileDiff.modified.length + fileDiff.removed.length + stale.length > 0,
  };
}

export function formatSchemaDiff(report: SchemaDiffReport): string {
  if (!report.hasChanges) {
    return chalk.green('No changes. Schema matches the last sync.');
  }

  const lines: string[] = [chalk.bold('Schema files:')];
  for (const kind of ['added', 'modified', 'removed'] as const) {
    for (const file of report.files[kind]) {
      lines.push(`  ${OperationColors[kind](OperationSymbols[kind])} ${file}`);
    }
  }
  if (report.stale.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Entities to remove:'));
    for (const entity of report.stale) {
      const scope = entity.scope === undefined ? '' : ` on ${entity.scope}`;
      lines.push(`  ${OperationColors.removed(OperationSymbols.removed)} ${entity.kind} ${entity.name}${scope}`);
    }
  }
  return lines.join('\n');
}

export async function diffCommand(options: DiffCommandOptions, context: CommandContext): Promise<ExitCode> {
  const report = await computeSchemaDiff(context);
  if (options.json) {
    printJson({ success: true, ...report });
  } else {
    console.log(formatSchemaDiff(report));
  }
  return ExitCodes.SUCCESS;
}
