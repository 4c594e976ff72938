/**
 * Sync Command - quarry sync
 *
 * Reconciles the live database with database/schema, once or on an
 * interval until interrupted.
 *
 * @module packages/cli/commands/sync
 */

import chalk from 'chalk';
import {
  SnapshotStore,
  SyncEngine,
  createSurrealTrackingStores,
  describeError,
  type EntityKey,
  type SyncOptions,
  type SyncPassResult,
} from '@quarry/core';
import { withOperator, type CommandContext } from './context.js';
import { ExitCodes, Symbols, createSpinner, formatInfo, formatWarning, printJson, type ExitCode } from './utils.js';

export const DEFAULT_WATCH_INTERVAL_MS = 1000;

export interface SyncCommandOptions {
  dryRun?: boolean;
  failFast?: boolean;
  /** `--no-prune` sets this to false */
  prune?: boolean;
  allowSharedPrune?: boolean;
  watch?: boolean;
  debounce?: number;
  json?: boolean;
}

function entityLabel(entity: EntityKey): string {
  return entity.scope === undefined
    ? `${entity.kind} ${entity.name}`
    : `${entity.kind} ${entity.name} on ${entity.scope}`;
}

/**
 * Human-readable summary of one pass
 */
export function formatSyncResult(result: SyncPassResult): string {
  const lines: string[] = [];
  const header = result.dryRun ? 'Sync (dry run)' : 'Sync';
  lines.push(
    chalk.bold(`${header}: ${result.filesTotal} files, ${result.changed.length} changed`) +
      (result.dryRun ? '' : `, ${result.applied.length} applied, ${result.failed.length} failed`)
  );

  if (result.dryRun) {
    for (const file of result.changed) {
      lines.push(`  ${chalk.yellow(Symbols.pending)} ${file}`);
    }
  } else {
    for (const file of result.applied) {
      lines.push(`  ${chalk.green(Symbols.success)} ${file}`);
    }
    for (const failure of result.failed) {
      lines.push(`  ${chalk.red(Symbols.error)} ${failure.file}: ${failure.error}`);
    }
  }

  if (result.stale.length > 0) {
    lines.push(chalk.bold(`Stale entities: ${result.stale.length}`));
    for (const entity of result.stale) {
      lines.push(`  ${Symbols.skipped} ${entityLabel(entity)}`);
    }
    if (result.dryRun) {
      for (const statement of result.removeStatements) {
        lines.push(chalk.dim(`  would run: ${statement}`));
      }
    } else if (result.pruned > 0) {
      lines.push(`pruned ${result.pruned}`);
    } else {
      lines.push(chalk.dim('not pruned (--no-prune)'));
    }
  }

  return lines.join('\n');
}

function printPass(result: SyncPassResult, json: boolean): void {
  if (json) {
    printJson({ success: result.failed.length === 0, ...result });
  } else {
    console.log(formatSyncResult(result));
  }
}

export async function syncCommand(options: SyncCommandOptions, context: CommandContext): Promise<ExitCode> {
  const json = options.json ?? false;
  const syncOptions: SyncOptions = {
    dryRun: options.dryRun ?? false,
    failFast: options.failFast ?? false,
    prune: options.prune ?? true,
    allowSharedPrune: options.allowSharedPrune ?? false,
  };

  return withOperator(context, async (db) => {
    const stores = createSurrealTrackingStores(db);
    const engine = new SyncEngine({
      db,
      hashes: stores.hashes,
      meta: stores.meta,
      snapshots: new SnapshotStore(context.paths),
      paths: context.paths,
      logger: context.logger,
      env: context.env,
    });

    if (!options.watch) {
      const spinner = createSpinner('Syncing schema...', json);
      let result: SyncPassResult;
      try {
        result = await engine.sync(syncOptions);
      } finally {
        spinner?.stop();
      }
      printPass(result, json);
      return result.failed.length > 0 ? ExitCodes.EXECUTION_ERROR : ExitCodes.SUCCESS;
    }

    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    const intervalMs = options.debounce ?? DEFAULT_WATCH_INTERVAL_MS;
    if (!json) {
      formatInfo(`Watching ${context.paths.schemaDir} every ${intervalMs}ms. Press Ctrl+C to stop.`);
    }
    try {
      const passes = await engine.watch({
        ...syncOptions,
        intervalMs,
        signal: controller.signal,
        onPass: (result) => {
          if (json || result.changed.length > 0 || result.stale.length > 0) {
            printPass(result, json);
          }
        },
        onError: (error) => formatWarning(`Sync pass failed: ${describeError(error)}`),
      });
      if (!json) {
        console.log(chalk.dim(`Stopped after ${passes} passes.`));
      }
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    }
    return ExitCodes.SUCCESS;
  });
}
