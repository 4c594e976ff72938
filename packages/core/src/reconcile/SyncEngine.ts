/**
 * SyncEngine - Reconcile a live database with the schema directory
 *
 * A pass applies every schema file whose hash differs from the server-side
 * tracking row, then optionally prunes entities that disappeared from the
 * schema since the last recorded catalog. Watch mode repeats the pass on a
 * fixed interval until cancelled.
 *
 * @module packages/core/reconcile/SyncEngine
 */

import type { Logger } from 'pino';

import { parseBool, OWNER_ENV, SHARED_DB_ENV, type ProjectPaths } from '../config.js';
import { supportsRemoveApi } from '../database/capabilities.js';
import { runQuery } from '../database/query.js';
import type { DatabaseClient } from '../database/types.js';
import { describeError, SharedDatabaseError } from '../errors.js';
import { normalizeEntities, type EntityKey } from '../schema/catalog.js';
import {
  buildCatalogSnapshot,
  collectSchemaFiles,
  removedEntities,
  renderRemoveSql,
  snapshotFromFiles,
} from '../schema/snapshot.js';
import type { SnapshotRepository } from '../schema/SnapshotStore.js';
import { ensureBootstrapSchema } from '../tracking/bootstrap.js';
import type { SyncHashStore, SyncMetaStore } from '../tracking/types.js';

// =============================================================================
// Constants
// =============================================================================

/** Lower bound for the watch interval */
export const MIN_WATCH_INTERVAL_MS = 250;

// =============================================================================
// Types
// =============================================================================

export interface SyncEngineConfig {
  db: DatabaseClient;
  hashes: SyncHashStore;
  meta: SyncMetaStore;
  snapshots: SnapshotRepository;
  paths: ProjectPaths;
  logger: Logger;
  /** Environment consulted for the shared/owner overrides */
  env?: NodeJS.ProcessEnv;
  /** Defines the tracking tables (default: bootstrap schema) */
  ensureSchema?: () => Promise<void>;
  /** REMOVE API capability probe (default: live probe) */
  probeRemoveApi?: (db: DatabaseClient) => Promise<boolean>;
  /** Clock for last_sync */
  now?: () => Date;
}

export interface SyncOptions {
  dryRun: boolean;
  failFast: boolean;
  prune: boolean;
  allowSharedPrune: boolean;
}

export interface WatchOptions extends SyncOptions {
  intervalMs: number;
  signal: AbortSignal;
  /** Called after every completed pass */
  onPass?: (result: SyncPassResult) => void;
  /** Called for a pass error that did not stop the loop */
  onError?: (error: unknown) => void;
}

export interface SyncFileError {
  file: string;
  error: string;
}

/**
 * Outcome of one reconciliation pass
 */
export interface SyncPassResult {
  dryRun: boolean;
  /** Number of schema files discovered */
  filesTotal: number;
  /** Files whose hash differed from the tracked one */
  changed: string[];
  /** Files executed and tracked in this pass */
  applied: string[];
  failed: SyncFileError[];
  stale: EntityKey[];
  /** REMOVE statements executed (or, in dry-run, that would run) */
  removeStatements: string[];
  pruned: number;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Resolve after `ms`, or early with `false` when the signal aborts
 */
function waitForTick(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// SyncEngine
// =============================================================================

export class SyncEngine {
  private readonly db: DatabaseClient;
  private readonly hashes: SyncHashStore;
  private readonly meta: SyncMetaStore;
  private readonly snapshots: SnapshotRepository;
  private readonly paths: ProjectPaths;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly ensureSchema: () => Promise<void>;
  private readonly probeRemoveApi: (db: DatabaseClient) => Promise<boolean>;
  private readonly now: () => Date;

  constructor(config: SyncEngineConfig) {
    this.db = config.db;
    this.hashes = config.hashes;
    this.meta = config.meta;
    this.snapshots = config.snapshots;
    this.paths = config.paths;
    this.logger = config.logger.child({ component: 'SyncEngine' });
    this.env = config.env ?? process.env;
    this.ensureSchema =
      config.ensureSchema ?? (() => ensureBootstrapSchema(config.db, config.paths));
    this.probeRemoveApi = config.probeRemoveApi ?? supportsRemoveApi;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Bootstrap the tracking tables, then run one pass
   */
  async sync(options: SyncOptions): Promise<SyncPassResult> {
    if (!options.dryRun) {
      await this.ensureSchema();
    }
    return this.runSyncOnce(options);
  }

  /**
   * One reconciliation pass
   */
  async runSyncOnce(options: SyncOptions): Promise<SyncPassResult> {
    const files = await collectSchemaFiles(this.paths);
    const tracked = await this.hashes.loadAll();

    const result: SyncPassResult = {
      dryRun: options.dryRun,
      filesTotal: files.length,
      changed: [],
      applied: [],
      failed: [],
      stale: [],
      removeStatements: [],
      pruned: 0,
    };

    for (const file of files) {
      if (tracked.get(file.path) === file.hash) {
        continue;
      }
      result.changed.push(file.path);

      if (options.dryRun) {
        continue;
      }

      try {
        await runQuery(this.db, file.sql, `Failed applying ${file.path}`);
      } catch (error) {
        const message = describeError(error);
        result.failed.push({ file: file.path, error: message });
        this.logger.error({ file: file.path, error: message }, 'Schema file failed');
        if (options.failFast) {
          throw error;
        }
        continue;
      }

      await this.hashes.upsert(file.path, file.hash);
      result.applied.push(file.path);
      this.logger.info({ file: file.path, hash: file.hash }, 'Schema file applied');
    }

    const previousCatalog = await this.snapshots.loadCatalog();
    const currentCatalog = buildCatalogSnapshot(files);
    result.stale = removedEntities(previousCatalog, currentCatalog);

    if (options.prune && result.stale.length > 0) {
      await this.prune(result, options);
    } else if (result.stale.length > 0) {
      this.logger.info({ stale: result.stale.length }, 'Stale entities detected; prune disabled');
    }

    if (!options.dryRun) {
      await this.writeMetadata();

      if (result.failed.length === 0) {
        // Unpruned stale entities stay in the catalog so the next pass still sees them.
        const unpruned = result.pruned > 0 ? [] : result.stale;
        await this.snapshots.saveSchema(snapshotFromFiles(files));
        await this.snapshots.saveCatalog({
          version: currentCatalog.version,
          entities: normalizeEntities([...currentCatalog.entities, ...unpruned]),
        });
      }
    }

    return result;
  }

  /**
   * Run a pass now, then one per interval until the signal aborts.
   * Resolves with the number of completed passes.
   */
  async watch(options: WatchOptions): Promise<number> {
    const interval = Math.max(options.intervalMs, MIN_WATCH_INTERVAL_MS);

    let passes = 0;
    options.onPass?.(await this.sync(options));
    passes += 1;

    this.logger.info({ intervalMs: interval }, 'Watching schema directory');

    while (!options.signal.aborted) {
      const ticked = await waitForTick(interval, options.signal);
      if (!ticked) {
        break;
      }

      try {
        const result = await this.runSyncOnce(options);
        passes += 1;
        options.onPass?.(result);
      } catch (error) {
        if (options.failFast) {
          throw error;
        }
        this.logger.error({ error: describeError(error) }, 'Sync iteration failed');
        options.onError?.(error);
      }
    }

    this.logger.info({ passes }, 'Schema watch stopped');
    return passes;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async prune(result: SyncPassResult, options: SyncOptions): Promise<void> {
    const shared = await this.isSharedDatabase();
    if (shared && !options.allowSharedPrune) {
      throw new SharedDatabaseError(result.stale.length);
    }

    const hasApi = result.stale.some((entity) => entity.kind === 'api');
    const apiSupported = hasApi ? await this.probeRemoveApi(this.db) : true;
    result.removeStatements = renderRemoveSql(result.stale, apiSupported);

    if (options.dryRun) {
      return;
    }

    await runQuery(
      this.db,
      result.removeStatements.join('\n'),
      `Failed pruning ${result.stale.length} stale entities`
    );
    result.pruned = result.stale.length;
    this.logger.info({ pruned: result.pruned }, 'Stale entities pruned');
  }

  /**
   * Environment override first, then the server-stored flag
   */
  private async isSharedDatabase(): Promise<boolean> {
    const raw = this.env[SHARED_DB_ENV];
    if (raw !== undefined) {
      const parsed = parseBool(raw);
      if (parsed !== undefined) {
        return parsed;
      }
    }
    return (await this.meta.get('shared')) === true;
  }

  private async writeMetadata(): Promise<void> {
    const rawShared = this.env[SHARED_DB_ENV];
    const shared = rawShared === undefined ? undefined : parseBool(rawShared);
    if (shared !== undefined) {
      await this.meta.upsert('shared', shared);
    }

    const owner = this.env[OWNER_ENV];
    if (owner !== undefined && owner.trim() !== '') {
      await this.meta.upsert('owner', owner);
    }

    await this.meta.upsert('last_sync', this.now().toISOString());
  }
}
