/**
 * MigrationLedger - Content-addressed migration application
 *
 * A migration file is applied at most once per distinct content hash.
 * Editing an applied file produces a new hash and therefore a new, additional
 * migration; old ledger rows are never touched.
 *
 * @module packages/core/reconcile/MigrationLedger
 */

import type { Logger } from 'pino';

import { toProjectPath, type ProjectPaths } from '../config.js';
import { runQuery } from '../database/query.js';
import type { DatabaseClient } from '../database/types.js';
import { describeError } from '../errors.js';
import { listSchemaFiles, readSchemaFile } from '../schema/snapshot.js';
import { ensureBootstrapSchema } from '../tracking/bootstrap.js';
import type { MigrationLedgerStore, MigrationRecord } from '../tracking/types.js';

// =============================================================================
// Types
// =============================================================================

export interface MigrationLedgerConfig {
  db: DatabaseClient;
  store: MigrationLedgerStore;
  paths: ProjectPaths;
  logger: Logger;
  /** Makes sure the ledger table exists (default: bootstrap schema) */
  ensureSchema?: () => Promise<void>;
}

export type MigrationOutcome = 'applied' | 'skipped';

export interface MigrationFileResult {
  /** Project-relative path */
  file: string;
  status: MigrationOutcome | 'pending' | 'failed';
  error?: string;
}

export interface MigrateOptions {
  failFast: boolean;
  dryRun: boolean;
}

export interface MigrateResult {
  /** Directory the files came from; `schema` when falling back */
  source: 'migrations' | 'schema';
  /** True when `database/migrations` was empty and the schema dir was used */
  usedLegacySource: boolean;
  files: MigrationFileResult[];
  applied: number;
  skipped: number;
  failed: number;
}

// =============================================================================
// MigrationLedger
// =============================================================================

export class MigrationLedger {
  private readonly db: DatabaseClient;
  private readonly store: MigrationLedgerStore;
  private readonly paths: ProjectPaths;
  private readonly logger: Logger;
  private readonly ensureSchema: () => Promise<void>;

  constructor(config: MigrationLedgerConfig) {
    this.db = config.db;
    this.store = config.store;
    this.paths = config.paths;
    this.logger = config.logger.child({ component: 'MigrationLedger' });
    this.ensureSchema =
      config.ensureSchema ?? (() => ensureBootstrapSchema(config.db, config.paths));
  }

  /**
   * Apply one file unless its content hash is already in the ledger
   */
  async applyMigrationFile(absolutePath: string): Promise<MigrationOutcome> {
    const file = await readSchemaFile(this.paths, absolutePath);

    const existing = await this.store.get(file.hash);
    if (existing) {
      this.logger.debug({ file: file.path, hash: file.hash }, 'Migration already applied');
      return 'skipped';
    }

    await runQuery(this.db, file.sql, `Failed applying ${file.path}`);
    await this.store.insert({ id: file.hash, file: file.path });

    this.logger.info({ file: file.path, hash: file.hash }, 'Migration applied');
    return 'applied';
  }

  /**
   * Apply every migration file in path order
   */
  async migrateAll(options: MigrateOptions): Promise<MigrateResult> {
    if (!options.dryRun) {
      await this.ensureSchema();
    }

    const { source, files } = await this.collectMigrationFiles();
    const result: MigrateResult = {
      source,
      usedLegacySource: source === 'schema' && files.length > 0,
      files: [],
      applied: 0,
      skipped: 0,
      failed: 0,
    };

    for (const absolute of files) {
      const relative = toProjectPath(this.paths, absolute);

      if (options.dryRun) {
        const file = await readSchemaFile(this.paths, absolute);
        if (await this.store.get(file.hash)) {
          result.files.push({ file: relative, status: 'skipped' });
          result.skipped += 1;
        } else {
          result.files.push({ file: relative, status: 'pending' });
        }
        continue;
      }

      try {
        const outcome = await this.applyMigrationFile(absolute);
        result.files.push({ file: relative, status: outcome });
        if (outcome === 'applied') {
          result.applied += 1;
        } else {
          result.skipped += 1;
        }
      } catch (error) {
        const message = describeError(error);
        this.logger.error({ file: relative, error: message }, 'Migration failed');
        result.files.push({ file: relative, status: 'failed', error: message });
        result.failed += 1;
        if (options.failFast) {
          throw error;
        }
      }
    }

    return result;
  }

  /**
   * Run one file directly, optionally recording it in the ledger
   */
  async applyOne(absolutePath: string, track: boolean): Promise<MigrationOutcome> {
    if (track) {
      await this.ensureSchema();
      return this.applyMigrationFile(absolutePath);
    }
    const file = await readSchemaFile(this.paths, absolutePath);
    await runQuery(this.db, file.sql, `Failed applying ${file.path}`);
    this.logger.info({ file: file.path }, 'File applied (untracked)');
    return 'applied';
  }

  /**
   * Ledger rows, oldest first
   */
  async status(): Promise<MigrationRecord[]> {
    return this.store.list();
  }

  private async collectMigrationFiles(): Promise<{
    source: MigrateResult['source'];
    files: string[];
  }> {
    const migrations = await listSchemaFiles(this.paths.migrationsDir);
    if (migrations.length > 0) {
      return { source: 'migrations', files: migrations };
    }

    const legacy = await listSchemaFiles(this.paths.schemaDir);
    if (legacy.length > 0) {
      this.logger.warn(
        { migrationsDir: this.paths.migrationsDir, schemaDir: this.paths.schemaDir },
        'Migrations directory is empty; using legacy schema directory'
      );
    }
    return { source: 'schema', files: legacy };
  }
}
