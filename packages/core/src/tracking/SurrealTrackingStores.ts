/**
 * SurrealDB Tracking Stores
 *
 * Repository implementations over the bootstrap tables `_migration`,
 * `_quarry_sync` and `_quarry_sync_meta`.
 *
 * @module packages/core/tracking/SurrealTrackingStores
 */

import { isRecord, rowsOf, runQuery, timestampText } from '../database/query.js';
import type { DatabaseClient } from '../database/types.js';
import type {
  MigrationLedgerStore,
  MigrationRecord,
  SyncHashStore,
  SyncMetaKey,
  SyncMetaStore,
} from './types.js';

export const MIGRATION_TABLE = '_migration';
export const SYNC_TABLE = '_quarry_sync';
export const SYNC_META_TABLE = '_quarry_sync_meta';

function toMigrationRecord(row: Record<string, unknown>): MigrationRecord {
  return {
    id: String(row.id ?? ''),
    file: typeof row.file === 'string' ? row.file : '',
    appliedAt: timestampText(row.applied_at),
  };
}

// ============================================================================
// Migration Ledger
// ============================================================================

/**
 * Ledger rows are keyed by content hash: `_migration:⟨sha256⟩`
 */
export class SurrealMigrationLedgerStore implements MigrationLedgerStore {
  constructor(private readonly db: DatabaseClient) {}

  async get(id: string): Promise<MigrationRecord | null> {
    const results = await runQuery(
      this.db,
      `SELECT meta::id(id) AS id, file, applied_at FROM type::thing('${MIGRATION_TABLE}', $id);`,
      `Failed reading migration ledger for ${id}`,
      { id }
    );
    const [row] = rowsOf(results, 0);
    return row ? toMigrationRecord(row) : null;
  }

  async insert(record: { id: string; file: string }): Promise<void> {
    await runQuery(
      this.db,
      `CREATE type::thing('${MIGRATION_TABLE}', $id) CONTENT { file: $file, applied_at: time::now() };`,
      `Failed recording migration ${record.file}`,
      { id: record.id, file: record.file }
    );
  }

  async list(): Promise<MigrationRecord[]> {
    const results = await runQuery(
      this.db,
      `SELECT meta::id(id) AS id, file, applied_at FROM ${MIGRATION_TABLE} ORDER BY applied_at;`,
      'Failed listing migration ledger'
    );
    return rowsOf(results, 0).map(toMigrationRecord);
  }
}

// ============================================================================
// Sync Hashes
// ============================================================================

export class SurrealSyncHashStore implements SyncHashStore {
  constructor(private readonly db: DatabaseClient) {}

  async loadAll(): Promise<Map<string, string>> {
    const results = await runQuery(
      this.db,
      `SELECT path, hash FROM ${SYNC_TABLE};`,
      'Failed loading sync hashes'
    );
    const tracked = new Map<string, string>();
    for (const row of rowsOf(results, 0)) {
      if (typeof row.path === 'string' && typeof row.hash === 'string') {
        tracked.set(row.path, row.hash);
      }
    }
    return tracked;
  }

  async upsert(path: string, hash: string): Promise<void> {
    await runQuery(
      this.db,
      `DELETE ${SYNC_TABLE} WHERE path = $path;\n` +
        `CREATE ${SYNC_TABLE} CONTENT { path: $path, hash: $hash, synced_at: time::now() };`,
      `Failed storing sync hash for ${path}`,
      { path, hash }
    );
  }
}

// ============================================================================
// Sync Metadata
// ============================================================================

export class SurrealSyncMetaStore implements SyncMetaStore {
  constructor(private readonly db: DatabaseClient) {}

  async get(key: SyncMetaKey): Promise<unknown> {
    const results = await runQuery(
      this.db,
      `SELECT value FROM ${SYNC_META_TABLE} WHERE key = $key LIMIT 1;`,
      `Failed reading sync metadata '${key}'`,
      { key }
    );
    const [row] = rowsOf(results, 0);
    return isRecord(row) ? row.value : undefined;
  }

  async upsert(key: SyncMetaKey, value: unknown): Promise<void> {
    await runQuery(
      this.db,
      `DELETE ${SYNC_META_TABLE} WHERE key = $key;\n` +
        `CREATE ${SYNC_META_TABLE} CONTENT { key: $key, value: $value, updated_at: time::now() };`,
      `Failed writing sync metadata '${key}'`,
      { key, value }
    );
  }
}

/**
 * All three stores over one connection
 */
export interface TrackingStores {
  ledger: MigrationLedgerStore;
  hashes: SyncHashStore;
  meta: SyncMetaStore;
}

export function createSurrealTrackingStores(db: DatabaseClient): TrackingStores {
  return {
    ledger: new SurrealMigrationLedgerStore(db),
    hashes: new SurrealSyncHashStore(db),
    meta: new SurrealSyncMetaStore(db),
  };
}
