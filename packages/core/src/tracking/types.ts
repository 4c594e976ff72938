/**
 * Tracking Store Types
 *
 * Server-side bookkeeping (migration ledger, sync hashes, sync metadata) is
 * reached only through these repository interfaces. Call sites never issue
 * ad hoc queries against the tracking tables.
 *
 * @module packages/core/tracking/types
 */

/**
 * One applied migration. `id` is the content hash of the file.
 */
export interface MigrationRecord {
  id: string;
  file: string;
  appliedAt: string;
}

/**
 * Append-only, content-addressed migration ledger
 */
export interface MigrationLedgerStore {
  /** Look up a ledger row by content hash */
  get(id: string): Promise<MigrationRecord | null>;
  /** Record a newly applied migration */
  insert(record: { id: string; file: string }): Promise<void>;
  /** Every ledger row, oldest first */
  list(): Promise<MigrationRecord[]>;
}

/**
 * Current hash per schema file path
 */
export interface SyncHashStore {
  loadAll(): Promise<Map<string, string>>;
  /** Replace the row for `path` (delete, then create) */
  upsert(path: string, hash: string): Promise<void>;
}

/** Known sync metadata keys */
export type SyncMetaKey = 'shared' | 'owner' | 'last_sync';

/**
 * Key/value sync metadata
 */
export interface SyncMetaStore {
  get(key: SyncMetaKey): Promise<unknown>;
  upsert(key: SyncMetaKey, value: unknown): Promise<void>;
}
