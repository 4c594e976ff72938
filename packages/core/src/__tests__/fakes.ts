/**
 * In-process stand-ins for the database collaborator and tracking stores
 *
 * @module packages/core/__tests__/fakes
 */

import type { Credentials, DatabaseClient, UseTarget } from '../database/types.js';
import type {
  MigrationLedgerStore,
  MigrationRecord,
  SyncHashStore,
  SyncMetaKey,
  SyncMetaStore,
} from '../tracking/types.js';

export interface ExecutedQuery {
  statement: string;
  bindings?: Record<string, unknown>;
}

/**
 * Decides what one `execute` call returns. Throw to simulate a failed
 * statement.
 */
export type QueryHandler = (
  statement: string,
  bindings: Record<string, unknown> | undefined
) => unknown[] | Promise<unknown[]>;

export class FakeDatabase implements DatabaseClient {
  readonly executed: ExecutedQuery[] = [];
  readonly signins: Credentials[] = [];
  readonly authenticated: string[] = [];
  readonly uses: UseTarget[] = [];
  closeCount = 0;
  signinError: Error | undefined;
  token = 'test-token';

  constructor(public handler: QueryHandler = () => []) {}

  async signin(credentials: Credentials): Promise<string> {
    this.signins.push(credentials);
    if (this.signinError) {
      throw this.signinError;
    }
    return this.token;
  }

  async authenticate(token: string): Promise<void> {
    this.authenticated.push(token);
  }

  async use(target: UseTarget): Promise<void> {
    this.uses.push(target);
  }

  async execute(statement: string, bindings?: Record<string, unknown>): Promise<unknown[]> {
    this.executed.push(bindings === undefined ? { statement } : { statement, bindings });
    return this.handler(statement, bindings);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  statements(): string[] {
    return this.executed.map((q) => q.statement);
  }
}

export class MemoryLedgerStore implements MigrationLedgerStore {
  readonly rows: MigrationRecord[] = [];
  private clock = 0;

  async get(id: string): Promise<MigrationRecord | null> {
    return this.rows.find((row) => row.id === id) ?? null;
  }

  async insert(record: { id: string; file: string }): Promise<void> {
    this.clock += 1;
    this.rows.push({ ...record, appliedAt: `t${this.clock}` });
  }

  async list(): Promise<MigrationRecord[]> {
    return [...this.rows];
  }
}

export class MemoryHashStore implements SyncHashStore {
  readonly hashes = new Map<string, string>();

  async loadAll(): Promise<Map<string, string>> {
    return new Map(this.hashes);
  }

  async upsert(path: string, hash: string): Promise<void> {
    this.hashes.set(path, hash);
  }
}

export class MemoryMetaStore implements SyncMetaStore {
  readonly values = new Map<SyncMetaKey, unknown>();

  async get(key: SyncMetaKey): Promise<unknown> {
    return this.values.get(key);
  }

  async upsert(key: SyncMetaKey, value: unknown): Promise<void> {
    this.values.set(key, value);
  }
}
