/**
 * SurrealDB Database Client
 *
 * DatabaseClient implementation backed by the official `surrealdb` SDK.
 *
 * @module packages/core/database/SurrealDatabase
 */

import { Surreal } from 'surrealdb';
import { ErrorCodes, ExecutionError } from '../errors.js';
import type {
  Credentials,
  DatabaseClient,
  DatabaseConfig,
  DatabaseConnector,
  UseTarget,
} from './types.js';

/**
 * SurrealDB-backed DatabaseClient
 *
 * @example
 * ```typescript
 * const db = await SurrealDatabase.connect('ws://localhost:8000');
 * await db.signin({ kind: 'root', username: 'root', password: 'root' });
 * await db.use({ namespace: 'app', database: 'main' });
 * const [rows] = await db.execute('SELECT * FROM person;');
 * ```
 */
export class SurrealDatabase implements DatabaseClient {
  private readonly db: Surreal;

  private constructor(db: Surreal) {
    this.db = db;
  }

  /**
   * Open a connection. The address may use ws(s):// or http(s)://.
   */
  static async connect(address: string): Promise<SurrealDatabase> {
    const db = new Surreal();
    try {
      await db.connect(address);
    } catch (error) {
      throw new ExecutionError(`Failed connecting to ${address}`, {
        code: ErrorCodes.EXEC_CONNECTION_FAILED,
        cause: error,
      });
    }
    return new SurrealDatabase(db);
  }

  async signin(credentials: Credentials): Promise<string> {
    switch (credentials.kind) {
      case 'root':
        return this.db.signin({
          username: credentials.username,
          password: credentials.password,
        });
      case 'namespace':
        return this.db.signin({
          namespace: credentials.namespace,
          username: credentials.username,
          password: credentials.password,
        });
      case 'database':
        return this.db.signin({
          namespace: credentials.namespace,
          database: credentials.database,
          username: credentials.username,
          password: credentials.password,
        });
      case 'record':
        return this.db.signin({
          namespace: credentials.namespace,
          database: credentials.database,
          access: credentials.access,
          variables: credentials.params,
        });
    }
  }

  async authenticate(token: string): Promise<void> {
    await this.db.authenticate(token);
  }

  async use(target: UseTarget): Promise<void> {
    await this.db.use(target);
  }

  async execute(statement: string, bindings?: Record<string, unknown>): Promise<unknown[]> {
    return this.db.query<unknown[]>(statement, bindings);
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}

/**
 * Default connector used outside tests
 */
export const connectSurreal: DatabaseConnector = (address) => SurrealDatabase.connect(address);

/**
 * Connect, sign in as root and select the configured namespace/database
 */
export async function connectOperator(
  config: DatabaseConfig,
  connector: DatabaseConnector = connectSurreal
): Promise<DatabaseClient> {
  const db = await connector(config.host);
  try {
    await db.signin({ kind: 'root', username: config.username, password: config.password });
  } catch (error) {
    await db.close();
    throw new ExecutionError('Operator signin failed', {
      code: ErrorCodes.EXEC_AUTH_FAILED,
      cause: error,
      suggestion: 'Check DATABASE_USER and DATABASE_PASSWORD.',
    });
  }
  try {
    await db.use({ namespace: config.namespace, database: config.database });
  } catch (error) {
    await db.close();
    throw new ExecutionError(
      `Failed switching to ns=${config.namespace} db=${config.database}`,
      { cause: error }
    );
  }
  return db;
}
