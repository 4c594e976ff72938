/**
 * Command Context
 *
 * Resolves the project layout, database settings and root logger once per
 * invocation, and scopes operator connections to a callback.
 *
 * @module packages/cli/commands/context
 */

import {
  LOG_LEVEL_ENV,
  connectOperator,
  connectSurreal,
  createLogger,
  loadDatabaseConfig,
  resolveProjectPaths,
  type DatabaseClient,
  type DatabaseConfig,
  type DatabaseConnector,
  type Logger,
  type ProjectPaths,
} from '@quarry/core';

/**
 * Options every command accepts through the root program
 */
export interface GlobalOptions {
  /** Project root (default: working directory) */
  root?: string;
}

export interface CommandContext {
  paths: ProjectPaths;
  database: DatabaseConfig;
  connector: DatabaseConnector;
  logger: Logger;
  env: NodeJS.ProcessEnv;
}

export function createContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CommandContext {
  return {
    paths: resolveProjectPaths(options.root),
    database: loadDatabaseConfig(env),
    connector: connectSurreal,
    logger: createLogger(env[LOG_LEVEL_ENV] ?? 'info'),
    env,
  };
}

/**
 * Open an operator connection for the duration of `fn`
 */
export async function withOperator<T>(
  context: CommandContext,
  fn: (db: DatabaseClient) => Promise<T>
): Promise<T> {
  const db = await connectOperator(context.database, context.connector);
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}
