/**
 * Configuration
 *
 * Database connection settings from the environment (validated with zod),
 * the project directory layout, and the tool-owned environment flags.
 *
 * @module packages/core/config
 */

import path from 'node:path';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from './errors.js';
import type { DatabaseConfig } from './database/types.js';

// ============================================================================
// Environment
// ============================================================================

const DatabaseEnvSchema = z.object({
  DATABASE_HOST: z.string().min(1).default('ws://localhost:8000'),
  DATABASE_NAMESPACE: z.string().min(1).default('db'),
  DATABASE_NAME: z.string().min(1).default('test'),
  DATABASE_USER: z.string().min(1).default('root'),
  DATABASE_PASSWORD: z.string().min(1).default('root'),
});

/** Overrides the server-stored shared-database flag */
export const SHARED_DB_ENV = 'QUARRY_SHARED_DB';
/** Provenance string written to sync metadata */
export const OWNER_ENV = 'QUARRY_OWNER';
/** Base URL for api_request cases */
export const TEST_BASE_URL_ENV = 'QUARRY_TEST_BASE_URL';
/** Default request timeout for api_request cases */
export const TEST_TIMEOUT_ENV = 'QUARRY_TEST_TIMEOUT_MS';
/** Log level for the CLI's root logger */
export const LOG_LEVEL_ENV = 'QUARRY_LOG_LEVEL';

/**
 * Read the operator's database settings from the environment.
 * Empty values are treated as unset.
 *
 * @throws ConfigError if a value fails validation
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = DatabaseEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError('Invalid database environment', {
      code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return {
    host: parsed.data.DATABASE_HOST,
    namespace: parsed.data.DATABASE_NAMESPACE,
    database: parsed.data.DATABASE_NAME,
    username: parsed.data.DATABASE_USER,
    password: parsed.data.DATABASE_PASSWORD,
  };
}

/**
 * Parse a boolean-ish environment value. Unknown spellings yield undefined.
 */
export function parseBool(raw: string): boolean | undefined {
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'y':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'n':
    case 'off':
      return false;
    default:
      return undefined;
  }
}

// ============================================================================
// Project Layout
// ============================================================================

/**
 * Absolute locations of every file and directory the tool reads or writes
 */
export interface ProjectPaths {
  /** Project root; stored paths are relative to it */
  root: string;
  schemaDir: string;
  migrationsDir: string;
  stateDir: string;
  schemaSnapshot: string;
  catalogSnapshot: string;
  setupFile: string;
  seedFile: string;
  testsDir: string;
  testConfig: string;
  suitesDir: string;
}

/**
 * Resolve the standard `database/` layout under a project root
 */
export function resolveProjectPaths(root: string = process.cwd()): ProjectPaths {
  const base = path.resolve(root);
  const database = path.join(base, 'database');
  const stateDir = path.join(database, '.quarry');
  const testsDir = path.join(database, 'tests');
  return {
    root: base,
    schemaDir: path.join(database, 'schema'),
    migrationsDir: path.join(database, 'migrations'),
    stateDir,
    schemaSnapshot: path.join(stateDir, 'schema_snapshot.json'),
    catalogSnapshot: path.join(stateDir, 'catalog_snapshot.json'),
    setupFile: path.join(database, 'setup.surql'),
    seedFile: path.join(database, 'seed.surql'),
    testsDir,
    testConfig: path.join(testsDir, 'config.yaml'),
    suitesDir: path.join(testsDir, 'suites'),
  };
}

/**
 * Path relative to the project root with forward slashes
 */
export function toProjectPath(paths: ProjectPaths, absolute: string): string {
  const relative = path.relative(paths.root, absolute);
  const chosen = relative.startsWith('..') || path.isAbsolute(relative) ? absolute : relative;
  return chosen.split(path.sep).join('/');
}
