/**
 * Setup & Seed Collaborators
 *
 * @module packages/core/tracking/bootstrap
 */

import { promises as fs } from 'node:fs';
import { runQuery } from '../database/query.js';
import type { DatabaseClient } from '../database/types.js';
import { ConfigError, ErrorCodes, StateIoError } from '../errors.js';
import type { ProjectPaths } from '../config.js';
import { MIGRATION_TABLE, SYNC_META_TABLE, SYNC_TABLE } from './SurrealTrackingStores.js';

/**
 * Tracking tables owned by the tool. Every definition uses OVERWRITE so the
 * script can run on every invocation.
 */
export const BOOTSTRAP_SQL = `
DEFINE TABLE OVERWRITE ${MIGRATION_TABLE} SCHEMAFULL
	PERMISSIONS NONE;
DEFINE FIELD OVERWRITE file ON ${MIGRATION_TABLE}
	TYPE string;
DEFINE FIELD OVERWRITE applied_at ON ${MIGRATION_TABLE}
	TYPE datetime
	DEFAULT time::now();
DEFINE INDEX OVERWRITE by_file ON ${MIGRATION_TABLE}
	FIELDS file;

DEFINE TABLE OVERWRITE ${SYNC_TABLE} SCHEMAFULL
	PERMISSIONS NONE;
DEFINE FIELD OVERWRITE path ON ${SYNC_TABLE}
	TYPE string;
DEFINE FIELD OVERWRITE hash ON ${SYNC_TABLE}
	TYPE string;
DEFINE FIELD OVERWRITE synced_at ON ${SYNC_TABLE}
	TYPE datetime
	DEFAULT time::now();
DEFINE INDEX OVERWRITE by_path ON ${SYNC_TABLE}
	FIELDS path
	UNIQUE;

DEFINE TABLE OVERWRITE ${SYNC_META_TABLE} SCHEMAFULL
	PERMISSIONS NONE;
DEFINE FIELD OVERWRITE key ON ${SYNC_META_TABLE}
	TYPE string;
DEFINE FIELD OVERWRITE value ON ${SYNC_META_TABLE}
	TYPE any;
DEFINE FIELD OVERWRITE updated_at ON ${SYNC_META_TABLE}
	TYPE datetime
	DEFAULT time::now();
DEFINE INDEX OVERWRITE by_key ON ${SYNC_META_TABLE}
	FIELDS key
	UNIQUE;
`;

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw new StateIoError('reading', filePath, { cause: error });
  }
}

/**
 * Define the tracking tables, then run the project's `setup.surql` if present
 */
export async function ensureBootstrapSchema(
  db: DatabaseClient,
  paths: Pick<ProjectPaths, 'setupFile'>
): Promise<void> {
  await runQuery(db, BOOTSTRAP_SQL, 'Failed defining tracking tables');

  const projectSetup = await readOptional(paths.setupFile);
  if (projectSetup !== null && projectSetup.trim() !== '') {
    await runQuery(db, projectSetup, `Failed executing ${paths.setupFile}`);
  }
}

/**
 * Execute the project's seed script
 *
 * @throws ConfigError when the seed file does not exist
 */
export async function applySeed(
  db: DatabaseClient,
  paths: Pick<ProjectPaths, 'seedFile'>
): Promise<void> {
  const seed = await readOptional(paths.seedFile);
  if (seed === null) {
    throw new ConfigError(`Seed file not found: ${paths.seedFile}`, {
      code: ErrorCodes.CONFIG_NOT_FOUND,
      suggestion: 'Create database/seed.surql or run without seeding.',
    });
  }
  await runQuery(db, seed, `Failed executing ${paths.seedFile}`);
}
