/**
 * Snapshot & Diff Engine
 *
 * Content-hashed schema file discovery, file and catalog snapshots, the
 * file-level diff, stale entity detection and REMOVE statement rendering.
 *
 * @module packages/core/schema/snapshot
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { toProjectPath, type ProjectPaths } from '../config.js';
import { CapabilityError, MissingScopeError, StateIoError } from '../errors.js';
import {
  entityId,
  extractEntities,
  normalizeEntities,
  type EntityKey,
} from './catalog.js';

/** Current on-disk snapshot format */
export const SNAPSHOT_VERSION = 1;

/** Schema file extension */
export const SCHEMA_EXTENSION = '.surql';

// ============================================================================
// Types
// ============================================================================

/**
 * One schema file as read from disk
 */
export interface SchemaFile {
  /** Project-relative, forward-slash path */
  path: string;
  sql: string;
  /** SHA-256 of the raw file bytes, hex encoded */
  hash: string;
}

export interface SchemaSnapshotEntry {
  path: string;
  hash: string;
}

export interface SchemaSnapshot {
  version: number;
  /** Sorted by path */
  files: SchemaSnapshotEntry[];
}

export interface CatalogSnapshot {
  version: number;
  /** Sorted by the entity key total order, no duplicates */
  entities: EntityKey[];
}

export interface FileDiff {
  added: string[];
  modified: string[];
  removed: string[];
}

// ============================================================================
// Hashing & Discovery
// ============================================================================

/**
 * Hex-encoded SHA-256
 */
export function sha256Hex(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

async function walk(dir: string): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw new StateIoError('reading directory', dir, { cause: error });
  }

  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * List every `.surql` file under a directory (recursively), sorted by
 * absolute path. A missing directory yields an empty list.
 */
export async function listSchemaFiles(dir: string): Promise<string[]> {
  const files = await walk(dir);
  return files.filter((file) => path.extname(file) === SCHEMA_EXTENSION).sort();
}

/**
 * Read one schema file and hash its raw bytes
 */
export async function readSchemaFile(paths: ProjectPaths, absolute: string): Promise<SchemaFile> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(absolute);
  } catch (error) {
    throw new StateIoError('reading', absolute, { cause: error });
  }
  return {
    path: toProjectPath(paths, absolute),
    sql: bytes.toString('utf-8'),
    hash: sha256Hex(bytes),
  };
}

/**
 * Read every schema file under a directory
 */
export async function collectSchemaFiles(
  paths: ProjectPaths,
  dir: string = paths.schemaDir
): Promise<SchemaFile[]> {
  const files: SchemaFile[] = [];
  for (const absolute of await listSchemaFiles(dir)) {
    files.push(await readSchemaFile(paths, absolute));
  }
  return files;
}

// ============================================================================
// Snapshots
// ============================================================================

function byPath(a: SchemaSnapshotEntry, b: SchemaSnapshotEntry): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/**
 * Build a file snapshot, sorted by path regardless of input order
 */
export function snapshotFromFiles(files: readonly SchemaFile[]): SchemaSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    files: files.map((file) => ({ path: file.path, hash: file.hash })).sort(byPath),
  };
}

/**
 * Build the entity catalog from the current schema files
 */
export function buildCatalogSnapshot(files: readonly SchemaFile[]): CatalogSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    entities: normalizeEntities(files.flatMap((file) => extractEntities(file.sql))),
  };
}

export function emptySchemaSnapshot(): SchemaSnapshot {
  return { version: SNAPSHOT_VERSION, files: [] };
}

export function emptyCatalogSnapshot(): CatalogSnapshot {
  return { version: SNAPSHOT_VERSION, entities: [] };
}

// ============================================================================
// Diff
// ============================================================================

function toSortedMap(snapshot: SchemaSnapshot): Map<string, string> {
  const entries = [...snapshot.files].sort(byPath);
  return new Map(entries.map((entry) => [entry.path, entry.hash]));
}

/**
 * File-level diff between two snapshots. Lists follow path order.
 */
export function diffSchema(previous: SchemaSnapshot, current: SchemaSnapshot): FileDiff {
  const oldMap = toSortedMap(previous);
  const newMap = toSortedMap(current);

  const diff: FileDiff = { added: [], modified: [], removed: [] };

  for (const [filePath, hash] of newMap) {
    const oldHash = oldMap.get(filePath);
    if (oldHash === undefined) {
      diff.added.push(filePath);
    } else if (oldHash !== hash) {
      diff.modified.push(filePath);
    }
  }

  for (const filePath of oldMap.keys()) {
    if (!newMap.has(filePath)) {
      diff.removed.push(filePath);
    }
  }

  return diff;
}

/**
 * Entities present in the previous catalog but absent from the current one
 */
export function removedEntities(previous: CatalogSnapshot, current: CatalogSnapshot): EntityKey[] {
  const currentIds = new Set(current.entities.map(entityId));
  return normalizeEntities(previous.entities.filter((entity) => !currentIds.has(entityId(entity))));
}

// ============================================================================
// REMOVE Rendering
// ============================================================================

function requireScope(entity: EntityKey, object: string): string {
  if (entity.scope === undefined) {
    throw new MissingScopeError(object, entity.name);
  }
  return entity.scope;
}

function optionalScope(entity: EntityKey): string {
  return entity.scope === undefined ? '' : ` ON ${entity.scope}`;
}

/**
 * Render one REMOVE statement per stale entity
 *
 * @param apiRemovalSupported - whether the target server accepts `REMOVE API`
 * @throws CapabilityError for an api entity when removal is unsupported
 * @throws MissingScopeError for a field/event/index without its table
 */
export function renderRemoveSql(
  entities: readonly EntityKey[],
  apiRemovalSupported: boolean
): string[] {
  const out: string[] = [];
  for (const entity of entities) {
    switch (entity.kind) {
      case 'table':
        out.push(`REMOVE TABLE ${entity.name};`);
        break;
      case 'field':
        out.push(`REMOVE FIELD ${entity.name} ON ${requireScope(entity, 'FIELD')};`);
        break;
      case 'event':
        out.push(`REMOVE EVENT ${entity.name} ON ${requireScope(entity, 'EVENT')};`);
        break;
      case 'index':
        out.push(`REMOVE INDEX ${entity.name} ON ${requireScope(entity, 'INDEX')};`);
        break;
      case 'function':
        out.push(`REMOVE FUNCTION ${entity.name};`);
        break;
      case 'param':
        out.push(`REMOVE PARAM ${entity.name};`);
        break;
      case 'analyzer':
        out.push(`REMOVE ANALYZER ${entity.name};`);
        break;
      case 'access':
        out.push(`REMOVE ACCESS ${entity.name}${optionalScope(entity)};`);
        break;
      case 'user':
        out.push(`REMOVE USER ${entity.name}${optionalScope(entity)};`);
        break;
      case 'api':
        if (!apiRemovalSupported) {
          throw new CapabilityError(
            'REMOVE API',
            `API removal requested for '${entity.name}' but the server does not support REMOVE API`,
            'Remove the API with a manual migration, or upgrade the server.'
          );
        }
        out.push(`REMOVE API ${entity.name};`);
        break;
      default:
        // Kinds added to the catalog later are skipped rather than rejected.
        break;
    }
  }
  return out;
}
