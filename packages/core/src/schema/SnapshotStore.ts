/**
 * Snapshot Store
 *
 * Persists the schema-file snapshot and the entity catalog snapshot as
 * versioned JSON documents under the project's state directory.
 *
 * @module packages/core/schema/SnapshotStore
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ErrorCodes, StateIoError } from '../errors.js';
import type { ProjectPaths } from '../config.js';
import { isEntityKind, normalizeEntities, type EntityKey } from './catalog.js';
import {
  emptyCatalogSnapshot,
  emptySchemaSnapshot,
  type CatalogSnapshot,
  type SchemaSnapshot,
} from './snapshot.js';

// ============================================================================
// Schemas
// ============================================================================

const SchemaSnapshotSchema = z.object({
  version: z.number().int(),
  files: z.array(z.object({ path: z.string(), hash: z.string() })),
});

const CatalogSnapshotSchema = z.object({
  version: z.number().int(),
  entities: z.array(
    z.object({
      kind: z.string(),
      scope: z.string().nullish(),
      name: z.string(),
    })
  ),
});

// ============================================================================
// File Helpers
// ============================================================================

async function readJson(filePath: string): Promise<unknown | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw new StateIoError('reading', filePath, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new StateIoError('parsing', filePath, {
      code: ErrorCodes.STATE_CORRUPT,
      cause: error,
    });
  }
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  try {
    await fs.mkdir(dirname(filePath), { recursive: true });
  } catch (error) {
    throw new StateIoError('creating directory for', filePath, {
      code: ErrorCodes.STATE_WRITE_ERROR,
      cause: error,
    });
  }

  // Write to temp, then rename
  const tempPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tempPath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    throw new StateIoError('writing', filePath, {
      code: ErrorCodes.STATE_WRITE_ERROR,
      cause: error,
    });
  }
}

// ============================================================================
// SnapshotStore
// ============================================================================

/**
 * Where the last known schema and catalog snapshots live
 */
export interface SnapshotRepository {
  loadSchema(): Promise<SchemaSnapshot>;
  saveSchema(snapshot: SchemaSnapshot): Promise<void>;
  loadCatalog(): Promise<CatalogSnapshot>;
  saveCatalog(snapshot: CatalogSnapshot): Promise<void>;
}

/**
 * Local snapshot persistence. A missing file is an empty snapshot.
 */
export class SnapshotStore implements SnapshotRepository {
  private readonly schemaPath: string;
  private readonly catalogPath: string;

  constructor(paths: Pick<ProjectPaths, 'schemaSnapshot' | 'catalogSnapshot'>) {
    this.schemaPath = paths.schemaSnapshot;
    this.catalogPath = paths.catalogSnapshot;
  }

  async loadSchema(): Promise<SchemaSnapshot> {
    const raw = await readJson(this.schemaPath);
    if (raw === null) {
      return emptySchemaSnapshot();
    }
    const parsed = SchemaSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateIoError('validating', this.schemaPath, {
        code: ErrorCodes.STATE_CORRUPT,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async saveSchema(snapshot: SchemaSnapshot): Promise<void> {
    await writeJson(this.schemaPath, snapshot);
  }

  async loadCatalog(): Promise<CatalogSnapshot> {
    const raw = await readJson(this.catalogPath);
    if (raw === null) {
      return emptyCatalogSnapshot();
    }
    const parsed = CatalogSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateIoError('validating', this.catalogPath, {
        code: ErrorCodes.STATE_CORRUPT,
        cause: parsed.error,
      });
    }
    // Kinds this build does not recognize are dropped; a null scope means none.
    const entities: EntityKey[] = [];
    for (const { kind, scope, name } of parsed.data.entities) {
      if (!isEntityKind(kind)) {
        continue;
      }
      entities.push(scope === null || scope === undefined ? { kind, name } : { kind, scope, name });
    }
    return {
      version: parsed.data.version,
      entities: normalizeEntities(entities),
    };
  }

  async saveCatalog(snapshot: CatalogSnapshot): Promise<void> {
    await writeJson(this.catalogPath, {
      version: snapshot.version,
      entities: normalizeEntities(snapshot.entities),
    });
  }
}

/**
 * Snapshots held in memory. Used for throwaway databases (test suites), whose
 * history must not leak into the project's snapshot files.
 */
export class MemorySnapshotStore implements SnapshotRepository {
  private schema: SchemaSnapshot = emptySchemaSnapshot();
  private catalog: CatalogSnapshot = emptyCatalogSnapshot();

  async loadSchema(): Promise<SchemaSnapshot> {
    return this.schema;
  }

  async saveSchema(snapshot: SchemaSnapshot): Promise<void> {
    this.schema = snapshot;
  }

  async loadCatalog(): Promise<CatalogSnapshot> {
    return this.catalog;
  }

  async saveCatalog(snapshot: CatalogSnapshot): Promise<void> {
    this.catalog = { version: snapshot.version, entities: normalizeEntities(snapshot.entities) };
  }
}
