/**
 * Catalog Extractor
 *
 * Recognizes `DEFINE <kind> ...` statements and turns them into structural
 * entity keys. Heuristic inventory only: nothing here validates a schema.
 *
 * @module packages/core/schema/catalog
 */

import { splitStatements, stripLineComments, tokenize } from './statements.js';

// ============================================================================
// Types
// ============================================================================

export const ENTITY_KINDS = [
  'table',
  'field',
  'event',
  'index',
  'function',
  'param',
  'access',
  'analyzer',
  'user',
  'api',
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/**
 * One structural schema object. `scope` is the owning table for
 * field/event/index and the optional ON target for access/user.
 */
export interface EntityKey {
  kind: EntityKind;
  scope?: string;
  name: string;
}

export function isEntityKind(value: string): value is EntityKind {
  return (ENTITY_KINDS as readonly string[]).includes(value);
}

// ============================================================================
// Ordering
// ============================================================================

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over entity keys: kind, then scope (absent first), then name
 */
export function compareEntityKeys(a: EntityKey, b: EntityKey): number {
  const byKind = compareText(a.kind, b.kind);
  if (byKind !== 0) return byKind;

  if (a.scope === undefined && b.scope !== undefined) return -1;
  if (a.scope !== undefined && b.scope === undefined) return 1;
  if (a.scope !== undefined && b.scope !== undefined) {
    const byScope = compareText(a.scope, b.scope);
    if (byScope !== 0) return byScope;
  }

  return compareText(a.name, b.name);
}

/**
 * Stable identity string used for set semantics
 */
export function entityId(entity: EntityKey): string {
  return `${entity.kind}\u0000${entity.scope ?? ''}\u0000${entity.scope === undefined ? '0' : '1'}\u0000${entity.name}`;
}

/**
 * Deduplicate and sort entity keys
 */
export function normalizeEntities(entities: Iterable<EntityKey>): EntityKey[] {
  const byId = new Map<string, EntityKey>();
  for (const entity of entities) {
    const key: EntityKey =
      entity.scope === undefined
        ? { kind: entity.kind, name: entity.name }
        : { kind: entity.kind, scope: entity.scope, name: entity.name };
    byId.set(entityId(key), key);
  }
  return [...byId.values()].sort(compareEntityKeys);
}

// ============================================================================
// Extraction
// ============================================================================

const MODIFIERS = new Set(['OVERWRITE', 'IF', 'NOT', 'EXISTS']);

function eq(token: string, expected: string): boolean {
  return token.toUpperCase() === expected;
}

/**
 * Strip surrounding `,;(){}` and cut at the first `(`
 */
export function cleanIdentifier(token: string): string {
  const trimmed = token.replace(/^[,;(){}]+/, '').replace(/[,;(){}]+$/, '');
  const paren = trimmed.indexOf('(');
  return paren === -1 ? trimmed : trimmed.slice(0, paren);
}

function findToken(tokens: string[], start: number, target: string): number {
  for (let i = start; i < tokens.length; i++) {
    if (eq(tokens[i] ?? '', target)) return i;
  }
  return -1;
}

/**
 * Parse one statement. Returns undefined for anything that is not a
 * recognized DEFINE.
 */
export function parseDefineEntity(statement: string): EntityKey | undefined {
  const tokens = tokenize(statement);
  if (tokens.length < 3 || !eq(tokens[0] ?? '', 'DEFINE')) {
    return undefined;
  }

  const kind = (tokens[1] ?? '').toLowerCase();
  if (!isEntityKind(kind)) {
    return undefined;
  }

  let idx = 2;
  while (idx < tokens.length && MODIFIERS.has((tokens[idx] ?? '').toUpperCase())) {
    idx += 1;
  }
  const nameToken = tokens[idx];
  if (nameToken === undefined) {
    return undefined;
  }
  const name = cleanIdentifier(nameToken);

  switch (kind) {
    case 'table':
    case 'function':
    case 'param':
    case 'analyzer':
    case 'api':
      return { kind, name };

    case 'field':
    case 'event':
    case 'index': {
      const on = findToken(tokens, idx + 1, 'ON');
      if (on === -1) return undefined;
      let scopeIdx = on + 1;
      if (eq(tokens[scopeIdx] ?? '', 'TABLE')) {
        scopeIdx += 1;
      }
      const scopeToken = tokens[scopeIdx];
      if (scopeToken === undefined) return undefined;
      return { kind, scope: cleanIdentifier(scopeToken), name };
    }

    case 'access':
    case 'user': {
      const on = findToken(tokens, idx + 1, 'ON');
      const scopeToken = on === -1 ? undefined : tokens[on + 1];
      return scopeToken === undefined
        ? { kind, name }
        : { kind, scope: cleanIdentifier(scopeToken), name };
    }
  }
}

/**
 * Extract every recognized entity from raw schema text
 */
export function extractEntities(sql: string): EntityKey[] {
  const found: EntityKey[] = [];
  for (const statement of splitStatements(stripLineComments(sql))) {
    const entity = parseDefineEntity(statement);
    if (entity) {
      found.push(entity);
    }
  }
  return found;
}
