/**
 * Query helpers shared by the engines
 *
 * @module packages/core/database/query
 */

import { ExecutionError } from '../errors.js';
import type { DatabaseClient } from './types.js';

/**
 * Execute statements, wrapping any failure with what was being attempted
 */
export async function runQuery(
  db: DatabaseClient,
  statement: string,
  context: string,
  bindings?: Record<string, unknown>
): Promise<unknown[]> {
  try {
    return await db.execute(statement, bindings);
  } catch (error) {
    throw new ExecutionError(context, { cause: error });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rows of one statement's result. A single object result counts as one row;
 * anything else as none.
 */
export function rowsOf(results: readonly unknown[], index: number): Record<string, unknown>[] {
  const result = results[index];
  if (Array.isArray(result)) {
    return result.filter(isRecord);
  }
  return isRecord(result) ? [result] : [];
}

/**
 * Render a datetime-ish column value as text
 */
export function timestampText(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value === undefined || value === null ? '' : String(value);
}
