/**
 * Server capability probes
 *
 * @module packages/core/database/capabilities
 */

import { describeError } from '../errors.js';
import type { DatabaseClient } from './types.js';

const PROBE_API = '__quarry_capability_probe__';

const UNSUPPORTED_MARKERS = ['unexpected', 'parse', 'not implemented', 'invalid statement'];

/**
 * Whether the server understands `REMOVE API`. A "does not exist" style
 * error still proves the statement parsed.
 */
export async function supportsRemoveApi(db: DatabaseClient): Promise<boolean> {
  try {
    await db.execute(`REMOVE API ${PROBE_API};`);
    return true;
  } catch (error) {
    const message = describeError(error).toLowerCase();
    return !UNSUPPORTED_MARKERS.some((marker) => message.includes(marker));
  }
}
