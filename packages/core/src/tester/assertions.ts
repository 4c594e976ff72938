/**
 * Assertion Engine
 *
 * Path lookup plus exists/equals/contains/regex checks over JSON values and
 * response headers. A failed check is returned as a failed AssertionReport;
 * only a malformed regex throws.
 *
 * @module packages/core/tester/assertions
 */

import { isDeepStrictEqual } from 'node:util';

import { isRecord } from '../database/query.js';
import { ConfigError, ErrorCodes } from '../errors.js';
import type { HeaderAssertionSpec, JsonAssertionSpec } from './schemas.js';
import type { AssertionReport } from './types.js';

// ============================================================================
// Values
// ============================================================================

function bigintToJson(value: bigint): number | string {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

/**
 * Normalize a database or HTTP value to plain JSON (dates and record ids
 * become their JSON text form). A bigint becomes a number when it is a safe
 * integer and its decimal string otherwise.
 */
export function toJsonValue(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  const text = JSON.stringify(value, (_key, inner: unknown) =>
    typeof inner === 'bigint' ? bigintToJson(inner) : inner
  );
  return text === undefined ? null : JSON.parse(text);
}

/**
 * Text form used by contains/regex: strings render bare, everything else as
 * compact JSON
 */
export function valueToText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return render(value);
}

function render(value: unknown): string {
  return JSON.stringify(toJsonValue(value));
}

/**
 * Look up a dot-separated path. Empty segments are ignored, so `''` returns
 * the whole value. A numeric segment only indexes an array, never an object
 * key; anything else is an object key. Returns `{ found: false }` rather than
 * throwing.
 */
export function lookupPath(value: unknown, path: string): { found: true; value: unknown } | { found: false } {
  let current: unknown = value;
  for (const segment of path.split('.')) {
    if (segment === '') {
      continue;
    }
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) {
        return { found: false };
      }
      const index = Number(segment);
      if (index >= current.length) {
        return { found: false };
      }
      current = current[index];
    } else if (isRecord(current)) {
      if (/^\d+$/.test(segment) || !Object.prototype.hasOwnProperty.call(current, segment)) {
        return { found: false };
      }
      current = current[segment];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

function compileRegex(pattern: string, subject: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(`Invalid regex '${pattern}' for ${subject}`, {
      code: ErrorCodes.CONFIG_INVALID_REGEX,
      cause: error,
    });
  }
}

// ============================================================================
// JSON Assertions
// ============================================================================

/**
 * Evaluate one JSON assertion. `index` is zero-based; the report name is
 * one-based.
 *
 * @throws ConfigError when `regex` is not a valid pattern
 */
export function assertJsonValue(
  actual: unknown,
  assertion: JsonAssertionSpec,
  index: number
): AssertionReport {
  const name = `json_assertion_${index + 1}`;
  const subject = `path '${assertion.path}'`;
  const lookup = lookupPath(actual, assertion.path);

  if (assertion.exists !== undefined && assertion.exists !== lookup.found) {
    return {
      name,
      passed: false,
      message: `${subject} existence mismatch: expected ${assertion.exists} got ${lookup.found}`,
    };
  }

  if (!lookup.found) {
    // Reaching here with exists === false is the only passing case.
    return { name, passed: assertion.exists === false, message: `${subject} not found` };
  }

  const value = lookup.value;

  if (assertion.equals !== undefined && !isDeepStrictEqual(toJsonValue(value), toJsonValue(assertion.equals))) {
    return {
      name,
      passed: false,
      message: `${subject} expected ${render(assertion.equals)}, got ${render(value)}`,
    };
  }

  if (assertion.contains !== undefined) {
    const text = valueToText(value);
    if (!text.includes(assertion.contains)) {
      return {
        name,
        passed: false,
        message: `${subject} missing substring '${assertion.contains}' in '${text}'`,
      };
    }
  }

  if (assertion.regex !== undefined) {
    const re = compileRegex(assertion.regex, subject);
    const text = valueToText(value);
    if (!re.test(text)) {
      return {
        name,
        passed: false,
        message: `${subject} regex '${assertion.regex}' did not match '${text}'`,
      };
    }
  }

  return { name, passed: true, message: `${subject} assertion passed` };
}

// ============================================================================
// Header Assertions
// ============================================================================

/**
 * Case-insensitive header lookup
 */
export function findHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Evaluate one header assertion. Same contract as assertJsonValue.
 *
 * @throws ConfigError when `regex` is not a valid pattern
 */
export function assertHeaderValue(
  headers: Record<string, string>,
  assertion: HeaderAssertionSpec,
  index: number
): AssertionReport {
  const name = `header_assertion_${index + 1}`;
  const subject = `header '${assertion.name}'`;
  const value = findHeader(headers, assertion.name);
  const exists = value !== undefined;

  if (assertion.exists !== undefined && assertion.exists !== exists) {
    return {
      name,
      passed: false,
      message: `${subject} existence mismatch: expected ${assertion.exists} got ${exists}`,
    };
  }

  if (value === undefined) {
    return { name, passed: assertion.exists === false, message: `${subject} not found` };
  }

  if (assertion.equals !== undefined && value !== assertion.equals) {
    return {
      name,
      passed: false,
      message: `${subject} expected '${assertion.equals}', got '${value}'`,
    };
  }

  if (assertion.contains !== undefined && !value.includes(assertion.contains)) {
    return {
      name,
      passed: false,
      message: `${subject} missing substring '${assertion.contains}' in '${value}'`,
    };
  }

  if (assertion.regex !== undefined) {
    const re = compileRegex(assertion.regex, subject);
    if (!re.test(value)) {
      return {
        name,
        passed: false,
        message: `${subject} regex '${assertion.regex}' did not match '${value}'`,
      };
    }
  }

  return { name, passed: true, message: `${subject} assertion passed` };
}
