/**
 * Test Spec Loader
 *
 * Reads the optional global config and every suite document under the suites
 * directory, validating each against the strict schemas.
 *
 * @module packages/core/tester/loader
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import * as yaml from 'js-yaml';
import type { ZodType, ZodTypeDef } from 'zod';

import { toProjectPath, type ProjectPaths } from '../config.js';
import { ConfigError, ConfigValidationError, ErrorCodes, StateIoError } from '../errors.js';
import { GlobalTestConfigSchema, SuiteSpecSchema, type GlobalTestConfig, type SuiteSpec } from './schemas.js';
import type { LoadedSpecs, LoadedSuite } from './types.js';

const SUITE_EXTENSIONS = new Set(['.yaml', '.yml']);

/** Session name that always exists */
export const ROOT_ACTOR = 'root';

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse one YAML document and validate it
 *
 * @throws ConfigError on YAML syntax errors
 * @throws ConfigValidationError when the document does not match the schema
 */
export function parseDocument<T>(
  content: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  sourcePath: string
): T {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const line = error instanceof yaml.YAMLException && error.mark ? error.mark.line + 1 : undefined;
    throw new ConfigError(`YAML syntax error in ${sourcePath}`, {
      code: ErrorCodes.CONFIG_PARSE_ERROR,
      details: line === undefined ? undefined : [`line ${line}`],
      cause: error,
    });
  }

  // Empty document
  if (raw === null || raw === undefined) {
    raw = {};
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(
      sourcePath,
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}

export function parseGlobalConfig(content: string, sourcePath: string): GlobalTestConfig {
  return parseDocument(content, GlobalTestConfigSchema, sourcePath);
}

export function parseSuite(content: string, sourcePath: string): SuiteSpec {
  return parseDocument(content, SuiteSpecSchema, sourcePath);
}

// ============================================================================
// Reference Validation
// ============================================================================

/**
 * Every actor a suite's cases and fixtures (including global fixtures) name
 * must be root or defined globally or in the suite.
 */
export function validateActorReferences(global: GlobalTestConfig, suite: LoadedSuite): void {
  const known = new Set([ROOT_ACTOR, ...Object.keys(global.actors), ...Object.keys(suite.spec.actors)]);
  const problems: string[] = [];

  const check = (actor: string | undefined, where: string): void => {
    if (actor !== undefined && !known.has(actor)) {
      problems.push(`${where}: unknown actor '${actor}'`);
    }
  };

  global.fixtures.forEach((fixture, i) => check(fixture.actor, `global fixtures.${i}`));
  suite.spec.fixtures.forEach((fixture, i) => check(fixture.actor, `fixtures.${i}`));
  suite.spec.cases.forEach((testCase) => check(testCase.actor, `case '${testCase.name}'`));

  if (problems.length > 0) {
    throw new ConfigError(`Unknown actor reference in ${suite.displayPath}`, {
      code: ErrorCodes.CONFIG_UNKNOWN_REFERENCE,
      details: problems,
      suggestion: 'Define the actor under `actors` in the suite or in the global config.',
    });
  }
}

// ============================================================================
// Loading
// ============================================================================

async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw new StateIoError('reading', filePath, { cause: error });
  }
}

async function findSuiteFiles(dir: string): Promise<string[]> {
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
      files.push(...(await findSuiteFiles(full)));
    } else if (entry.isFile() && SUITE_EXTENSIONS.has(path.extname(entry.name))) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Load the global config (defaults when missing) and every suite
 *
 * @throws ConfigError when no suite documents exist
 */
export async function loadSpecs(paths: ProjectPaths): Promise<LoadedSpecs> {
  const globalContent = await readFileOrNull(paths.testConfig);
  const global =
    globalContent === null
      ? GlobalTestConfigSchema.parse({})
      : parseGlobalConfig(globalContent, toProjectPath(paths, paths.testConfig));

  const suites: LoadedSuite[] = [];
  for (const file of await findSuiteFiles(paths.suitesDir)) {
    const displayPath = toProjectPath(paths, file);
    const content = await readFileOrNull(file);
    if (content === null) {
      continue;
    }
    const suite: LoadedSuite = { path: file, displayPath, spec: parseSuite(content, displayPath) };
    validateActorReferences(global, suite);
    suites.push(suite);
  }

  if (suites.length === 0) {
    throw new ConfigError(`No suite files found in ${toProjectPath(paths, paths.suitesDir)}`, {
      code: ErrorCodes.CONFIG_NO_SUITES,
      suggestion: 'Add a *.yaml suite under database/tests/suites.',
    });
  }

  suites.sort((a, b) => (a.displayPath < b.displayPath ? -1 : a.displayPath > b.displayPath ? 1 : 0));

  return { global, globalBaseDir: paths.testsDir, suites };
}
