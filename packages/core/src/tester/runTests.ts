/**
 * Test Run Orchestration
 *
 * Load specs, apply filters, resolve the API base URL and timeout, run the
 * suites and write the JSON report when asked.
 *
 * @module packages/core/tester/runTests
 */

import type { Logger } from 'pino';

import { TEST_BASE_URL_ENV, TEST_TIMEOUT_ENV, type ProjectPaths } from '../config.js';
import type { DatabaseConfig, DatabaseConnector } from '../database/types.js';
import { ConfigError, ErrorCodes } from '../errors.js';
import type { HttpClient } from './api.js';
import { applyFilters } from './filters.js';
import { loadSpecs } from './loader.js';
import { writeJsonReport } from './report.js';
import { TestRunner, defaultSuitePreparation, type RunOutcome, type SuitePreparation } from './runner.js';
import type { GlobalTestConfig } from './schemas.js';
import type { TestRunOptions } from './types.js';

/** Request timeout when nothing else sets one */
export const DEFAULT_TEST_TIMEOUT_MS = 10_000;

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Flag, then config default, then QUARRY_TEST_BASE_URL, then the database
 * host with ws(s) rewritten to http(s)
 */
export function resolveBaseUrl(
  flag: string | undefined,
  global: GlobalTestConfig,
  env: NodeJS.ProcessEnv,
  databaseHost: string | undefined
): string | undefined {
  const chosen =
    nonBlank(flag) ?? nonBlank(global.defaults.baseUrl) ?? nonBlank(env[TEST_BASE_URL_ENV]) ?? nonBlank(databaseHost);
  if (chosen === undefined) {
    return undefined;
  }
  if (chosen.startsWith('ws://')) {
    return `http://${chosen.slice('ws://'.length)}`;
  }
  if (chosen.startsWith('wss://')) {
    return `https://${chosen.slice('wss://'.length)}`;
  }
  return chosen;
}

/**
 * Flag, then config default, then QUARRY_TEST_TIMEOUT_MS, then 10s.
 * Unparseable or non-positive env values are ignored.
 */
export function resolveTimeoutMs(
  flag: number | undefined,
  global: GlobalTestConfig,
  env: NodeJS.ProcessEnv
): number {
  if (flag !== undefined && flag > 0) {
    return flag;
  }
  if (global.defaults.timeoutMs !== undefined) {
    return global.defaults.timeoutMs;
  }
  const raw = nonBlank(env[TEST_TIMEOUT_ENV]);
  if (raw !== undefined && /^\d+$/.test(raw)) {
    const parsed = Number.parseInt(raw, 10);
    if (parsed > 0) {
      return parsed;
    }
  }
  return DEFAULT_TEST_TIMEOUT_MS;
}

export interface RunTestsConfig {
  paths: ProjectPaths;
  database: DatabaseConfig;
  connector: DatabaseConnector;
  http: HttpClient;
  logger: Logger;
  options: TestRunOptions;
  env?: NodeJS.ProcessEnv;
  /** Per-suite preparation (default: bootstrap, sync and seed from the project) */
  preparation?: SuitePreparation;
  runId?: string;
}

/**
 * Load, filter, run and (optionally) write the JSON report
 *
 * @throws ConfigError when loading fails or no suite survives the filters
 */
export async function runTests(config: RunTestsConfig): Promise<RunOutcome> {
  const env = config.env ?? process.env;
  const specs = await loadSpecs(config.paths);

  const suites = applyFilters(specs.suites, config.options);
  if (suites.length === 0) {
    throw new ConfigError('No suites matched the selected filters', {
      code: ErrorCodes.CONFIG_NO_SUITES,
      suggestion: 'Check --suite, --case and --tag.',
    });
  }

  const runner = new TestRunner({
    database: config.database,
    connector: config.connector,
    http: config.http,
    logger: config.logger,
    global: specs.global,
    globalBaseDir: specs.globalBaseDir,
    baseUrl: resolveBaseUrl(config.options.baseUrl, specs.global, env, config.database.host),
    timeoutMs: resolveTimeoutMs(config.options.timeoutMs, specs.global, env),
    options: {
      failFast: config.options.failFast,
      parallel: config.options.parallel,
      noSetup: config.options.noSetup,
      noSync: config.options.noSync,
      noSeed: config.options.noSeed,
      keepDb: config.options.keepDb,
    },
    preparation: config.preparation ?? defaultSuitePreparation(config.paths, config.logger),
    env,
    runId: config.runId,
  });

  const outcome = await runner.run(suites);
  if (config.options.jsonOut !== undefined) {
    await writeJsonReport(config.options.jsonOut, outcome.report);
  }
  return outcome;
}
