/**
 * Test Command - quarry test
 *
 * Runs declarative suites from database/tests against isolated databases.
 *
 * @module packages/cli/commands/test
 */

import {
  FetchHttpClient,
  formatHumanReport,
  runTests,
  type HttpClient,
  type TestRunOptions,
} from '@quarry/core';
import type { CommandContext } from './context.js';
import { ExitCodes, createSpinner, printJson, type ExitCode } from './utils.js';

export interface TestCommandOptions {
  suite?: string;
  case?: string;
  tag: string[];
  failFast?: boolean;
  parallel?: number;
  jsonOut?: string;
  /** `--no-setup` sets this to false; likewise sync and seed */
  setup?: boolean;
  sync?: boolean;
  seed?: boolean;
  keepDb?: boolean;
  baseUrl?: string;
  timeoutMs?: number;
  json?: boolean;
}

/**
 * Translate command-line flags into runner options
 */
export function toRunOptions(options: TestCommandOptions): TestRunOptions {
  return {
    suitePattern: options.suite,
    casePattern: options.case,
    tags: options.tag,
    failFast: options.failFast ?? false,
    parallel: options.parallel ?? 1,
    jsonOut: options.jsonOut,
    noSetup: options.setup === false,
    noSync: options.sync === false,
    noSeed: options.seed === false,
    keepDb: options.keepDb ?? false,
    baseUrl: options.baseUrl,
    timeoutMs: options.timeoutMs,
  };
}

export async function testCommand(
  options: TestCommandOptions,
  context: CommandContext,
  http: HttpClient = new FetchHttpClient()
): Promise<ExitCode> {
  const json = options.json ?? false;
  const spinner = createSpinner('Running test suites...', json);

  const outcome = await runTests({
    paths: context.paths,
    database: context.database,
    connector: context.connector,
    http,
    logger: context.logger,
    options: toRunOptions(options),
    env: context.env,
  }).finally(() => spinner?.stop());

  // A fatal error still shows what settled; under --json the error document replaces the report.
  if (outcome.fatal !== undefined) {
    if (!json) {
      console.log(formatHumanReport(outcome.report));
    }
    throw outcome.fatal;
  }

  if (json) {
    printJson(outcome.report);
  } else {
    console.log(formatHumanReport(outcome.report));
  }
  return outcome.report.casesFailed > 0 ? ExitCodes.TEST_FAILURE : ExitCodes.SUCCESS;
}
