/**
 * Test Report Output
 *
 * Human-readable summary (failing detail only) and the JSON report file.
 *
 * @module packages/core/tester/report
 */

import chalk from 'chalk';
import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { ErrorCodes, StateIoError } from '../errors.js';
import type { CaseReport, RunReport, SuiteReport } from './types.js';

export const Symbols = {
  success: '✓',
  error: '✗',
  bullet: '-',
} as const;

function formatSuiteLine(suite: SuiteReport): string {
  const symbol = suite.casesFailed > 0 ? chalk.red(Symbols.error) : chalk.green(Symbols.success);
  const counts =
    `${chalk.green(`${suite.casesPassed} passed`)}, ` +
    (suite.casesFailed > 0 ? chalk.red(`${suite.casesFailed} failed`) : `${suite.casesFailed} failed`);
  return `${symbol} suite ${suite.suiteName} ${chalk.dim(`[${suite.namespace} / ${suite.database}]`)}: ${counts}`;
}

function formatFailedCase(testCase: CaseReport): string[] {
  const lines = [
    `  ${chalk.red('FAIL')} ${testCase.name} ${chalk.dim(`(${testCase.kind})`)}` +
      (testCase.message ? ` ${testCase.message}` : ''),
  ];
  for (const assertion of testCase.assertions) {
    if (!assertion.passed) {
      lines.push(`    ${Symbols.bullet} ${assertion.name}: ${assertion.message}`);
    }
  }
  return lines;
}

/**
 * Render totals, one line per suite, and detail for failing cases only
 */
export function formatHumanReport(report: RunReport): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Test run summary:'));
  lines.push(`  suites: ${report.suitesTotal} total, ${report.suitesFailed} failed`);
  lines.push(
    `  cases: ${report.casesTotal} total, ${report.casesPassed} passed, ${report.casesFailed} failed`
  );
  lines.push(chalk.dim(`  duration_ms: ${report.durationMs}`));

  for (const suite of report.suites) {
    lines.push('');
    lines.push(formatSuiteLine(suite));
    for (const testCase of suite.cases) {
      if (!testCase.passed) {
        lines.push(...formatFailedCase(testCase));
      }
    }
  }

  return lines.join('\n');
}

/**
 * Write the report as pretty JSON with a trailing newline
 */
export async function writeJsonReport(filePath: string, report: RunReport): Promise<void> {
  try {
    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new StateIoError('writing report', filePath, {
      code: ErrorCodes.STATE_WRITE_ERROR,
      cause: error,
    });
  }
}
