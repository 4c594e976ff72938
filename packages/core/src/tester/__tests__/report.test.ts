/**
 * Report Output Tests
 *
 * @module packages/core/tester/__tests__/report.test
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, beforeEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { formatHumanReport, writeJsonReport } from '../report.js';
import type { RunReport } from '../types.js';

const report: RunReport = {
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:00.250Z',
  durationMs: 250,
  suitesTotal: 2,
  suitesFailed: 1,
  casesTotal: 3,
  casesPassed: 2,
  casesFailed: 1,
  suites: [
    {
      suiteFile: 'database/tests/suites/a.yaml',
      suiteName: 'accounts',
      namespace: 'app_qk_test_1_a',
      database: 'main_qk_test_1_a',
      durationMs: 100,
      casesTotal: 1,
      casesPassed: 1,
      casesFailed: 0,
      cases: [
        {
          name: 'reads',
          kind: 'sql_expect',
          durationMs: 5,
          passed: true,
          assertions: [{ name: 'outcome', passed: true, message: 'query succeeded as expected' }],
        },
      ],
    },
    {
      suiteFile: 'database/tests/suites/b.yaml',
      suiteName: 'billing',
      namespace: 'app_qk_test_1_b',
      database: 'main_qk_test_1_b',
      durationMs: 120,
      casesTotal: 2,
      casesPassed: 1,
      casesFailed: 1,
      cases: [
        {
          name: 'writes',
          kind: 'sql_expect',
          durationMs: 5,
          passed: true,
          assertions: [],
        },
        {
          name: 'denied',
          kind: 'permissions_matrix',
          durationMs: 7,
          passed: false,
          message: 'one or more permission rules failed',
          assertions: [
            { name: 'rule_1', passed: true, message: 'query succeeded as expected' },
            { name: 'rule_2', passed: false, message: 'expected failure, query succeeded; sql=DELETE invoice:x;' },
          ],
        },
      ],
    },
  ],
};

describe('formatHumanReport', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('prints totals, suite lines and failing detail only', () => {
    expect(formatHumanReport(report).split('\n')).toEqual([
      'Test run summary:',
      '  suites: 2 total, 1 failed',
      '  cases: 3 total, 2 passed, 1 failed',
      '  duration_ms: 250',
      '',
      '✓ suite accounts [app_qk_test_1_a / main_qk_test_1_a]: 1 passed, 0 failed',
      '',
      '✗ suite billing [app_qk_test_1_b / main_qk_test_1_b]: 1 passed, 1 failed',
      '  FAIL denied (permissions_matrix) one or more permission rules failed',
      '    - rule_2: expected failure, query succeeded; sql=DELETE invoice:x;',
    ]);
  });
});

describe('writeJsonReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'quarry-report-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes pretty JSON, creating parent directories', async () => {
    const target = join(tempDir, 'out', 'report.json');

    await writeJsonReport(target, report);

    const content = await readFile(target, 'utf-8');
    expect(content.endsWith('}\n')).toBe(true);
    expect(JSON.parse(content)).toEqual(report);
  });
});
