/**
 * Test Orchestration Types
 *
 * @module packages/core/tester/types
 */

import type { GlobalTestConfig, SuiteSpec } from './schemas.js';

// ============================================================================
// Loaded Specs
// ============================================================================

export interface LoadedSuite {
  /** Absolute path of the suite document */
  path: string;
  /** Project-relative path, used for display, filtering and sorting */
  displayPath: string;
  spec: SuiteSpec;
}

export interface LoadedSpecs {
  global: GlobalTestConfig;
  /** Directory global fixture files resolve against */
  globalBaseDir: string;
  suites: LoadedSuite[];
}

export interface FilterInput {
  suitePattern?: string;
  casePattern?: string;
  tags: string[];
}

// ============================================================================
// Run Options
// ============================================================================

export interface TestRunOptions extends FilterInput {
  failFast: boolean;
  /** Maximum suites in flight; 1 or less runs sequentially */
  parallel: number;
  /** Write the JSON report here */
  jsonOut?: string;
  noSetup: boolean;
  noSync: boolean;
  noSeed: boolean;
  /** Keep each suite's isolated database after the run */
  keepDb: boolean;
  baseUrl?: string;
  timeoutMs?: number;
}

// ============================================================================
// Reports
// ============================================================================

export interface AssertionReport {
  name: string;
  passed: boolean;
  message: string;
}

export interface CaseReport {
  name: string;
  kind: string;
  durationMs: number;
  passed: boolean;
  message?: string;
  assertions: AssertionReport[];
}

export interface SuiteReport {
  suiteFile: string;
  suiteName: string;
  namespace: string;
  database: string;
  durationMs: number;
  casesTotal: number;
  casesPassed: number;
  casesFailed: number;
  cases: CaseReport[];
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  suitesTotal: number;
  suitesFailed: number;
  casesTotal: number;
  casesPassed: number;
  casesFailed: number;
  suites: SuiteReport[];
}
