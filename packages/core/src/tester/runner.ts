/**
 * TestRunner - Execute declarative suites against isolated databases
 *
 * Each suite gets its own namespace/database pair for the run:
 *
 *   prepare (sessions, setup, sync, seed, fixtures)
 *     -> cases, in declaration order
 *     -> cleanup (close sessions, drop the database unless kept)
 *
 * Suites run one at a time, or up to `parallel` at once behind a
 * semaphore. Under fail-fast a failing suite cancels everything not yet
 * settled; reports are always returned sorted by suite path.
 *
 * @module packages/core/tester/runner
 */

import { promises as fs } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import type { Logger } from 'pino';

import type { ProjectPaths } from '../config.js';
import type { DatabaseClient, DatabaseConfig, DatabaseConnector } from '../database/types.js';
import { ConfigError, ErrorCodes, ExecutionError, StateIoError, describeError } from '../errors.js';
import { SyncEngine } from '../reconcile/SyncEngine.js';
import { MemorySnapshotStore } from '../schema/SnapshotStore.js';
import { applySeed, ensureBootstrapSchema } from '../tracking/bootstrap.js';
import { createSurrealTrackingStores } from '../tracking/SurrealTrackingStores.js';
import {
  ActorSessionManager,
  ActorSessions,
  isolatedTarget,
  mergeActorSpecs,
  type SessionTarget,
} from './actors.js';
import { executeApiCase, type HttpClient } from './api.js';
import { assertJsonValue, toJsonValue } from './assertions.js';
import { suiteDisplayName } from './filters.js';
import { ROOT_ACTOR } from './loader.js';
import { Semaphore } from './semaphore.js';
import type {
  ApiRequestCase,
  CaseSpec,
  FixtureSpec,
  GlobalTestConfig,
  JsonAssertionSpec,
  PermissionRuleSpec,
  PermissionsMatrixCase,
  SchemaBehaviorCase,
  SchemaMetadataCase,
} from './schemas.js';
import type { AssertionReport, CaseReport, LoadedSuite, RunReport, SuiteReport } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Record id used by permissions_matrix cases that name none */
export const DEFAULT_PERMISSION_RECORD_ID = 'perm_record';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-suite preparation steps run as root against the isolated database
 */
export interface SuitePreparation {
  ensureSchema(db: DatabaseClient): Promise<void>;
  sync(db: DatabaseClient): Promise<void>;
  seed(db: DatabaseClient): Promise<void>;
}

export interface RunnerOptions {
  failFast: boolean;
  /** Maximum suites in flight; 1 or less runs sequentially */
  parallel: number;
  noSetup: boolean;
  noSync: boolean;
  noSeed: boolean;
  keepDb: boolean;
}

export interface TestRunnerConfig {
  /** Operator connection settings; namespace/database are the base for isolated names */
  database: DatabaseConfig;
  connector: DatabaseConnector;
  http: HttpClient;
  logger: Logger;
  global: GlobalTestConfig;
  /** Directory global fixture files resolve against */
  globalBaseDir: string;
  /** Base URL for api_request cases; those cases fail without one */
  baseUrl?: string;
  timeoutMs: number;
  options: RunnerOptions;
  preparation: SuitePreparation;
  env?: NodeJS.ProcessEnv;
  /** Identifier embedded in isolated database names (default: current time) */
  runId?: string;
}

/**
 * Report of everything that settled, plus the error that stopped the run
 */
export interface RunOutcome {
  report: RunReport;
  fatal?: unknown;
}

export type SqlResult = { ok: true; value: unknown } | { ok: false; error: string };

type CaseBody = Omit<CaseReport, 'durationMs'>;

// ============================================================================
// Preparation
// ============================================================================

/**
 * Bootstrap, sync and seed from the project's `database/` directory. Sync
 * keeps its snapshots in memory: a fresh database has no history to prune
 * from, and the project's snapshot files must stay untouched.
 */
export function defaultSuitePreparation(paths: ProjectPaths, logger: Logger): SuitePreparation {
  return {
    ensureSchema: (db) => ensureBootstrapSchema(db, paths),
    sync: async (db) => {
      const stores = createSurrealTrackingStores(db);
      const engine = new SyncEngine({
        db,
        hashes: stores.hashes,
        meta: stores.meta,
        snapshots: new MemorySnapshotStore(),
        paths,
        logger,
      });
      await engine.sync({ dryRun: false, failFast: true, prune: true, allowSharedPrune: true });
    },
    seed: (db) => applySeed(db, paths),
  };
}

// ============================================================================
// Outcome Evaluation
// ============================================================================

async function executeSqlValue(db: DatabaseClient, sql: string): Promise<SqlResult> {
  try {
    const results = await db.execute(sql);
    return { ok: true, value: toJsonValue(results[0]) };
  } catch (error) {
    return { ok: false, error: describeError(error) };
  }
}

/**
 * Check an allow/deny expectation against a statement result
 */
export function outcomeAssertion(
  name: string,
  result: SqlResult,
  allow: boolean,
  errorContains?: string,
  errorCode?: string
): AssertionReport {
  if (allow) {
    return result.ok
      ? { name, passed: true, message: 'query succeeded as expected' }
      : { name, passed: false, message: `expected success, got error: ${result.error}` };
  }

  if (result.ok) {
    return { name, passed: false, message: 'expected failure, query succeeded' };
  }

  const containsOk = errorContains === undefined || result.error.includes(errorContains);
  const codeOk = errorCode === undefined || result.error.includes(errorCode);
  return containsOk && codeOk
    ? { name, passed: true, message: 'query failed as expected' }
    : { name, passed: false, message: `error mismatch, got '${result.error}'` };
}

function reportSqlExpect(
  testCase: CaseSpec,
  result: SqlResult,
  allow: boolean,
  errorContains: string | undefined,
  errorCode: string | undefined,
  jsonAssertions: readonly JsonAssertionSpec[]
): CaseBody {
  const outcome = outcomeAssertion('outcome', result, allow, errorContains, errorCode);
  const assertions = [outcome];
  if (allow && result.ok) {
    jsonAssertions.forEach((assertion, i) => {
      assertions.push(assertJsonValue(result.value, assertion, i));
    });
  }

  const passed = assertions.every((a) => a.passed);
  let message: string | undefined;
  if (!outcome.passed) {
    message = outcome.message;
  } else if (!passed) {
    message = 'one or more assertions failed';
  }
  return { name: testCase.name, kind: testCase.kind, passed, message, assertions };
}

function permissionStatement(
  testCase: PermissionsMatrixCase,
  recordId: string,
  rule: PermissionRuleSpec,
  index: number
): string {
  const record = `${testCase.table}:${recordId}`;
  switch (rule.action) {
    case 'create':
      return `CREATE ${record}_create_${index} CONTENT { marker: 'perm' };`;
    case 'select':
      return `SELECT * FROM ${record};`;
    case 'update':
      return `UPDATE ${record} SET marker = 'updated_${index}';`;
    case 'delete':
      return `DELETE ${record};`;
    case 'query':
      if (rule.sql === undefined) {
        throw new ConfigError(`permissions_matrix action=query in '${testCase.name}' requires sql`, {
          code: ErrorCodes.CONFIG_VALIDATION_ERROR,
        });
      }
      return rule.sql;
  }
}

// ============================================================================
// Reports
// ============================================================================

function suiteFailed(report: SuiteReport): boolean {
  return report.casesFailed > 0;
}

/**
 * Fold suite reports into run totals, sorted by suite path
 */
export function buildRunReport(started: Date, finished: Date, suites: readonly SuiteReport[]): RunReport {
  const sorted = [...suites].sort((a, b) =>
    a.suiteFile < b.suiteFile ? -1 : a.suiteFile > b.suiteFile ? 1 : 0
  );
  return {
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationMs: finished.getTime() - started.getTime(),
    suitesTotal: sorted.length,
    suitesFailed: sorted.filter(suiteFailed).length,
    casesTotal: sorted.reduce((sum, s) => sum + s.casesTotal, 0),
    casesPassed: sorted.reduce((sum, s) => sum + s.casesPassed, 0),
    casesFailed: sorted.reduce((sum, s) => sum + s.casesFailed, 0),
    suites: sorted,
  };
}

// ============================================================================
// TestRunner
// ============================================================================

export class TestRunner {
  private readonly config: TestRunnerConfig;
  private readonly logger: Logger;
  private readonly sessions: ActorSessionManager;
  private readonly runId: string;

  constructor(config: TestRunnerConfig) {
    this.config = config;
    this.logger = config.logger.child({ component: 'TestRunner' });
    this.sessions = new ActorSessionManager({
      connector: config.connector,
      database: config.database,
      logger: config.logger,
      env: config.env,
    });
    this.runId = config.runId ?? String(Date.now());
  }

  /**
   * Run every suite. A fatal error (configuration, connection, fixture)
   * stops the run; suites settled before it are still reported.
   */
  async run(suites: readonly LoadedSuite[]): Promise<RunOutcome> {
    const started = new Date();
    this.logger.info(
      { suites: suites.length, parallel: this.config.options.parallel, runId: this.runId },
      'Test run started'
    );

    const { reports, fatal } =
      this.config.options.parallel <= 1
        ? await this.runSequential(suites)
        : await this.runParallel(suites, this.config.options.parallel);

    const report = buildRunReport(started, new Date(), reports);
    this.logger.info(
      { suites: report.suitesTotal, failed: report.suitesFailed, durationMs: report.durationMs },
      'Test run finished'
    );
    return fatal === undefined ? { report } : { report, fatal };
  }

  private async runSequential(
    suites: readonly LoadedSuite[]
  ): Promise<{ reports: SuiteReport[]; fatal?: unknown }> {
    const reports: SuiteReport[] = [];
    const signal = new AbortController().signal;

    for (const suite of suites) {
      let report: SuiteReport;
      try {
        report = await this.runSuite(suite, signal);
      } catch (error) {
        this.logger.error({ suite: suite.displayPath, error: describeError(error) }, 'Suite aborted');
        return { reports, fatal: error };
      }
      reports.push(report);
      if (this.config.options.failFast && suiteFailed(report)) {
        break;
      }
    }
    return { reports };
  }

  private async runParallel(
    suites: readonly LoadedSuite[],
    parallel: number
  ): Promise<{ reports: SuiteReport[]; fatal?: unknown }> {
    const gate = new Semaphore(parallel);
    const controller = new AbortController();
    const reports: SuiteReport[] = [];
    let fatal: unknown;

    await Promise.all(
      suites.map(async (suite) => {
        const release = await gate.acquire(controller.signal);
        if (release === null) {
          return;
        }
        try {
          const report = await this.runSuite(suite, controller.signal);
          // Finished after cancellation: not a settled result.
          if (controller.signal.aborted) {
            return;
          }
          reports.push(report);
          if (this.config.options.failFast && suiteFailed(report)) {
            controller.abort();
          }
        } catch (error) {
          if (!controller.signal.aborted) {
            this.logger.error({ suite: suite.displayPath, error: describeError(error) }, 'Suite aborted');
            fatal = error;
            controller.abort();
          } else {
            this.logger.debug(
              { suite: suite.displayPath, error: describeError(error) },
              'Suite failed after cancellation'
            );
          }
        } finally {
          release();
        }
      })
    );

    return fatal === undefined ? { reports } : { reports, fatal };
  }

  // ==========================================================================
  // Suite Lifecycle
  // ==========================================================================

  /**
   * Prepare, execute and clean up one suite
   *
   * @throws ConfigError for unresolved credentials or unknown actors
   * @throws ExecutionError when a session, preparation step or fixture fails
   */
  async runSuite(suite: LoadedSuite, signal: AbortSignal): Promise<SuiteReport> {
    const started = Date.now();
    const suiteName = suiteDisplayName(suite);
    const target = isolatedTarget(
      { namespace: this.config.database.namespace, database: this.config.database.database },
      this.runId,
      suiteName,
      suite.displayPath
    );
    const log = this.logger.child({ suite: suite.displayPath });

    // Resolve every credential before the first connection.
    const rootPlan = this.sessions.planRoot(target);
    const actorPlans = this.sessions.planSessions(
      mergeActorSpecs(this.config.global.actors, suite.spec.actors),
      target
    );

    const sessions = new ActorSessions(log);
    const cases: CaseReport[] = [];
    log.info({ namespace: target.namespace, database: target.database }, 'Suite started');

    try {
      const root = await this.sessions.open(rootPlan);
      sessions.add(root);
      await this.prepare(root.db);

      await this.applyFixtures(suite, sessions, true);
      for (const plan of actorPlans) {
        sessions.add(await this.sessions.open(plan));
      }
      await this.applyFixtures(suite, sessions, false);

      for (const testCase of suite.spec.cases) {
        if (signal.aborted) {
          log.info('Suite cancelled');
          break;
        }
        const report = await this.runCase(testCase, sessions);
        cases.push(report);
        log.debug({ case: report.name, passed: report.passed, durationMs: report.durationMs }, 'Case finished');
        if (!report.passed && this.config.options.failFast) {
          break;
        }
      }
    } finally {
      await sessions.closeAll();
      if (!this.config.options.keepDb) {
        await this.cleanup(target, log);
      }
    }

    const casesPassed = cases.filter((c) => c.passed).length;
    const report: SuiteReport = {
      suiteFile: suite.displayPath,
      suiteName,
      namespace: target.namespace,
      database: target.database,
      durationMs: Date.now() - started,
      casesTotal: cases.length,
      casesPassed,
      casesFailed: cases.length - casesPassed,
      cases,
    };
    log.info({ passed: report.casesPassed, failed: report.casesFailed }, 'Suite finished');
    return report;
  }

  private async prepare(db: DatabaseClient): Promise<void> {
    const { options, preparation } = this.config;
    if (!options.noSetup) {
      await preparation.ensureSchema(db);
    }
    if (!options.noSync) {
      await preparation.sync(db);
    }
    if (!options.noSeed) {
      await preparation.seed(db);
    }
  }

  /**
   * Apply global then suite fixtures that target root (`rootPhase`) or any
   * other actor
   */
  private async applyFixtures(suite: LoadedSuite, sessions: ActorSessions, rootPhase: boolean): Promise<void> {
    const scoped: Array<[FixtureSpec, string]> = [
      ...this.config.global.fixtures.map((f): [FixtureSpec, string] => [f, this.config.globalBaseDir]),
      ...suite.spec.fixtures.map((f): [FixtureSpec, string] => [f, dirname(suite.path)]),
    ];

    for (const [fixture, baseDir] of scoped) {
      const targetsRoot = fixture.actor === undefined || fixture.actor === ROOT_ACTOR;
      if (targetsRoot !== rootPhase) {
        continue;
      }
      const session = sessions.get(fixture.actor);
      const sql = await this.fixtureSql(fixture, baseDir);
      try {
        await session.db.execute(sql);
      } catch (error) {
        throw new ExecutionError(`Fixture '${fixture.name ?? 'unnamed'}' failed`, { cause: error });
      }
      this.logger.debug({ fixture: fixture.name, actor: session.name }, 'Fixture applied');
    }
  }

  private async fixtureSql(fixture: FixtureSpec, baseDir: string): Promise<string> {
    if (fixture.sql !== undefined) {
      return fixture.sql;
    }
    if (fixture.file === undefined) {
      throw new ConfigError('fixture must define exactly one of sql or file', {
        code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      });
    }
    const filePath = isAbsolute(fixture.file) ? fixture.file : resolve(baseDir, fixture.file);
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new StateIoError('reading fixture', filePath, { cause: error });
    }
  }

  /**
   * Drop the suite's database over a fresh root connection. Never throws.
   */
  private async cleanup(target: SessionTarget, log: Logger): Promise<void> {
    let db: DatabaseClient | undefined;
    try {
      db = await this.config.connector(this.config.database.host);
      await db.signin({
        kind: 'root',
        username: this.config.database.username,
        password: this.config.database.password,
      });
      await db.use({ namespace: target.namespace });
      await db.execute(`REMOVE DATABASE ${target.database};`);
      log.debug({ namespace: target.namespace, database: target.database }, 'Test database removed');
    } catch (error) {
      log.warn(
        { namespace: target.namespace, database: target.database, error: describeError(error) },
        'Failed to clean up test database'
      );
    } finally {
      if (db) {
        await db.close().catch((error: unknown) => {
          log.warn({ error: describeError(error) }, 'Failed closing cleanup connection');
        });
      }
    }
  }

  // ==========================================================================
  // Cases
  // ==========================================================================

  /**
   * Run one case. Execution errors become a failed `outcome` assertion;
   * configuration errors propagate.
   */
  async runCase(testCase: CaseSpec, sessions: ActorSessions): Promise<CaseReport> {
    const started = Date.now();
    try {
      const body = await this.executeCase(testCase, sessions);
      return { ...body, durationMs: Date.now() - started };
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      const message = describeError(error);
      return {
        name: testCase.name,
        kind: testCase.kind,
        durationMs: Date.now() - started,
        passed: false,
        message,
        assertions: [{ name: 'outcome', passed: false, message }],
      };
    }
  }

  private async executeCase(testCase: CaseSpec, sessions: ActorSessions): Promise<CaseBody> {
    switch (testCase.kind) {
      case 'sql_expect': {
        const actor = sessions.get(testCase.actor);
        const result = await executeSqlValue(actor.db, testCase.sql);
        return reportSqlExpect(
          testCase,
          result,
          testCase.allow,
          testCase.errorContains,
          testCase.errorCode,
          testCase.assertions
        );
      }
      case 'permissions_matrix':
        return this.permissionsMatrix(testCase, sessions);
      case 'schema_metadata':
        return this.schemaMetadata(testCase, sessions);
      case 'schema_behavior':
        return this.schemaBehavior(testCase, sessions);
      case 'api_request':
        return this.apiRequest(testCase, sessions);
    }
  }

  private async permissionsMatrix(testCase: PermissionsMatrixCase, sessions: ActorSessions): Promise<CaseBody> {
    if (testCase.rules.length === 0) {
      throw new ExecutionError(`permissions_matrix case '${testCase.name}' has no rules`, {
        code: ErrorCodes.EXEC_CASE_FAILED,
      });
    }
    const actor = sessions.get(testCase.actor);
    const root = sessions.get(ROOT_ACTOR);
    const recordId = testCase.recordId ?? DEFAULT_PERMISSION_RECORD_ID;
    const seedSql = `UPSERT ${testCase.table}:${recordId} MERGE { __quarry_perm_seed: true };`;

    const assertions: AssertionReport[] = [];
    for (const [i, rule] of testCase.rules.entries()) {
      const statement = permissionStatement(testCase, recordId, rule, i);
      // Seed failures are ignored; the rule outcome decides.
      await executeSqlValue(root.db, seedSql);

      const result = await executeSqlValue(actor.db, statement);
      const report = outcomeAssertion(`rule_${i + 1}`, result, rule.allow, rule.errorContains);
      assertions.push(report.passed ? report : { ...report, message: `${report.message}; sql=${statement}` });
    }

    const passed = assertions.every((a) => a.passed);
    return {
      name: testCase.name,
      kind: testCase.kind,
      passed,
      message: passed ? undefined : 'one or more permission rules failed',
      assertions,
    };
  }

  private async schemaMetadata(testCase: SchemaMetadataCase, sessions: ActorSessions): Promise<CaseBody> {
    const actor = sessions.get(testCase.actor);
    let sql: string;
    if (testCase.sql !== undefined) {
      sql = testCase.sql;
    } else if (testCase.table !== undefined) {
      sql = `INFO FOR TABLE ${testCase.table};`;
    } else {
      throw new ExecutionError(`schema_metadata case '${testCase.name}' requires either table or sql`, {
        code: ErrorCodes.EXEC_CASE_FAILED,
      });
    }

    const result = await executeSqlValue(actor.db, sql);
    if (!result.ok) {
      throw new ExecutionError(`Metadata query failed: ${result.error}`, { code: ErrorCodes.EXEC_CASE_FAILED });
    }

    const text = JSON.stringify(result.value);
    const assertions: AssertionReport[] = testCase.contains.map((needle, i) => ({
      name: `contains_${i + 1}`,
      passed: text.includes(needle),
      message: `expected metadata to contain '${needle}'`,
    }));
    testCase.assertions.forEach((assertion, i) => {
      assertions.push(assertJsonValue(result.value, assertion, i));
    });

    const passed = assertions.every((a) => a.passed);
    return {
      name: testCase.name,
      kind: testCase.kind,
      passed,
      message: passed ? undefined : 'schema metadata assertions failed',
      assertions,
    };
  }

  private async schemaBehavior(testCase: SchemaBehaviorCase, sessions: ActorSessions): Promise<CaseBody> {
    const actor = sessions.get(testCase.actor);
    for (const sql of testCase.setupSql) {
      try {
        await actor.db.execute(sql);
      } catch (error) {
        throw new ExecutionError(`schema_behavior setup failed in case '${testCase.name}'`, { cause: error });
      }
    }

    const action = await executeSqlValue(actor.db, testCase.actionSql);
    const report = reportSqlExpect(
      testCase,
      action,
      testCase.expectSuccess,
      testCase.expectErrorContains,
      undefined,
      []
    );
    if (!report.passed || testCase.assertions.length === 0) {
      return report;
    }

    const verify = await executeSqlValue(actor.db, testCase.verifySql ?? testCase.actionSql);
    if (!verify.ok) {
      throw new ExecutionError(`Verify query failed: ${verify.error}`, { code: ErrorCodes.EXEC_CASE_FAILED });
    }
    const assertions = [...report.assertions];
    testCase.assertions.forEach((assertion, i) => {
      assertions.push(assertJsonValue(verify.value, assertion, i));
    });
    const passed = assertions.every((a) => a.passed);
    return {
      ...report,
      passed,
      message: passed ? report.message : 'schema behavior assertions failed',
      assertions,
    };
  }

  private async apiRequest(testCase: ApiRequestCase, sessions: ActorSessions): Promise<CaseBody> {
    const actor = sessions.get(testCase.actor);
    if (this.config.baseUrl === undefined) {
      throw new ExecutionError(
        `api_request case '${testCase.name}' requires base URL (--base-url, config default, or env)`,
        { code: ErrorCodes.EXEC_CASE_FAILED }
      );
    }
    const result = await executeApiCase(
      this.config.http,
      this.config.baseUrl,
      testCase,
      actor.headers,
      this.config.timeoutMs
    );
    const passed = result.assertions.every((a) => a.passed);
    return {
      name: testCase.name,
      kind: testCase.kind,
      passed,
      message: passed ? undefined : `api assertions failed (status=${result.status})`,
      assertions: result.assertions,
    };
  }
}
