/**
 * Quarry Core
 *
 * Schema catalog and diff, migration ledger, sync reconciler and the
 * declarative test runner for SurrealDB projects.
 *
 * @module packages/core
 */

// Configuration, logging and errors
export {
  loadDatabaseConfig,
  parseBool,
  resolveProjectPaths,
  toProjectPath,
  SHARED_DB_ENV,
  OWNER_ENV,
  TEST_BASE_URL_ENV,
  TEST_TIMEOUT_ENV,
  LOG_LEVEL_ENV,
  type ProjectPaths,
} from './config.js';
export { createLogger, createSilentLogger, type Logger } from './logger.js';
export {
  ErrorCodes,
  QuarryError,
  ConfigError,
  ConfigValidationError,
  MissingCredentialError,
  StateIoError,
  MissingScopeError,
  ExecutionError,
  CapabilityError,
  SharedDatabaseError,
  isQuarryError,
  describeError,
  getErrorCode,
  type ErrorCode,
} from './errors.js';

// Database collaborator
export type {
  Credentials,
  RootCredentials,
  NamespaceCredentials,
  DatabaseCredentials,
  RecordCredentials,
  UseTarget,
  DatabaseClient,
  DatabaseConnector,
  DatabaseConfig,
} from './database/types.js';
export { SurrealDatabase, connectSurreal, connectOperator } from './database/SurrealDatabase.js';
export { runQuery, isRecord, rowsOf, timestampText } from './database/query.js';
export { supportsRemoveApi } from './database/capabilities.js';

// Schema catalog, snapshots and diff
export { stripLineComments, splitStatements, tokenize } from './schema/statements.js';
export {
  ENTITY_KINDS,
  isEntityKind,
  compareEntityKeys,
  entityId,
  normalizeEntities,
  cleanIdentifier,
  parseDefineEntity,
  extractEntities,
  type EntityKind,
  type EntityKey,
} from './schema/catalog.js';
export {
  SNAPSHOT_VERSION,
  SCHEMA_EXTENSION,
  sha256Hex,
  listSchemaFiles,
  readSchemaFile,
  collectSchemaFiles,
  snapshotFromFiles,
  buildCatalogSnapshot,
  emptySchemaSnapshot,
  emptyCatalogSnapshot,
  diffSchema,
  removedEntities,
  renderRemoveSql,
  type SchemaFile,
  type SchemaSnapshotEntry,
  type SchemaSnapshot,
  type CatalogSnapshot,
  type FileDiff,
} from './schema/snapshot.js';
export { SnapshotStore, MemorySnapshotStore, type SnapshotRepository } from './schema/SnapshotStore.js';

// Server-side tracking
export type {
  MigrationRecord,
  MigrationLedgerStore,
  SyncHashStore,
  SyncMetaKey,
  SyncMetaStore,
} from './tracking/types.js';
export {
  MIGRATION_TABLE,
  SYNC_TABLE,
  SYNC_META_TABLE,
  SurrealMigrationLedgerStore,
  SurrealSyncHashStore,
  SurrealSyncMetaStore,
  createSurrealTrackingStores,
  type TrackingStores,
} from './tracking/SurrealTrackingStores.js';
export { BOOTSTRAP_SQL, ensureBootstrapSchema, applySeed } from './tracking/bootstrap.js';

// Reconciliation
export {
  MigrationLedger,
  type MigrationLedgerConfig,
  type MigrationOutcome,
  type MigrationFileResult,
  type MigrateOptions,
  type MigrateResult,
} from './reconcile/MigrationLedger.js';
export {
  SyncEngine,
  MIN_WATCH_INTERVAL_MS,
  type SyncEngineConfig,
  type SyncOptions,
  type WatchOptions,
  type SyncFileError,
  type SyncPassResult,
} from './reconcile/SyncEngine.js';

// Test orchestration
export * from './tester/schemas.js';
export type {
  LoadedSuite,
  LoadedSpecs,
  FilterInput,
  TestRunOptions,
  AssertionReport,
  CaseReport,
  SuiteReport,
  RunReport,
} from './tester/types.js';
export { ROOT_ACTOR, parseDocument, parseGlobalConfig, parseSuite, validateActorReferences, loadSpecs } from './tester/loader.js';
export { globMatch, suiteDisplayName, applyFilters } from './tester/filters.js';
export {
  toJsonValue,
  valueToText,
  lookupPath,
  assertJsonValue,
  findHeader,
  assertHeaderValue,
} from './tester/assertions.js';
export {
  resolveString,
  mergeActorSpecs,
  slugify,
  isolatedTarget,
  ActorSessionManager,
  ActorSessions,
  type SessionTarget,
  type ActorSession,
  type SessionPlan,
  type ActorSessionManagerConfig,
} from './tester/actors.js';
export {
  FetchHttpClient,
  joinUrl,
  executeApiCase,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
  type ApiCaseResult,
} from './tester/api.js';
export { Semaphore, type Release } from './tester/semaphore.js';
export {
  TestRunner,
  DEFAULT_PERMISSION_RECORD_ID,
  defaultSuitePreparation,
  outcomeAssertion,
  buildRunReport,
  type SuitePreparation,
  type RunnerOptions,
  type TestRunnerConfig,
  type RunOutcome,
  type SqlResult,
} from './tester/runner.js';
export { formatHumanReport, writeJsonReport } from './tester/report.js';
export {
  DEFAULT_TEST_TIMEOUT_MS,
  resolveBaseUrl,
  resolveTimeoutMs,
  runTests,
  type RunTestsConfig,
} from './tester/runTests.js';
