/**
 * Database Collaborator Types
 *
 * The engines only ever talk to the database through DatabaseClient, so the
 * transport (SurrealDB over WebSocket or HTTP) stays swappable and tests can
 * run against an in-process fake.
 *
 * @module packages/core/database/types
 */

// ============================================================================
// Credentials
// ============================================================================

/**
 * Root (system user) credentials
 */
export interface RootCredentials {
  kind: 'root';
  username: string;
  password: string;
}

/**
 * Namespace-scoped user credentials
 */
export interface NamespaceCredentials {
  kind: 'namespace';
  namespace: string;
  username: string;
  password: string;
}

/**
 * Database-scoped user credentials
 */
export interface DatabaseCredentials {
  kind: 'database';
  namespace: string;
  database: string;
  username: string;
  password: string;
}

/**
 * Record access credentials (signs in through a DEFINE ACCESS ... TYPE RECORD)
 */
export interface RecordCredentials {
  kind: 'record';
  namespace: string;
  database: string;
  access: string;
  params: Record<string, unknown>;
}

export type Credentials =
  | RootCredentials
  | NamespaceCredentials
  | DatabaseCredentials
  | RecordCredentials;

// ============================================================================
// Client
// ============================================================================

/**
 * Namespace/database selection
 */
export interface UseTarget {
  namespace: string;
  database?: string;
}

/**
 * Opaque database client consumed by every engine
 */
export interface DatabaseClient {
  /** Sign in and return the issued bearer token */
  signin(credentials: Credentials): Promise<string>;
  /** Authenticate the connection with an existing token */
  authenticate(token: string): Promise<void>;
  /** Switch the connection to a namespace (and database) */
  use(target: UseTarget): Promise<void>;
  /**
   * Execute one or more statements. Resolves with one result per statement;
   * rejects if any statement failed.
   */
  execute(statement: string, bindings?: Record<string, unknown>): Promise<unknown[]>;
  /** Close the underlying connection */
  close(): Promise<void>;
}

/**
 * Opens a new, unauthenticated connection to a database address
 */
export type DatabaseConnector = (address: string) => Promise<DatabaseClient>;

/**
 * Connection settings for the operator's own database
 */
export interface DatabaseConfig {
  host: string;
  namespace: string;
  database: string;
  username: string;
  password: string;
}
