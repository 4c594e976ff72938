/**
 * Actor Session Manager
 *
 * Builds one authenticated database session per actor for a suite run, plus
 * the implicit `root` session. Credentials are resolved for every actor
 * before the first connection is opened, so a missing credential never
 * leaves half-built sessions behind.
 *
 * @module packages/core/tester/actors
 */

import type { Logger } from 'pino';

import type { Credentials, DatabaseClient, DatabaseConfig, DatabaseConnector } from '../database/types.js';
import { ConfigError, ErrorCodes, ExecutionError, MissingCredentialError, describeError } from '../errors.js';
import { findHeader } from './assertions.js';
import { ROOT_ACTOR } from './loader.js';
import type { ActorKind, ActorSpec } from './schemas.js';

// ============================================================================
// Types
// ============================================================================

export interface SessionTarget {
  namespace: string;
  database: string;
}

export interface ActorSession {
  name: string;
  kind: ActorKind;
  db: DatabaseClient;
  /** Headers attached to api_request cases run as this actor */
  headers: Record<string, string>;
}

/**
 * Everything needed to open one session, resolved without network access
 */
export interface SessionPlan {
  name: string;
  kind: ActorKind;
  auth: { type: 'signin'; credentials: Credentials } | { type: 'token'; token: string };
  /** Where the session switches after authenticating; absent for token-only sessions */
  use?: SessionTarget;
  headers: Record<string, string>;
}

export interface ActorSessionManagerConfig {
  connector: DatabaseConnector;
  /** Operator settings: host and root credentials */
  database: DatabaseConfig;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a value by precedence: non-blank literal, then non-blank
 * environment variable, then non-blank default.
 *
 * @throws MissingCredentialError when nothing resolves
 */
export function resolveString(
  literal: string | undefined,
  envName: string | undefined,
  defaultValue: string | undefined,
  label: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (literal !== undefined && literal.trim() !== '') {
    return literal;
  }
  if (envName !== undefined) {
    const fromEnv = env[envName];
    if (fromEnv !== undefined && fromEnv.trim() !== '') {
      return fromEnv;
    }
  }
  if (defaultValue !== undefined && defaultValue.trim() !== '') {
    return defaultValue;
  }
  throw new MissingCredentialError(label, envName);
}

/**
 * Suite actors override global actors of the same name
 */
export function mergeActorSpecs(
  global: Record<string, ActorSpec>,
  suite: Record<string, ActorSpec>
): Record<string, ActorSpec> {
  return { ...global, ...suite };
}

/**
 * Lower-case, collapse non-alphanumeric runs to `_`, trim `_`
 */
export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug === '' ? 'suite' : slug;
}

/**
 * Isolated namespace/database pair for one suite in one run
 */
export function isolatedTarget(
  base: SessionTarget,
  runId: string,
  suiteName: string,
  suitePath: string
): SessionTarget {
  const slug = slugify(`${suiteName}-${suitePath}`);
  return {
    namespace: `${base.namespace}_qk_test_${runId}_${slug}`,
    database: `${base.database}_qk_test_${runId}_${slug}`,
  };
}

function withBearer(headers: Record<string, string>, token: string): Record<string, string> {
  if (findHeader(headers, 'authorization') !== undefined) {
    return headers;
  }
  return { ...headers, authorization: `Bearer ${token}` };
}

// ============================================================================
// ActorSessionManager
// ============================================================================

export class ActorSessionManager {
  private readonly connector: DatabaseConnector;
  private readonly operator: DatabaseConfig;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(config: ActorSessionManagerConfig) {
    this.connector = config.connector;
    this.operator = config.database;
    this.logger = config.logger.child({ component: 'ActorSessionManager' });
    this.env = config.env ?? process.env;
  }

  /**
   * Resolve one actor's credentials and target
   *
   * @throws MissingCredentialError for an unresolved required value
   */
  planSession(name: string, spec: ActorSpec, target: SessionTarget): SessionPlan {
    const resolve = (literal: string | undefined, envName: string | undefined, fallback: string | undefined, what: string): string =>
      resolveString(literal, envName, fallback, `actor '${name}' ${what}`, this.env);

    const namespace = resolve(spec.namespace, spec.namespaceEnv, target.namespace, 'namespace');
    const database = resolve(spec.database, spec.databaseEnv, target.database, 'database');
    const use = { namespace, database };

    switch (spec.kind) {
      case 'root':
        return {
          name,
          kind: spec.kind,
          auth: {
            type: 'signin',
            credentials: {
              kind: 'root',
              username: resolve(spec.username, spec.usernameEnv, this.operator.username, 'root username'),
              password: resolve(spec.password, spec.passwordEnv, this.operator.password, 'root password'),
            },
          },
          use,
          headers: spec.headers,
        };

      case 'namespace':
        return {
          name,
          kind: spec.kind,
          auth: {
            type: 'signin',
            credentials: {
              kind: 'namespace',
              namespace,
              username: resolve(spec.username, spec.usernameEnv, undefined, 'namespace username'),
              password: resolve(spec.password, spec.passwordEnv, undefined, 'namespace password'),
            },
          },
          use,
          headers: spec.headers,
        };

      case 'database':
        return {
          name,
          kind: spec.kind,
          auth: {
            type: 'signin',
            credentials: {
              kind: 'database',
              namespace,
              database,
              username: resolve(spec.username, spec.usernameEnv, undefined, 'database username'),
              password: resolve(spec.password, spec.passwordEnv, undefined, 'database password'),
            },
          },
          use,
          headers: spec.headers,
        };

      case 'record':
        return {
          name,
          kind: spec.kind,
          auth: {
            type: 'signin',
            credentials: {
              kind: 'record',
              namespace,
              database,
              access: resolve(spec.access, spec.accessEnv, undefined, 'access method'),
              params: spec.params ?? {},
            },
          },
          use,
          headers: spec.headers,
        };

      case 'token': {
        // A token already carries its scope; switch only when one is named.
        const named =
          spec.namespace !== undefined ||
          spec.namespaceEnv !== undefined ||
          spec.database !== undefined ||
          spec.databaseEnv !== undefined;
        return {
          name,
          kind: spec.kind,
          auth: { type: 'token', token: resolve(spec.token, spec.tokenEnv, undefined, 'token') },
          use: named ? use : undefined,
          headers: spec.headers,
        };
      }

      case 'headers':
        return {
          name,
          kind: spec.kind,
          auth: {
            type: 'signin',
            credentials: {
              kind: 'root',
              username: this.operator.username,
              password: this.operator.password,
            },
          },
          use,
          headers: spec.headers,
        };
    }
  }

  /**
   * Plan for the implicit root session
   */
  planRoot(target: SessionTarget): SessionPlan {
    return {
      name: ROOT_ACTOR,
      kind: 'root',
      auth: {
        type: 'signin',
        credentials: { kind: 'root', username: this.operator.username, password: this.operator.password },
      },
      use: target,
      headers: {},
    };
  }

  /**
   * Resolve every actor up front
   */
  planSessions(specs: Record<string, ActorSpec>, target: SessionTarget): SessionPlan[] {
    return Object.keys(specs)
      .sort()
      .flatMap((name) => {
        const spec = specs[name];
        return spec === undefined ? [] : [this.planSession(name, spec, target)];
      });
  }

  /**
   * Connect and authenticate one planned session
   *
   * @throws ExecutionError when connecting, authenticating or switching fails
   */
  async open(plan: SessionPlan): Promise<ActorSession> {
    const db = await this.connector(this.operator.host);
    try {
      let token: string;
      if (plan.auth.type === 'token') {
        token = plan.auth.token;
        await db.authenticate(token);
      } else {
        token = await db.signin(plan.auth.credentials);
      }

      if (plan.use) {
        await db.use(plan.use);
      }

      this.logger.debug({ actor: plan.name, kind: plan.kind, target: plan.use }, 'Actor session opened');
      return {
        name: plan.name,
        kind: plan.kind,
        db,
        headers: token === '' ? plan.headers : withBearer(plan.headers, token),
      };
    } catch (error) {
      await db.close().catch((closeError: unknown) => {
        this.logger.warn({ actor: plan.name, error: describeError(closeError) }, 'Failed closing session');
      });
      throw new ExecutionError(`Actor '${plan.name}' ${plan.kind} authentication failed`, {
        code: ErrorCodes.EXEC_AUTH_FAILED,
        cause: error,
      });
    }
  }
}

// ============================================================================
// ActorSessions
// ============================================================================

/**
 * Open sessions for one suite run
 */
export class ActorSessions {
  private readonly sessions = new Map<string, ActorSession>();
  /** Sessions replaced by a later add; still closed by closeAll */
  private readonly retired: ActorSession[] = [];

  constructor(private readonly logger: Logger) {}

  add(session: ActorSession): void {
    const previous = this.sessions.get(session.name);
    if (previous) {
      this.retired.push(previous);
    }
    this.sessions.set(session.name, session);
  }

  has(name: string): boolean {
    return this.sessions.has(name);
  }

  /**
   * @throws ConfigError for an actor that was never configured
   */
  get(name: string | undefined): ActorSession {
    const actor = name ?? ROOT_ACTOR;
    const session = this.sessions.get(actor);
    if (!session) {
      throw new ConfigError(`Actor '${actor}' not configured`, {
        code: ErrorCodes.CONFIG_UNKNOWN_REFERENCE,
      });
    }
    return session;
  }

  /**
   * Close every session; failures are logged
   */
  async closeAll(): Promise<void> {
    for (const session of [...this.retired, ...this.sessions.values()]) {
      try {
        await session.db.close();
      } catch (error) {
        this.logger.warn({ actor: session.name, error: describeError(error) }, 'Failed closing session');
      }
    }
    this.sessions.clear();
    this.retired.length = 0;
  }
}
