/**
 * Quarry Error Hierarchy
 *
 * All errors raised by the engines extend QuarryError and carry a stable
 * error code, a recoverable flag and an optional suggestion for the user.
 * Assertion failures are never errors: they are reported as data.
 *
 * @module packages/core/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - CONFIG_*: Configuration errors (1xxx)
 * - STATE_*: Local state / file I/O errors (2xxx)
 * - EXEC_*: Statement and request execution errors (3xxx)
 * - CAPABILITY_*: Server capability errors (4xxx)
 * - SYNC_*: Reconciliation guard errors (5xxx)
 */
export const ErrorCodes = {
  // Configuration errors (1xxx)
  CONFIG_NOT_FOUND: 'E1001',
  CONFIG_PARSE_ERROR: 'E1002',
  CONFIG_VALIDATION_ERROR: 'E1003',
  CONFIG_MISSING_CREDENTIAL: 'E1004',
  CONFIG_UNKNOWN_REFERENCE: 'E1005',
  CONFIG_INVALID_REGEX: 'E1006',
  CONFIG_NO_SUITES: 'E1007',

  // State errors (2xxx)
  STATE_READ_ERROR: 'E2001',
  STATE_WRITE_ERROR: 'E2002',
  STATE_CORRUPT: 'E2003',
  STATE_MISSING_SCOPE: 'E2004',

  // Execution errors (3xxx)
  EXEC_STATEMENT_FAILED: 'E3001',
  EXEC_CONNECTION_FAILED: 'E3002',
  EXEC_AUTH_FAILED: 'E3003',
  EXEC_REQUEST_FAILED: 'E3004',
  EXEC_CASE_FAILED: 'E3005',

  // Capability errors (4xxx)
  CAPABILITY_REMOVE_API: 'E4001',

  // Sync errors (5xxx)
  SYNC_SHARED_DATABASE: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

interface QuarryErrorOptions {
  code: ErrorCode;
  recoverable?: boolean;
  suggestion?: string;
  details?: string[];
  cause?: unknown;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all Quarry errors
 *
 * Features:
 * - Unique error code for identification
 * - Recoverable flag (execution errors are recoverable, the caller decides
 *   between fail-fast and log-and-continue)
 * - Cause chain for root cause analysis
 * - Suggestion text for user guidance
 */
export class QuarryError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Whether the operation may continue past this error */
  readonly recoverable: boolean;

  /** Suggested action for the user */
  readonly suggestion?: string;

  /** Additional details about the error */
  readonly details?: string[];

  constructor(message: string, options: QuarryErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'QuarryError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }

  /**
   * Format error for display
   */
  toDisplayString(): string {
    let output = `${this.message} [${this.code}]`;
    if (this.details && this.details.length > 0) {
      output += '\n' + this.details.map((d) => `  - ${d}`).join('\n');
    }
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }

  /**
   * Format error for JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration-related errors. Never retried.
 */
export class ConfigError extends QuarryError {
  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      suggestion?: string;
      details?: string[];
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.CONFIG_PARSE_ERROR,
      recoverable: false,
      suggestion: options.suggestion,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Declarative document failed schema validation
 */
export class ConfigValidationError extends ConfigError {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid test specification: ${filePath}`, {
      code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      details: issues,
      suggestion: 'Fix the fields listed above. Unknown fields are rejected.',
    });
    this.name = 'ConfigValidationError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

/**
 * A required credential could not be resolved from a literal, an
 * environment variable or a default
 */
export class MissingCredentialError extends ConfigError {
  readonly label: string;

  constructor(label: string, envName?: string) {
    super(`Missing ${label}`, {
      code: ErrorCodes.CONFIG_MISSING_CREDENTIAL,
      suggestion: envName
        ? `Set the ${envName} environment variable or provide the value inline.`
        : 'Provide the value inline or through an *Env field.',
    });
    this.name = 'MissingCredentialError';
    this.label = label;
  }
}

// ============================================================================
// State Errors
// ============================================================================

/**
 * Local file I/O failed. Always wraps the path.
 */
export class StateIoError extends QuarryError {
  readonly path: string;

  constructor(
    operation: string,
    path: string,
    options: { code?: ErrorCode; cause?: unknown } = {}
  ) {
    super(`Failed ${operation} ${path}`, {
      code: options.code ?? ErrorCodes.STATE_READ_ERROR,
      cause: options.cause,
      details: options.cause instanceof Error ? [options.cause.message] : undefined,
    });
    this.name = 'StateIoError';
    this.path = path;
  }
}

/**
 * A stale entity cannot be rendered without its owning table
 */
export class MissingScopeError extends QuarryError {
  readonly entityName: string;

  constructor(object: string, entityName: string) {
    super(`Cannot render REMOVE ${object} for '${entityName}' because scope is missing`, {
      code: ErrorCodes.STATE_MISSING_SCOPE,
      suggestion: 'Delete the catalog snapshot to rebuild it from the schema directory.',
    });
    this.name = 'MissingScopeError';
    this.entityName = entityName;
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

/**
 * A statement or request failed. Recoverable: the caller decides whether to
 * abort (fail-fast) or log and continue.
 */
export class ExecutionError extends QuarryError {
  constructor(
    message: string,
    options: { code?: ErrorCode; cause?: unknown; suggestion?: string } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.EXEC_STATEMENT_FAILED,
      recoverable: true,
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = 'ExecutionError';
  }

  /**
   * Message including every cause in the chain, `a: b: c`
   */
  get fullMessage(): string {
    return describeError(this);
  }
}

// ============================================================================
// Capability Errors
// ============================================================================

/**
 * The target server lacks a feature the requested action needs
 */
export class CapabilityError extends QuarryError {
  readonly capability: string;

  constructor(capability: string, message: string, suggestion: string) {
    super(message, {
      code: ErrorCodes.CAPABILITY_REMOVE_API,
      suggestion,
    });
    this.name = 'CapabilityError';
    this.capability = capability;
  }
}

// ============================================================================
// Sync Errors
// ============================================================================

/**
 * Prune refused because the database is flagged as shared
 */
export class SharedDatabaseError extends QuarryError {
  readonly staleCount: number;

  constructor(staleCount: number) {
    super(
      `Database is marked shared; refusing to prune ${staleCount} stale entities`,
      {
        code: ErrorCodes.SYNC_SHARED_DATABASE,
        suggestion:
          'Pass --allow-shared-prune to prune anyway, or --no-prune to skip pruning.',
      }
    );
    this.name = 'SharedDatabaseError';
    this.staleCount = staleCount;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a QuarryError
 */
export function isQuarryError(error: unknown): error is QuarryError {
  return error instanceof QuarryError;
}

/**
 * Render an error and its cause chain as `outer: inner: root`
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  let depth = 0;
  while (current !== undefined && current !== null && depth < 10) {
    if (current instanceof Error) {
      if (!parts.includes(current.message)) {
        parts.push(current.message);
      }
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
    depth += 1;
  }
  return parts.join(': ');
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): ErrorCode | string {
  if (error instanceof QuarryError) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error) {
    return String(error.code);
  }
  return 'UNKNOWN';
}
