/**
 * CLI Utilities
 *
 * Exit codes, error reporting, TTY detection and shared output helpers.
 *
 * @module packages/cli/commands/utils
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { InvalidArgumentError } from 'commander';
import { ConfigError, ExecutionError, isQuarryError } from '@quarry/core';

// =============================================================================
// TTY Detection & Color Control
// =============================================================================

/**
 * Determines if colors should be used in output
 *
 * - NO_COLOR env var set → no color
 * - TERM=dumb → no color
 * - stdout is not a TTY → no color
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Whether spinners and other interactive output make sense
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

/**
 * Spinner for long operations; null when output is JSON or not a TTY
 */
export function createSpinner(text: string, json = false): Ora | null {
  if (json || !isInteractive()) {
    return null;
  }
  return ora({ text, stream: process.stderr }).start();
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Process exit statuses
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  TEST_FAILURE: 2,
  EXECUTION_ERROR: 3,
  CONFIG_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map an error to the exit status the CLI reports for it
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return ExitCodes.CONFIG_ERROR;
  }
  if (error instanceof ExecutionError) {
    return ExitCodes.EXECUTION_ERROR;
  }
  return ExitCodes.FAILURE;
}

/**
 * Render an error for stderr, or as a JSON document for --json
 */
export function formatError(error: unknown, json = false): string {
  if (json) {
    const body = isQuarryError(error)
      ? error.toJSON()
      : { message: error instanceof Error ? error.message : String(error), code: 'UNKNOWN' };
    return JSON.stringify({ success: false, error: body }, null, 2);
  }
  if (isQuarryError(error)) {
    return chalk.red(`Error: ${error.toDisplayString()}`);
  }
  return chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * Handles errors in CLI commands
 */
export function handleError(error: unknown, json = false): never {
  if (json) {
    console.log(formatError(error, true));
  } else {
    console.error(formatError(error));
  }
  process.exit(exitCodeFor(error));
}

// =============================================================================
// Output Formatting
// =============================================================================

export const Symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  pending: '•',
  skipped: '-',
} as const;

export function formatSuccess(message: string): void {
  console.log(chalk.green(`${Symbols.success} ${message}`));
}

export function formatWarning(message: string): void {
  console.warn(chalk.yellow(`${Symbols.warning} ${message}`));
}

export function formatInfo(message: string): void {
  console.log(chalk.blue(`${Symbols.info} ${message}`));
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// =============================================================================
// Argument Parsing
// =============================================================================

/**
 * Commander parser for non-negative integer options
 */
export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

/**
 * Commander reducer for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// =============================================================================
// Typo Suggestions
// =============================================================================

/**
 * Levenshtein distance between two strings
 */
export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);
  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1);
      current[j] = Math.min(substitution, (current[j - 1] ?? 0) + 1, (previous[j] ?? 0) + 1);
    }
    previous = current;
  }
  return previous[a.length] ?? 0;
}

/**
 * Closest command names for a did-you-mean hint
 */
export function findSimilarCommands(input: string, commands: readonly string[], maxDistance = 2): string[] {
  return commands
    .map((cmd) => ({ cmd, distance: levenshtein(input.toLowerCase(), cmd.toLowerCase()) }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .map(({ cmd }) => cmd);
}
