/**
 * Logger Factory
 *
 * Engines take a pino Logger in their options and derive a child per
 * component; only the CLI creates the root logger.
 *
 * @module packages/core/logger
 */

import { pino, destination, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLevel(value: string): value is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(value);
}

/**
 * Create the root logger. Logs go to stderr so stdout stays free for
 * command output and JSON reports.
 */
export function createLogger(level: string = 'info'): Logger {
  const resolved = isLevel(level) ? level : 'info';
  return pino({ name: 'quarry', level: resolved }, destination(2));
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
