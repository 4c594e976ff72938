/**
 * CLI Utilities Tests
 *
 * @module packages/cli/commands/__tests__/utils.test
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import {
  CapabilityError,
  ConfigError,
  ErrorCodes,
  ExecutionError,
  MissingCredentialError,
} from '@quarry/core';
import {
  ExitCodes,
  collect,
  exitCodeFor,
  findSimilarCommands,
  formatError,
  isInteractive,
  levenshtein,
  parseInteger,
  shouldUseColor,
} from '../utils.js';

describe('TTY detection', () => {
  let originalIsTTY: boolean;
  let originalNoColor: string | undefined;
  let originalTerm: string | undefined;

  beforeEach(() => {
    originalIsTTY = process.stdout.isTTY;
    originalNoColor = process.env.NO_COLOR;
    originalTerm = process.env.TERM;
    delete process.env.NO_COLOR;
    process.env.TERM = 'xterm-256color';
  });

  afterEach(() => {
    Object.defineProperty(process.stdout, 'isTTY', { value: originalIsTTY, configurable: true });
    if (originalNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = originalNoColor;
    }
    if (originalTerm === undefined) {
      delete process.env.TERM;
    } else {
      process.env.TERM = originalTerm;
    }
  });

  it('uses color on a TTY', () => {
    Object.defineProperty(process.stdout, 'isTTY', { value: true, configurable: true });
    expect(shouldUseColor()).toBe(true);
    expect(isInteractive()).toBe(true);
  });

  it('disables color when NO_COLOR is set, even to an empty string', () => {
    Object.defineProperty(process.stdout, 'isTTY', { value: true, configurable: true });
    process.env.NO_COLOR = '';
    expect(shouldUseColor()).toBe(false);
  });

  it('disables color for TERM=dumb', () => {
    Object.defineProperty(process.stdout, 'isTTY', { value: true, configurable: true });
    process.env.TERM = 'dumb';
    expect(shouldUseColor()).toBe(false);
  });

  it('treats piped output as non-interactive', () => {
    Object.defineProperty(process.stdout, 'isTTY', { value: undefined, configurable: true });
    expect(shouldUseColor()).toBe(false);
    expect(isInteractive()).toBe(false);
  });
});

describe('exitCodeFor', () => {
  it('maps configuration errors, including subclasses, to 4', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(ExitCodes.CONFIG_ERROR);
    expect(exitCodeFor(new MissingCredentialError('operator password'))).toBe(4);
  });

  it('maps execution errors to 3', () => {
    expect(exitCodeFor(new ExecutionError('statement failed'))).toBe(3);
  });

  it('maps everything else to 1', () => {
    expect(exitCodeFor(new CapabilityError('REMOVE API', 'unsupported', 'upgrade'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('formatError', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
  });

  it('renders a tool error with its code and suggestion', () => {
    const error = new ConfigError('Seed file not found: database/seed.surql', {
      code: ErrorCodes.CONFIG_NOT_FOUND,
      suggestion: 'Create it.',
    });
    expect(formatError(error)).toBe(
      'Error: Seed file not found: database/seed.surql [E1001]\n\nSuggestion: Create it.'
    );
  });

  it('renders a plain error by message', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
  });

  it('emits a JSON document for tool errors', () => {
    const parsed: unknown = JSON.parse(formatError(new MissingCredentialError('operator password'), true));
    expect(parsed).toMatchObject({
      success: false,
      error: {
        name: 'MissingCredentialError',
        code: 'E1004',
        message: 'Missing operator password',
        recoverable: false,
      },
    });
  });

  it('emits an UNKNOWN code for foreign errors', () => {
    expect(JSON.parse(formatError(new Error('boom'), true))).toEqual({
      success: false,
      error: { message: 'boom', code: 'UNKNOWN' },
    });
  });
});

describe('argument parsing', () => {
  it('parses non-negative integers', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger(' 7 ')).toBe(7);
    expect(parseInteger('0')).toBe(0);
  });

  it('rejects negatives and fractions', () => {
    expect(() => parseInteger('-1')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('1.5')).toThrow('Not a non-negative integer.');
  });

  it('collects repeated values in order', () => {
    expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
  });
});

describe('command suggestions', () => {
  it('computes edit distance', () => {
    expect(levenshtein('migrat', 'migrate')).toBe(1);
    expect(levenshtein('', 'diff')).toBe(4);
    expect(levenshtein('sync', 'sync')).toBe(0);
  });

  it('suggests commands within two edits, closest first', () => {
    expect(findSimilarCommands('sinc', ['setup', 'migrate', 'sync', 'seed', 'diff', 'test'])).toEqual(['sync']);
    expect(findSimilarCommands('sed', ['setup', 'sets', 'seed'])).toEqual(['seed', 'sets']);
  });

  it('ignores case', () => {
    expect(findSimilarCommands('DIFF', ['diff', 'test'])).toEqual(['diff']);
  });

  it('returns nothing for distant input', () => {
    expect(findSimilarCommands('deploy', ['sync', 'test'])).toEqual([]);
  });
});
