/**
 * Command Output Formatting Tests
 *
 * @module packages/cli/commands/__tests__/formatters.test
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import type { MigrateResult, SyncPassResult } from '@quarry/core';
import { formatMigrateResult } from '../migrate.js';
import { formatSyncResult } from '../sync.js';
import { formatSchemaDiff } from '../diff.js';
import { formatLedger } from '../status.js';

let level: typeof chalk.level;

beforeEach(() => {
  level = chalk.level;
  chalk.level = 0;
});

afterEach(() => {
  chalk.level = level;
});

describe('formatMigrateResult', () => {
  it('lists each file with its outcome and a summary', () => {
    const result: MigrateResult = {
      source: 'migrations',
      usedLegacySource: false,
      files: [
        { file: 'database/migrations/001_init.surql', status: 'skipped' },
        { file: 'database/migrations/002_people.surql', status: 'applied' },
        { file: 'database/migrations/003_pets.surql', status: 'failed', error: 'parse error' },
      ],
      applied: 1,
      skipped: 1,
      failed: 1,
    };

    expect(formatMigrateResult(result, false).split('\n')).toEqual([
      'Migrations:',
      '  - database/migrations/001_init.surql (already applied)',
      '  ✓ database/migrations/002_people.surql',
      '  ✗ database/migrations/003_pets.surql: parse error',
      '',
      'applied 1, skipped 1, failed 1',
    ]);
  });

  it('omits the summary on a dry run', () => {
    const result: MigrateResult = {
      source: 'schema',
      usedLegacySource: true,
      files: [{ file: 'database/schema/people.surql', status: 'pending' }],
      applied: 0,
      skipped: 0,
      failed: 0,
    };

    expect(formatMigrateResult(result, true).split('\n')).toEqual([
      '⚠ database/migrations is empty; using database/schema',
      'Pending migrations (dry run):',
      '  • database/schema/people.surql',
    ]);
  });

  it('reports an empty source', () => {
    const result: MigrateResult = {
      source: 'migrations',
      usedLegacySource: false,
      files: [],
      applied: 0,
      skipped: 0,
      failed: 0,
    };
    expect(formatMigrateResult(result, false)).toBe('No migration files found.');
  });
});

describe('formatSyncResult', () => {
  it('summarizes an applied pass with stale entities left in place', () => {
    const result: SyncPassResult = {
      dryRun: false,
      filesTotal: 2,
      changed: ['database/schema/a.surql', 'database/schema/b.surql'],
      applied: ['database/schema/a.surql'],
      failed: [{ file: 'database/schema/b.surql', error: 'boom' }],
      stale: [{ kind: 'table', name: 'pet' }],
      removeStatements: [],
      pruned: 0,
    };

    expect(formatSyncResult(result).split('\n')).toEqual([
      'Sync: 2 files, 2 changed, 1 applied, 1 failed',
      '  ✓ database/schema/a.surql',
      '  ✗ database/schema/b.surql: boom',
      'Stale entities: 1',
      '  - table pet',
      'not pruned (--no-prune)',
    ]);
  });

  it('shows pending files and REMOVE statements on a dry run', () => {
    const result: SyncPassResult = {
      dryRun: true,
      filesTotal: 1,
      changed: ['database/schema/people.surql'],
      applied: [],
      failed: [],
      stale: [{ kind: 'field', scope: 'person', name: 'age' }],
      removeStatements: ['REMOVE FIELD age ON person;'],
      pruned: 0,
    };

    expect(formatSyncResult(result).split('\n')).toEqual([
      'Sync (dry run): 1 files, 1 changed',
      '  • database/schema/people.surql',
      'Stale entities: 1',
      '  - field age on person',
      '  would run: REMOVE FIELD age ON person;',
    ]);
  });

  it('reports the prune count', () => {
    const result: SyncPassResult = {
      dryRun: false,
      filesTotal: 1,
      changed: [],
      applied: [],
      failed: [],
      stale: [{ kind: 'table', name: 'pet' }],
      removeStatements: ['REMOVE TABLE pet;'],
      pruned: 1,
    };

    expect(formatSyncResult(result).split('\n')).toEqual([
      'Sync: 1 files, 0 changed, 0 applied, 0 failed',
      'Stale entities: 1',
      '  - table pet',
      'pruned 1',
    ]);
  });
});

describe('formatSchemaDiff', () => {
  it('reports a clean tree', () => {
    expect(
      formatSchemaDiff({ files: { added: [], modified: [], removed: [] }, stale: [], hasChanges: false })
    ).toBe('No changes. Schema matches the last sync.');
  });

  it('groups file changes then stale entities', () => {
    const text = formatSchemaDiff({
      files: {
        added: ['database/schema/b.surql'],
        modified: ['database/schema/a.surql'],
        removed: ['database/schema/old.surql'],
      },
      stale: [
        { kind: 'table', name: 'pet' },
        { kind: 'index', scope: 'person', name: 'by_email' },
      ],
      hasChanges: true,
    });

    expect(text.split('\n')).toEqual([
      'Schema files:',
      '  + database/schema/b.surql',
      '  ~ database/schema/a.surql',
      '  - database/schema/old.surql',
      '',
      'Entities to remove:',
      '  - table pet',
      '  - index by_email on person',
    ]);
  });
});

describe('formatLedger', () => {
  it('reports an empty ledger', () => {
    expect(formatLedger([])).toBe('No migrations applied.');
  });

  it('aligns timestamps and shortens ids', () => {
    const text = formatLedger([
      { id: 'abcdef0123456789', file: 'database/migrations/001.surql', appliedAt: '2026-05-01T12:00:00Z' },
      { id: '0123456789abcdefff', file: 'database/migrations/002.surql', appliedAt: '2026-05-02T08:30:00.000Z' },
    ]);

    expect(text.split('\n')).toEqual([
      'Applied migrations (2):',
      '  2026-05-01T12:00:00Z      database/migrations/001.surql  abcdef012345',
      '  2026-05-02T08:30:00.000Z  database/migrations/002.surql  0123456789ab',
    ]);
  });
});
