/**
 * Configuration Tests
 *
 * @module packages/core/__tests__/config.test
 */

import { describe, it, expect } from 'vitest';
import path from 'node:path';

import { loadDatabaseConfig, parseBool, resolveProjectPaths, toProjectPath } from '../config.js';

describe('loadDatabaseConfig', () => {
  it('applies defaults for missing or blank values', () => {
    expect(loadDatabaseConfig({ DATABASE_NAME: '  ' })).toEqual({
      host: 'ws://localhost:8000',
      namespace: 'db',
      database: 'test',
      username: 'root',
      password: 'root',
    });
  });

  it('reads every setting from the environment', () => {
    expect(
      loadDatabaseConfig({
        DATABASE_HOST: 'wss://db.example.test',
        DATABASE_NAMESPACE: 'app',
        DATABASE_NAME: 'main',
        DATABASE_USER: 'operator',
        DATABASE_PASSWORD: 'test-secret',
      })
    ).toEqual({
      host: 'wss://db.example.test',
      namespace: 'app',
      database: 'main',
      username: 'operator',
      password: 'test-secret',
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadDatabaseConfig({ PATH: '/usr/bin' }).host).toBe('ws://localhost:8000');
  });
});

describe('parseBool', () => {
  it('accepts common spellings', () => {
    expect(['1', 'TRUE', ' yes ', 'y', 'on'].map(parseBool)).toEqual([true, true, true, true, true]);
    expect(['0', 'False', 'no', 'n', 'off'].map(parseBool)).toEqual([false, false, false, false, false]);
  });

  it('returns undefined for anything else', () => {
    expect(parseBool('maybe')).toBeUndefined();
    expect(parseBool('')).toBeUndefined();
  });
});

describe('resolveProjectPaths', () => {
  it('lays out the database directory under the root', () => {
    const root = path.resolve('/srv/project');
    const paths = resolveProjectPaths(root);

    expect(paths.schemaDir).toBe(path.join(root, 'database', 'schema'));
    expect(paths.catalogSnapshot).toBe(path.join(root, 'database', '.quarry', 'catalog_snapshot.json'));
    expect(paths.testConfig).toBe(path.join(root, 'database', 'tests', 'config.yaml'));
    expect(paths.suitesDir).toBe(path.join(root, 'database', 'tests', 'suites'));
  });

  it('renders project-relative paths with forward slashes', () => {
    const paths = resolveProjectPaths(path.resolve('/srv/project'));

    expect(toProjectPath(paths, path.join(paths.schemaDir, 'a.surql'))).toBe('database/schema/a.surql');
  });
});
