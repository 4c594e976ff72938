/**
 * Test Spec Loader Tests
 *
 * @module packages/core/tester/__tests__/loader.test
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { resolveProjectPaths, type ProjectPaths } from '../../config.js';
import { ConfigError, ConfigValidationError, ErrorCodes } from '../../errors.js';
import { loadSpecs, parseGlobalConfig, parseSuite } from '../loader.js';

describe('parseSuite', () => {
  it('applies defaults to an empty document', () => {
    const suite = parseSuite('', 'suite.yaml');

    expect(suite).toEqual({ tags: [], actors: {}, fixtures: [], cases: [] });
  });

  it('fills case defaults', () => {
    const suite = parseSuite(
      ['cases:', '  - name: reads', '    kind: sql_expect', '    sql: SELECT * FROM person;'].join('\n'),
      'suite.yaml'
    );

    expect(suite.cases[0]).toEqual({
      name: 'reads',
      kind: 'sql_expect',
      sql: 'SELECT * FROM person;',
      tags: [],
      allow: true,
      assertions: [],
    });
  });

  it('rejects unknown fields', () => {
    const parse = (): unknown =>
      parseSuite(
        ['cases:', '  - name: reads', '    kind: sql_expect', '    sql: SELECT 1;', '    bogus: true'].join('\n'),
        'suite.yaml'
      );

    expect(parse).toThrow(ConfigValidationError);
    try {
      parse();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual(["cases.0: Unrecognized key(s) in object: 'bogus'"]);
        expect(error.code).toBe(ErrorCodes.CONFIG_VALIDATION_ERROR);
      }
    }
  });

  it('requires exactly one of sql or file on a fixture', () => {
    const both = ['fixtures:', '  - sql: SELECT 1;', '    file: seed.surql'].join('\n');
    const neither = ['fixtures:', '  - name: empty'].join('\n');

    for (const content of [both, neither]) {
      try {
        parseSuite(content, 'suite.yaml');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.issues).toEqual(['fixtures.0: fixture must define exactly one of sql or file']);
        }
      }
    }
  });

  it('reports YAML syntax errors as parse errors', () => {
    try {
      parseSuite('cases: [unclosed', 'suite.yaml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ErrorCodes.CONFIG_PARSE_ERROR);
        expect(error.message).toBe('YAML syntax error in suite.yaml');
      }
    }
  });
});

describe('parseGlobalConfig', () => {
  it('reads defaults and actors', () => {
    const global = parseGlobalConfig(
      [
        'defaults:',
        '  baseUrl: http://localhost:8000',
        '  timeoutMs: 5000',
        'actors:',
        '  viewer:',
        '    kind: token',
        '    tokenEnv: VIEWER_TOKEN',
      ].join('\n'),
      'config.yaml'
    );

    expect(global.defaults).toEqual({ baseUrl: 'http://localhost:8000', timeoutMs: 5000 });
    expect(global.actors.viewer).toEqual({ kind: 'token', tokenEnv: 'VIEWER_TOKEN', headers: {} });
  });
});

describe('loadSpecs', () => {
  let tempDir: string;
  let paths: ProjectPaths;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'quarry-loader-'));
    paths = resolveProjectPaths(tempDir);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeSuite(relative: string, content: string): Promise<void> {
    const full = join(paths.suitesDir, relative);
    await mkdir(join(full, '..'), { recursive: true });
    await writeFile(full, content);
  }

  it('uses default global config when the file is missing', async () => {
    await writeSuite('a.yaml', 'name: a');

    const specs = await loadSpecs(paths);

    expect(specs.global).toEqual({ defaults: {}, actors: {}, fixtures: [] });
    expect(specs.globalBaseDir).toBe(paths.testsDir);
  });

  it('finds suites recursively, sorted by path, ignoring other files', async () => {
    await writeSuite('b.yaml', 'name: b');
    await writeSuite('nested/a.yml', 'name: a');
    await writeSuite('notes.txt', 'not a suite');

    const specs = await loadSpecs(paths);

    expect(specs.suites.map((s) => s.displayPath)).toEqual([
      'database/tests/suites/b.yaml',
      'database/tests/suites/nested/a.yml',
    ]);
  });

  it('fails when no suites exist', async () => {
    await expect(loadSpecs(paths)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_NO_SUITES });
  });

  it('rejects a case naming an undefined actor', async () => {
    await writeSuite(
      'a.yaml',
      ['cases:', '  - name: reads', '    kind: sql_expect', '    actor: ghost', '    sql: SELECT 1;'].join('\n')
    );

    await expect(loadSpecs(paths)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_UNKNOWN_REFERENCE,
      details: ["case 'reads': unknown actor 'ghost'"],
    });
  });

  it('accepts actors defined in the global config', async () => {
    await mkdir(paths.testsDir, { recursive: true });
    await writeFile(paths.testConfig, ['actors:', '  viewer:', '    kind: token', '    token: test-token'].join('\n'));
    await writeSuite(
      'a.yaml',
      ['cases:', '  - name: reads', '    kind: sql_expect', '    actor: viewer', '    sql: SELECT 1;'].join('\n')
    );

    const specs = await loadSpecs(paths);

    expect(specs.suites[0]?.spec.cases[0]?.actor).toBe('viewer');
  });
});
