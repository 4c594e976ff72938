/**
 * Filter Tests
 *
 * @module packages/core/tester/__tests__/filters.test
 */

import { describe, it, expect } from 'vitest';

import { applyFilters, globMatch, suiteDisplayName } from '../filters.js';
import { parseSuite } from '../loader.js';
import type { LoadedSuite } from '../types.js';

function suite(displayPath: string, yaml: string): LoadedSuite {
  return { path: `/project/${displayPath}`, displayPath, spec: parseSuite(yaml, displayPath) };
}

const people = suite(
  'database/tests/suites/people.yaml',
  [
    'name: people',
    'tags: [smoke]',
    'cases:',
    '  - name: create person',
    '    kind: sql_expect',
    '    sql: CREATE person;',
    '  - name: delete person',
    '    kind: sql_expect',
    '    tags: [slow]',
    '    sql: DELETE person;',
  ].join('\n')
);

const pets = suite(
  'database/tests/suites/pets.yaml',
  ['cases:', '  - name: create pet', '    kind: sql_expect', '    tags: [slow]', '    sql: CREATE pet;'].join('\n')
);

describe('globMatch', () => {
  it('matches stars against any run, including empty', () => {
    expect(globMatch('*', '')).toBe(true);
    expect(globMatch('a*', 'a')).toBe(true);
    expect(globMatch('*son', 'person')).toBe(true);
  });

  it('matches question marks against exactly one character', () => {
    expect(globMatch('a?c', 'abc')).toBe(true);
    expect(globMatch('a?c', 'abd')).toBe(false);
    expect(globMatch('a?c', 'ac')).toBe(false);
  });

  it('treats other characters literally', () => {
    expect(globMatch('a.c', 'abc')).toBe(false);
    expect(globMatch('a.c', 'a.c')).toBe(true);
  });
});

describe('suiteDisplayName', () => {
  it('prefers the declared name over the path', () => {
    expect(suiteDisplayName(people)).toBe('people');
    expect(suiteDisplayName(pets)).toBe('database/tests/suites/pets.yaml');
  });
});

describe('applyFilters', () => {
  it('keeps everything without filters', () => {
    const selected = applyFilters([people, pets], { tags: [] });

    expect(selected.map((s) => s.spec.cases.length)).toEqual([2, 1]);
  });

  it('matches suites by name or path', () => {
    expect(applyFilters([people, pets], { suitePattern: 'people', tags: [] })).toHaveLength(1);
    expect(applyFilters([people, pets], { suitePattern: '*pets.yaml', tags: [] })[0]?.displayPath).toBe(
      'database/tests/suites/pets.yaml'
    );
  });

  it('drops suites left without cases', () => {
    const selected = applyFilters([people, pets], { casePattern: 'delete*', tags: [] });

    expect(selected.map((s) => s.spec.name)).toEqual(['people']);
    expect(selected[0]?.spec.cases.map((c) => c.name)).toEqual(['delete person']);
  });

  it('requires every tag on the case or its suite', () => {
    const selected = applyFilters([people, pets], { tags: ['smoke', 'slow'] });

    expect(selected).toHaveLength(1);
    expect(selected[0]?.spec.cases.map((c) => c.name)).toEqual(['delete person']);
  });

  it('does not mutate the input', () => {
    applyFilters([people], { casePattern: 'nothing', tags: [] });

    expect(people.spec.cases).toHaveLength(2);
  });
});
