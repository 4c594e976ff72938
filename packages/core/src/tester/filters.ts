/**
 * Suite / case selection
 *
 * @module packages/core/tester/filters
 */

import type { FilterInput, LoadedSuite } from './types.js';

/**
 * Glob match supporting `*` (any run, including empty) and `?` (one
 * character). Every other character matches itself.
 */
export function globMatch(pattern: string, text: string): boolean {
  const p = Array.from(pattern);
  const t = Array.from(text);

  // dp[i][j]: first i pattern chars match first j text chars
  const dp: boolean[][] = Array.from({ length: p.length + 1 }, () =>
    new Array<boolean>(t.length + 1).fill(false)
  );
  const row = (i: number): boolean[] => dp[i] ?? [];

  row(0)[0] = true;
  for (let i = 1; i <= p.length; i++) {
    if (p[i - 1] === '*') {
      row(i)[0] = row(i - 1)[0] ?? false;
    }
  }

  for (let i = 1; i <= p.length; i++) {
    const ch = p[i - 1];
    for (let j = 1; j <= t.length; j++) {
      if (ch === '*') {
        row(i)[j] = (row(i - 1)[j] ?? false) || (row(i)[j - 1] ?? false);
      } else if (ch === '?' || ch === t[j - 1]) {
        row(i)[j] = row(i - 1)[j - 1] ?? false;
      }
    }
  }

  return row(p.length)[t.length] ?? false;
}

/** Display name of a suite: its declared name, else its path */
export function suiteDisplayName(suite: LoadedSuite): string {
  return suite.spec.name ?? suite.displayPath;
}

/**
 * Keep the suites and cases selected by the filters. Suites left without
 * cases are dropped. Input suites are not mutated.
 */
export function applyFilters(suites: readonly LoadedSuite[], filters: FilterInput): LoadedSuite[] {
  const suitePattern = filters.suitePattern ?? '*';
  const casePattern = filters.casePattern ?? '*';

  const selected: LoadedSuite[] = [];
  for (const suite of suites) {
    if (!globMatch(suitePattern, suiteDisplayName(suite)) && !globMatch(suitePattern, suite.displayPath)) {
      continue;
    }

    const suiteTags = new Set(suite.spec.tags);
    const cases = suite.spec.cases.filter(
      (testCase) =>
        globMatch(casePattern, testCase.name) &&
        filters.tags.every((tag) => suiteTags.has(tag) || testCase.tags.includes(tag))
    );

    if (cases.length > 0) {
      selected.push({ ...suite, spec: { ...suite.spec, cases } });
    }
  }
  return selected;
}
