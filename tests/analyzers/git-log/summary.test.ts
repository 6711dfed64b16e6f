/**
 * Summary Aggregator Tests
 */

import { describe, it, expect } from 'vitest';
import { parse } from '../../../src/analyzers/git-log/log-parser.js';
import { countRevisions, summarize } from '../../../src/analyzers/git-log/summary.js';
import type { LogEntry } from '../../../src/analyzers/git-log/types.js';

function parseOrThrow(log: string): LogEntry[] {
  const result = parse(log);
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}

const HISTORY = parseOrThrow(
  [
    "'--c1--2023-01-01--Alice'",
    '10\t0\tsrc/app.ts',
    '5\t0\tREADME.md',
    '',
    "'--c2--2023-01-02--Bob'",
    '3\t2\tsrc/app.ts',
    '-\t-\tlogo.png',
    '',
    "'--c3--2023-01-03--Alice'",
    '1\t1\tsrc/app.ts',
    '',
    "'--c4--2023-01-04--Carol'",
  ].join('\n')
);

describe('summarize', () => {
  it('should count the two-commit example', () => {
    const entries = parseOrThrow(
      "'--abc123--2023-01-01--Alice'\n\n'--def456--2023-01-02--Bob'\n3\t1\tfoo.txt\n-\t-\tbin.dat"
    );

    expect(summarize(entries)).toEqual({
      authorsCount: 2,
      commitsCount: 2,
      distinctFilesCount: 2,
      totalChangedFilesCount: 2,
    });
  });

  it('should count a file touched by two commits once as distinct and twice as changed', () => {
    const entries = parseOrThrow(
      "'--a--2023-01-01--Alice'\n1\t0\tfoo.txt\n\n'--b--2023-01-02--Alice'\n2\t1\tfoo.txt"
    );

    expect(summarize(entries)).toEqual({
      authorsCount: 1,
      commitsCount: 2,
      distinctFilesCount: 1,
      totalChangedFilesCount: 2,
    });
  });

  it('should summarize a longer history', () => {
    expect(summarize(HISTORY)).toEqual({
      authorsCount: 3,
      commitsCount: 4,
      distinctFilesCount: 3,
      totalChangedFilesCount: 5,
    });
  });

  it('should return zeros for no entries', () => {
    expect(summarize([])).toEqual({
      authorsCount: 0,
      commitsCount: 0,
      distinctFilesCount: 0,
      totalChangedFilesCount: 0,
    });
  });

  it('should not depend on entry order', () => {
    const reversed = [...HISTORY].reverse();
    const rotated = [...HISTORY.slice(2), ...HISTORY.slice(0, 2)];

    expect(summarize(reversed)).toEqual(summarize(HISTORY));
    expect(summarize(rotated)).toEqual(summarize(HISTORY));
  });

  it('should give the same output when run twice', () => {
    expect(summarize(HISTORY)).toEqual(summarize(HISTORY));
  });

  it('should compare authors by exact string', () => {
    const entries = parseOrThrow("'--a--2023-01-01--alice'\n\n'--b--2023-01-02--Alice'");

    expect(summarize(entries).authorsCount).toBe(2);
  });
});

describe('countRevisions', () => {
  it('should count revisions and concrete line totals per file', () => {
    expect(countRevisions(HISTORY)).toEqual([
      { path: 'src/app.ts', revisions: 3, linesAdded: 14, linesRemoved: 3 },
      { path: 'README.md', revisions: 1, linesAdded: 5, linesRemoved: 0 },
      { path: 'logo.png', revisions: 1, linesAdded: 0, linesRemoved: 0 },
    ]);
  });

  it('should return an empty list for no entries', () => {
    expect(countRevisions([])).toEqual([]);
  });
});
