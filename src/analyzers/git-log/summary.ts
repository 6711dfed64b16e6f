/**
 * Summary Aggregator
 *
 * Pure counts over a parsed entry collection. Input order never matters.
 */

import type { FilePath, FileRevisions, LogEntry, Summary } from './types.js';
import { lineCount } from './values.js';

export function countAuthors(entries: ReadonlyArray<LogEntry>): number {
  return new Set(entries.map(entry => entry.author)).size;
}

export function countCommits(entries: ReadonlyArray<LogEntry>): number {
  return entries.length;
}

export function countDistinctFiles(entries: ReadonlyArray<LogEntry>): number {
  return new Set(entries.flatMap(entry => entry.changes.map(change => change.path))).size;
}

// A file touched by two commits counts twice
export function countChangedFiles(entries: ReadonlyArray<LogEntry>): number {
  return entries.reduce((sum, entry) => sum + entry.changes.length, 0);
}

export function summarize(entries: ReadonlyArray<LogEntry>): Summary {
  return Object.freeze({
    authorsCount: countAuthors(entries),
    commitsCount: countCommits(entries),
    distinctFilesCount: countDistinctFiles(entries),
    totalChangedFilesCount: countChangedFiles(entries),
  });
}

/**
 * Number of revisions and concrete line totals per file.
 * Sorted by revisions (descending), then path.
 */
export function countRevisions(entries: ReadonlyArray<LogEntry>): FileRevisions[] {
  const revisionMap = new Map<FilePath, { revisions: number; added: number; removed: number }>();

  for (const entry of entries) {
    for (const change of entry.changes) {
      const current = revisionMap.get(change.path) ?? { revisions: 0, added: 0, removed: 0 };
      revisionMap.set(change.path, {
        revisions: current.revisions + 1,
        added: current.added + lineCount(change.addedLines),
        removed: current.removed + lineCount(change.removedLines),
      });
    }
  }

  const result: FileRevisions[] = [];
  for (const [path, data] of revisionMap.entries()) {
    result.push(
      Object.freeze({
        path,
        revisions: data.revisions,
        linesAdded: data.added,
        linesRemoved: data.removed,
      })
    );
  }

  return result.sort((a, b) => b.revisions - a.revisions || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
