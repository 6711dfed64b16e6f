/**
 * Git Log Types
 */

// Nominal typing via branded types
declare const __brand: unique symbol;
type Brand<T, TBrand> = T & { readonly [__brand]: TBrand };

/** Opaque commit identifier, never empty */
export type CommitId = Brand<string, 'CommitId'>;

/** Free-text author name, compared by exact string match */
export type Author = Brand<string, 'Author'>;

/** Repository-relative path, not normalized */
export type FilePath = Brand<string, 'FilePath'>;

/** A commit date that parsed to a valid point in time */
export type CommitTimestamp = Brand<Date, 'CommitTimestamp'>;

/**
 * Added or removed line count of one file change.
 * `not-applicable` marks a non-numeric count field, as git prints `-` for binary files.
 */
export type LineDelta =
  | { readonly kind: 'lines'; readonly count: number }
  | { readonly kind: 'not-applicable' };

export interface ChangeRecord {
  readonly addedLines: LineDelta;
  readonly removedLines: LineDelta;
  readonly path: FilePath;
}

export interface LogEntryHeader {
  readonly id: CommitId;
  readonly timestamp: CommitTimestamp;
  readonly author: Author;
}

/**
 * One commit with every file it touched, in log order
 */
export interface LogEntry extends LogEntryHeader {
  readonly changes: ReadonlyArray<ChangeRecord>;
}

/**
 * One blank-line-delimited chunk of the log, split into lines
 */
export interface RawBlock {
  readonly lines: ReadonlyArray<string>;
}

/**
 * A block after header/change classification
 */
export interface SegmentedBlock {
  readonly headerLines: ReadonlyArray<string>;
  readonly changeLines: ReadonlyArray<string>;
}

export interface Summary {
  readonly authorsCount: number;
  readonly commitsCount: number;
  readonly distinctFilesCount: number;
  readonly totalChangedFilesCount: number;
}

/**
 * Revision metrics of a single file
 */
export interface FileRevisions {
  readonly path: FilePath;
  readonly revisions: number; // Number of change records touching this file
  readonly linesAdded: number; // Sum of concrete added counts
  readonly linesRemoved: number; // Sum of concrete removed counts
}

export type AmbiguousBlockPolicy = 'share' | 'reject';

/**
 * Delimiters of the exported log
 */
export interface LogFormat {
  readonly quoteChar: string;
  readonly fieldDelimiter: string;
  readonly headerMarker: string;
  readonly changeSeparator: string;
  readonly blockDelimiter: string;
  readonly lineDelimiter: string;
}

export interface GitLogParseOptions {
  readonly format?: Partial<LogFormat>;
  readonly ambiguousBlocks?: AmbiguousBlockPolicy;
}
