/**
 * Value Parsers
 *
 * Smart constructors for the scalar values of a log entry.
 */

import { InvalidTimestampError } from '../errors.js';
import { Err, Ok, type Result } from './result.js';
import type { Author, CommitId, CommitTimestamp, FilePath, LineDelta } from './types.js';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

// 16-bit signed range; counts outside it are not treated as numbers
export const MIN_LINE_COUNT = -32768;
export const MAX_LINE_COUNT = 32767;

const notApplicable: LineDelta = { kind: 'not-applicable' };
export const NOT_APPLICABLE: LineDelta = Object.freeze(notApplicable);

/**
 * Smart constructor for CommitId
 * Returns null when nothing is left after trimming
 */
export function createCommitId(raw: string): CommitId | null {
  const id = raw.trim();
  if (id.length === 0) {
    return null;
  }
  return id as CommitId;
}

export function createAuthor(raw: string): Author {
  return raw as Author;
}

export function createFilePath(raw: string): FilePath {
  return raw as FilePath;
}

/**
 * Parse a line count field.
 *
 * Integer text within the 16-bit signed range becomes a concrete count;
 * anything else (`-` for binary files, empty text, integers outside
 * [-32768, 32767]) becomes NOT_APPLICABLE.
 */
export function parseLineDelta(raw: string): LineDelta {
  if (!INTEGER_PATTERN.test(raw)) {
    return NOT_APPLICABLE;
  }
  const count = Number(raw);
  if (count < MIN_LINE_COUNT || count > MAX_LINE_COUNT) {
    return NOT_APPLICABLE;
  }
  const delta: LineDelta = { kind: 'lines', count };
  return Object.freeze(delta);
}

/**
 * Parse the date field of a header. `rawLine` is the header the date came from,
 * reported back in the error.
 */
export function parseCommitTimestamp(
  raw: string,
  rawLine: string = raw
): Result<CommitTimestamp, InvalidTimestampError> {
  const text = raw.trim();
  if (text.length === 0) {
    return Err(new InvalidTimestampError(rawLine, raw, 'Date text is empty'));
  }

  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    return Err(new InvalidTimestampError(rawLine, raw, `"${text}" is not a recognized date/time format`));
  }
  return Ok(date as CommitTimestamp);
}

export function lineCount(delta: LineDelta): number {
  return delta.kind === 'lines' ? delta.count : 0;
}
