/**
 * Header Parser
 *
 * Turns one raw header line, e.g. `'--abc123--2023-01-01--Alice'`, into a
 * validated LogEntryHeader.
 */

import { InvalidTimestampError, MalformedHeaderError } from '../errors.js';
import { DEFAULT_LOG_FORMAT } from './log-format.js';
import { Err, mapResult, type Result } from './result.js';
import type { LogEntryHeader, LogFormat } from './types.js';
import { createAuthor, createCommitId, parseCommitTimestamp } from './values.js';

export type HeaderParseError = MalformedHeaderError | InvalidTimestampError;

/**
 * Split a header into its non-empty fields.
 * Quote characters are dropped first; empty fragments from leading or trailing
 * delimiters are discarded.
 */
export function splitHeaderFields(rawHeader: string, format: LogFormat = DEFAULT_LOG_FORMAT): string[] {
  const unquoted = format.quoteChar.length > 0 ? rawHeader.split(format.quoteChar).join('') : rawHeader;
  return unquoted.split(format.fieldDelimiter).filter(fragment => fragment.length > 0);
}

export function parseHeader(
  rawHeader: string,
  format: LogFormat = DEFAULT_LOG_FORMAT
): Result<LogEntryHeader, HeaderParseError> {
  const fields = splitHeaderFields(rawHeader, format);
  if (fields.length !== 3) {
    return Err(new MalformedHeaderError(rawHeader, fields.length));
  }

  const [rawId, rawDate, rawAuthor] = fields;
  const id = createCommitId(rawId);
  if (id === null) {
    return Err(new MalformedHeaderError(rawHeader, fields.length, 'commit id is blank'));
  }

  return mapResult(parseCommitTimestamp(rawDate, rawHeader), timestamp =>
    Object.freeze({
      id,
      timestamp,
      author: createAuthor(rawAuthor),
    })
  );
}

/**
 * Whether a block line introduces a commit
 */
export function isHeaderLine(line: string, format: LogFormat = DEFAULT_LOG_FORMAT): boolean {
  return line.startsWith(format.headerMarker);
}
