/**
 * Entry Assembler
 *
 * Pairs the parsed headers of a block with its parsed change list.
 */

import { AmbiguousBlockError, type LogParseError } from '../errors.js';
import { parseChange } from './change-parser.js';
import { parseHeader } from './header-parser.js';
import { DEFAULT_LOG_FORMAT } from './log-format.js';
import { Err, Ok, traverse, type Result } from './result.js';
import type {
  AmbiguousBlockPolicy,
  ChangeRecord,
  LogEntry,
  LogEntryHeader,
  LogFormat,
  SegmentedBlock,
} from './types.js';

export interface AssembleOptions {
  readonly format?: LogFormat;
  readonly ambiguousBlocks?: AmbiguousBlockPolicy;
}

export function mergeHeaderWithChanges(
  header: LogEntryHeader,
  changes: ReadonlyArray<ChangeRecord>
): LogEntry {
  return Object.freeze({
    id: header.id,
    timestamp: header.timestamp,
    author: header.author,
    changes,
  });
}

/**
 * Assemble the entries of one block.
 *
 * Headers and changes are parsed independently; a header failure is reported
 * before a change failure. Every header of the block receives the same change
 * list unless ambiguous blocks are rejected.
 */
export function assembleBlock(
  block: SegmentedBlock,
  options: AssembleOptions = {}
): Result<LogEntry[], LogParseError> {
  const format = options.format ?? DEFAULT_LOG_FORMAT;

  if (options.ambiguousBlocks === 'reject' && block.headerLines.length > 1) {
    return Err(new AmbiguousBlockError(block.headerLines));
  }

  const headers = traverse(block.headerLines.map(line => parseHeader(line, format)));
  if (!headers.success) {
    return headers;
  }

  const changes = traverse(block.changeLines.map(line => parseChange(line, format)));
  if (!changes.success) {
    return changes;
  }

  const sharedChanges = Object.freeze(changes.value);
  return Ok(headers.value.map(header => mergeHeaderWithChanges(header, sharedChanges)));
}

/**
 * Concatenate block results in order, failing with the first failed block
 */
export function concatBlocks<E>(blockResults: Iterable<Result<LogEntry[], E>>): Result<LogEntry[], E> {
  const blocks = traverse(blockResults);
  if (!blocks.success) {
    return blocks;
  }
  return Ok(blocks.value.flat());
}
