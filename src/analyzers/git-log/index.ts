/**
 * Git Log Module
 */

export { GitLogParser, parse } from './log-parser.js';
export type { ParseResult } from './log-parser.js';
export { parseHeader, splitHeaderFields, isHeaderLine } from './header-parser.js';
export type { HeaderParseError } from './header-parser.js';
export { parseChange } from './change-parser.js';
export { splitIntoBlocks, segmentBlock } from './block-segmenter.js';
export { assembleBlock, concatBlocks, mergeHeaderWithChanges } from './entry-assembler.js';
export type { AssembleOptions } from './entry-assembler.js';
export { summarize, countRevisions } from './summary.js';
export { DEFAULT_LOG_FORMAT, resolveLogFormat, gitLogCommand } from './log-format.js';
export {
  NOT_APPLICABLE,
  parseLineDelta,
  parseCommitTimestamp,
  createCommitId,
  createAuthor,
  createFilePath,
  lineCount,
} from './values.js';
export { Ok, Err, mapResult, andThen, traverse } from './result.js';
export type { Result } from './result.js';

export type {
  CommitId,
  Author,
  FilePath,
  CommitTimestamp,
  LineDelta,
  ChangeRecord,
  LogEntryHeader,
  LogEntry,
  RawBlock,
  SegmentedBlock,
  Summary,
  FileRevisions,
  AmbiguousBlockPolicy,
  LogFormat,
  GitLogParseOptions,
} from './types.js';
