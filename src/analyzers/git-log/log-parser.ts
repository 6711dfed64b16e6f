/**
 * Git Log Parser
 *
 * Main entry point: raw log text -> blocks -> (headers, changes) -> entries.
 * All-or-nothing: the first failing block fails the whole parse.
 */

import type { Logger } from '../../utils/analysis-logger.js';
import { NoopLogger } from '../../utils/analysis-logger.js';
import type { LogParseError } from '../errors.js';
import { segmentBlock, splitIntoBlocks } from './block-segmenter.js';
import { assembleBlock, concatBlocks } from './entry-assembler.js';
import { resolveLogFormat } from './log-format.js';
import type { Result } from './result.js';
import type { AmbiguousBlockPolicy, GitLogParseOptions, LogEntry, LogFormat, RawBlock } from './types.js';

export type ParseResult = Result<LogEntry[], LogParseError>;

export class GitLogParser {
  private readonly format: LogFormat;
  private readonly ambiguousBlocks: AmbiguousBlockPolicy;
  private readonly logger: Logger;

  constructor(options: GitLogParseOptions = {}, logger?: Logger) {
    this.format = resolveLogFormat(options.format);
    this.ambiguousBlocks = options.ambiguousBlocks ?? 'share';
    this.logger = logger || new NoopLogger();
  }

  /**
   * Parse a complete log export
   */
  parse(logText: string): ParseResult {
    const blocks = splitIntoBlocks(logText, this.format);
    this.logger.debug('Log split into blocks', { blocks: blocks.length });

    const result = concatBlocks(this.assembleAll(blocks));

    if (result.success) {
      this.logger.info('Log parsed', { entries: result.value.length });
    } else {
      this.logger.error('Log parsing failed', result.error);
    }
    return result;
  }

  // Lazy so that blocks after the first failure are never parsed
  private *assembleAll(blocks: ReadonlyArray<RawBlock>): Generator<Result<LogEntry[], LogParseError>> {
    for (const [index, block] of blocks.entries()) {
      const segmented = segmentBlock(block, this.format);
      if (segmented.headerLines.length === 0 && segmented.changeLines.length > 0) {
        this.logger.warn('Block has change lines but no header line', { block: index });
      } else if (segmented.headerLines.length > 1) {
        this.logger.debug('Block has several header lines', {
          block: index,
          headers: segmented.headerLines.length,
          policy: this.ambiguousBlocks,
        });
      }
      yield assembleBlock(segmented, { format: this.format, ambiguousBlocks: this.ambiguousBlocks });
    }
  }
}

/**
 * Parse a log export with the default format
 */
export function parse(logText: string, options: GitLogParseOptions = {}): ParseResult {
  return new GitLogParser(options).parse(logText);
}
