/**
 * Block Segmenter
 *
 * Splits the raw log into blank-line-delimited blocks and classifies the lines
 * of each block. A blank line inside one commit's change list is read as a
 * block boundary; git never prints one there.
 */

import { isHeaderLine } from './header-parser.js';
import { DEFAULT_LOG_FORMAT } from './log-format.js';
import type { LogFormat, RawBlock, SegmentedBlock } from './types.js';

const CRLF = /\r\n/g;

/**
 * Drop empty lines at both ends of a block, keeping interior lines untouched
 */
function trimEmptyLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].length === 0) start++;
  while (end > start && lines[end - 1].length === 0) end--;
  return lines.slice(start, end);
}

/**
 * CRLF is folded into LF only for LF-delimited formats; a format that
 * declares CRLF delimiters sees the text untouched.
 */
export function splitIntoBlocks(logText: string, format: LogFormat = DEFAULT_LOG_FORMAT): RawBlock[] {
  const normalized = format.lineDelimiter === '\n' ? logText.replace(CRLF, '\n') : logText;
  const blocks: RawBlock[] = [];

  for (const rawBlock of normalized.split(format.blockDelimiter)) {
    const lines = trimEmptyLines(rawBlock.split(format.lineDelimiter));
    if (lines.length === 0) continue;
    blocks.push(Object.freeze({ lines: Object.freeze(lines) }));
  }

  return blocks;
}

/**
 * Leading header-marked lines are headers; everything after the first
 * non-header line is a change line, whatever it looks like.
 */
export function segmentBlock(block: RawBlock, format: LogFormat = DEFAULT_LOG_FORMAT): SegmentedBlock {
  let headerCount = 0;
  while (headerCount < block.lines.length && isHeaderLine(block.lines[headerCount], format)) {
    headerCount++;
  }

  return Object.freeze({
    headerLines: block.lines.slice(0, headerCount),
    changeLines: block.lines.slice(headerCount),
  });
}
