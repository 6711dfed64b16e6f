/**
 * Change Parser
 *
 * Turns one `--numstat` line (`<added>\t<removed>\t<path>`) into a ChangeRecord.
 */

import { MalformedChangeError } from '../errors.js';
import { DEFAULT_LOG_FORMAT } from './log-format.js';
import { Err, Ok, type Result } from './result.js';
import type { ChangeRecord, LogFormat } from './types.js';
import { createFilePath, parseLineDelta } from './values.js';

export function parseChange(
  rawChange: string,
  format: LogFormat = DEFAULT_LOG_FORMAT
): Result<ChangeRecord, MalformedChangeError> {
  const fields = rawChange.split(format.changeSeparator);
  if (fields.length !== 3) {
    return Err(new MalformedChangeError(rawChange, fields.length));
  }

  const [added, removed, path] = fields;
  return Ok(
    Object.freeze({
      addedLines: parseLineDelta(added),
      removedLines: parseLineDelta(removed),
      path: createFilePath(path),
    })
  );
}
