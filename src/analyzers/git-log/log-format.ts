/**
 * Log Format
 *
 * Delimiters of the history export produced by
 *   git log --pretty=format:"'--%h--%ad--%aN'" --date=short --numstat
 */

import { ValidationError } from '../errors.js';
import { LogFormatSchema } from '../../schemas/log-format-schemas.js';
import type { LogFormat } from './types.js';

export const DEFAULT_LOG_FORMAT: LogFormat = Object.freeze({
  quoteChar: "'",
  fieldDelimiter: '--',
  headerMarker: "'--",
  changeSeparator: '\t',
  blockDelimiter: '\n\n',
  lineDelimiter: '\n',
});

/**
 * Merge caller overrides onto the default format and validate the result
 */
export function resolveLogFormat(overrides: Partial<LogFormat> = {}): LogFormat {
  const merged = { ...DEFAULT_LOG_FORMAT, ...overrides };
  const result = LogFormatSchema.safeParse(merged);
  if (!result.success) {
    throw new ValidationError(`Invalid log format: ${result.error.issues.map(issue => issue.message).join('; ')}`, {
      format: merged,
    });
  }
  return Object.freeze(result.data);
}

/**
 * Command line that exports a log in the given format
 */
export function gitLogCommand(format: LogFormat = DEFAULT_LOG_FORMAT): string {
  const { quoteChar: q, fieldDelimiter: d } = format;
  return `git log --pretty=format:"${q}${d}%h${d}%ad${d}%aN${q}" --date=short --numstat`;
}
