/**
 * Analysis Error Classes
 *
 * Structured error hierarchy for log analysis.
 * All errors extend from AnalysisError and carry a machine-readable code plus context.
 */

/**
 * Base error class for all analysis errors
 */
export abstract class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when configuration or caller-supplied options fail validation
 */
export class ValidationError extends AnalysisError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

export type LogParseErrorCode =
  | 'MALFORMED_HEADER'
  | 'INVALID_TIMESTAMP'
  | 'MALFORMED_CHANGE'
  | 'AMBIGUOUS_BLOCK';

/**
 * Base class for every failure produced while parsing a history log.
 * `rawLine` is the offending input exactly as it appeared in the log.
 */
export abstract class LogParseError extends AnalysisError {
  declare readonly code: LogParseErrorCode;

  constructor(
    message: string,
    code: LogParseErrorCode,
    public readonly rawLine: string,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, rawLine });
  }
}

/**
 * A header line did not split into exactly 3 non-empty fields
 */
export class MalformedHeaderError extends LogParseError {
  constructor(rawLine: string, public readonly fieldCount: number, detail?: string) {
    super(
      `Wrong format of log entry header (${detail ?? `expected 3 fields, got ${fieldCount}`}). ` +
        `Check the --pretty=format argument of the git log export. Raw header: ${rawLine}`,
      'MALFORMED_HEADER',
      rawLine,
      { fieldCount }
    );
  }
}

/**
 * A header's date field could not be parsed
 */
export class InvalidTimestampError extends LogParseError {
  constructor(
    rawLine: string,
    public readonly rawTimestamp: string,
    public readonly reason: string
  ) {
    super(
      `Invalid commit date "${rawTimestamp}" in header ${rawLine}: ${reason}`,
      'INVALID_TIMESTAMP',
      rawLine,
      { rawTimestamp, reason }
    );
  }
}

/**
 * A change line did not split into exactly 3 separated fields
 */
export class MalformedChangeError extends LogParseError {
  constructor(rawLine: string, public readonly fieldCount: number) {
    super(
      `Wrong format of file change (expected 3 fields, got ${fieldCount}). Raw change: ${rawLine}`,
      'MALFORMED_CHANGE',
      rawLine,
      { fieldCount }
    );
  }
}

/**
 * A block holds more than one header line while ambiguous blocks are rejected
 */
export class AmbiguousBlockError extends LogParseError {
  constructor(public readonly headerLines: ReadonlyArray<string>) {
    super(
      `Block contains ${headerLines.length} header lines sharing one change list`,
      'AMBIGUOUS_BLOCK',
      headerLines[0] ?? '',
      { headerLines: [...headerLines] }
    );
  }
}
