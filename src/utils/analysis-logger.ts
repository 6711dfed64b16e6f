/**
 * Analysis Logger
 *
 * Level-gated diagnostics for log parsing. Everything goes to stderr so that
 * `--json` output on stdout stays machine-readable.
 */

import { AnalysisError } from '../analyzers/errors.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return value ? LEVEL_NAMES[value.trim().toLowerCase()] : undefined;
}

/**
 * Analysis errors contribute their code and context (raw line, field count…);
 * anything else its message and stack.
 */
function describeError(error: Error): Record<string, unknown> {
  if (error instanceof AnalysisError) {
    return { code: error.code, ...error.context };
  }
  return { message: error.message, stack: error.stack };
}

/**
 * Console-based logger writing `[prefix] LEVEL message` lines to stderr
 */
export class ConsoleLogger implements Logger {
  constructor(
    readonly level: LogLevel = LogLevel.WARN,
    private readonly prefix: string = 'git-log-miner'
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const details = error ? { ...describeError(error), ...context } : context;
    this.emit(LogLevel.ERROR, error ? `${message}: ${error.message}` : message, details);
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const line = `[${this.prefix}] ${LogLevel[level]} ${message}`;
    if (context && Object.keys(context).length > 0) {
      console.error(line, context);
    } else {
      console.error(line);
    }
  }
}

/**
 * No-op logger, the parser's default when no logger is given
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Create a logger based on environment
 *
 * DEBUG=1 (or true) wins, then LOG_LEVEL=debug|info|warn|error|none,
 * then the caller's fallback.
 */
export function createLogger(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = LogLevel.WARN
): ConsoleLogger {
  if (env.DEBUG === '1' || env.DEBUG === 'true') {
    return new ConsoleLogger(LogLevel.DEBUG);
  }
  return new ConsoleLogger(parseLogLevel(env.LOG_LEVEL) ?? fallback);
}
