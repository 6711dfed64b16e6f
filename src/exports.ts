/**
 * Public library surface
 */

export * from './analyzers/git-log/index.js';
export {
  AnalysisError,
  ValidationError,
  LogParseError,
  MalformedHeaderError,
  InvalidTimestampError,
  MalformedChangeError,
  AmbiguousBlockError,
} from './analyzers/errors.js';
export type { LogParseErrorCode } from './analyzers/errors.js';
export { ConsoleLogger, NoopLogger, LogLevel, createLogger } from './utils/analysis-logger.js';
export type { Logger } from './utils/analysis-logger.js';
export { loadLogFormatConfig, clearConfigCache } from './utils/config-loader.js';
export type { LogFormatConfig } from './utils/config-loader.js';
