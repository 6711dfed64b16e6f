/**
 * Tests for utils/analysis-logger.ts
 */
import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  ConsoleLogger,
  LogLevel,
  NoopLogger,
  createLogger,
  parseLogLevel,
} from '../../src/utils/analysis-logger.js';
import { MalformedChangeError } from '../../src/analyzers/errors.js';

describe('ConsoleLogger', () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print messages at or above its level to stderr', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);

    logger.debug('hidden');
    logger.info('Log parsed', { entries: 2 });
    logger.warn('Block has several header lines');

    expect(consoleErrorSpy.mock.calls).toEqual([
      ['[git-log-miner] INFO Log parsed', { entries: 2 }],
      ['[git-log-miner] WARN Block has several header lines'],
    ]);
  });

  it('should use the given prefix', () => {
    new ConsoleLogger(LogLevel.DEBUG, 'miner').debug('Log split into blocks', { blocks: 4 });

    expect(consoleErrorSpy).toHaveBeenCalledWith('[miner] DEBUG Log split into blocks', { blocks: 4 });
  });

  it('should expand a parse error into its code and context', () => {
    const logger = new ConsoleLogger(LogLevel.ERROR);
    const error = new MalformedChangeError('5\tfoo.txt', 2);

    logger.error('Log parsing failed', error, { block: 3 });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      `[git-log-miner] ERROR Log parsing failed: ${error.message}`,
      { code: 'MALFORMED_CHANGE', fieldCount: 2, rawLine: '5\tfoo.txt', block: 3 }
    );
  });

  it('should include message and stack of a plain error', () => {
    const logger = new ConsoleLogger(LogLevel.ERROR);
    const error = new Error('boom');

    logger.error('Reading log failed', error);

    expect(consoleErrorSpy).toHaveBeenCalledWith('[git-log-miner] ERROR Reading log failed: boom', {
      message: 'boom',
      stack: error.stack,
    });
  });

  it('should print nothing at NONE', () => {
    const logger = new ConsoleLogger(LogLevel.NONE);

    logger.error('quiet');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('should let NoopLogger swallow everything', () => {
    const logger = new NoopLogger();

    logger.debug();
    logger.info();
    logger.warn();
    logger.error();

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('info')).toBe(LogLevel.INFO);
    expect(parseLogLevel(' ERROR ')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('none')).toBe(LogLevel.NONE);
  });

  it('should return undefined for unknown or missing names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('createLogger', () => {
  it('should default to WARN', () => {
    expect(createLogger({}).level).toBe(LogLevel.WARN);
  });

  it('should use the caller fallback when the environment is silent', () => {
    expect(createLogger({}, LogLevel.NONE).level).toBe(LogLevel.NONE);
  });

  it('should enable DEBUG through the environment', () => {
    expect(createLogger({ DEBUG: '1' }, LogLevel.NONE).level).toBe(LogLevel.DEBUG);
    expect(createLogger({ DEBUG: 'true' }).level).toBe(LogLevel.DEBUG);
    expect(createLogger({ DEBUG: 'no' }).level).toBe(LogLevel.WARN);
  });

  it('should read LOG_LEVEL', () => {
    expect(createLogger({ LOG_LEVEL: 'info' }, LogLevel.NONE).level).toBe(LogLevel.INFO);
    expect(createLogger({ LOG_LEVEL: 'loud' }, LogLevel.ERROR).level).toBe(LogLevel.ERROR);
  });
});
