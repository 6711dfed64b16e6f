import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'fs/promises';
import { GitLogParser } from '../analyzers/git-log/log-parser.js';
import type { GitLogParseOptions, LogEntry } from '../analyzers/git-log/types.js';
import { LogLevel, createLogger } from '../utils/analysis-logger.js';
import { loadLogFormatConfig } from '../utils/config-loader.js';
import { ErrorCategory, createErrorMessage, formatParseFailure } from '../utils/error-handler.js';

export const STDIN_MARKER = '-';

export interface ParseCommandOptions {
  json?: boolean;
  rejectAmbiguous?: boolean;
  formatFile?: string;
  verbose?: boolean;
}

/**
 * Register the options every parsing command accepts
 */
export function addParseOptions(command: Command): Command {
  return command
    .option('-j, --json', 'Output in JSON format')
    .option('--reject-ambiguous', 'Fail on blocks with more than one header line')
    .option('-f, --format-file <path>', 'YAML file describing the log delimiters')
    .option('-v, --verbose', 'Print parser diagnostics to stderr');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function readLogText(file: string): Promise<string> {
  if (file === STDIN_MARKER) {
    return readStdin();
  }
  return readFile(file, 'utf8');
}

export function resolveParseOptions(options: ParseCommandOptions): GitLogParseOptions {
  const config = loadLogFormatConfig(options.formatFile);
  return {
    format: config.format,
    ambiguousBlocks: options.rejectAmbiguous ? 'reject' : config.ambiguousBlocks,
  };
}

/**
 * Read and parse a log for a command. Prints the failure and exits with 1
 * when the file, the format file or the log itself is invalid.
 */
export async function loadEntries(file: string, options: ParseCommandOptions): Promise<LogEntry[]> {
  let parser: GitLogParser;
  try {
    // Failures are rendered below, so diagnostics stay silent unless asked for
    const logger = createLogger(process.env, options.verbose ? LogLevel.DEBUG : LogLevel.NONE);
    parser = new GitLogParser(resolveParseOptions(options), logger);
  } catch (error: unknown) {
    console.error(chalk.red(createErrorMessage(ErrorCategory.CONFIGURATION, 'Loading log format', error, {
      filePath: options.formatFile,
    })));
    process.exit(1);
  }

  let logText: string;
  try {
    logText = await readLogText(file);
  } catch (error: unknown) {
    console.error(chalk.red(createErrorMessage(ErrorCategory.FILE_OPERATION, 'Reading log', error, {
      filePath: file,
    })));
    process.exit(1);
  }

  const result = parser.parse(logText);
  if (!result.success) {
    if (options.json) {
      console.log(JSON.stringify({ success: false, error: result.error.toJSON() }, null, 2));
    } else {
      console.error(chalk.red(formatParseFailure(result.error)));
    }
    process.exit(1);
  }

  return result.value;
}
