import { Command } from 'commander';
import chalk from 'chalk';
import { gitLogCommand, resolveLogFormat } from '../analyzers/git-log/log-format.js';
import { loadLogFormatConfig } from '../utils/config-loader.js';
import { ErrorCategory, createErrorMessage } from '../utils/error-handler.js';

/**
 * Create the format command
 *
 * Prints the git invocation whose output the parser expects
 */
export function createFormatCommand(): Command {
  const formatCommand = new Command('format');
  formatCommand
    .description('Print the git log command that produces a parsable export')
    .option('-f, --format-file <path>', 'YAML file describing the log delimiters')
    .action((options: { formatFile?: string }) => {
      try {
        const format = resolveLogFormat(loadLogFormatConfig(options.formatFile).format);
        console.log(`${gitLogCommand(format)} > history.log`);
      } catch (error: unknown) {
        console.error(chalk.red(createErrorMessage(ErrorCategory.CONFIGURATION, 'Loading log format', error, {
          filePath: options.formatFile,
        })));
        process.exit(1);
      }
    });

  return formatCommand;
}
