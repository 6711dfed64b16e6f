import { Command } from 'commander';
import chalk from 'chalk';
import { summarize } from '../analyzers/git-log/summary.js';
import type { Summary } from '../analyzers/git-log/types.js';
import { addParseOptions, loadEntries, type ParseCommandOptions } from './shared.js';

export function renderSummary(summary: Summary): string[] {
  return [
    chalk.bold.blue('📊 Repository Summary'),
    chalk.gray('─'.repeat(40)),
    `  Commits:             ${chalk.cyan(summary.commitsCount.toLocaleString('en-US'))}`,
    `  Authors:             ${chalk.cyan(summary.authorsCount.toLocaleString('en-US'))}`,
    `  Distinct files:      ${chalk.cyan(summary.distinctFilesCount.toLocaleString('en-US'))}`,
    `  Changed files:       ${chalk.cyan(summary.totalChangedFilesCount.toLocaleString('en-US'))}`,
  ];
}

/**
 * Create the summary command
 *
 * Prints commit, author and file counts of an exported log
 */
export function createSummaryCommand(): Command {
  const summaryCommand = new Command('summary');
  summaryCommand
    .description('Summarize an exported git log (use - for stdin)')
    .argument('<file>', 'Log file produced by the command shown by `format`');

  addParseOptions(summaryCommand).action(async (file: string, options: ParseCommandOptions) => {
    const entries = await loadEntries(file, options);
    const summary = summarize(entries);

    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    for (const line of renderSummary(summary)) {
      console.log(line);
    }
  });

  return summaryCommand;
}
