import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { countRevisions } from '../analyzers/git-log/summary.js';
import type { FileRevisions } from '../analyzers/git-log/types.js';
import { addParseOptions, loadEntries, type ParseCommandOptions } from './shared.js';

interface RevisionsCommandOptions extends ParseCommandOptions {
  top: number;
}

function parseTop(value: string): number {
  const top = Number(value);
  if (!Number.isInteger(top) || top < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return top;
}

export function renderRevisions(revisions: ReadonlyArray<FileRevisions>): string[] {
  if (revisions.length === 0) {
    return [chalk.yellow('No file changes found in the log.')];
  }

  const width = String(revisions[0].revisions).length;
  return revisions.map(file =>
    `  ${String(file.revisions).padStart(width)}  ` +
    `${chalk.green(`+${file.linesAdded}`)} ${chalk.red(`-${file.linesRemoved}`)}  ${file.path}`
  );
}

/**
 * Create the revisions command
 *
 * Lists the most frequently changed files of an exported log
 */
export function createRevisionsCommand(): Command {
  const revisionsCommand = new Command('revisions');
  revisionsCommand
    .description('List files by number of revisions (use - for stdin)')
    .argument('<file>', 'Log file produced by the command shown by `format`')
    .option('-t, --top <n>', 'Number of files to show', parseTop, 10);

  addParseOptions(revisionsCommand).action(async (file: string, options: RevisionsCommandOptions) => {
    const entries = await loadEntries(file, options);
    const revisions = countRevisions(entries).slice(0, options.top);

    if (options.json) {
      console.log(JSON.stringify(revisions, null, 2));
      return;
    }

    console.log(chalk.bold.blue(`📁 Top ${revisions.length} files by revisions`));
    console.log(chalk.gray('─'.repeat(40)));
    for (const line of renderRevisions(revisions)) {
      console.log(line);
    }
  });

  return revisionsCommand;
}
