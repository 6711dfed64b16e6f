import { Command } from 'commander';
import { createFormatCommand } from './commands/format.js';
import { createRevisionsCommand } from './commands/revisions.js';
import { createSummaryCommand } from './commands/summary.js';

export interface CLIOptions {
  version: string;
}

export function createProgram(options: CLIOptions): Command {
  const program = new Command();

  program
    .name('git-log-miner')
    .description('Repository history metrics from an exported git log')
    .version(options.version);

  program.addCommand(createSummaryCommand());
  program.addCommand(createRevisionsCommand());
  program.addCommand(createFormatCommand());

  return program;
}

export async function runCLI(options: CLIOptions, argv: string[] = process.argv): Promise<void> {
  await createProgram(options).parseAsync(argv);
}
