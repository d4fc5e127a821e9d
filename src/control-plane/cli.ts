import { Command } from 'commander';
import { createPlansCommand } from './commands/plans.js';
import { createPlanRunsCommand } from './commands/plan-runs.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createSummarizeCommand } from './commands/summarize.js';
import { createPreviewMailCommand } from './commands/preview-mail.js';
import { createCliContext, type ContextFactory } from './context.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.3.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(getContext: ContextFactory = createCliContext): Command {
  const program = new Command();

  program
    .name('plan-digest')
    .description('Fetch, analyze and summarize workflow plan runs')
    .version(VERSION, '-v, --version', 'Output the current version');

  // Add commands
  program.addCommand(createPlansCommand(getContext));
  program.addCommand(createPlanRunsCommand(getContext));
  program.addCommand(createAnalyzeCommand(getContext));
  program.addCommand(createSummarizeCommand(getContext));
  program.addCommand(createPreviewMailCommand(getContext));

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createPlansCommand } from './commands/plans.js';
export { createPlanRunsCommand } from './commands/plan-runs.js';
export { createAnalyzeCommand } from './commands/analyze.js';
export { createSummarizeCommand } from './commands/summarize.js';
export { createPreviewMailCommand } from './commands/preview-mail.js';
