import type { Command } from 'commander';
import { printError, formatError } from '../formatter.js';
import { InvalidDateError } from '../window.js';

/**
 * Window flags shared by analyze, summarize and preview-mail.
 */
export function addWindowOptions(command: Command, defaultDescription: string): Command {
  return command
    .option('--today', 'Use today (UTC midnight to now)', false)
    .option('--yesterday', 'Use the previous UTC day', false)
    .option('--since <iso>', `Window start, ISO 8601 (default: ${defaultDescription})`)
    .option('--until <iso>', 'Window end, ISO 8601 (with --since; default: now)')
    .option('--with-tools', 'Include tool usage analysis', false);
}

/**
 * Print a command failure and flag the exit code. Bad dates are reported
 * without the command prefix.
 */
export function reportFailure(prefix: string, error: unknown): void {
  if (error instanceof InvalidDateError) {
    printError(formatError(error.message));
  } else {
    printError(formatError(`${prefix}: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
}
