import { Command } from 'commander';
import { recordIdSchema, runListOptionsSchema } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatRunList,
  formatValidationErrors,
} from '../formatter.js';
import { parseIsoDate } from '../window.js';
import { createCliContext, type ContextFactory } from '../context.js';
import type { RunsListOptions } from '../../client/index.js';

/**
 * Create the plan-runs command group.
 */
export function createPlanRunsCommand(getContext: ContextFactory = createCliContext): Command {
  const command = new Command('plan-runs').description('Inspect plan runs');

  command
    .command('list')
    .description('List plan runs with optional filters')
    .option('--plan-id <id>', 'Filter by plan ID')
    .option('--state <state>', 'Filter by state (COMPLETE, FAILED, RUNNING, ...)')
    .option('-l, --limit <n>', 'Maximum number of runs to return', '10')
    .option('--since <iso>', 'Only runs created at or after this time (ISO 8601)')
    .option('--json', 'Output as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeList(options, getContext);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  command
    .command('get')
    .description('Show one plan run')
    .argument('<run-id>', 'Plan run ID to retrieve')
    .action(async (runId: string) => {
      try {
        await executeGet(runId, getContext);
      } catch (error) {
        printError(
          formatError(`Failed to get plan run: ${error instanceof Error ? error.message : String(error)}`)
        );
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeList(rawOptions: Record<string, unknown>, getContext: ContextFactory): Promise<void> {
  const optionsResult = runListOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;

  // Parsed before any request so a bad date fails fast
  const filters: RunsListOptions = { limit: options.limit };
  if (options.since !== undefined) filters.since = parseIsoDate(options.since);
  if (options.planId !== undefined) filters.planId = options.planId;
  if (options.state !== undefined) filters.state = options.state.toUpperCase();

  const { client } = getContext();
  const runs = await client.runs.list(filters);

  print(options.json ? formatJson(runs) : formatRunList(runs));
}

async function executeGet(rawId: string, getContext: ContextFactory): Promise<void> {
  const runId = recordIdSchema.parse(rawId);
  const { client } = getContext();
  const run = await client.runs.get(runId);
  print(formatJson(run));
}
