import { Command } from 'commander';
import { planListOptionsSchema, recordIdSchema } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatPlanList,
  formatValidationErrors,
} from '../formatter.js';
import { createCliContext, type ContextFactory } from '../context.js';

/**
 * Create the plans command group.
 */
export function createPlansCommand(getContext: ContextFactory = createCliContext): Command {
  const command = new Command('plans').description('Inspect plans');

  command
    .command('list')
    .description('List plans for the organisation')
    .option('-l, --limit <n>', 'Maximum number of plans to return', '10')
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
    .description('Show one plan')
    .argument('<plan-id>', 'Plan ID to retrieve')
    .action(async (planId: string) => {
      try {
        await executeGet(planId, getContext);
      } catch (error) {
        printError(
          formatError(`Failed to get plan: ${error instanceof Error ? error.message : String(error)}`)
        );
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeList(rawOptions: Record<string, unknown>, getContext: ContextFactory): Promise<void> {
  const optionsResult = planListOptionsSchema.safeParse(rawOptions);
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
  const { client } = getContext();
  const plans = await client.plans.list({ limit: options.limit });

  print(options.json ? formatJson(plans) : formatPlanList(plans));
}

async function executeGet(rawId: string, getContext: ContextFactory): Promise<void> {
  const planId = recordIdSchema.parse(rawId);
  const { client } = getContext();
  const plan = await client.plans.get(planId);
  print(formatJson(plan));
}
