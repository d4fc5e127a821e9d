import { Command } from 'commander';
import { summarizeOptionsSchema, validateOrThrow } from '../validators.js';
import { print, formatDate, formatJson, green } from '../formatter.js';
import { resolveWindow } from '../window.js';
import { createCliContext, type ContextFactory } from '../context.js';
import { addWindowOptions, reportFailure } from './window-options.js';

/**
 * Create the summarize command.
 */
export function createSummarizeCommand(getContext: ContextFactory = createCliContext): Command {
  const command = addWindowOptions(
    new Command('summarize').description('Generate a natural-language summary of a time window'),
    'last 24 hours'
  )
    .option('--json-only', 'Output the raw report JSON and skip the summary', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeSummarize(options, getContext);
      } catch (error) {
        reportFailure('Summarization failed', error);
      }
    });

  return command;
}

async function executeSummarize(rawOptions: Record<string, unknown>, getContext: ContextFactory): Promise<void> {
  const options = validateOrThrow(summarizeOptionsSchema, rawOptions);
  const context = getContext();
  const window = resolveWindow(options, context.clock(), 'last-24h');

  const report = await context.analyzer.analyzeWindow(window.since, window.until, {
    includeToolMetrics: options.withTools,
  });

  if (options.jsonOnly) {
    print(formatJson(report));
    return;
  }

  const summary = await context.summarizer.summarize(report, 'text');
  print(green(`Summary for ${formatDate(window.since)} to ${formatDate(window.until)} UTC`));
  print('');
  print(summary);
}
