import { Command } from 'commander';
import { analyzeOptionsSchema, validateOrThrow } from '../validators.js';
import { print, formatAnalysisSummary, formatJson } from '../formatter.js';
import { resolveWindow } from '../window.js';
import { createCliContext, type ContextFactory } from '../context.js';
import { addWindowOptions, reportFailure } from './window-options.js';

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(getContext: ContextFactory = createCliContext): Command {
  const command = addWindowOptions(
    new Command('analyze').description('Analyze plan runs in a time window'),
    'last 24 hours'
  )
    .option('--json', 'Output the full report as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeAnalyze(options, getContext);
      } catch (error) {
        reportFailure('Analysis failed', error);
      }
    });

  return command;
}

async function executeAnalyze(rawOptions: Record<string, unknown>, getContext: ContextFactory): Promise<void> {
  const options = validateOrThrow(analyzeOptionsSchema, rawOptions);
  const context = getContext();
  const window = resolveWindow(options, context.clock(), 'last-24h');

  const report = await context.analyzer.analyzeWindow(window.since, window.until, {
    includeToolMetrics: options.withTools,
  });

  print(options.json ? formatJson(report) : formatAnalysisSummary(report, window));
}
