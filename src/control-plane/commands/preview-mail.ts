import { Command } from 'commander';
import { previewMailOptionsSchema, validateOrThrow } from '../validators.js';
import { print } from '../formatter.js';
import { resolveWindow } from '../window.js';
import { createCliContext, type ContextFactory } from '../context.js';
import { buildDigestEmail, formatMailPreview } from '../../digest/index.js';
import { addWindowOptions, reportFailure } from './window-options.js';

/**
 * Create the preview-mail command. Renders the digest email; nothing is sent.
 */
export function createPreviewMailCommand(getContext: ContextFactory = createCliContext): Command {
  const command = addWindowOptions(
    new Command('preview-mail').description('Preview the digest email for a time window'),
    'previous UTC day'
  ).action(async (options: Record<string, unknown>) => {
    try {
      await executePreviewMail(options, getContext);
    } catch (error) {
      reportFailure('Failed to generate preview', error);
    }
  });

  return command;
}

async function executePreviewMail(rawOptions: Record<string, unknown>, getContext: ContextFactory): Promise<void> {
  const options = validateOrThrow(previewMailOptionsSchema, rawOptions);
  const context = getContext();
  const window = resolveWindow(options, context.clock(), 'yesterday');

  const report = await context.analyzer.analyzeWindow(window.since, window.until, {
    includeToolMetrics: options.withTools,
  });
  const summary = await context.summarizer.summarize(report, 'email');

  const email = buildDigestEmail({
    report,
    summary,
    since: window.since,
    until: window.until,
    subjectPrefix: context.config.digest.subjectPrefix,
    now: context.clock(),
  });

  print(formatMailPreview(email, context.config.digest.mailTo));
}
