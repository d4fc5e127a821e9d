/**
 * Services shared by the CLI commands, built from configuration.
 */

import { getConfig, requireCredentials, type PlanDigestConfig } from '../config/index.js';
import { PlanDigestClient } from '../client/index.js';
import { ApiRecordSource, type RecordSource } from '../source/index.js';
import { PlanRunAnalyzer } from '../metrics/index.js';
import { DigestSummarizer, createOpenAIClient } from '../digest/index.js';

export interface CliContext {
  config: PlanDigestConfig;
  client: PlanDigestClient;
  source: RecordSource;
  analyzer: PlanRunAnalyzer;
  summarizer: DigestSummarizer;
  clock: () => Date;
}

/**
 * Built lazily inside each command action, so `--help` works without
 * credentials.
 */
export type ContextFactory = () => CliContext;

export function createCliContext(
  config: PlanDigestConfig = getConfig(),
  clock: () => Date = () => new Date()
): CliContext {
  const { apiKey, orgId } = requireCredentials(config);

  const client = new PlanDigestClient({
    baseUrl: config.api.baseUrl,
    apiKey,
    orgId,
    timeout: config.api.timeoutMs,
  });
  const source = new ApiRecordSource(client);

  const analyzer = new PlanRunAnalyzer(source, {
    topK: config.topK,
    fetchLimit: config.api.fetchLimit,
    clock,
  });

  const summarizer = new DigestSummarizer({
    client: config.digest.openaiApiKey !== undefined
      ? createOpenAIClient(config.digest.openaiApiKey)
      : null,
    model: config.digest.summaryModel,
  });

  return { config, client, source, analyzer, summarizer, clock };
}
