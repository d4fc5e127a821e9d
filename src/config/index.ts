/**
 * plan-digest Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Platform API configuration schema
 */
const apiConfigSchema = z.object({
  /** API key for the workflow platform */
  apiKey: z.string().min(1).optional(),
  /** Organisation the key belongs to */
  orgId: z.string().min(1).optional(),
  /** API base URL */
  baseUrl: z.string().url().default('https://api.example.com/api/v0'),
  /** Per-request timeout in milliseconds (1s - 10min) */
  timeoutMs: z.coerce.number().int().min(1000).max(600000).default(30000),
  /** Page size for each window query */
  fetchLimit: z.coerce.number().int().min(1).max(5000).default(1000),
});

export type ApiConfig = z.infer<typeof apiConfigSchema>;

/**
 * Digest configuration schema
 */
const digestConfigSchema = z.object({
  /** Recipient shown in the mail preview */
  mailTo: z.string().email().optional(),
  subjectPrefix: z.string().min(1).default('Plan Runs Daily Digest'),
  /** Chat model used for the natural-language summary */
  summaryModel: z.string().min(1).default('gpt-4o-mini'),
  /** Key for the summary model; without it the summary falls back to raw JSON */
  openaiApiKey: z.string().min(1).optional(),
});

export type DigestConfig = z.infer<typeof digestConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  api: apiConfigSchema,
  digest: digestConfigSchema,
  /** Length of the fastest/slowest run and plan lists */
  topK: z.coerce.number().int().min(1).max(50).default(5),
});

export type PlanDigestConfig = z.infer<typeof configSchema>;

/**
 * Treat empty strings from .env templates as unset.
 */
function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): PlanDigestConfig {
  const raw = {
    api: {
      apiKey: readEnv('PLAN_DIGEST_API_KEY'),
      orgId: readEnv('PLAN_DIGEST_ORG_ID'),
      baseUrl: readEnv('PLAN_DIGEST_API_URL'),
      timeoutMs: readEnv('PLAN_DIGEST_TIMEOUT_MS'),
      fetchLimit: readEnv('PLAN_DIGEST_FETCH_LIMIT'),
    },
    digest: {
      mailTo: readEnv('PLAN_DIGEST_MAIL_TO'),
      subjectPrefix: readEnv('PLAN_DIGEST_SUBJECT_PREFIX'),
      summaryModel: readEnv('PLAN_DIGEST_SUMMARY_MODEL'),
      openaiApiKey: readEnv('OPENAI_API_KEY'),
    },
    topK: readEnv('PLAN_DIGEST_TOP_K'),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      baseUrl: result.data.api.baseUrl,
      hasApiKey: result.data.api.apiKey !== undefined,
      fetchLimit: result.data.api.fetchLimit,
      topK: result.data.topK,
      summaryModel: result.data.digest.summaryModel,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: PlanDigestConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): PlanDigestConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Credentials required by every command that talks to the platform.
 */
export function requireCredentials(config: PlanDigestConfig): { apiKey: string; orgId: string } {
  const { apiKey, orgId } = config.api;
  if (apiKey === undefined) {
    throw new Error('Missing configuration: PLAN_DIGEST_API_KEY');
  }
  if (orgId === undefined) {
    throw new Error('Missing configuration: PLAN_DIGEST_ORG_ID');
  }
  return { apiKey, orgId };
}
