/**
 * Workflow platform client
 */

export { PlanDigestClient } from './client.js';

export type { PlanDigestClientConfig, ListOptions } from './types.js';
export type { RunsListOptions } from './resources/runs.js';

export {
  PlanDigestError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  RateLimitError,
  ServerError,
  type PlanDigestErrorCode,
  type PlanDigestErrorOptions,
} from './errors.js';
