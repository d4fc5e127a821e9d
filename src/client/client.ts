/**
 * Workflow platform API client
 */

import type { z } from 'zod';
import type { PlanDigestClientConfig, QueryParams } from './types.js';
import {
  PlanDigestError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  RateLimitError,
  ServerError,
} from './errors.js';
import { PlansResource } from './resources/plans.js';
import { RunsResource } from './resources/runs.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('client');

/**
 * Read a human-readable message out of an error body.
 */
function extractErrorMessage(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null) {
    for (const key of ['detail', 'message', 'error']) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return `Request failed with status ${status}`;
}

/**
 * Client for the plans and plan-runs endpoints of the workflow platform.
 *
 * @example
 * ```typescript
 * const client = new PlanDigestClient({
 *   baseUrl: 'https://api.example.com/api/v0',
 *   apiKey: 'your-api-key',
 *   orgId: 'your-org',
 * });
 *
 * const failed = await client.runs.list({ state: 'FAILED', limit: 50 });
 * ```
 */
export class PlanDigestClient {
  private baseUrl: string;
  private apiKey: string;
  private orgId: string;
  private timeout: number;
  private fetchFn: typeof fetch;

  /** Plans resource */
  public readonly plans: PlansResource;

  /** Plan runs resource */
  public readonly runs: RunsResource;

  constructor(config: PlanDigestClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.apiKey = config.apiKey;
    this.orgId = config.orgId;
    this.timeout = config.timeout ?? 30000;
    this.fetchFn = config.fetch ?? fetch;

    const requestFn = this.request.bind(this);

    this.plans = new PlansResource(requestFn);
    this.runs = new RunsResource(requestFn);
  }

  /**
   * Get headers for requests
   */
  private getHeaders(): Record<string, string> {
    return {
      Accept: 'application/json',
      Authorization: `Api-Key ${this.apiKey}`,
      'X-Organization-Id': this.orgId,
    };
  }

  /**
   * GET a path below the base URL and validate the body against a schema
   */
  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: QueryParams = {}
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(url.toString(), {
        method: 'GET',
        headers: this.getHeaders(),
        signal: controller.signal,
      });

      const body: unknown = await response.json().catch(() => null);

      if (!response.ok) {
        this.handleError(response, body, path);
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new ValidationError(`Unexpected response from ${path}`, path, parsed.error.issues);
      }

      log.debug({ path, params }, 'Request completed');
      return parsed.data;
    } catch (error) {
      if (error instanceof PlanDigestError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkError('Request timeout', path, error);
      }

      throw new NetworkError('Request failed', path, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Handle API error responses
   */
  private handleError(response: Response, body: unknown, path: string): never {
    const { status } = response;
    const message = extractErrorMessage(body, status);

    switch (status) {
      case 400:
        throw new ValidationError(message, path, body);
      case 401:
      case 403:
        throw new AuthenticationError(message, status, path);
      case 404:
        throw new NotFoundError(path, body);
      case 429: {
        const retryAfter = Number(response.headers.get('retry-after'));
        throw Number.isFinite(retryAfter) && retryAfter > 0
          ? new RateLimitError(message, path, retryAfter)
          : new RateLimitError(message, path);
      }
      default:
        if (status >= 500) {
          throw new ServerError(message, status, path, body);
        }
        throw new PlanDigestError(message, 'HTTP_ERROR', status, { path, body });
    }
  }
}
