/**
 * Platform client errors.
 *
 * Every error names the API path that failed. Errors raised from an HTTP
 * response keep the parsed body, whose `detail` field is what the platform
 * uses to explain a rejection.
 */

export type PlanDigestErrorCode =
  | 'NETWORK_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'RATE_LIMIT'
  | 'SERVER_ERROR'
  | 'HTTP_ERROR';

export interface PlanDigestErrorOptions {
  /** API path of the failed request, e.g. /plan-runs/ */
  path?: string;
  /** Parsed response body, or the zod issues of a malformed one */
  body?: unknown;
  cause?: unknown;
}

export class PlanDigestError extends Error {
  public readonly path: string | undefined;
  public readonly body: unknown;

  constructor(
    message: string,
    public readonly code: PlanDigestErrorCode,
    public readonly status: number,
    options: PlanDigestErrorOptions = {}
  ) {
    super(message);
    this.name = 'PlanDigestError';
    this.path = options.path;
    this.body = options.body;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /** The platform's `detail` explanation, when the body carried one */
  get detail(): string | undefined {
    if (typeof this.body !== 'object' || this.body === null) {
      return undefined;
    }
    const detail: unknown = Reflect.get(this.body, 'detail');
    return typeof detail === 'string' ? detail : undefined;
  }
}

/** Status 0: the request never got a response (connection failure or timeout) */
export class NetworkError extends PlanDigestError {
  constructor(message: string, path: string, cause: unknown) {
    super(message, 'NETWORK_ERROR', 0, { path, cause });
    this.name = 'NetworkError';
  }
}

export class NotFoundError extends PlanDigestError {
  constructor(path: string, body?: unknown) {
    super(`Resource not found: ${path}`, 'NOT_FOUND', 404, { path, body });
    this.name = 'NotFoundError';
  }
}

/** A 400, or a 2xx body that does not match the record schema */
export class ValidationError extends PlanDigestError {
  constructor(message: string, path: string, body?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, { path, body });
    this.name = 'ValidationError';
  }
}

/** 401 or 403: bad API key, or a key outside the organisation */
export class AuthenticationError extends PlanDigestError {
  constructor(message: string, status: 401 | 403, path: string) {
    super(message, 'UNAUTHORIZED', status, { path });
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends PlanDigestError {
  /** Seconds from the Retry-After header, when the platform sent one */
  public readonly retryAfter: number | undefined;

  constructor(message: string, path: string, retryAfter?: number) {
    super(message, 'RATE_LIMIT', 429, { path });
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class ServerError extends PlanDigestError {
  constructor(message: string, status: number, path: string, body?: unknown) {
    super(message, 'SERVER_ERROR', status, { path, body });
    this.name = 'ServerError';
  }
}
