/**
 * Raised when one of the primary run queries fails. Without runs there is
 * nothing to analyse, so this is never degraded.
 */
export class RunFetchError extends Error {
  readonly code = 'RUN_FETCH_FAILED';

  constructor(
    public readonly query: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch ${query} runs: ${reason}`);
    this.name = 'RunFetchError';
    this.cause = cause;
  }
}
