import type { FailureAnalysis, Run } from '../types/index.js';
import type { PlanDirectory } from './plans.js';

export const UNKNOWN_ERROR = 'Unknown error';

/**
 * Metadata `error` as text. Strings pass through unchanged, even empty ones;
 * structured errors are serialized as JSON.
 */
export function extractErrorMessage(metadata: Record<string, unknown> | null | undefined): string {
  const error = metadata?.['error'];
  if (error === undefined || error === null) {
    return UNKNOWN_ERROR;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object') {
    return JSON.stringify(error);
  }
  return String(error);
}

/**
 * Failed runs with their plan names and error messages, in source order.
 */
export function analyzeFailures(
  failedRuns: readonly Run[],
  plans: PlanDirectory
): FailureAnalysis {
  return {
    count: failedRuns.length,
    details: failedRuns.map(run => ({
      run_id: run.id,
      plan_id: run.planId,
      plan_name: plans.nameOf(run.planId),
      failed_at: run.completedAt ? run.completedAt.toISOString() : null,
      error_message: extractErrorMessage(run.metadata),
    })),
  };
}
