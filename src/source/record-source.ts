import type { Plan, Run } from '../types/index.js';

/**
 * Runs created in the half-open window [since, until).
 */
export interface RunQuery {
  since: Date;
  until: Date;
  /** Lowercased state filter ('complete', 'failed', ...); all states when absent */
  state?: string;
  limit?: number;
}

/**
 * Plans created in the window. Sources that cannot range-query may return a
 * superset; the analyzer filters again.
 */
export interface PlanQuery {
  since: Date;
  until: Date;
  limit?: number;
}

/**
 * Supplies plan runs and plans to the analyzer. Any query may return fewer
 * records than exist upstream.
 */
export interface RecordSource {
  listRuns(query: RunQuery): Promise<Run[]>;
  listPlans(query: PlanQuery): Promise<Plan[]>;
  /** Resolves to null when the plan does not exist */
  getPlan(id: string): Promise<Plan | null>;
}
