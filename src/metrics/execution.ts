/**
 * Cross-reference of plans created in the window against plans that ran.
 */

import type { ExecutionRate, Plan, PlansCreatedDetails, Run } from '../types/index.js';
import { compareKeys, ratePercent } from './statistics.js';

/**
 * Share of created plans with at least one run in the window. A created
 * plan without runs counts toward the denominator only.
 */
export function computeExecutionRate(
  plansCreated: readonly Plan[],
  runs: readonly Run[]
): ExecutionRate {
  const created = new Set(plansCreated.map(plan => plan.id));
  const executed = new Set(runs.map(run => run.planId));
  const intersection = [...created].filter(id => executed.has(id)).sort(compareKeys);

  return {
    rate: ratePercent(intersection.length, created.size),
    executed_plans: intersection.length,
    total_plans: created.size,
    executed_plan_ids: intersection,
  };
}

/**
 * Plans created in the window, newest first.
 */
export function describePlansCreated(plansCreated: readonly Plan[]): PlansCreatedDetails {
  const details = [...plansCreated]
    .sort(
      (a, b) =>
        b.createdAt.getTime() - a.createdAt.getTime() || compareKeys(a.id, b.id)
    )
    .map(plan => ({
      plan_id: plan.id,
      plan_name: plan.name,
      created_at: plan.createdAt.toISOString(),
      updated_at: plan.updatedAt.toISOString(),
    }));

  return { count: details.length, details };
}
