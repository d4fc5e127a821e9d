/**
 * Fastest/slowest rankings and per-plan success rates.
 */

import {
  isSuccessState,
  isFailureState,
  type PlanRanking,
  type PlanSuccessRate,
  type Run,
  type RunRanking,
} from '../types/index.js';
import type { PlanDirectory } from './plans.js';
import type { PlanDurationGroup, TimedRun } from './durations.js';
import { byValueThenKey, mean, msToSeconds, ratePercent, type SortDirection } from './statistics.js';

/**
 * Individual runs by duration. Equal durations keep run ID order in both
 * directions.
 */
export function rankRuns(
  runs: readonly TimedRun[],
  plans: PlanDirectory,
  direction: SortDirection,
  limit: number
): RunRanking[] {
  return [...runs]
    .sort(byValueThenKey(run => run.durationMs, run => run.id, direction))
    .slice(0, limit)
    .map(run => ({
      run_id: run.id,
      plan_id: run.planId,
      plan_name: plans.nameOf(run.planId),
      duration_seconds: msToSeconds(run.durationMs),
      completed_at: run.completedAt ? run.completedAt.toISOString() : null,
    }));
}

/**
 * Plans by mean duration.
 */
export function rankPlans(
  groups: readonly PlanDurationGroup[],
  plans: PlanDirectory,
  direction: SortDirection,
  limit: number
): PlanRanking[] {
  return groups
    .map(group => ({
      plan_id: group.planId,
      plan_name: plans.nameOf(group.planId),
      avg_duration: mean(group.durations),
      run_count: group.durations.length,
    }))
    .sort(byValueThenKey(ranking => ranking.avg_duration, ranking => ranking.plan_id, direction))
    .slice(0, limit);
}

/**
 * Success rate per plan over runs in any state, highest first.
 */
export function computePlanSuccessRates(
  runs: readonly Run[],
  plans: PlanDirectory
): PlanSuccessRate[] {
  const tallies = new Map<string, { completed: number; failed: number; total: number }>();

  for (const run of runs) {
    let tally = tallies.get(run.planId);
    if (!tally) {
      tally = { completed: 0, failed: 0, total: 0 };
      tallies.set(run.planId, tally);
    }
    tally.total++;
    if (isSuccessState(run.state)) {
      tally.completed++;
    } else if (isFailureState(run.state)) {
      tally.failed++;
    }
  }

  return [...tallies.entries()]
    .map(([planId, tally]) => ({
      plan_id: planId,
      plan_name: plans.nameOf(planId),
      success_rate: ratePercent(tally.completed, tally.total),
      completed_runs: tally.completed,
      failed_runs: tally.failed,
      total_runs: tally.total,
    }))
    .sort(byValueThenKey(rate => rate.success_rate, rate => rate.plan_id, 'desc'));
}
