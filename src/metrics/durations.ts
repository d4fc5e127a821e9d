/**
 * Duration statistics over successful runs.
 * All outputs are in seconds.
 */

import type {
  DurationStats,
  PerPlanStat,
  PlanDurationStats,
  Run,
} from '../types/index.js';
import type { PlanDirectory } from './plans.js';
import {
  byValueThenKey,
  compareKeys,
  mean,
  msToSeconds,
  percentile,
  summarize,
} from './statistics.js';

/**
 * A run whose duration was reported.
 */
export type TimedRun = Run & { durationMs: number };

export function isTimedRun(run: Run): run is TimedRun {
  return run.durationMs !== null;
}

/**
 * Durations (seconds) of one plan's timed runs.
 */
export interface PlanDurationGroup {
  planId: string;
  durations: number[];
}

/**
 * Overall distribution: count, mean, median, p95 and range.
 */
export function computeDurationStats(runs: readonly TimedRun[]): DurationStats {
  const seconds = runs.map(run => msToSeconds(run.durationMs));
  const summary = summarize(seconds);
  if (!summary) {
    return { count: 0 };
  }

  return {
    count: summary.count,
    mean_seconds: summary.mean,
    median_seconds: summary.median,
    p95_seconds: percentile(seconds, 95),
    min_seconds: summary.min,
    max_seconds: summary.max,
  };
}

/**
 * Group timed runs by plan. Groups come back ordered by plan ID.
 */
export function groupDurationsByPlan(runs: readonly TimedRun[]): PlanDurationGroup[] {
  const groups = new Map<string, number[]>();
  for (const run of runs) {
    const durations = groups.get(run.planId);
    if (durations) {
      durations.push(msToSeconds(run.durationMs));
    } else {
      groups.set(run.planId, [msToSeconds(run.durationMs)]);
    }
  }

  return [...groups.entries()]
    .map(([planId, durations]) => ({ planId, durations }))
    .sort((a, b) => compareKeys(a.planId, b.planId));
}

/**
 * Per-plan activity, busiest plan first.
 */
export function computePerPlanStats(
  groups: readonly PlanDurationGroup[],
  plans: PlanDirectory
): PerPlanStat[] {
  return groups
    .map(group => ({
      plan_id: group.planId,
      plan_name: plans.nameOf(group.planId),
      run_count: group.durations.length,
      mean_duration_seconds: mean(group.durations),
      median_duration_seconds: percentile(group.durations, 50),
    }))
    .sort(byValueThenKey(stat => stat.run_count, stat => stat.plan_id, 'desc'));
}

/**
 * Per-plan duration ranges, slowest average first.
 */
export function computePlanDurationStats(
  groups: readonly PlanDurationGroup[],
  plans: PlanDirectory
): PlanDurationStats {
  const details = groups.flatMap(group => {
    const summary = summarize(group.durations);
    if (!summary) {
      return [];
    }
    return [
      {
        plan_id: group.planId,
        plan_name: plans.nameOf(group.planId),
        avg_duration: summary.mean,
        median_duration: summary.median,
        min_duration: summary.min,
        max_duration: summary.max,
        run_count: summary.count,
      },
    ];
  });

  return {
    plan_count: details.length,
    overall_avg_plan_duration: mean(details.map(detail => detail.avg_duration)),
    plan_details: details.sort(
      byValueThenKey(detail => detail.avg_duration, detail => detail.plan_id, 'desc')
    ),
  };
}
