/**
 * Completion-time histograms (UTC).
 */

import type { Run } from '../types/index.js';
import { compareKeys } from './statistics.js';

function countBy<K>(runs: readonly Run[], key: (completedAt: Date) => K): Map<K, number> {
  const counts = new Map<K, number>();
  for (const run of runs) {
    if (!run.completedAt) continue;
    const bucket = key(run.completedAt);
    counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }
  return counts;
}

/**
 * Hour of day (0-23) to count; only hours with runs.
 */
export function computeHourlyDistribution(runs: readonly Run[]): Record<string, number> {
  const counts = countBy(runs, completedAt => completedAt.getUTCHours());
  return Object.fromEntries(
    [...counts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([hour, count]) => [String(hour), count])
  );
}

/**
 * Calendar date (YYYY-MM-DD) to count; only dates with runs.
 */
export function computeDailyDistribution(runs: readonly Run[]): Record<string, number> {
  const counts = countBy(runs, completedAt => completedAt.toISOString().slice(0, 10));
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => compareKeys(a, b)));
}
