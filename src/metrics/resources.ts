import type { ResourceUsage, Run } from '../types/index.js';
import { msToSeconds, sum } from './statistics.js';

/**
 * Total and average run time over successful runs. The average divides by
 * every successful run, timed or not.
 */
export function computeResourceUsage(runs: readonly Run[]): ResourceUsage {
  const totalDuration = msToSeconds(
    sum(runs.flatMap(run => (run.durationMs !== null ? [run.durationMs] : [])))
  );

  return {
    total_duration: totalDuration,
    avg_duration: runs.length === 0 ? 0 : totalDuration / runs.length,
    total_runs: runs.length,
  };
}
