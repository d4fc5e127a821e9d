/**
 * Tool invocation analytics from `metadata.tools_used`.
 *
 * Entries are validated once, when a run is ingested; anything that does not
 * match {@link toolInvocationSchema} is skipped and counted.
 */

import {
  toolInvocationSchema,
  type Run,
  type ToolInvocation,
  type ToolPerformance,
  type ToolPerformanceDetail,
  type ToolStat,
  type ToolUsage,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { byValueThenKey, compareKeys, mean, msToSeconds, ratePercent, summarize } from './statistics.js';

const log = createLogger('metrics:tools');

export const TOP_TOOLS_LIMIT = 10;

export interface ExtractedTools {
  invocations: ToolInvocation[];
  skipped: number;
}

/**
 * Validated tool invocations of one run. A `tools_used` value that is not
 * an array counts as one skipped entry.
 */
export function extractToolInvocations(run: Run): ExtractedTools {
  const raw = run.metadata['tools_used'];
  if (raw === undefined || raw === null) {
    return { invocations: [], skipped: 0 };
  }
  if (!Array.isArray(raw)) {
    return { invocations: [], skipped: 1 };
  }

  const invocations: ToolInvocation[] = [];
  let skipped = 0;
  for (const entry of raw) {
    const parsed = toolInvocationSchema.safeParse(entry);
    if (parsed.success) {
      invocations.push(parsed.data);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    log.debug({ runId: run.id, skipped }, 'Skipped malformed tool entries');
  }
  return { invocations, skipped };
}

interface ToolTally {
  name: string;
  total: number;
  success: number;
  /** seconds */
  durations: number[];
}

function tallyTools(runs: readonly Run[]): { tallies: ToolTally[]; skipped: number } {
  const byName = new Map<string, ToolTally>();
  let skipped = 0;

  for (const run of runs) {
    const extracted = extractToolInvocations(run);
    skipped += extracted.skipped;

    for (const invocation of extracted.invocations) {
      let tally = byName.get(invocation.name);
      if (!tally) {
        tally = { name: invocation.name, total: 0, success: 0, durations: [] };
        byName.set(invocation.name, tally);
      }
      tally.total++;
      if (invocation.success) {
        tally.success++;
      }
      if (invocation.durationMs !== null) {
        tally.durations.push(msToSeconds(invocation.durationMs));
      }
    }
  }

  return {
    tallies: [...byName.values()].sort((a, b) => compareKeys(a.name, b.name)),
    skipped,
  };
}

function toToolStat(tally: ToolTally): ToolStat {
  return {
    tool_name: tally.name,
    usage_count: tally.total,
    avg_duration_seconds: tally.durations.length > 0 ? mean(tally.durations) : null,
    success_rate: ratePercent(tally.success, tally.total),
    success_count: tally.success,
    total_invocations: tally.total,
  };
}

function toPerformanceDetail(tally: ToolTally): ToolPerformanceDetail[] {
  const summary = summarize(tally.durations);
  if (!summary) {
    return [];
  }
  return [
    {
      tool_name: tally.name,
      avg_duration: summary.mean,
      median_duration: summary.median,
      min_duration: summary.min,
      max_duration: summary.max,
      success_rate: ratePercent(tally.success, tally.total),
      total_invocations: tally.total,
    },
  ];
}

export interface ToolAnalysis {
  usage: ToolUsage;
  performance: ToolPerformance;
}

/**
 * Usage counts (top ten by invocations) and per-tool timing (every tool
 * with at least one duration, slowest first).
 */
export function analyzeTools(runs: readonly Run[]): ToolAnalysis {
  const { tallies, skipped } = tallyTools(runs);

  const topTools = [...tallies]
    .sort(byValueThenKey(tally => tally.total, tally => tally.name, 'desc'))
    .slice(0, TOP_TOOLS_LIMIT)
    .map(toToolStat);

  const details = tallies
    .flatMap(toPerformanceDetail)
    .sort(byValueThenKey(detail => detail.avg_duration, detail => detail.tool_name, 'desc'));

  return {
    usage: {
      total_tool_invocations: tallies.reduce((total, tally) => total + tally.total, 0),
      unique_tools_used: tallies.length,
      top_tools: topTools,
      tool_distribution: Object.fromEntries(
        topTools.map(tool => [tool.tool_name, tool.usage_count])
      ),
      skipped_invocations: skipped,
    },
    performance: {
      tool_count: details.length,
      performance_details: details,
    },
  };
}
