/**
 * Metrics module for windowed plan-run analytics.
 *
 * This module provides:
 * - PlanRunAnalyzer: Fetch a window and assemble the report
 * - Section functions: Durations, rankings, histograms, failures, tools
 * - Statistics primitives: Percentile, mean, ordering helpers
 */

// Analyzer
export {
  PlanRunAnalyzer,
  EMPTY_WINDOW_MESSAGE,
  type AnalyzerOptions,
  type AnalyzeOptions,
} from './analyzer.js';
export { RunFetchError } from './errors.js';

// Plan resolution
export { PlanDirectory, createPlaceholderPlan, isPlaceholderPlan } from './plans.js';

// Sections
export {
  computeDurationStats,
  computePerPlanStats,
  computePlanDurationStats,
  groupDurationsByPlan,
  isTimedRun,
  type TimedRun,
  type PlanDurationGroup,
} from './durations.js';
export { rankRuns, rankPlans, computePlanSuccessRates } from './rankings.js';
export { computeHourlyDistribution, computeDailyDistribution } from './temporal.js';
export { analyzeFailures, extractErrorMessage, UNKNOWN_ERROR } from './failures.js';
export {
  analyzeTools,
  extractToolInvocations,
  TOP_TOOLS_LIMIT,
  type ExtractedTools,
  type ToolAnalysis,
} from './tools.js';
export { computeExecutionRate, describePlansCreated } from './execution.js';
export { computeResourceUsage } from './resources.js';

// Statistics
export {
  percentile,
  median,
  mean,
  sum,
  summarize,
  ratePercent,
  msToSeconds,
  compareKeys,
  byValueThenKey,
  type Summary,
  type SortDirection,
} from './statistics.js';
