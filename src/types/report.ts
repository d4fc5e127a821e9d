/**
 * Analysis report types.
 *
 * The report is the JSON contract consumed by the summarizer and the digest
 * renderers, so its keys stay snake_case. All durations are seconds.
 */

// ============================================================================
// Window & Volume
// ============================================================================

export interface ReportWindow {
  since: string;
  until: string;
}

export interface ExecutionRate {
  /** Percentage (0-100) of plans created in the window that ran at least once */
  rate: number;
  executed_plans: number;
  total_plans: number;
  executed_plan_ids: string[];
}

export interface CreatedPlanDetail {
  plan_id: string;
  plan_name: string;
  created_at: string;
  updated_at: string;
}

export interface PlansCreatedDetails {
  count: number;
  details: CreatedPlanDetail[];
}

// ============================================================================
// Durations
// ============================================================================

/**
 * Only `count` is present when no run carried a duration.
 */
export interface DurationStats {
  count: number;
  mean_seconds?: number;
  median_seconds?: number;
  p95_seconds?: number;
  min_seconds?: number;
  max_seconds?: number;
}

export interface PerPlanStat {
  plan_id: string;
  plan_name: string;
  run_count: number;
  mean_duration_seconds: number;
  median_duration_seconds: number;
}

export interface PlanDurationDetail {
  plan_id: string;
  plan_name: string;
  avg_duration: number;
  median_duration: number;
  min_duration: number;
  max_duration: number;
  run_count: number;
}

export interface PlanDurationStats {
  plan_count: number;
  overall_avg_plan_duration: number;
  plan_details: PlanDurationDetail[];
}

export interface RunRanking {
  run_id: string;
  plan_id: string;
  plan_name: string;
  duration_seconds: number;
  completed_at: string | null;
}

export interface PlanRanking {
  plan_id: string;
  plan_name: string;
  avg_duration: number;
  run_count: number;
}

export interface PlanSuccessRate {
  plan_id: string;
  plan_name: string;
  success_rate: number;
  completed_runs: number;
  failed_runs: number;
  total_runs: number;
}

// ============================================================================
// Failures & Resources
// ============================================================================

export interface FailureDetail {
  run_id: string;
  plan_id: string;
  plan_name: string;
  failed_at: string | null;
  error_message: string;
}

export interface FailureAnalysis {
  count: number;
  details: FailureDetail[];
}

export interface ResourceUsage {
  total_duration: number;
  avg_duration: number;
  total_runs: number;
}

// ============================================================================
// Tools
// ============================================================================

export interface ToolStat {
  tool_name: string;
  usage_count: number;
  avg_duration_seconds: number | null;
  success_rate: number;
  success_count: number;
  total_invocations: number;
}

export interface ToolUsage {
  total_tool_invocations: number;
  unique_tools_used: number;
  top_tools: ToolStat[];
  tool_distribution: Record<string, number>;
  /** Entries of metadata.tools_used that failed validation */
  skipped_invocations: number;
}

export interface ToolPerformanceDetail {
  tool_name: string;
  avg_duration: number;
  median_duration: number;
  min_duration: number;
  max_duration: number;
  success_rate: number;
  total_invocations: number;
}

export interface ToolPerformance {
  tool_count: number;
  performance_details: ToolPerformanceDetail[];
}

// ============================================================================
// Report
// ============================================================================

export interface AnalysisReport {
  /** Wall-clock time of the analysis; the only non-deterministic field */
  generated_at: string;
  window: ReportWindow;
  empty: false;

  total_runs: number;
  completed_runs: number;
  failed_runs: number;
  success_rate: number;

  plans_created: number;
  plans_created_details: PlansCreatedDetails;
  execution_rate: ExecutionRate;

  duration_stats: DurationStats;
  plan_duration_stats: PlanDurationStats;
  per_plan_stats: PerPlanStat[];
  fastest_runs: RunRanking[];
  slowest_runs: RunRanking[];
  fastest_plans: PlanRanking[];
  slowest_plans: PlanRanking[];
  plan_success_rates: PlanSuccessRate[];

  hourly_distribution: Record<string, number>;
  daily_distribution: Record<string, number>;

  failure_analysis: FailureAnalysis;
  resource_usage: ResourceUsage;

  tool_usage?: ToolUsage;
  tool_performance?: ToolPerformance;
}

/**
 * Report for a window in which no runs were fetched.
 */
export interface EmptyAnalysisReport {
  generated_at: string;
  window: ReportWindow;
  empty: true;
  total_runs: 0;
  message: string;
}

export type WindowReport = AnalysisReport | EmptyAnalysisReport;

export function isEmptyReport(report: WindowReport): report is EmptyAnalysisReport {
  return report.empty;
}
