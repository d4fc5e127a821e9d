// Run Types
export {
  RunState,
  isSuccessState,
  isFailureState,
  runRecordSchema,
  toolInvocationSchema,
  type Run,
  type RunRecord,
  type ToolInvocation,
} from './run.js';

// Timestamps
export { timestampSchema, assumeUtc, ZONE_PATTERN } from './timestamp.js';

// Plan Types
export {
  planRecordSchema,
  type Plan,
  type PlaceholderPlan,
  type PlanRecord,
} from './plan.js';

// Report Types
export {
  isEmptyReport,
  type ReportWindow,
  type ExecutionRate,
  type CreatedPlanDetail,
  type PlansCreatedDetails,
  type DurationStats,
  type PerPlanStat,
  type PlanDurationDetail,
  type PlanDurationStats,
  type RunRanking,
  type PlanRanking,
  type PlanSuccessRate,
  type FailureDetail,
  type FailureAnalysis,
  type ResourceUsage,
  type ToolStat,
  type ToolUsage,
  type ToolPerformanceDetail,
  type ToolPerformance,
  type AnalysisReport,
  type EmptyAnalysisReport,
  type WindowReport,
} from './report.js';
