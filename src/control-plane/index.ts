// Context
export { createCliContext, type CliContext, type ContextFactory } from './context.js';

// Window
export {
  resolveWindow,
  parseIsoDate,
  InvalidDateError,
  type WindowOptions,
  type ResolvedWindow,
  type DefaultWindow,
} from './window.js';

// Validators
export {
  validate,
  validateOrThrow,
  planListOptionsSchema,
  runListOptionsSchema,
  windowOptionsSchema,
  analyzeOptionsSchema,
  summarizeOptionsSchema,
  previewMailOptionsSchema,
  recordIdSchema,
  type ValidationResult,
  type ValidationError,
  type PlanListOptions,
  type RunListOptions,
  type AnalyzeCommandOptions,
  type SummarizeCommandOptions,
  type PreviewMailCommandOptions,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  formatRunState,
  formatDate,
  formatSeconds,
  truncate,
  padRight,
  padLeft,
  formatTable,
  formatPlanList,
  formatRunList,
  formatAnalysisSummary,
  formatError,
  formatJson,
  formatValidationErrors,
  print,
  printError,
  type TableColumn,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createPlansCommand,
  createPlanRunsCommand,
  createAnalyzeCommand,
  createSummarizeCommand,
  createPreviewMailCommand,
} from './cli.js';
