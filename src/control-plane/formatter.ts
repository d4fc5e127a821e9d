import { RunState, isEmptyReport, type Plan, type Run, type WindowReport } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

type Color = keyof typeof colors;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: Color): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Color a run state; states the platform adds later stay uncolored.
 */
export function formatRunState(state: string): string {
  const stateColors: Record<string, Color> = {
    [RunState.PENDING]: 'yellow',
    [RunState.RUNNING]: 'blue',
    [RunState.COMPLETE]: 'green',
    [RunState.FAILED]: 'red',
  };

  const text = state.toUpperCase();
  const color = stateColors[state];
  return color ? colorize(text, color) : text;
}

/**
 * YYYY-MM-DD HH:MM in UTC.
 */
export function formatDate(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

/**
 * Seconds with one decimal, e.g. "12.5s".
 */
export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(1)}s`;
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition. `style` is applied after padding so escape
 * codes do not count towards the width.
 */
export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
  style?: (text: string, item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: readonly T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow.trimEnd());

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        const padded = col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
        return col.style ? col.style(padded, item) : padded;
      })
      .join('  ');
    lines.push(row.trimEnd());
  }

  return lines.join('\n');
}

/**
 * Format a list of plans as a table.
 */
export function formatPlanList(plans: readonly Plan[]): string {
  if (plans.length === 0) {
    return dim('No plans found.');
  }

  const columns: TableColumn<Plan>[] = [
    { header: 'ID', width: 15, value: p => p.id, style: text => cyan(text) },
    { header: 'NAME', width: 30, value: p => p.name },
    { header: 'DESCRIPTION', width: 50, value: p => p.description ?? '' },
    { header: 'CREATED', width: 16, value: p => formatDate(p.createdAt) },
  ];

  return formatTable(plans, columns);
}

/**
 * Format a list of plan runs as a table.
 */
export function formatRunList(runs: readonly Run[]): string {
  if (runs.length === 0) {
    return dim('No plan runs found.');
  }

  const columns: TableColumn<Run>[] = [
    { header: 'RUN ID', width: 15, value: r => r.id, style: text => cyan(text) },
    { header: 'PLAN ID', width: 15, value: r => r.planId },
    {
      header: 'STATE',
      width: 10,
      value: r => r.state.toUpperCase(),
      style: (text, r) => text.replace(r.state.toUpperCase(), formatRunState(r.state)),
    },
    {
      header: 'DURATION',
      width: 10,
      align: 'right',
      value: r => (r.durationMs !== null ? formatSeconds(r.durationMs / 1000) : 'N/A'),
    },
    {
      header: 'COMPLETED',
      width: 16,
      value: r => (r.completedAt ? formatDate(r.completedAt) : 'N/A'),
    },
  ];

  return formatTable(runs, columns);
}

/**
 * Human-readable overview of an analysis report.
 */
export function formatAnalysisSummary(report: WindowReport, window: { since: Date; until: Date }): string {
  const lines: string[] = [];

  lines.push(
    green(bold(`Analysis for ${formatDate(window.since)} to ${formatDate(window.until)} UTC`))
  );
  lines.push(`Total runs: ${report.total_runs}`);

  if (isEmptyReport(report)) {
    lines.push(dim(report.message));
    return lines.join('\n');
  }

  lines.push(`Completed runs: ${report.completed_runs}`);
  lines.push(`Failed runs: ${report.failed_runs}`);
  lines.push(`Success rate: ${report.success_rate.toFixed(1)}%`);

  const stats = report.duration_stats;
  if (stats.count > 0) {
    lines.push(`Mean duration: ${formatSeconds(stats.mean_seconds ?? 0)}`);
    lines.push(`Median duration: ${formatSeconds(stats.median_seconds ?? 0)}`);
    lines.push(`P95 duration: ${formatSeconds(stats.p95_seconds ?? 0)}`);
  }

  if (report.per_plan_stats.length > 0) {
    lines.push('');
    lines.push(blue('Top plans by activity:'));
    for (const plan of report.per_plan_stats.slice(0, 5)) {
      lines.push(
        `  • ${plan.plan_name}: ${plan.run_count} runs, avg ${formatSeconds(plan.mean_duration_seconds)}`
      );
    }
  }

  if (report.failure_analysis.count > 0) {
    lines.push('');
    lines.push(red(`Failures (${report.failure_analysis.count}):`));
    for (const failure of report.failure_analysis.details.slice(0, 5)) {
      lines.push(`  • ${failure.plan_name}: ${failure.error_message}`);
    }
  }

  if (report.tool_usage) {
    lines.push('');
    lines.push(
      blue(
        `Tools: ${report.tool_usage.total_tool_invocations} invocations across ${report.tool_usage.unique_tools_used} tools`
      )
    );
    for (const tool of report.tool_usage.top_tools.slice(0, 5)) {
      lines.push(`  • ${tool.tool_name}: ${tool.usage_count} uses`);
    }
  }

  return lines.join('\n');
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
