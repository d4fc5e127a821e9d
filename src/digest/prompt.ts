/**
 * Prompts for the natural-language digest summary.
 */

import { isEmptyReport, type WindowReport } from '../types/index.js';

export type SummaryFormat = 'text' | 'email';

const TEXT_SYSTEM_PROMPT = `You are a helpful assistant that creates daily digest summaries for software developers.

Analyze the plan run data and create a clear, structured summary. Focus on:

- Overview of activity
- Performance metrics (duration stats, p95, etc.)
- Top performing plans
- Any notable patterns or outliers
- Brief insights for developers

Use clear sections and bullet points where helpful. Keep it informative but concise.`;

const EMAIL_SYSTEM_PROMPT = `You are a helpful assistant that creates concise daily digest summaries for software developers.

Create a professional but friendly email-style summary of plan run analytics. Focus on:

- Key metrics and trends
- Notable performance insights
- Any concerning patterns
- Brief actionable insights

Keep it concise (2-3 paragraphs max), developer-friendly, and highlight the most important findings.`;

const CLOSING_INSTRUCTION =
  'Provide a concise, developer-focused summary highlighting key insights and any notable patterns.';

const TOP_PLANS_IN_PROMPT = 5;
const TOP_TOOLS_IN_PROMPT = 3;

export function getSystemPrompt(format: SummaryFormat): string {
  return format === 'email' ? EMAIL_SYSTEM_PROMPT : TEXT_SYSTEM_PROMPT;
}

function seconds(value: number): string {
  return `${value.toFixed(1)}s`;
}

/**
 * Plain-text rendering of a report for the summary model.
 */
export function buildSummaryPrompt(report: WindowReport): string {
  const lines: string[] = [
    `Analyze this plan run data from ${report.window.since} to ${report.window.until}:`,
  ];

  if (isEmptyReport(report)) {
    lines.push('', 'No plan runs were found in this window.', '', CLOSING_INSTRUCTION);
    return lines.join('\n');
  }

  lines.push(
    '',
    'Overview:',
    `- Total runs: ${report.total_runs}`,
    `- Completed runs: ${report.completed_runs}`,
    `- Failed runs: ${report.failed_runs}`,
    `- Success rate: ${report.success_rate.toFixed(1)}%`
  );

  const stats = report.duration_stats;
  if (
    stats.count > 0 &&
    stats.mean_seconds !== undefined &&
    stats.median_seconds !== undefined &&
    stats.p95_seconds !== undefined &&
    stats.min_seconds !== undefined &&
    stats.max_seconds !== undefined
  ) {
    lines.push(
      '',
      'Performance:',
      `- Mean duration: ${seconds(stats.mean_seconds)}`,
      `- Median duration: ${seconds(stats.median_seconds)}`,
      `- P95 duration: ${seconds(stats.p95_seconds)}`,
      `- Range: ${seconds(stats.min_seconds)} - ${seconds(stats.max_seconds)}`
    );
  }

  if (report.per_plan_stats.length > 0) {
    lines.push('', 'Top Plans by Activity:');
    for (const plan of report.per_plan_stats.slice(0, TOP_PLANS_IN_PROMPT)) {
      lines.push(
        `- ${plan.plan_name}: ${plan.run_count} runs, avg ${seconds(plan.mean_duration_seconds)}`
      );
    }
  }

  if (report.fastest_runs.length > 0) {
    lines.push('', 'Fastest Runs:');
    for (const run of report.fastest_runs) {
      lines.push(`- ${run.plan_name}: ${seconds(run.duration_seconds)}`);
    }
  }

  if (report.slowest_runs.length > 0) {
    lines.push('', 'Slowest Runs:');
    for (const run of report.slowest_runs) {
      lines.push(`- ${run.plan_name}: ${seconds(run.duration_seconds)}`);
    }
  }

  const tools = report.tool_usage;
  if (tools && tools.total_tool_invocations > 0) {
    lines.push(
      '',
      'Tool Usage:',
      `- Total tool invocations: ${tools.total_tool_invocations}`,
      `- Unique tools used: ${tools.unique_tools_used}`
    );
    const topTools = tools.top_tools.slice(0, TOP_TOOLS_IN_PROMPT);
    if (topTools.length > 0) {
      lines.push('- Top tools:');
      for (const tool of topTools) {
        const avg =
          tool.avg_duration_seconds !== null ? `, avg ${seconds(tool.avg_duration_seconds)}` : '';
        lines.push(`  - ${tool.tool_name}: ${tool.usage_count} uses${avg}`);
      }
    }
  }

  lines.push('', CLOSING_INSTRUCTION);
  return lines.join('\n');
}
