/**
 * Digest email rendering and terminal preview.
 */

import { isEmptyReport, type WindowReport } from '../types/index.js';

export interface DigestEmail {
  subject: string;
  body: string;
}

export interface DigestEmailInput {
  report: WindowReport;
  summary: string;
  since: Date;
  until: Date;
  subjectPrefix: string;
  /** Time printed in the footer */
  now: Date;
}

/** YYYY-MM-DD HH:MM UTC */
export function formatUtcMinute(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

/** YYYY-MM-DD HH:MM:SS UTC */
export function formatUtcSecond(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function buildDigestEmail(input: DigestEmailInput): DigestEmail {
  const { report, summary, since, until, subjectPrefix, now } = input;

  const subject = `${subjectPrefix} - ${report.total_runs} runs on ${since.toISOString().slice(0, 10)}`;

  const lines = [
    'Plan Runs Summary',
    `Period: ${formatUtcMinute(since)} to ${formatUtcMinute(until)}`,
    '',
    summary,
    '',
    '---',
    `Generated at: ${formatUtcSecond(now)}`,
    `Total runs analyzed: ${report.total_runs}`,
  ];

  if (!isEmptyReport(report)) {
    const stats = report.duration_stats;
    if (stats.count > 0 && stats.mean_seconds !== undefined && stats.p95_seconds !== undefined) {
      lines.push(
        `Mean duration: ${stats.mean_seconds.toFixed(1)}s`,
        `P95 duration: ${stats.p95_seconds.toFixed(1)}s`
      );
    }
  }

  return { subject, body: lines.join('\n') };
}

const RULE = '='.repeat(60);
const BODY_RULE = '-'.repeat(40);

/**
 * Frame an email for printing; nothing is sent.
 */
export function formatMailPreview(email: DigestEmail, to?: string): string {
  const lines = [RULE, 'EMAIL PREVIEW', RULE, ''];
  if (to !== undefined) {
    lines.push(`To: ${to}`);
  }
  lines.push(`Subject: ${email.subject}`, '', 'Body:', BODY_RULE, email.body, BODY_RULE);
  return lines.join('\n');
}
