/**
 * Analysis window resolution for the window-based commands.
 */

import { assumeUtc } from '../types/index.js';

export interface WindowOptions {
  today?: boolean | undefined;
  yesterday?: boolean | undefined;
  since?: string | undefined;
  until?: string | undefined;
}

export interface ResolvedWindow {
  since: Date;
  until: Date;
}

/** Window used when no window option is given */
export type DefaultWindow = 'last-24h' | 'yesterday';

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/i;

export class InvalidDateError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid date format: ${value}`);
    this.name = 'InvalidDateError';
  }
}

/**
 * Parse an ISO-8601 date or date-time. Values without an offset are UTC.
 */
export function parseIsoDate(value: string): Date {
  const trimmed = value.trim();
  if (!ISO_PATTERN.test(trimmed)) {
    throw new InvalidDateError(value);
  }

  const date = new Date(assumeUtc(trimmed));
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateError(value);
  }
  return date;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function previousUtcDay(now: Date): ResolvedWindow {
  const since = startOfUtcDay(new Date(now.getTime() - DAY_MS));
  return { since, until: new Date(since.getTime() + DAY_MS) };
}

/**
 * Precedence: --today, --yesterday, --since (with optional --until), default.
 * `--until` is only read together with `--since`.
 */
export function resolveWindow(
  options: WindowOptions,
  now: Date,
  fallback: DefaultWindow = 'last-24h'
): ResolvedWindow {
  if (options.today) {
    return { since: startOfUtcDay(now), until: now };
  }

  if (options.yesterday) {
    return previousUtcDay(now);
  }

  if (options.since !== undefined) {
    const since = parseIsoDate(options.since);
    const until = options.until !== undefined ? parseIsoDate(options.until) : now;
    return { since, until };
  }

  if (fallback === 'yesterday') {
    return previousUtcDay(now);
  }
  return { since: new Date(now.getTime() - DAY_MS), until: now };
}
