import { z } from 'zod';

/** Trailing UTC designator or numeric offset */
export const ZONE_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

/**
 * Read an ISO-8601 date-time without an offset as UTC. Date-only values
 * already parse as UTC and are returned unchanged.
 */
export function assumeUtc(value: string): string {
  const trimmed = value.trim();
  if (!DATE_TIME_PATTERN.test(trimmed)) {
    return trimmed;
  }
  const normalized = trimmed.replace(' ', 'T');
  return ZONE_PATTERN.test(normalized) ? normalized : `${normalized}Z`;
}

/**
 * Wire timestamp, independent of the host time zone.
 */
export const timestampSchema = z.preprocess(
  value => (typeof value === 'string' ? assumeUtc(value) : value),
  z.coerce.date()
);
