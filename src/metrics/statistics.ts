/**
 * Numeric primitives shared by every report section.
 */

export type SortDirection = 'asc' | 'desc';

export function msToSeconds(ms: number): number {
  return ms / 1000;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Arithmetic mean; 0 for an empty input.
 */
export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/**
 * Linear-interpolated percentile (p in 0-100).
 *
 * index = (p / 100) * (n - 1); an integral index selects that element,
 * otherwise the two neighbours are blended by the fractional part.
 * Returns 0 for an empty input.
 */
export function percentile(values: readonly number[], p: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const first = sorted[0];
  if (first === undefined) {
    return 0;
  }

  const index = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(index);
  const lower = sorted[lo] ?? first;

  if (Number.isInteger(index)) {
    return lower;
  }

  const upper = sorted[lo + 1] ?? lower;
  const weight = index - lo;
  return lower * (1 - weight) + upper * weight;
}

export function median(values: readonly number[]): number {
  return percentile(values, 50);
}

export interface Summary {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
}

/**
 * Count, mean, median and range of a non-empty sample; null when empty.
 */
export function summarize(values: readonly number[]): Summary | null {
  if (values.length === 0) {
    return null;
  }
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

/**
 * `part / whole * 100`, or 0 when the whole is empty.
 */
export function ratePercent(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

/**
 * Code-unit string order, independent of locale.
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order: primary numeric key in the given direction, then the
 * identifier ascending.
 */
export function byValueThenKey<T>(
  value: (item: T) => number,
  key: (item: T) => string,
  direction: SortDirection
): (a: T, b: T) => number {
  return (a, b) => {
    const diff = value(a) - value(b);
    if (diff !== 0) {
      return direction === 'asc' ? diff : -diff;
    }
    return compareKeys(key(a), key(b));
  };
}
