import { NO_DATA, ok } from "../shared/types.js";
import type { Metric } from "../shared/types.js";

/**
 * Median: middle element, or the average of the two middle elements.
 * No data for an empty input.
 */
export function median(values: number[]): Metric<number> {
  if (values.length === 0) return NO_DATA;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return ok(sorted[mid]);
  return ok((sorted[mid - 1] + sorted[mid]) / 2);
}

/**
 * Quantile with linear interpolation between closest ranks.
 * `sorted` must be ascending and non-empty.
 */
export function quantile(sorted: number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Rank keys by count, highest first; equal counts fall back to code-point
 * order of the key so the ranking never depends on input order.
 */
export function rankCounts(counts: Map<string, number>): Array<[string, number]> {
  return [...counts.entries()].sort(([ka, a], [kb, b]) => b - a || (ka < kb ? -1 : ka > kb ? 1 : 0));
}

/** Most frequent value, or no data when there are no values. */
export function mode(values: Iterable<string>): Metric<string> {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  const [first] = rankCounts(counts);
  return first ? ok(first[0]) : NO_DATA;
}
