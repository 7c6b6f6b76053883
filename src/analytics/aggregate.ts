import { WEEKDAYS, NO_DATA, ok } from "../shared/types.js";
import type {
  BusiestSlot,
  CategoryCount,
  DailyCount,
  DateRange,
  GroupedSummaries,
  HourDayMatrix,
  HourlyTypeCount,
  KPIBundle,
  Metric,
  ResolutionStats,
  ResolutionSummary,
  ServiceRequest,
} from "../shared/types.js";
import { dateKey } from "../source/schema.js";
import { median, mode, quantile, rankCounts, round } from "./stats.js";

export const CLOSED_STATUS = "Closed";

/** Leading categories shown in the hourly breakdown. */
export const HOURLY_TYPE_LIMIT = 6;
/** Categories included in the resolution-time distributions. */
export const RESOLUTION_TYPE_LIMIT = 15;
/** Resolution times above this are left out of the distributions (60 days). */
export const RESOLUTION_CAP_MINUTES = 60 * 24 * 60;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * KPI row: volume, closure rate, median time to close, leading type and
 * borough.
 */
export function computeKpis(records: readonly ServiceRequest[]): KPIBundle {
  const totalComplaints = records.length;
  const closed = records.filter((r) => r.status === CLOSED_STATUS).length;
  const resolutions = records.flatMap((r) => (r.resolutionMinutes === undefined ? [] : [r.resolutionMinutes]));

  return {
    totalComplaints,
    closureRate: totalComplaints === 0 ? 0 : closed / totalComplaints,
    medianResolutionMinutes: median(resolutions),
    topComplaintType: mode(records.map((r) => r.complaintType)),
    topBorough: mode(records.map((r) => r.borough)),
  };
}

export function countByType(records: readonly ServiceRequest[], limit?: number): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const r of records) counts.set(r.complaintType, (counts.get(r.complaintType) ?? 0) + 1);
  const ranked = rankCounts(counts);
  return (limit === undefined ? ranked : ranked.slice(0, limit)).map(([complaintType, count]) => ({
    complaintType,
    count,
  }));
}

// ── Hour x day ─────────────────────────────────────────────────────

export function hourDayMatrix(records: readonly ServiceRequest[]): HourDayMatrix {
  const counts = WEEKDAYS.map(() => new Array<number>(24).fill(0));
  for (const r of records) {
    counts[WEEKDAYS.indexOf(r.dayOfWeek)][r.hour] += 1;
  }
  return { days: WEEKDAYS, counts };
}

/** Highest cell; ties go to the earlier day, then the earlier hour. */
export function busiestSlot(matrix: HourDayMatrix): Metric<BusiestSlot> {
  let best: BusiestSlot | undefined;
  for (let d = 0; d < matrix.counts.length; d++) {
    const row = matrix.counts[d];
    for (let hour = 0; hour < row.length; hour++) {
      const count = row[hour];
      if (count > 0 && (best === undefined || count > best.count)) {
        best = { day: matrix.days[d], hour, count };
      }
    }
  }
  return best ? ok(best) : NO_DATA;
}

// ── Daily series ───────────────────────────────────────────────────

function dayStart(key: string): number {
  return Date.parse(`${key}T00:00:00Z`);
}

/**
 * Requests per calendar day, zero-filled between the first and last day
 * present. A range narrows the series only; it never widens it past the
 * data.
 */
export function dailySeries(records: readonly ServiceRequest[], range?: DateRange): DailyCount[] {
  const counts = new Map<string, number>();
  for (const r of records) {
    const key = dateKey(r.createdAt);
    if (range && (key < range.start || key > range.end)) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  if (counts.size === 0) return [];

  const keys = [...counts.keys()].sort();
  const series: DailyCount[] = [];
  const last = dayStart(keys[keys.length - 1]);
  for (let t = dayStart(keys[0]); t <= last; t += DAY_MS) {
    const date = dateKey(t);
    series.push({ date, count: counts.get(date) ?? 0 });
  }
  return series;
}

export function peakDay(series: DailyCount[]): Metric<DailyCount> {
  let best: DailyCount | undefined;
  for (const point of series) {
    if (point.count > 0 && (best === undefined || point.count > best.count)) best = point;
  }
  return best ? ok(best) : NO_DATA;
}

// ── Hourly by type ─────────────────────────────────────────────────

export function hourlyByType(
  records: readonly ServiceRequest[],
  limit: number = HOURLY_TYPE_LIMIT
): HourlyTypeCount[] {
  const leading = countByType(records, limit).map((c) => c.complaintType);
  const rank = new Map(leading.map((t, i) => [t, i]));

  const counts = new Map<string, HourlyTypeCount>();
  for (const r of records) {
    if (!rank.has(r.complaintType)) continue;
    const key = `${r.hour}||${r.complaintType}`;
    const entry = counts.get(key) ?? { hour: r.hour, complaintType: r.complaintType, count: 0 };
    entry.count++;
    counts.set(key, entry);
  }

  return [...counts.values()].sort(
    (a, b) => a.hour - b.hour || (rank.get(a.complaintType) ?? 0) - (rank.get(b.complaintType) ?? 0)
  );
}

// ── Resolution time ────────────────────────────────────────────────

/**
 * Box statistics of minutes-to-close for the leading categories, and the
 * three slowest by median.
 */
export function resolutionByType(
  records: readonly ServiceRequest[],
  limit: number = RESOLUTION_TYPE_LIMIT,
  capMinutes: number = RESOLUTION_CAP_MINUTES
): ResolutionSummary {
  const leading = countByType(records, limit).map((c) => c.complaintType);
  const byType = new Map<string, number[]>(leading.map((t) => [t, []]));

  for (const r of records) {
    const bucket = byType.get(r.complaintType);
    if (bucket && r.resolutionMinutes !== undefined && r.resolutionMinutes >= 0 && r.resolutionMinutes <= capMinutes) {
      bucket.push(r.resolutionMinutes);
    }
  }

  const stats: ResolutionStats[] = [];
  for (const [complaintType, minutes] of byType) {
    if (minutes.length === 0) continue;
    const sorted = [...minutes].sort((a, b) => a - b);
    stats.push({
      complaintType,
      count: sorted.length,
      min: sorted[0],
      q1: quantile(sorted, 0.25),
      median: quantile(sorted, 0.5),
      q3: quantile(sorted, 0.75),
      max: sorted[sorted.length - 1],
      hours: minutes.map((m) => round(m / 60, 1)),
    });
  }

  const slowest = [...stats]
    .sort((a, b) => b.median - a.median || (a.complaintType < b.complaintType ? -1 : 1))
    .slice(0, 3)
    .map((s) => ({ complaintType: s.complaintType, medianMinutes: s.median }));

  return { byType: stats, slowest };
}

/**
 * Grouped summaries for the chart panels. `categoryLimit` bounds the
 * category bar chart.
 */
export function computeSummaries(
  records: readonly ServiceRequest[],
  options: { categoryLimit: number; trendRange?: DateRange }
): GroupedSummaries {
  const hourDay = hourDayMatrix(records);
  return {
    topCategories: countByType(records, options.categoryLimit),
    hourDay,
    busiest: busiestSlot(hourDay),
    daily: dailySeries(records, options.trendRange),
    hourlyByType: hourlyByType(records),
    resolution: resolutionByType(records),
  };
}
