import type { FilterCriteria } from "../shared/types.js";

/** 90 -> "1h 30m", 120 -> "2h", 45 -> "45m". Rounded to the minute. */
export function formatDuration(minutes: number): string {
  const total = Math.round(minutes);
  const h = Math.floor(total / 60);
  const m = total % 60;
  if (h === 0) return `${m}m`;
  if (m === 0) return `${h}h`;
  return `${h}h ${m}m`;
}

/** 0.5 -> "50.0%" */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

/** 1 -> "1 request", 1200 -> "1,200 requests" */
export function pluralize(n: number, noun: string): string {
  return `${formatCount(n)} ${noun}${n === 1 ? "" : "s"}`;
}

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

function describeList(values: "all" | readonly string[], allLabel: string, noneLabel: string): string {
  if (values === "all") return allLabel;
  if (values.length === 0) return noneLabel;
  return values.join(", ");
}

/**
 * Filter context for fallback sentences, e.g.
 * "Monday, 00:00-23:59, all boroughs".
 */
export function describeCriteria(criteria: FilterCriteria): string {
  const [start, end] = criteria.hourRange;
  const days = describeList(criteria.days, "all days", "no days selected");
  const boroughs = describeList(criteria.boroughs, "all boroughs", "no boroughs selected");
  return `${days}, ${formatHour(start)}-${String(end).padStart(2, "0")}:59, ${boroughs}`;
}
