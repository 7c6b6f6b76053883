/**
 * Filter Stage
 *
 * Order is fixed: day-of-week AND hour-of-day AND borough narrow the table
 * first; the top-N categories are ranked on that narrowed subset and then
 * applied as the last predicate.
 */

import { z } from "zod";
import { WEEKDAYS } from "../shared/types.js";
import type { FilterCriteria, ServiceRequest, Weekday } from "../shared/types.js";
import { ValidationError } from "../shared/errors.js";
import {
  MAP_POINTS_MIN,
  MAP_POINTS_MAX,
  MAP_POINTS_STEP,
  TOP_N_MIN,
  TOP_N_DEFAULT,
  TOP_N_SLIDER_MIN,
  TOP_N_SLIDER_MAX,
} from "../shared/config.js";
import { rankCounts } from "./stats.js";
import { UNSPECIFIED } from "../source/schema.js";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const hour = z.number().int().min(0).max(23);

function buildCriteriaSchema(defaultMapPoints: number) {
  return z
    .object({
      days: z.union([z.literal("all"), z.array(z.enum(WEEKDAYS))]).default("all"),
      hourRange: z.tuple([hour, hour]).default([0, 23]),
      boroughs: z.union([z.literal("all"), z.array(z.string().min(1))]).default("all"),
      topN: z.number().int().min(TOP_N_MIN).default(TOP_N_DEFAULT),
      mapPoints: z.number().int().min(MAP_POINTS_MIN).max(MAP_POINTS_MAX).default(defaultMapPoints),
      trendRange: z
        .object({
          start: z.string().regex(DATE_PATTERN),
          end: z.string().regex(DATE_PATTERN),
        })
        .optional(),
    })
    .superRefine((c, ctx) => {
      const [start, end] = c.hourRange;
      if (start > end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["hourRange"],
          message: `hour range ${start}-${end} wraps past midnight; use a range with start <= end`,
        });
      }
      if (c.trendRange && c.trendRange.start > c.trendRange.end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["trendRange"],
          message: `date range starts after it ends (${c.trendRange.start} > ${c.trendRange.end})`,
        });
      }
    });
}

/**
 * Validate an untyped criteria payload, filling defaults for absent
 * fields. Throws ValidationError listing every problem.
 */
export function parseCriteria(input: unknown, defaultMapPoints: number = 3000): FilterCriteria {
  const result = buildCriteriaSchema(defaultMapPoints).safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }

  const c = result.data;
  const criteria: FilterCriteria = {
    days: c.days === "all" ? "all" : [...new Set(c.days)],
    hourRange: [c.hourRange[0], c.hourRange[1]],
    boroughs: c.boroughs === "all" ? "all" : [...new Set(c.boroughs)],
    topN: c.topN,
    mapPoints: c.mapPoints,
  };
  if (c.trendRange) criteria.trendRange = { ...c.trendRange };
  return criteria;
}

export function defaultCriteria(defaultMapPoints: number = 3000): FilterCriteria {
  return parseCriteria({}, defaultMapPoints);
}

/** Day AND hour AND borough. */
export function applyBaseFilters(
  records: readonly ServiceRequest[],
  criteria: FilterCriteria
): ServiceRequest[] {
  const days = criteria.days === "all" ? null : new Set<Weekday>(criteria.days);
  const boroughs = criteria.boroughs === "all" ? null : new Set(criteria.boroughs);
  const [start, end] = criteria.hourRange;

  return records.filter(
    (r) =>
      (days === null || days.has(r.dayOfWeek)) &&
      r.hour >= start &&
      r.hour <= end &&
      (boroughs === null || boroughs.has(r.borough))
  );
}

/** The n most frequent complaint types, ties by name. */
export function topCategories(records: readonly ServiceRequest[], n: number): string[] {
  const counts = new Map<string, number>();
  for (const r of records) counts.set(r.complaintType, (counts.get(r.complaintType) ?? 0) + 1);
  return rankCounts(counts)
    .slice(0, n)
    .map(([type]) => type);
}

export interface FilterResult {
  records: ServiceRequest[];
  topCategories: string[];
}

export function applyFilters(records: readonly ServiceRequest[], criteria: FilterCriteria): FilterResult {
  const narrowed = applyBaseFilters(records, criteria);
  const top = topCategories(narrowed, criteria.topN);
  const inScope = new Set(top);
  return {
    records: narrowed.filter((r) => inScope.has(r.complaintType)),
    topCategories: top,
  };
}

export interface FilterOptions {
  days: Weekday[];
  boroughs: string[];
  hours: { min: number; max: number };
  topN: { min: number; max: number; default: number };
  mapPoints: { min: number; max: number; step: number; default: number };
}

/**
 * Choices offered to the UI. Unspecified boroughs are still filterable
 * under "all" but are not offered as a selection.
 */
export function filterOptions(records: readonly ServiceRequest[], defaultMapPoints: number = 3000): FilterOptions {
  const presentDays = new Set(records.map((r) => r.dayOfWeek));
  const boroughs = new Set<string>();
  for (const r of records) {
    if (r.borough.trim().toLowerCase() !== UNSPECIFIED.toLowerCase()) boroughs.add(r.borough);
  }

  return {
    days: WEEKDAYS.filter((d) => presentDays.has(d)),
    boroughs: [...boroughs].sort(),
    hours: { min: 0, max: 23 },
    topN: { min: TOP_N_SLIDER_MIN, max: TOP_N_SLIDER_MAX, default: TOP_N_DEFAULT },
    mapPoints: { min: MAP_POINTS_MIN, max: MAP_POINTS_MAX, step: MAP_POINTS_STEP, default: defaultMapPoints },
  };
}
