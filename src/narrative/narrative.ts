/**
 * Narrative Stage
 *
 * Template rules turning computed metrics into one sentence group per
 * chart. Every function here is pure: identical inputs give identical
 * text. Each chart has its own fallback for an empty population, so a
 * missing value is never dropped into a sentence written for counts.
 */

import type {
  ChartNarrative,
  FilterCriteria,
  GroupedSummaries,
  KPIBundle,
  Metric,
  NarrativeSet,
} from "../shared/types.js";
import { peakDay } from "../analytics/aggregate.js";
import { describeCriteria, formatCount, formatDuration, formatHour, formatPercent, pluralize } from "./format.js";

export interface MapNarrativeInput {
  sampleSize: number;
  topBorough: Metric<string>;
  topComplaintType: Metric<string>;
}

export interface NarrativeInput {
  kpis: KPIBundle;
  summaries: GroupedSummaries;
  map: MapNarrativeInput;
  criteria: FilterCriteria;
}

export const TAKEAWAYS = {
  categories: (lead: string) => `Complaints concentrate in a few categories, led by ${lead}.`,
  trend: "Complaint volume can spike during certain periods, supporting proactive planning.",
  heatmap: "Reporting follows consistent daily and weekly cycles.",
  resolution: "Resolution times vary by complaint type, reflecting agency workflows.",
  map: "Hotspots shift with filters and help guide targeted deployment.",
} as const;

/** KPI headline; depends on the KPI bundle only (plus filter context). */
export function headlineNarrative(kpis: KPIBundle, criteria: FilterCriteria): string {
  if (kpis.totalComplaints === 0 || kpis.topComplaintType.status === "no_data") {
    return (
      `No records match the current filters (${describeCriteria(criteria)}). ` +
      `Try broadening your day/hour/borough selection.`
    );
  }

  const closing =
    kpis.medianResolutionMinutes.status === "ok"
      ? `The closure rate is ${formatPercent(kpis.closureRate)}, and the median time to close is ${formatDuration(kpis.medianResolutionMinutes.value)}.`
      : `The closure rate is ${formatPercent(kpis.closureRate)}; none of these requests has a recorded closing time yet.`;

  let text =
    `In this view, ${kpis.topComplaintType.value} is the most common complaint across ` +
    `${pluralize(kpis.totalComplaints, "request")}. ${closing}`;
  if (kpis.topBorough.status === "ok") {
    text += ` Highest volume borough here is ${kpis.topBorough.value}.`;
  }
  return text;
}

export function categoriesNarrative(summaries: GroupedSummaries, criteria: FilterCriteria): ChartNarrative {
  const [lead] = summaries.topCategories;
  if (!lead) {
    return { narrative: `No complaint categories to rank for ${describeCriteria(criteria)}.` };
  }

  const shown = summaries.topCategories.reduce((sum, c) => sum + c.count, 0);
  const share = ((100 * lead.count) / shown).toFixed(1);
  return {
    narrative:
      `${lead.complaintType} leads with ${pluralize(lead.count, "request")} ` +
      `(~${share}% of the displayed top categories).`,
    takeaway: TAKEAWAYS.categories(lead.complaintType),
  };
}

export function trendNarrative(summaries: GroupedSummaries, criteria: FilterCriteria): ChartNarrative {
  const peak = peakDay(summaries.daily);
  if (peak.status === "no_data") {
    return { narrative: `No requests fall within the selected dates for ${describeCriteria(criteria)}.` };
  }
  return {
    narrative: `Peak daily volume occurs on ${peak.value.date} with ${pluralize(peak.value.count, "request")}.`,
    takeaway: TAKEAWAYS.trend,
  };
}

export function heatmapNarrative(summaries: GroupedSummaries, criteria: FilterCriteria): ChartNarrative {
  if (summaries.busiest.status === "no_data") {
    return { narrative: `No requests to place on the hour-by-day grid for ${describeCriteria(criteria)}.` };
  }
  const { day, hour, count } = summaries.busiest.value;
  return {
    narrative: `The busiest time is ${day} at ${formatHour(hour)}, with ${pluralize(count, "request")}.`,
    takeaway: TAKEAWAYS.heatmap,
  };
}

export function resolutionNarrative(summaries: GroupedSummaries, criteria: FilterCriteria): ChartNarrative {
  const { slowest } = summaries.resolution;
  if (slowest.length === 0) {
    return { narrative: `No closed requests to measure resolution time for ${describeCriteria(criteria)}.` };
  }
  const bullets = slowest
    .map((s) => `${s.complaintType} (${formatDuration(s.medianMinutes)} median)`)
    .join(" • ");
  return {
    narrative: `Slowest categories by median closure time: ${bullets}.`,
    takeaway: TAKEAWAYS.resolution,
  };
}

export function mapNarrative(map: MapNarrativeInput, criteria: FilterCriteria): ChartNarrative {
  if (map.sampleSize === 0 || map.topBorough.status === "no_data" || map.topComplaintType.status === "no_data") {
    return { narrative: `No geocoded requests are available for ${describeCriteria(criteria)}.` };
  }
  return {
    narrative:
      `In the mapped sample of ${formatCount(map.sampleSize)}, complaints cluster most in ${map.topBorough.value}, ` +
      `and the most common complaint type is ${map.topComplaintType.value}.`,
    takeaway: TAKEAWAYS.map,
  };
}

export function buildNarratives(input: NarrativeInput): NarrativeSet {
  const { kpis, summaries, map, criteria } = input;
  return {
    headline: headlineNarrative(kpis, criteria),
    categories: categoriesNarrative(summaries, criteria),
    trend: trendNarrative(summaries, criteria),
    heatmap: heatmapNarrative(summaries, criteria),
    resolution: resolutionNarrative(summaries, criteria),
    map: mapNarrative(map, criteria),
  };
}
