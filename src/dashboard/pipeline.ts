/**
 * Dashboard pipeline: Filter → Aggregate → Narrative → output shaping.
 *
 * Recomputed in full from the shared record table on every interaction;
 * nothing is cached between calls.
 */

import type {
  FilterCriteria,
  GroupedSummaries,
  KPIBundle,
  MapView,
  NarrativeSet,
  ServiceRequest,
} from "../shared/types.js";
import { applyFilters } from "../analytics/filter.js";
import { computeKpis, computeSummaries } from "../analytics/aggregate.js";
import { sampleMapPoints } from "../analytics/map.js";
import { buildNarratives } from "../narrative/narrative.js";
import { categoriesChart, dailyChart, hourlyChart, resolutionChart } from "../exports/chart.js";
import type { ChartSet } from "../exports/chart.js";

export interface DashboardOptions {
  sampleSeed: number;
}

export interface DashboardView {
  criteria: FilterCriteria;
  totalRows: number;
  rowsAfter: number;
  topCategories: string[];
  kpis: KPIBundle;
  summaries: GroupedSummaries;
  narratives: NarrativeSet;
  charts: ChartSet;
  map: MapView;
}

export function buildDashboard(
  records: readonly ServiceRequest[],
  criteria: FilterCriteria,
  options: DashboardOptions
): DashboardView {
  const filtered = applyFilters(records, criteria);

  const kpis = computeKpis(filtered.records);
  const summaries = computeSummaries(filtered.records, {
    categoryLimit: criteria.topN,
    trendRange: criteria.trendRange,
  });
  const map = sampleMapPoints(filtered.records, criteria.mapPoints, options.sampleSeed);

  const narratives = buildNarratives({
    kpis,
    summaries,
    map: {
      sampleSize: map.points.length,
      topBorough: map.topBorough,
      topComplaintType: map.topComplaintType,
    },
    criteria,
  });

  return {
    criteria,
    totalRows: records.length,
    rowsAfter: filtered.records.length,
    topCategories: filtered.topCategories,
    kpis,
    summaries,
    narratives,
    charts: {
      categories: categoriesChart(summaries.topCategories, criteria.topN),
      daily: dailyChart(summaries.daily),
      hourly: hourlyChart(summaries.hourlyByType),
      resolution: resolutionChart(summaries.resolution.byType),
    },
    map,
  };
}
