/** Days of the week in dashboard order (Monday first). */
export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** A single 311 service request, validated once at load time. */
export interface ServiceRequest {
  complaintType: string;
  status: string;
  borough: string;
  createdAt: number; // epoch ms of the naive wall-clock timestamp
  closedAt?: number;
  latitude?: number;
  longitude?: number;
  // derived at load
  hour: number;
  dayOfWeek: Weekday;
  resolutionMinutes?: number;
}

/** A value that may be absent when the population is empty. */
export type Metric<T> = { status: "ok"; value: T } | { status: "no_data" };

export const NO_DATA = { status: "no_data" } as const;

export function ok<T>(value: T): Metric<T> {
  return { status: "ok", value };
}

export interface DateRange {
  start: string; // YYYY-MM-DD
  end: string;
}

export interface FilterCriteria {
  days: "all" | Weekday[];
  hourRange: [number, number];
  boroughs: "all" | string[];
  topN: number;
  mapPoints: number;
  trendRange?: DateRange;
}

export interface KPIBundle {
  totalComplaints: number;
  closureRate: number;
  medianResolutionMinutes: Metric<number>;
  topComplaintType: Metric<string>;
  topBorough: Metric<string>;
}

export interface CategoryCount {
  complaintType: string;
  count: number;
}

/** 7 rows (Monday..Sunday) x 24 hour columns. */
export interface HourDayMatrix {
  days: readonly Weekday[];
  counts: number[][];
}

export interface BusiestSlot {
  day: Weekday;
  hour: number;
  count: number;
}

export interface DailyCount {
  date: string; // YYYY-MM-DD
  count: number;
}

export interface HourlyTypeCount {
  hour: number;
  complaintType: string;
  count: number;
}

export interface ResolutionStats {
  complaintType: string;
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  hours: number[];
}

export interface ResolutionSummary {
  byType: ResolutionStats[];
  slowest: Array<{ complaintType: string; medianMinutes: number }>;
}

export interface GroupedSummaries {
  topCategories: CategoryCount[];
  hourDay: HourDayMatrix;
  busiest: Metric<BusiestSlot>;
  daily: DailyCount[];
  hourlyByType: HourlyTypeCount[];
  resolution: ResolutionSummary;
}

export type RGB = [number, number, number];

export interface MapPoint {
  latitude: number;
  longitude: number;
  status: string;
  complaintType: string;
  borough: string;
  hoursToCloseText: string;
  color: RGB;
}

export interface MapView {
  points: MapPoint[];
  geocodedRows: number;
  topBorough: Metric<string>;
  topComplaintType: Metric<string>;
  viewState: { latitude: number; longitude: number; zoom: number; pitch: number };
}

export interface ChartNarrative {
  narrative: string;
  takeaway?: string;
}

export interface NarrativeSet {
  headline: string;
  categories: ChartNarrative;
  trend: ChartNarrative;
  heatmap: ChartNarrative;
  resolution: ChartNarrative;
  map: ChartNarrative;
}
