import { describe, it, expect } from "vitest";
import { buildNarratives, headlineNarrative } from "../src/narrative/narrative.js";
import type { NarrativeInput } from "../src/narrative/narrative.js";
import { describeCriteria, formatDuration, formatPercent, pluralize } from "../src/narrative/format.js";
import { computeKpis, computeSummaries } from "../src/analytics/aggregate.js";
import { sampleMapPoints } from "../src/analytics/map.js";
import { applyFilters, parseCriteria } from "../src/analytics/filter.js";
import type { FilterCriteria, ServiceRequest } from "../src/shared/types.js";
import { makeRequest } from "./helpers.js";

function narrativeInput(records: ServiceRequest[], criteria: FilterCriteria): NarrativeInput {
  const filtered = applyFilters(records, criteria).records;
  const map = sampleMapPoints(filtered, criteria.mapPoints, 42);
  return {
    kpis: computeKpis(filtered),
    summaries: computeSummaries(filtered, { categoryLimit: criteria.topN }),
    map: { sampleSize: map.points.length, topBorough: map.topBorough, topComplaintType: map.topComplaintType },
    criteria,
  };
}

const records = [
  makeRequest({ type: "Noise", created: "2024-01-01 09:00", closed: "2024-01-01 11:00", status: "Closed", borough: "Brooklyn" }),
  makeRequest({ type: "Noise", created: "2024-01-01 10:00", status: "Open", borough: "Queens" }),
];

describe("formatting", () => {
  it("formats durations at minute granularity", () => {
    expect(formatDuration(45)).toBe("45m");
    expect(formatDuration(120)).toBe("2h");
    expect(formatDuration(90.5)).toBe("1h 31m");
    expect(formatDuration(0)).toBe("0m");
  });

  it("formats rates and counts", () => {
    expect(formatPercent(0.5)).toBe("50.0%");
    expect(formatPercent(2 / 3)).toBe("66.7%");
    expect(pluralize(1, "request")).toBe("1 request");
    expect(pluralize(1200, "request")).toBe("1,200 requests");
  });

  it("describes the filter context", () => {
    expect(describeCriteria(parseCriteria({}))).toBe("all days, 00:00-23:59, all boroughs");
    expect(
      describeCriteria(parseCriteria({ days: ["Monday", "Tuesday"], hourRange: [8, 17], boroughs: ["BROOKLYN"] }))
    ).toBe("Monday, Tuesday, 08:00-17:59, BROOKLYN");
    expect(describeCriteria(parseCriteria({ boroughs: [] }))).toBe("all days, 00:00-23:59, no boroughs selected");
  });
});

describe("buildNarratives", () => {
  it("describes the two-record Monday view", () => {
    const criteria = parseCriteria({ days: ["Monday"], topN: 5 });
    const text = buildNarratives(narrativeInput(records, criteria));

    expect(text.headline).toBe(
      "In this view, Noise is the most common complaint across 2 requests. " +
        "The closure rate is 50.0%, and the median time to close is 2h. " +
        "Highest volume borough here is Brooklyn."
    );
    expect(text.categories).toEqual({
      narrative: "Noise leads with 2 requests (~100.0% of the displayed top categories).",
      takeaway: "Complaints concentrate in a few categories, led by Noise.",
    });
    expect(text.trend.narrative).toBe("Peak daily volume occurs on 2024-01-01 with 2 requests.");
    expect(text.heatmap.narrative).toBe("The busiest time is Monday at 09:00, with 1 request.");
    expect(text.resolution.narrative).toBe("Slowest categories by median closure time: Noise (2h median).");
    expect(text.map).toEqual({
      narrative: "No geocoded requests are available for Monday, 00:00-23:59, all boroughs.",
    });
  });

  it("uses fallback templates for an empty view", () => {
    const criteria = parseCriteria({ days: ["Sunday"] });
    const text = buildNarratives(narrativeInput(records, criteria));

    expect(text.headline).toBe(
      "No records match the current filters (Sunday, 00:00-23:59, all boroughs). " +
        "Try broadening your day/hour/borough selection."
    );
    expect(text.categories).toEqual({
      narrative: "No complaint categories to rank for Sunday, 00:00-23:59, all boroughs.",
    });
    expect(text.trend.narrative).toBe("No requests fall within the selected dates for Sunday, 00:00-23:59, all boroughs.");
    expect(text.heatmap.narrative).toBe(
      "No requests to place on the hour-by-day grid for Sunday, 00:00-23:59, all boroughs."
    );
    expect(text.resolution.narrative).toBe(
      "No closed requests to measure resolution time for Sunday, 00:00-23:59, all boroughs."
    );
  });

  it("never interpolates missing values", () => {
    const text = buildNarratives(narrativeInput(records, parseCriteria({ days: ["Sunday"] })));
    const all = JSON.stringify(text);
    expect(all).not.toMatch(/undefined|NaN|no_data/);
  });

  it("describes the map sample", () => {
    const geocoded = [
      makeRequest({ type: "Rodent", created: "2024-01-02 09:00", borough: "BRONX", lat: 40.84, lon: -73.88 }),
      makeRequest({ type: "Rodent", created: "2024-01-02 10:00", borough: "BRONX", lat: 40.85, lon: -73.87 }),
      makeRequest({ type: "Noise", created: "2024-01-02 11:00", borough: "QUEENS", lat: 40.72, lon: -73.82 }),
    ];
    const text = buildNarratives(narrativeInput(geocoded, parseCriteria({})));
    expect(text.map).toEqual({
      narrative:
        "In the mapped sample of 3, complaints cluster most in BRONX, and the most common complaint type is Rodent.",
      takeaway: "Hotspots shift with filters and help guide targeted deployment.",
    });
  });

  it("is pure: identical inputs give identical text and inputs are untouched", () => {
    const input = narrativeInput(records, parseCriteria({ days: ["Monday"], topN: 5 }));
    const snapshot = structuredClone(input);
    const first = buildNarratives(input);
    const second = buildNarratives(input);
    expect(second).toEqual(first);
    expect(input).toEqual(snapshot);
  });
});

describe("headlineNarrative", () => {
  it("says so when no request has closed yet", () => {
    const only = [makeRequest({ type: "Rodent", created: "2024-01-01 09:00", status: "Open", borough: "QUEENS" })];
    expect(headlineNarrative(computeKpis(only), parseCriteria({}))).toBe(
      "In this view, Rodent is the most common complaint across 1 request. " +
        "The closure rate is 0.0%; none of these requests has a recorded closing time yet. " +
        "Highest volume borough here is QUEENS."
    );
  });
});
