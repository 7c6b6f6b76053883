import { describe, it, expect } from "vitest";
import {
  parseCriteria,
  defaultCriteria,
  applyBaseFilters,
  applyFilters,
  topCategories,
  filterOptions,
} from "../src/analytics/filter.js";
import { ValidationError } from "../src/shared/errors.js";
import type { FilterCriteria } from "../src/shared/types.js";
import { makeRequest } from "./helpers.js";

function criteria(overrides: Partial<FilterCriteria> = {}): FilterCriteria {
  return { ...defaultCriteria(), ...overrides };
}

function issuesOf(input: unknown): string[] {
  try {
    parseCriteria(input);
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("parseCriteria", () => {
  it("fills defaults for an empty payload", () => {
    expect(parseCriteria({})).toEqual({
      days: "all",
      hourRange: [0, 23],
      boroughs: "all",
      topN: 15,
      mapPoints: 3000,
    });
  });

  it("uses the configured map point default", () => {
    expect(parseCriteria(undefined, 1500).mapPoints).toBe(1500);
  });

  it("accepts explicit selections and drops duplicates", () => {
    const c = parseCriteria({
      days: ["Monday", "Monday", "Friday"],
      hourRange: [8, 17],
      boroughs: ["QUEENS"],
      topN: 5,
      mapPoints: 500,
      trendRange: { start: "2024-01-01", end: "2024-01-31" },
    });
    expect(c.days).toEqual(["Monday", "Friday"]);
    expect(c.hourRange).toEqual([8, 17]);
    expect(c.trendRange).toEqual({ start: "2024-01-01", end: "2024-01-31" });
  });

  it("rejects an hour range that wraps past midnight", () => {
    expect(issuesOf({ hourRange: [22, 2] })).toEqual([
      "hourRange: hour range 22-2 wraps past midnight; use a range with start <= end",
    ]);
  });

  it("rejects hours outside 0-23", () => {
    expect(issuesOf({ hourRange: [0, 24] })).toHaveLength(1);
    expect(issuesOf({ hourRange: [1.5, 3] })).toHaveLength(1);
  });

  it("rejects a top-N that is not a positive integer", () => {
    expect(issuesOf({ topN: 0 })).toHaveLength(1);
    expect(issuesOf({ topN: -3 })).toHaveLength(1);
    expect(issuesOf({ topN: 2.5 })).toHaveLength(1);
  });

  it("rejects map point caps outside the slider bounds", () => {
    expect(issuesOf({ mapPoints: 100 })).toHaveLength(1);
    expect(issuesOf({ mapPoints: 9000 })).toHaveLength(1);
  });

  it("rejects unknown day names", () => {
    expect(issuesOf({ days: ["Funday"] })).toHaveLength(1);
  });

  it("rejects a reversed date range", () => {
    expect(issuesOf({ trendRange: { start: "2024-02-01", end: "2024-01-01" } })).toEqual([
      "trendRange: date range starts after it ends (2024-02-01 > 2024-01-01)",
    ]);
  });

  it("throws ValidationError", () => {
    expect(() => parseCriteria({ hourRange: [22, 2] })).toThrow(ValidationError);
  });
});

describe("applyFilters", () => {
  // 2024-01-01 is a Monday, 2024-01-02 a Tuesday
  const records = [
    makeRequest({ type: "A", created: "2024-01-01 08:00", borough: "QUEENS" }),
    makeRequest({ type: "A", created: "2024-01-01 09:00", borough: "BROOKLYN" }),
    makeRequest({ type: "A", created: "2024-01-01 22:00", borough: "BROOKLYN" }),
    makeRequest({ type: "B", created: "2024-01-01 10:00", borough: "BRONX" }),
    ...Array.from({ length: 5 }, (_, i) =>
      makeRequest({ type: "B", created: `2024-01-02 1${i}:00`, borough: "QUEENS" })
    ),
    makeRequest({ type: "C", created: "2024-01-02 12:00", borough: "QUEENS" }),
  ];

  it("never returns more records than it was given", () => {
    const selections: Partial<FilterCriteria>[] = [
      {},
      { days: ["Monday"] },
      { hourRange: [9, 10] },
      { boroughs: ["QUEENS"] },
      { topN: 1 },
      { days: ["Sunday"] },
    ];
    for (const s of selections) {
      expect(applyFilters(records, criteria(s)).records.length).toBeLessThanOrEqual(records.length);
    }
  });

  it("combines day, hour and borough predicates", () => {
    const result = applyBaseFilters(records, criteria({ days: ["Monday"], hourRange: [8, 21], boroughs: ["BROOKLYN", "QUEENS"] }));
    expect(result).toHaveLength(2);
    expect(result.map((r) => r.hour)).toEqual([8, 9]);
  });

  it("ranks top-N on the narrowed subset, then applies it", () => {
    // B leads overall (6 vs 3) but A leads on Monday
    const result = applyFilters(records, criteria({ days: ["Monday"], topN: 1 }));
    expect(result.topCategories).toEqual(["A"]);
    expect(result.records).toHaveLength(3);
    expect(result.records.every((r) => r.complaintType === "A")).toBe(true);
  });

  it("breaks category ties by name", () => {
    expect(topCategories(records.filter((r) => r.dayOfWeek === "Tuesday" || r.complaintType === "C"), 2)).toEqual([
      "B",
      "C",
    ]);
    const tied = [
      makeRequest({ type: "Zeta", created: "2024-01-01 08:00" }),
      makeRequest({ type: "Alpha", created: "2024-01-01 08:00" }),
    ];
    expect(topCategories(tied, 1)).toEqual(["Alpha"]);
  });

  it("returns an empty view when nothing matches", () => {
    const result = applyFilters(records, criteria({ days: ["Sunday"] }));
    expect(result.records).toEqual([]);
    expect(result.topCategories).toEqual([]);
  });

  it("treats an empty borough selection as matching nothing", () => {
    expect(applyFilters(records, criteria({ boroughs: [] })).records).toEqual([]);
  });
});

describe("filterOptions", () => {
  it("lists present days in week order and named boroughs only", () => {
    const records = [
      makeRequest({ created: "2024-01-07 08:00", borough: "QUEENS" }),
      makeRequest({ created: "2024-01-01 08:00", borough: "Unspecified" }),
      makeRequest({ created: "2024-01-03 08:00", borough: "BRONX" }),
    ];
    const options = filterOptions(records, 2000);
    expect(options.days).toEqual(["Monday", "Wednesday", "Sunday"]);
    expect(options.boroughs).toEqual(["BRONX", "QUEENS"]);
    expect(options.topN).toEqual({ min: 5, max: 30, default: 15 });
    expect(options.mapPoints).toEqual({ min: 500, max: 8000, step: 500, default: 2000 });
  });
});
