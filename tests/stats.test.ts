import { describe, it, expect } from "vitest";
import { median, quantile, round, rankCounts, mode } from "../src/analytics/stats.js";

describe("Statistics", () => {
  it("median of an odd-length input is the middle element", () => {
    expect(median([7, 1, 3])).toEqual({ status: "ok", value: 3 });
  });

  it("median of an even-length input averages the two middles", () => {
    expect(median([4, 1, 3, 2])).toEqual({ status: "ok", value: 2.5 });
  });

  it("median of an empty input is no data", () => {
    expect(median([])).toEqual({ status: "no_data" });
  });

  it("median does not reorder its input", () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it("quantile interpolates between ranks", () => {
    const sorted = [1, 2, 3, 4];
    expect(quantile(sorted, 0)).toBe(1);
    expect(quantile(sorted, 0.25)).toBe(1.75);
    expect(quantile(sorted, 0.5)).toBe(2.5);
    expect(quantile(sorted, 1)).toBe(4);
    expect(quantile([9], 0.75)).toBe(9);
  });

  it("round works correctly", () => {
    expect(round(3.14159, 2)).toBe(3.14);
    expect(round(3.14159, 0)).toBe(3);
  });
});

describe("Ranking", () => {
  it("orders by count, then by name", () => {
    const counts = new Map([
      ["Rodent", 2],
      ["Noise", 5],
      ["Illegal Parking", 2],
    ]);
    expect(rankCounts(counts)).toEqual([
      ["Noise", 5],
      ["Illegal Parking", 2],
      ["Rodent", 2],
    ]);
  });

  it("mode breaks ties the same way regardless of input order", () => {
    expect(mode(["QUEENS", "BRONX"])).toEqual({ status: "ok", value: "BRONX" });
    expect(mode(["BRONX", "QUEENS"])).toEqual({ status: "ok", value: "BRONX" });
    expect(mode([])).toEqual({ status: "no_data" });
  });
});
