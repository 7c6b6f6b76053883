/**
 * Map output shaping: a capped, reproducible sample of geocoded requests,
 * coloured by status, for a WebGL scatter layer.
 */

import type { MapPoint, MapView, RGB, ServiceRequest } from "../shared/types.js";
import { UNSPECIFIED } from "../source/schema.js";
import { mode } from "./stats.js";

const UNSPECIFIED_COLOR: RGB = [158, 158, 158];

export const STATUS_COLORS: ReadonlyMap<string, RGB> = new Map<string, RGB>([
  ["Closed", [46, 125, 50]],
  ["In Progress", [30, 136, 229]],
  ["Open", [251, 140, 0]],
  ["Assigned", [142, 36, 170]],
  ["Pending", [244, 81, 30]],
  ["Started", [57, 73, 171]],
  [UNSPECIFIED, UNSPECIFIED_COLOR],
]);

export const NYC_VIEW_STATE = { latitude: 40.7128, longitude: -74.006, zoom: 10.8, pitch: 0 };

export function statusColor(status: string): RGB {
  return STATUS_COLORS.get(status) ?? UNSPECIFIED_COLOR;
}

export function hoursToCloseText(resolutionMinutes: number | undefined): string {
  return resolutionMinutes === undefined ? "N/A" : `${(resolutionMinutes / 60).toFixed(1)}h`;
}

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Choose `k` of `n` indices without replacement (partial Fisher-Yates),
 * returned in ascending order.
 */
export function sampleIndices(n: number, k: number, seed: number): number[] {
  const take = Math.max(0, Math.min(n, k));
  if (take === n) return Array.from({ length: n }, (_, i) => i);

  const rand = seededRandom(seed);
  const pool = Array.from({ length: n }, (_, i) => i);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(rand() * (n - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take).sort((a, b) => a - b);
}

function hasCoordinates(r: ServiceRequest): r is ServiceRequest & { latitude: number; longitude: number } {
  return r.latitude !== undefined && r.longitude !== undefined;
}

export function sampleMapPoints(records: readonly ServiceRequest[], cap: number, seed: number): MapView {
  const geocoded = records.filter(hasCoordinates);
  const picked = sampleIndices(geocoded.length, cap, seed).map((i) => geocoded[i]);

  const points: MapPoint[] = picked.map((r) => ({
    latitude: r.latitude,
    longitude: r.longitude,
    status: r.status,
    complaintType: r.complaintType,
    borough: r.borough,
    hoursToCloseText: hoursToCloseText(r.resolutionMinutes),
    color: statusColor(r.status),
  }));

  return {
    points,
    geocodedRows: geocoded.length,
    topBorough: mode(picked.map((r) => r.borough)),
    topComplaintType: mode(picked.map((r) => r.complaintType)),
    viewState: { ...NYC_VIEW_STATE },
  };
}
