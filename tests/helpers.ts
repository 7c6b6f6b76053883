import { parseTimestamp, toServiceRequest } from "../src/source/schema.js";
import type { ServiceRequest } from "../src/shared/types.js";

export interface RequestFields {
  type?: string;
  status?: string;
  borough?: string;
  created: string;
  closed?: string;
  lat?: number;
  lon?: number;
}

function timestamp(text: string): number {
  const t = parseTimestamp(text);
  if (t === undefined) throw new Error(`bad test timestamp: ${text}`);
  return t;
}

/** Build a typed request the way the loader would. 2024-01-01 is a Monday. */
export function makeRequest(fields: RequestFields): ServiceRequest {
  return toServiceRequest({
    complaint_type: fields.type ?? "Noise",
    status: fields.status ?? "Open",
    borough: fields.borough ?? "BROOKLYN",
    created_date: timestamp(fields.created),
    closed_date: fields.closed === undefined ? undefined : timestamp(fields.closed),
    latitude: fields.lat,
    longitude: fields.lon,
  });
}
