import { z } from "zod";
import { WEEKDAYS } from "../shared/types.js";
import type { ServiceRequest, Weekday } from "../shared/types.js";

export const UNSPECIFIED = "Unspecified";

const MINUTE_MS = 60_000;

// ── Timestamp parsing ──────────────────────────────────────────────

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?$/;
const US_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AaPp][Mm]))?)?$/;

function wallClock(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  ms: number
): number | undefined {
  // Date.UTC reads years 0-99 as 1900-1999
  if (year < 1000) return undefined;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return undefined;
  const t = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  // Date.UTC rolls 02/30 over into March; reject instead
  if (new Date(t).getUTCDate() !== day) return undefined;
  return t;
}

/**
 * Parse a naive timestamp into epoch ms of its wall-clock fields (read back
 * with the getUTC* accessors). Accepts ISO-like "2024-03-04 09:15:00" and
 * the open-data export form "03/04/2024 09:15:00 AM". Returns undefined
 * when the text is not a valid timestamp.
 */
export function parseTimestamp(text: string): number | undefined {
  const v = text.trim();

  const iso = ISO_PATTERN.exec(v);
  if (iso) {
    const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "0"] = iso;
    const ms = Math.floor(Number(frac.padEnd(3, "0").slice(0, 3)));
    return wallClock(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s), ms);
  }

  const us = US_PATTERN.exec(v);
  if (us) {
    const [, mo, d, y, h = "0", mi = "0", s = "0", meridiem] = us;
    let hour = Number(h);
    if (meridiem) {
      if (hour < 1 || hour > 12) return undefined;
      const pm = meridiem.toLowerCase() === "pm";
      hour = (hour % 12) + (pm ? 12 : 0);
    }
    return wallClock(Number(y), Number(mo), Number(d), hour, Number(mi), Number(s), 0);
  }

  return undefined;
}

export function weekdayOf(epochMs: number): Weekday {
  // getUTCDay: 0 = Sunday
  return WEEKDAYS[(new Date(epochMs).getUTCDay() + 6) % 7];
}

export function hourOf(epochMs: number): number {
  return new Date(epochMs).getUTCHours();
}

/** YYYY-MM-DD of the wall-clock timestamp. */
export function dateKey(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

// ── Row schema ─────────────────────────────────────────────────────

const categoryText = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? v.trim() : UNSPECIFIED),
  z.string()
);

const timestamp = z.string().transform((v, ctx) => {
  const parsed = parseTimestamp(v);
  if (parsed === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparsable timestamp "${v}"` });
    return z.NEVER;
  }
  return parsed;
});

const optionalTimestamp = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  timestamp.optional()
);

const coordinate = z.preprocess((v) => {
  if (typeof v !== "string" || v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}, z.number().optional());

/** A CSV row after column standardization. Unknown columns are dropped. */
export const RawRequestSchema = z
  .object({
    created_date: timestamp,
    closed_date: optionalTimestamp,
    complaint_type: categoryText,
    status: categoryText,
    borough: categoryText,
    latitude: coordinate,
    longitude: coordinate,
  })
  .refine((r) => r.closed_date === undefined || r.closed_date >= r.created_date, {
    message: "closed_date is earlier than created_date",
    path: ["closed_date"],
  });

export type RawRequest = z.infer<typeof RawRequestSchema>;

/**
 * Build the typed record with its derived fields. Coordinates are kept only
 * when both are present.
 */
export function toServiceRequest(row: RawRequest): ServiceRequest {
  const record: ServiceRequest = {
    complaintType: row.complaint_type,
    status: row.status,
    borough: row.borough,
    createdAt: row.created_date,
    hour: hourOf(row.created_date),
    dayOfWeek: weekdayOf(row.created_date),
  };

  if (row.closed_date !== undefined) {
    record.closedAt = row.closed_date;
    record.resolutionMinutes = Math.round((row.closed_date - row.created_date) / MINUTE_MS);
  }
  if (row.latitude !== undefined && row.longitude !== undefined) {
    record.latitude = row.latitude;
    record.longitude = row.longitude;
  }

  return record;
}
