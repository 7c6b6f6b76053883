/**
 * Column Name Normalization
 *
 * Exported 311 files label the same field in several ways ("Created Date",
 * "created_datetime", "Boro", "Lng", ...). Headers are normalized first and
 * then mapped onto the canonical names the loader reads.
 */

export type CanonicalColumn =
  | "created_date"
  | "closed_date"
  | "complaint_type"
  | "borough"
  | "status"
  | "latitude"
  | "longitude";

const CANONICAL_COLUMNS: readonly CanonicalColumn[] = [
  "created_date",
  "closed_date",
  "complaint_type",
  "borough",
  "status",
  "latitude",
  "longitude",
];

export const REQUIRED_COLUMNS: readonly CanonicalColumn[] = [
  "created_date",
  "complaint_type",
  "status",
  "borough",
];

/** Synonyms grouped by canonical column name (already normalized). */
export const COLUMN_SYNONYMS: Record<CanonicalColumn, string[]> = {
  created_date: ["created_datetime", "created", "created_time", "createddate", "created_date_time"],
  closed_date: ["closed_datetime", "closed", "closed_time", "closeddate"],
  complaint_type: ["complaint", "complainttype", "type_of_complaint"],
  borough: ["boro"],
  status: ["sr_status", "request_status"],
  latitude: ["lat"],
  longitude: ["lon", "lng", "long"],
};

const ALIAS_LOOKUP: Map<string, CanonicalColumn> = (() => {
  const lookup = new Map<string, CanonicalColumn>();
  for (const canonical of CANONICAL_COLUMNS) {
    lookup.set(canonical, canonical);
    for (const s of COLUMN_SYNONYMS[canonical]) lookup.set(s, canonical);
  }
  return lookup;
})();

/**
 * "  Created Date " -> "created_date", "Complaint-Type?" -> "complainttype".
 */
export function normalizeColumnName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^\w\s]/g, "")
    .replace(/\s+/g, "_");
}

export function canonicalColumn(name: string): CanonicalColumn | undefined {
  return ALIAS_LOOKUP.get(normalizeColumnName(name));
}

/**
 * Map raw headers to their standardized names. Headers with no alias keep
 * their normalized form. A header already carrying the canonical name
 * takes precedence over its aliases; among aliases the first one wins.
 */
export function standardizeColumns(headers: string[]): string[] {
  const normalized = headers.map(normalizeColumnName);
  const taken = new Set<string>(normalized.filter((n) => ALIAS_LOOKUP.get(n) === n));

  return normalized.map((name) => {
    const canonical = ALIAS_LOOKUP.get(name);
    if (canonical === undefined || canonical === name) return name;
    if (taken.has(canonical)) return name;
    taken.add(canonical);
    return canonical;
  });
}

export function missingRequiredColumns(columns: string[]): CanonicalColumn[] {
  const present = new Set(columns);
  return REQUIRED_COLUMNS.filter((c) => !present.has(c));
}
