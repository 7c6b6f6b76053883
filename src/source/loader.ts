/**
 * Record Loader: reads the 311 extract once at startup.
 *
 * Candidate search → read (gunzip when .gz) → CSV parse → column
 * standardization → schema validation → typed records. Any failure is a
 * DataLoadError; a partially valid file is never returned.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { gunzipSync } from "zlib";
import { parse } from "csv-parse/sync";

import { DataLoadError } from "../shared/errors.js";
import { sha256Bytes } from "../shared/hash.js";
import type { ServiceRequest } from "../shared/types.js";
import { standardizeColumns, missingRequiredColumns } from "./columns.js";
import { RawRequestSchema, toServiceRequest } from "./schema.js";

/** Searched in order under the data directory. */
export const CANDIDATE_FILES = [
  "nyc311_12months.csv.gz",
  "nyc311_12months.csv",
  "nyc311_sample.csv.gz",
  "nyc311_sample.csv",
] as const;

export interface LoadOptions {
  dataDir?: string;
  /** Explicit file; skips the candidate search. */
  file?: string;
}

export interface LoadedTable {
  records: readonly ServiceRequest[];
  source: string;
  columns: string[];
  sourceHash: string;
  /** Standardized raw rows, kept for the data preview. */
  rawRows: readonly Record<string, string>[];
}

export function resolveSource(options: LoadOptions): string {
  if (options.file) {
    if (!existsSync(options.file)) {
      throw new DataLoadError(`Data file not found: ${options.file}`, { source: options.file });
    }
    return options.file;
  }

  const dir = options.dataDir ?? "data";
  for (const name of CANDIDATE_FILES) {
    const candidate = path.join(dir, name);
    if (existsSync(candidate)) return candidate;
  }
  throw new DataLoadError(
    `No local CSV found in ${dir}. Expected one of: ${CANDIDATE_FILES.join(", ")}.`
  );
}

function readSource(file: string): Buffer {
  try {
    const buffer = readFileSync(file);
    return file.endsWith(".gz") ? gunzipSync(buffer) : buffer;
  } catch (err) {
    throw new DataLoadError(`Could not read ${file}: ${err instanceof Error ? err.message : String(err)}`, {
      source: file,
      cause: err,
    });
  }
}

function parseCsv(content: string, file: string): { headers: string[]; rows: string[][] } {
  let table: string[][];
  try {
    table = parse(content, {
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
      bom: true,
    });
  } catch (err) {
    throw new DataLoadError(`Malformed CSV in ${file}: ${err instanceof Error ? err.message : String(err)}`, {
      source: file,
      cause: err,
    });
  }

  if (table.length === 0) {
    throw new DataLoadError(`${file} is empty`, { source: file });
  }
  const [headers, ...rows] = table;
  return { headers, rows };
}

/**
 * Parse CSV text into typed records. Row numbers in errors are 1-based
 * data rows (the header is row 0).
 */
export function parseRecords(
  content: string,
  source: string
): { records: ServiceRequest[]; columns: string[]; rawRows: Record<string, string>[] } {
  const { headers, rows } = parseCsv(content, source);
  const columns = standardizeColumns(headers);

  const missing = missingRequiredColumns(columns);
  if (missing.length > 0) {
    throw new DataLoadError(
      `${source} is missing required column(s): ${missing.join(", ")}. Detected: ${columns.join(", ")}`,
      { source }
    );
  }

  const records: ServiceRequest[] = [];
  const rawRows: Record<string, string>[] = [];

  rows.forEach((cells, i) => {
    const row: Record<string, string> = {};
    columns.forEach((col, c) => {
      row[col] = cells[c] ?? "";
    });
    rawRows.push(row);

    const result = RawRequestSchema.safeParse(row);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new DataLoadError(`${source} row ${i + 1}: ${issues.join("; ")}`, { source, row: i + 1 });
    }
    records.push(toServiceRequest(result.data));
  });

  return { records, columns, rawRows };
}

/**
 * Load the record table. Records are frozen; every request derives its
 * view from this shared, read-only array.
 */
export function loadRecords(options: LoadOptions = {}): LoadedTable {
  const source = resolveSource(options);
  const buffer = readSource(source);
  const { records, columns, rawRows } = parseRecords(buffer.toString("utf-8"), source);

  return {
    records: Object.freeze(records.map((r) => Object.freeze(r))),
    source,
    columns,
    sourceHash: sha256Bytes(buffer),
    rawRows,
  };
}

export interface DataPreview {
  source: string;
  columns: string[];
  rows: Record<string, string>[];
}

export function previewRows(table: LoadedTable, limit = 20): DataPreview {
  return {
    source: path.basename(table.source),
    columns: table.columns,
    rows: table.rawRows.slice(0, limit),
  };
}
