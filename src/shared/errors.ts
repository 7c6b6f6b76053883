/**
 * The record source could not be loaded: file missing or unreadable,
 * required columns absent, or a timestamp that does not parse.
 * Fatal at startup.
 */
export class DataLoadError extends Error {
  readonly source: string | null;
  readonly row?: number;

  constructor(message: string, options: { source?: string | null; row?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DataLoadError";
    this.source = options.source ?? null;
    this.row = options.row;
  }
}

/** Filter criteria were rejected; the caller keeps its last valid criteria. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}
