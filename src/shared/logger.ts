export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface StructuredLog {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Emit one JSON line per event. Errors and warnings go to stderr.
 */
export function logStructured(
  level: LogLevel,
  event: string,
  fields: Record<string, unknown> = {}
): void {
  if (!isLevelEnabled(level)) return;

  const log: StructuredLog = {
    ts: new Date().toISOString(),
    level,
    event,
    ...fields,
  };

  const line = JSON.stringify(log);
  if (level === "error") {
    console.error(line);
    return;
  }

  if (level === "warn") {
    console.warn(line);
    return;
  }

  console.log(line);
}

export const logger = {
  debug: (event: string, fields?: Record<string, unknown>) => logStructured("debug", event, fields),
  info: (event: string, fields?: Record<string, unknown>) => logStructured("info", event, fields),
  warn: (event: string, fields?: Record<string, unknown>) => logStructured("warn", event, fields),
  error: (event: string, fields?: Record<string, unknown>) => logStructured("error", event, fields),
};

/** Serialize an unknown thrown value for a log line. */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error_name: err.name, error_message: err.message };
  }
  return { error_message: String(err) };
}
