/**
 * App Configuration
 *
 * Read once from the environment (after dotenv has populated it):
 * - PORT:        HTTP port for the dashboard API.
 * - DATA_DIR:    directory searched for the candidate CSV files.
 * - DATA_FILE:   explicit CSV path; skips the candidate search.
 * - MAP_POINTS:  default cap on sampled map points.
 * - SAMPLE_SEED: seed for the deterministic map sample.
 * - LOG_LEVEL:   debug | info | warn | error.
 */

import path from "path";
import { z } from "zod";

/** Slider bounds for the map point cap. */
export const MAP_POINTS_MIN = 500;
export const MAP_POINTS_MAX = 8000;
export const MAP_POINTS_STEP = 500;

/** Slider bounds for the number of complaint categories in scope. */
export const TOP_N_MIN = 1;
export const TOP_N_DEFAULT = 15;
export const TOP_N_SLIDER_MIN = 5;
export const TOP_N_SLIDER_MAX = 30;

/** Sessions held in memory; the least recently used one is evicted beyond this. */
export const MAX_SESSIONS = 1000;

const intFromEnv = (inner: z.ZodNumber, fallback: number) =>
  z.preprocess((v) => (typeof v === "string" ? Number(v) : v), inner.int().default(fallback));

const EnvSchema = z.object({
  PORT: intFromEnv(z.number().min(0).max(65535), 3000),
  DATA_DIR: z.string().min(1).default("data"),
  DATA_FILE: z.string().min(1).optional(),
  MAP_POINTS: intFromEnv(z.number().min(MAP_POINTS_MIN).max(MAP_POINTS_MAX), 3000),
  SAMPLE_SEED: intFromEnv(z.number(), 42),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AppConfig {
  port: number;
  dataDir: string;
  dataFile?: string;
  mapPoints: number;
  sampleSeed: number;
  logLevel: "debug" | "info" | "warn" | "error";
}

/**
 * Parse configuration from an environment map. Empty strings count as unset.
 * Throws with every offending variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const cfg = parsed.data;
  return {
    port: cfg.PORT,
    dataDir: path.resolve(cfg.DATA_DIR),
    dataFile: cfg.DATA_FILE ? path.resolve(cfg.DATA_FILE) : undefined,
    mapPoints: cfg.MAP_POINTS,
    sampleSeed: cfg.SAMPLE_SEED,
    logLevel: cfg.LOG_LEVEL,
  };
}
