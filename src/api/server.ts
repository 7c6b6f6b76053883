import "dotenv/config";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { Server } from "http";
import path from "path";
import { fileURLToPath } from "url";

import { loadConfig } from "../shared/config.js";
import type { AppConfig } from "../shared/config.js";
import { DataLoadError, ValidationError } from "../shared/errors.js";
import { errorFields, logger, setLogLevel } from "../shared/logger.js";
import { loadRecords, previewRows } from "../source/loader.js";
import type { LoadedTable } from "../source/loader.js";
import { filterOptions, parseCriteria } from "../analytics/filter.js";
import { buildDashboard } from "../dashboard/pipeline.js";
import { SessionStore } from "../dashboard/session.js";

/**
 * body-parser reports unreadable bodies (bad JSON, wrong charset, too
 * large) as errors carrying a 4xx `status`; treat them like rejected
 * criteria.
 */
function bodyError(err: unknown): ValidationError | undefined {
  if (!(err instanceof Error) || !("status" in err) || typeof err.status !== "number") return undefined;
  if (err.status < 400 || err.status >= 500) return undefined;
  return new ValidationError([`body: ${err.message}`]);
}

export interface AppSettings {
  mapPoints: number;
  sampleSeed: number;
}

export function createApp(table: LoadedTable, settings: AppSettings) {
  const app = express();
  app.use(express.json());

  const sessions = new SessionStore(settings.mapPoints);
  const source = path.basename(table.source);
  const render = (criteria: Parameters<typeof buildDashboard>[1]) =>
    buildDashboard(table.records, criteria, { sampleSeed: settings.sampleSeed });

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      logger.info("http_request", {
        method: req.method,
        route: req.path,
        status: res.statusCode,
        latency_ms: Date.now() - started,
      });
    });
    next();
  });

  // ── GET /api/health ─────────────────────────────────────────────
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", rows: table.records.length, source, sourceHash: table.sourceHash });
  });

  // ── GET /api/options ────────────────────────────────────────────
  app.get("/api/options", (_req, res) => {
    res.json({ source, ...filterOptions(table.records, settings.mapPoints) });
  });

  // ── GET /api/preview ────────────────────────────────────────────
  app.get("/api/preview", (_req, res) => {
    res.json(previewRows(table));
  });

  // ── POST /api/dashboard ─────────────────────────────────────────
  app.post("/api/dashboard", (req, res) => {
    const criteria = parseCriteria(req.body, settings.mapPoints);
    res.json(render(criteria));
  });

  // ── POST /api/sessions ──────────────────────────────────────────
  app.post("/api/sessions", (_req, res) => {
    const { sessionId, criteria } = sessions.create();
    res.status(201).json({ sessionId, view: render(criteria) });
  });

  // ── GET /api/sessions/:id ───────────────────────────────────────
  app.get("/api/sessions/:id", (req, res) => {
    const criteria = sessions.get(req.params.id);
    if (!criteria) return res.status(404).json({ error: "Session not found" });
    res.json({ view: render(criteria) });
  });

  // ── PUT /api/sessions/:id/criteria ──────────────────────────────
  app.put("/api/sessions/:id/criteria", (req, res) => {
    const update = sessions.update(req.params.id, req.body);
    if (!update) return res.status(404).json({ error: "Session not found" });
    res.json({ view: render(update.criteria), accepted: update.accepted, warning: update.warning });
  });

  // ── DELETE /api/sessions/:id ────────────────────────────────────
  app.delete("/api/sessions/:id", (req, res) => {
    if (!sessions.delete(req.params.id)) return res.status(404).json({ error: "Session not found" });
    res.status(204).end();
  });

  // A malformed body on a criteria update keeps the session's selection
  app.use("/api/sessions/:id/criteria", (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const invalid = bodyError(err);
    if (req.method !== "PUT" || invalid === undefined) return next(err);
    const update = sessions.reject(req.params.id, invalid);
    if (!update) return res.status(404).json({ error: "Session not found" });
    res.json({ view: render(update.criteria), accepted: update.accepted, warning: update.warning });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const invalid = err instanceof ValidationError ? err : bodyError(err);
    if (invalid) {
      logger.warn("request_rejected", { issues: invalid.issues });
      res.status(400).json({ error: invalid.message, issues: invalid.issues });
      return;
    }
    logger.error("request_failed", errorFields(err));
    res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
  });

  return app;
}

// ── Start server ────────────────────────────────────────────────

export function startServer(config: AppConfig = loadConfig()): Server {
  setLogLevel(config.logLevel);

  const table = loadRecords({ dataDir: config.dataDir, file: config.dataFile });
  logger.info("data_loaded", {
    source: table.source,
    rows: table.records.length,
    columns: table.columns,
    source_hash: table.sourceHash,
  });

  const app = createApp(table, { mapPoints: config.mapPoints, sampleSeed: config.sampleSeed });
  return app.listen(config.port, () => {
    logger.info("server_started", { port: config.port });
  });
}

// Start if run directly
if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))) {
  try {
    startServer();
  } catch (err) {
    if (err instanceof DataLoadError) {
      logger.error("data_load_failed", { ...errorFields(err), source: err.source, row: err.row });
    } else {
      logger.error("startup_failed", errorFields(err));
    }
    process.exit(1);
  }
}
