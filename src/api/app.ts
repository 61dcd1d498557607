import express from "express";
import type { Express } from "express";
import type { TypesettingEngine } from "../engine/types.js";
import { RenderService } from "../render/service.js";
import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";
import type { TemplateStorage } from "../storage/types.js";
import { WorldPool } from "../world/pool.js";
import { parserErrorHandler } from "./errors.js";
import { templateRouter } from "./routes.js";

export interface AppDependencies {
  storage: TemplateStorage;
  logger?: Logger;
  pool?: WorldPool;
  engine?: TypesettingEngine;
}

export function createApp(deps: AppDependencies): Express {
  const logger = deps.logger ?? silentLogger;
  const service = new RenderService({
    storage: deps.storage,
    pool: deps.pool ?? new WorldPool({ logger }),
    engine: deps.engine,
    logger,
  });

  const app = express();
  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      logger.info("request", {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  });

  // ── GET /health ─────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(templateRouter(service, logger));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });
  app.use(parserErrorHandler(logger));

  return app;
}
