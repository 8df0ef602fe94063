import type { Env } from "@shared/env";
import compression from "compression";
import express, { type Express } from "express";

import { setupSecurity } from "./config/security";
import type { TradingEngine } from "./engine/tradingEngine";
import { liveness, readiness } from "./health";
import { createHttpLogger } from "./logger";
import { errorHandler, notFound } from "./middleware/error";
import { createEngineRouter } from "./routes/engine";

export interface AppOptions {
  env?: Pick<Env, "NODE_ENV" | "APP_ORIGIN">;
}

export function createApp(engine: TradingEngine, options: AppOptions = {}): Express {
  const app = express();

  app.use(compression());
  app.use(express.json({ limit: "100kb" }));
  setupSecurity(app, options.env ?? { NODE_ENV: "development" });
  app.use(createHttpLogger());

  // Health and readiness probes
  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      now: Date.now(),
      uptimeSec: Math.round(process.uptime()),
      openPositions: engine.portfolioSummary().openCount,
    });
  });
  app.get("/api/livez", liveness);
  app.get("/api/readyz", readiness);

  app.use("/api/engine", createEngineRouter(engine));

  // Error middleware - must be last
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
