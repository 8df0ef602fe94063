import type { Env } from "@shared/env";
import cors from "cors";
import { type Express } from "express";
import helmet from "helmet";

export function setupSecurity(app: Express, env: Pick<Env, "NODE_ENV" | "APP_ORIGIN">) {
  const allowedOrigins = new Set(env.APP_ORIGIN ? [env.APP_ORIGIN] : []);
  const isDev = env.NODE_ENV !== "production";

  // JSON-only API: no documents to apply a CSP to
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    }),
  );

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          return callback(null, true);
        }
        const isLocal = origin.startsWith("http://localhost:") || origin.startsWith("http://127.0.0.1:");
        return callback(null, isDev && isLocal);
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );
}
