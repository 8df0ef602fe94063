import { validateEnv } from "@shared/env";
import { createServer } from "http";

import { createApp } from "./app";
import { loadEngineConfig } from "./config/engine";
import { createDb } from "./db";
import { createTradingEngine } from "./engine/tradingEngine";
import { toLogError } from "./errors";
import { setServerReady } from "./health";
import { logger } from "./logger";
import { DrizzleEngineStore } from "./store/drizzleEngineStore";
import { MemoryEngineStore, type EngineStore } from "./store/engineStore";
import { PersistenceSync, hydrateEngine } from "./store/persistenceSync";

const env = validateEnv(process.env);
const log = logger.child({ component: "server" });

// Mark server as not ready during initialization
setServerReady(false);

const engine = createTradingEngine({ config: loadEngineConfig(env) });

const store: EngineStore = env.DATABASE_URL
  ? new DrizzleEngineStore(createDb(env.DATABASE_URL))
  : new MemoryEngineStore();
if (!env.DATABASE_URL) {
  log.warn("DATABASE_URL not set; engine state will not survive a restart");
}

await hydrateEngine(engine, store);
const sync = new PersistenceSync(store, engine.bus);
sync.start();

const app = createApp(engine, { env });
const server = createServer(app);

server.keepAliveTimeout = 75000;
server.headersTimeout = 80000;

server.listen(env.PORT, "0.0.0.0", () => {
  log.info({ port: env.PORT, env: env.NODE_ENV, logLevel: env.LOG_LEVEL }, "Server listening");
  setServerReady(true);
});

// Global process error handlers for crash visibility
process.on("uncaughtException", (error) => {
  log.fatal({ err: toLogError(error) }, "Uncaught exception");
  if (env.NODE_ENV === "production") {
    // Let the process manager restart us once probes fail
    setServerReady(false);
  } else {
    process.exit(1);
  }
});

process.on("unhandledRejection", (reason) => {
  log.fatal({ err: toLogError(reason) }, "Unhandled rejection");
  if (env.NODE_ENV === "production") {
    setServerReady(false);
  } else {
    process.exit(1);
  }
});

async function shutdown(signal: string) {
  log.info({ signal }, "Shutting down");
  setServerReady(false);
  server.close();

  try {
    await engine.drain();
    sync.stop();
    await sync.flush();
    log.info("Pending state flushed");
    process.exit(0);
  } catch (err) {
    log.error({ err: toLogError(err) }, "Shutdown flush failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
