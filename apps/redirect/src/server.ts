/**
 * HTTP Server Bootstrap
 *
 * Startup order:
 * 1. Load and validate configuration
 * 2. Build the mapping store (PostgreSQL when DATABASE_URL is set, else memory)
 * 3. Prepare the upload directory
 * 4. Start the reaper
 * 5. Serve
 *
 * SIGINT/SIGTERM stop the reaper (draining its sweep), close the HTTP
 * server, then the store. A reaper that loses the store logs fatal and
 * exits 1 for the supervisor to restart.
 */

import { serve } from "@hono/node-server";
import { createPool, MemoryMappingStore, PgMappingStore, type MappingStore } from "@ttlink/db";
import { createLogger } from "@ttlink/logger";
import { LocalArtifactStore, Reaper } from "@ttlink/reaper";
import { systemClock } from "@ttlink/shared";
import { createApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";
import type { AppDeps, Config } from "./types.js";

// =============================================================================
// Dependencies
// =============================================================================

interface Store {
  store: MappingStore;
  dbMetrics?: AppDeps["dbMetrics"];
}

async function createStore(config: Config): Promise<Store> {
  if (!config.databaseUrl) {
    return { store: new MemoryMappingStore(systemClock) };
  }

  const pool = createPool({ connectionString: config.databaseUrl, max: config.dbPoolMax });
  const store = new PgMappingStore(pool, { logger: createLogger("db", config.logLevel) });
  await store.ensureSchema();
  return { store, dbMetrics: () => store.getMetrics() };
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger("server", config.logLevel);
  validateConfig(config, log);

  log.info({ env: config.env }, "Initializing");

  const { store, dbMetrics } = await createStore(config);
  log.info({ backend: config.databaseUrl ? "postgres" : "memory" }, "Mapping store ready");

  const artifacts = new LocalArtifactStore(config.uploadDir, systemClock);
  await artifacts.ensureDir();

  let shuttingDown = false;

  const reaper = new Reaper({
    store,
    artifacts,
    ttl: config.ttlSeconds,
    intervalMs: config.reapIntervalSeconds * 1000,
    runOnStart: true,
    clock: systemClock,
    logger: createLogger("reaper", config.logLevel),
    onFatal: (err) => {
      log.fatal({ err }, "Reaper lost the store, exiting");
      process.exit(1);
    },
  });

  const app = createApp({
    store,
    artifacts,
    clock: systemClock,
    logger: createLogger("http", config.logLevel),
    ttlSeconds: config.ttlSeconds,
    codeLength: config.codeLength,
    baseUrl: config.baseUrl,
    maxUploadBytes: config.maxUploadBytes,
    reaperStats: () => reaper.getStats(),
    dbMetrics,
  });

  reaper.start();

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log.info({ host: config.host, port: info.port, baseUrl: config.baseUrl }, "Listening");
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down");

    await reaper.stop();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await store.close();

    log.info("Shutdown complete");
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  process.on("unhandledRejection", (reason) => {
    log.error({ err: reason }, "Unhandled rejection");
  });
}

main().catch((err: unknown) => {
  createLogger("server").fatal({ err }, "Failed to start");
  process.exit(1);
});
