/**
 * SitePulse Main Entry Point
 *
 * Starts the monitor scheduler and the HTTP API in one process, and stops
 * both cleanly on SIGINT/SIGTERM.
 */

import "dotenv/config";
import { createProbe } from "./checkers/http";
import { closeDatabase, initializeDatabase } from "./db";
import {
  createDrizzleMonitorStore,
  createUnavailableStore,
  type MonitorRepository,
} from "./db/monitor-store";
import { loadConfig, validateConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { createScheduler, type Scheduler } from "./scheduler";
import { createApp, type FastifyApp } from "./server/app";

let app: FastifyApp | null = null;
let scheduler: Scheduler | null = null;
let shuttingDown = false;

async function main() {
  const config = loadConfig();
  validateConfig(config);

  let store: MonitorRepository;
  if (config.databaseUrl) {
    const db = initializeDatabase({ url: config.databaseUrl, timeoutMs: config.storeTimeoutMs });
    store = createDrizzleMonitorStore(db, { timeoutMs: config.storeTimeoutMs });
  } else {
    store = createUnavailableStore("DATABASE_URL is not set");
  }

  scheduler = createScheduler({
    store,
    probe: createProbe({ userAgent: config.userAgent }),
    options: {
      probeTimeoutSeconds: config.probeTimeoutSeconds,
      cycleIntervalMs: config.cycleIntervalMs,
      storeRetryIntervalMs: config.storeRetryIntervalMs,
      maxConcurrentProbes: config.maxConcurrentProbes,
    },
  });
  await scheduler.start();

  app = await createApp({
    store,
    storeConfigured: Boolean(config.databaseUrl),
    scheduler,
    corsOrigin: config.corsOrigin,
  });
  await app.listen({ port: config.port, host: config.host });

  logger.info({ port: config.port, env: config.env }, "SitePulse started successfully");
}

// Handle graceful shutdown
const gracefulShutdown = async (signal: NodeJS.Signals) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down gracefully...");

  try {
    if (app) {
      await app.close();
    }
    if (scheduler) {
      await scheduler.stop();
    }
    await closeDatabase();
    logger.info("Shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error(error, "Error during shutdown");
    process.exit(1);
  }
};

process.on("SIGINT", (signal) => void gracefulShutdown(signal));
process.on("SIGTERM", (signal) => void gracefulShutdown(signal));

main().catch((error) => {
  logger.error(error, "Fatal error during startup");
  process.exit(1);
});
