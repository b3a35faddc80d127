import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import type { MonitorRepository } from "../db/monitor-store";
import { logger } from "../lib/logger";
import { getMetrics, getMetricsContentType } from "../lib/prometheus";
import type { Scheduler } from "../scheduler";
import { registerMonitorRoutes } from "./routes/monitors";

export interface AppOptions {
  store: MonitorRepository;
  storeConfigured: boolean;
  scheduler: Pick<Scheduler, "getState">;
  corsOrigin?: string;
}

export async function createApp(options: AppOptions) {
  const baseLogger: FastifyBaseLogger = logger;
  const app = Fastify({
    loggerInstance: baseLogger,
    trustProxy: true,
  });

  const corsOrigin = options.corsOrigin ?? "*";

  // Minimal CORS: one configured origin, preflight answered here
  app.addHook("onRequest", async (request, reply) => {
    reply.header("Access-Control-Allow-Origin", corsOrigin);
    if (request.method === "OPTIONS") {
      return reply
        .header("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS")
        .header("Access-Control-Allow-Headers", "Content-Type")
        .status(204)
        .send();
    }
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error.statusCode && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
      });
    }

    logger.error(
      { error, url: request.url, method: request.method },
      "Unhandled error",
    );

    return reply.status(500).send({
      error: "Internal server error",
      code: "INTERNAL_ERROR",
    });
  });

  app.get("/", async () => ({
    status: "ok",
    message: "SitePulse Backend is running!",
  }));

  // Liveness of the scheduler loop
  app.get("/health", async (_request, reply) => {
    const scheduler = options.scheduler.getState();
    return reply.status(scheduler.running ? 200 : 503).send({
      status: scheduler.running ? "ok" : "unavailable",
      store: options.storeConfigured ? "configured" : "not-configured",
      scheduler,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/metrics", async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.header("Content-Type", getMetricsContentType()).send(metrics);
  });

  await registerMonitorRoutes(app, {
    store: options.store,
    storeConfigured: options.storeConfigured,
  });

  app.setNotFoundHandler(async (_request, reply) => {
    return reply.code(404).send({ error: "Not found" });
  });

  return app;
}

export type FastifyApp = Awaited<ReturnType<typeof createApp>>;
