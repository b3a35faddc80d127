/**
 * Monitor routes
 * Create and delete monitors on behalf of a user. The caller names the owner
 * in the body; there is no authentication layer in front of these routes.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { MonitorRepository } from "../../db/monitor-store";
import { StoreUnavailableError } from "../../lib/errors";
import { logger } from "../../lib/logger";
import { resetMonitorMetrics } from "../../lib/prometheus";
import { CreateMonitorSchema, DeleteMonitorSchema } from "../../types/monitor";

const MonitorParamsSchema = z.object({
  monitorId: z.string().min(1),
});

export interface MonitorRoutesOptions {
  store: MonitorRepository;
  /** False when no database is configured; every route answers 503 */
  storeConfigured: boolean;
}

const SERVICE_UNAVAILABLE = { error: "Database service not available." };

export async function registerMonitorRoutes(
  app: FastifyInstance,
  { store, storeConfigured }: MonitorRoutesOptions,
) {
  app.post("/monitors", async (request, reply) => {
    if (!storeConfigured) {
      return reply.status(503).send(SERVICE_UNAVAILABLE);
    }

    const bodyResult = CreateMonitorSchema.safeParse(request.body ?? {});
    if (!bodyResult.success) {
      return reply.status(400).send({
        error: "Missing required fields.",
        issues: bodyResult.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }

    const { uid, url, name, interval } = bodyResult.data;

    try {
      const ref = await store.createMonitor({ ownerId: uid, url, name, interval });
      logger.info({ ownerId: uid, monitorId: ref.monitorId, url, interval }, "Monitor created");
      return reply.status(201).send({ message: "Monitor added successfully!", id: ref.monitorId });
    } catch (error) {
      logger.error({ error, ownerId: uid }, "Error adding monitor");
      if (error instanceof StoreUnavailableError) {
        return reply.status(503).send(SERVICE_UNAVAILABLE);
      }
      return reply.status(500).send({ error: "Failed to add monitor." });
    }
  });

  app.delete("/monitors/:monitorId", async (request, reply) => {
    if (!storeConfigured) {
      return reply.status(503).send(SERVICE_UNAVAILABLE);
    }

    const paramsResult = MonitorParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      return reply.status(400).send({ error: "Monitor ID is required." });
    }

    const bodyResult = DeleteMonitorSchema.safeParse(request.body ?? {});
    if (!bodyResult.success) {
      return reply.status(400).send({ error: "User ID is required." });
    }

    const ref = { ownerId: bodyResult.data.uid, monitorId: paramsResult.data.monitorId };

    try {
      const deleted = await store.deleteMonitor(ref);
      if (deleted) {
        resetMonitorMetrics(ref);
        logger.info(ref, "Monitor deleted");
      } else {
        logger.debug(ref, "Delete requested for a monitor that does not exist");
      }
      return reply.status(200).send({ message: "Monitor deleted successfully." });
    } catch (error) {
      logger.error({ error, ...ref }, "Error deleting monitor");
      if (error instanceof StoreUnavailableError) {
        return reply.status(503).send(SERVICE_UNAVAILABLE);
      }
      return reply.status(500).send({ error: "Failed to delete monitor." });
    }
  });
}
