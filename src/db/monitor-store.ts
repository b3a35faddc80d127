/**
 * Status store adapter.
 *
 * The only place the scheduler touches persistence. Reads come back as
 * Monitors with epoch-second timestamps; writes translate epoch seconds back
 * to the store's timestamp type. Every call is bounded by a timeout and every
 * driver failure surfaces as StoreUnavailableError.
 */

import { and, eq, isNull, lte, or } from "drizzle-orm";
import { z } from "zod";
import {
  MonitorNotFoundError,
  StaleWriteError,
  StoreUnavailableError,
  isSitePulseError,
  errorMessage,
} from "../lib/errors";
import { childLogger } from "../lib/logger";
import { storeErrorsTotal } from "../lib/prometheus";
import { fromEpochSeconds } from "../lib/time";
import { withTimeout } from "../lib/timeout";
import type {
  CheckedStatus,
  EpochSeconds,
  Monitor,
  MonitorRef,
  NewMonitor,
} from "../types/monitor";
import { decodeMonitorRow } from "./decode";
import type { Database } from "./index";
import { monitors } from "./schema";

const logger = childLogger("store");

export const DEFAULT_STORE_TIMEOUT_MS = 5000;

/**
 * What the scheduler needs from the store
 */
export interface MonitorStore {
  /** Every monitor across all owners, in one flat read */
  listAllMonitors(): Promise<Monitor[]>;
  /** Write status and lastChecked only */
  updateStatus(ref: MonitorRef, status: CheckedStatus, checkedAt: EpochSeconds): Promise<void>;
}

/**
 * Store plus the create/delete operations the API exposes
 */
export interface MonitorRepository extends MonitorStore {
  createMonitor(monitor: NewMonitor): Promise<MonitorRef>;
  deleteMonitor(ref: MonitorRef): Promise<boolean>;
}

export interface DrizzleMonitorStoreOptions {
  timeoutMs?: number;
}

const UuidSchema = z.string().uuid();

export function createDrizzleMonitorStore(
  db: Database,
  options: DrizzleMonitorStoreOptions = {},
): MonitorRepository {
  const timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;

  const run = async <T>(operation: string, query: PromiseLike<T>): Promise<T> => {
    try {
      return await withTimeout(
        query,
        timeoutMs,
        () => new StoreUnavailableError(operation, `Store ${operation} timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      storeErrorsTotal.inc({ operation });
      if (isSitePulseError(error)) throw error;
      throw new StoreUnavailableError(
        operation,
        `Store ${operation} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  };

  const matchesRef = (ref: MonitorRef) =>
    and(eq(monitors.id, ref.monitorId), eq(monitors.ownerId, ref.ownerId));

  return {
    async listAllMonitors() {
      const rows = await run("listAllMonitors", db.select().from(monitors));
      const decoded: Monitor[] = [];

      for (const row of rows) {
        try {
          decoded.push(decodeMonitorRow(row));
        } catch (error) {
          logger.warn(
            { monitorId: row.id, ownerId: row.ownerId, error: errorMessage(error) },
            "Skipping malformed monitor",
          );
        }
      }

      return decoded;
    },

    async updateStatus(ref, status, checkedAt) {
      // Ids that are not uuids cannot exist in the table
      if (!UuidSchema.safeParse(ref.monitorId).success) {
        throw new MonitorNotFoundError(ref);
      }

      const checkedAtDate = fromEpochSeconds(checkedAt);
      const updated = await run(
        "updateStatus",
        db
          .update(monitors)
          .set({ status, lastChecked: checkedAtDate })
          .where(
            and(
              matchesRef(ref),
              or(isNull(monitors.lastChecked), lte(monitors.lastChecked, checkedAtDate)),
            ),
          )
          .returning({ id: monitors.id }),
      );

      if (updated.length > 0) return;

      // Nothing matched: either the row is gone or it holds a newer check
      const existing = await run(
        "updateStatus",
        db.select({ id: monitors.id }).from(monitors).where(matchesRef(ref)).limit(1),
      );
      if (existing.length === 0) {
        throw new MonitorNotFoundError(ref);
      }
      throw new StaleWriteError(ref, checkedAt);
    },

    async createMonitor(monitor) {
      const inserted = await run(
        "createMonitor",
        db
          .insert(monitors)
          .values({
            ownerId: monitor.ownerId,
            url: monitor.url,
            name: monitor.name,
            interval: monitor.interval,
            status: "pending",
            lastChecked: null,
          })
          .returning({ id: monitors.id }),
      );

      const [row] = inserted;
      if (!row) {
        throw new StoreUnavailableError("createMonitor", "Insert returned no row");
      }
      return { ownerId: monitor.ownerId, monitorId: row.id };
    },

    async deleteMonitor(ref) {
      if (!UuidSchema.safeParse(ref.monitorId).success) return false;

      const deleted = await run(
        "deleteMonitor",
        db.delete(monitors).where(matchesRef(ref)).returning({ id: monitors.id }),
      );
      return deleted.length > 0;
    },
  };
}

/**
 * Store used when no database is configured: every call is unavailable
 */
export function createUnavailableStore(reason: string): MonitorRepository {
  const fail = (operation: string) =>
    Promise.reject(new StoreUnavailableError(operation, reason));

  return {
    listAllMonitors: () => fail("listAllMonitors"),
    updateStatus: () => fail("updateStatus"),
    createMonitor: () => fail("createMonitor"),
    deleteMonitor: () => fail("deleteMonitor"),
  };
}
