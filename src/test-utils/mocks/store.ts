/**
 * In-memory MonitorRepository for scheduler and API tests.
 * Enforces the same not-found and monotonic-lastChecked rules as the database store.
 */

import type { MonitorRepository } from "../../db/monitor-store";
import { MonitorNotFoundError, StaleWriteError } from "../../lib/errors";
import {
  formatRef,
  type CheckedStatus,
  type EpochSeconds,
  type Monitor,
  type MonitorRef,
} from "../../types/monitor";

export interface RecordedWrite {
  ref: MonitorRef;
  status: CheckedStatus;
  checkedAt: EpochSeconds;
}

export interface InMemoryStore extends MonitorRepository {
  /** Successful writes, in the order they landed */
  readonly writes: RecordedWrite[];
  /** Number of listAllMonitors calls */
  listCalls(): number;
  get(ref: MonitorRef): Monitor | undefined;
  remove(ref: MonitorRef): void;
  failListWith(error: Error | null): void;
  failUpdatesWith(pick: ((ref: MonitorRef) => Error | null) | null): void;
  /** Run before every update; lets a test delete or delay a monitor mid-cycle */
  beforeUpdate(hook: ((ref: MonitorRef) => Promise<void> | void) | null): void;
}

export function createInMemoryStore(initial: Monitor[] = []): InMemoryStore {
  const records = new Map<string, Monitor>();
  for (const monitor of initial) {
    records.set(formatRef(monitor.ref), monitor);
  }

  const writes: RecordedWrite[] = [];
  let listCount = 0;
  let listError: Error | null = null;
  let updateError: ((ref: MonitorRef) => Error | null) | null = null;
  let updateHook: ((ref: MonitorRef) => Promise<void> | void) | null = null;
  let nextId = 0;

  return {
    writes,

    listCalls: () => listCount,

    get: (ref) => records.get(formatRef(ref)),

    remove(ref) {
      records.delete(formatRef(ref));
    },

    failListWith(error) {
      listError = error;
    },

    failUpdatesWith(pick) {
      updateError = pick;
    },

    beforeUpdate(hook) {
      updateHook = hook;
    },

    async listAllMonitors() {
      listCount++;
      if (listError) throw listError;
      return [...records.values()].map((monitor) => ({ ...monitor, ref: { ...monitor.ref } }));
    },

    async updateStatus(ref, status, checkedAt) {
      if (updateHook) await updateHook(ref);

      const error = updateError?.(ref);
      if (error) throw error;

      const key = formatRef(ref);
      const existing = records.get(key);
      if (!existing) throw new MonitorNotFoundError(ref);
      if (existing.lastChecked !== null && existing.lastChecked > checkedAt) {
        throw new StaleWriteError(ref, checkedAt);
      }

      records.set(key, { ...existing, status, lastChecked: checkedAt });
      writes.push({ ref: { ...ref }, status, checkedAt });
    },

    async createMonitor(monitor) {
      nextId++;
      const ref = { ownerId: monitor.ownerId, monitorId: `mon-${nextId}` };
      records.set(formatRef(ref), {
        ref,
        url: monitor.url,
        name: monitor.name,
        interval: monitor.interval,
        status: "pending",
        lastChecked: null,
        createdAt: Date.now() / 1000,
      });
      return ref;
    },

    async deleteMonitor(ref) {
      return records.delete(formatRef(ref));
    },
  };
}
