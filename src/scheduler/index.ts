import { DEFAULT_PROBE_TIMEOUT_SECONDS, type ProbeResult } from "../checkers/http";
import {
  MonitorNotFoundError,
  StaleWriteError,
  StoreUnavailableError,
  errorMessage,
} from "../lib/errors";
import { childLogger } from "../lib/logger";
import {
  cycleDuration,
  recordCheckResult,
  resetMonitorMetrics,
  skippedMonitorsTotal,
} from "../lib/prometheus";
import { systemClock } from "../lib/time";
import { formatRef, type Monitor } from "../types/monitor";
import { byMostOverdue, selectDue } from "./due";
import type {
  CycleOutcome,
  CycleSummary,
  MonitorOutcome,
  SchedulerDeps,
  SchedulerOptions,
  SchedulerState,
  Sleep,
} from "./types";

const logger = childLogger("scheduler");

export * from "./types";
export { selectDue, byMostOverdue } from "./due";

export const CYCLE_INTERVAL_MS = 5_000;
export const STORE_RETRY_INTERVAL_MS = 60_000;
export const MAX_CONCURRENT_PROBES = 50;

const DEFAULT_OPTIONS: SchedulerOptions = {
  probeTimeoutSeconds: DEFAULT_PROBE_TIMEOUT_SECONDS,
  cycleIntervalMs: CYCLE_INTERVAL_MS,
  storeRetryIntervalMs: STORE_RETRY_INTERVAL_MS,
  maxConcurrentProbes: MAX_CONCURRENT_PROBES,
};

/**
 * setTimeout that resolves early when the signal aborts
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutHandle);
      resolve();
    };
    const timeoutHandle = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal.addEventListener("abort", onAbort, { once: true });
  });

export interface Scheduler {
  start(): Promise<void>;
  /** Stop dispatching, wait for in-flight probes and writes, then exit the loop */
  stop(): Promise<void>;
  /** One full pass: enumerate, select due, probe, write. Never rejects. */
  runCycle(): Promise<CycleOutcome>;
  isRunning(): boolean;
  getState(): SchedulerState;
}

const emptySummary = (due: number): CycleSummary => ({
  due,
  dispatched: 0,
  deferred: 0,
  skipped: 0,
  written: 0,
  vanished: 0,
  stale: 0,
  failedWrites: 0,
  durationMs: 0,
});

/**
 * Create scheduler instance
 */
export function createScheduler(deps: SchedulerDeps): Scheduler {
  const { store, probe } = deps;
  const clock = deps.clock ?? systemClock;
  const sleep = deps.sleep ?? abortableSleep;
  const options: SchedulerOptions = { ...DEFAULT_OPTIONS, ...deps.options };

  const state: SchedulerState = {
    phase: "stopped",
    running: false,
    cycles: 0,
    lastCycleAt: null,
    lastSummary: null,
    lastError: null,
  };

  let stopping = false;
  let abortController: AbortController | null = null;
  let loopPromise: Promise<void> | null = null;
  let stopPromise: Promise<void> | null = null;

  const safeProbe = async (url: string): Promise<ProbeResult> => {
    try {
      return await probe(url, options.probeTimeoutSeconds);
    } catch (error) {
      // Probes are not supposed to reject; treat it as unreachable if one does
      logger.warn({ url, error }, "Probe rejected");
      return { state: "down", latencyMs: 0, reason: "ERROR", message: errorMessage(error) };
    }
  };

  /**
   * Probe one monitor and write its result as soon as the probe settles
   */
  const checkMonitor = async (monitor: Monitor): Promise<MonitorOutcome> => {
    const { ref, url } = monitor;
    const result = await safeProbe(url);
    const checkedAt = clock();

    recordCheckResult(ref, result);
    logger.info(
      {
        monitor: formatRef(ref),
        url,
        status: result.state,
        reason: result.reason,
        latencyMs: result.latencyMs,
      },
      `Pinged ${url}. Status: ${result.state}`,
    );

    try {
      await store.updateStatus(ref, result.state, checkedAt);
      return "written";
    } catch (error) {
      if (error instanceof MonitorNotFoundError) {
        logger.info({ monitor: formatRef(ref) }, "Monitor deleted before its status was written");
        resetMonitorMetrics(ref);
        skippedMonitorsTotal.inc({ reason: "vanished" });
        return "vanished";
      }
      if (error instanceof StaleWriteError) {
        logger.debug({ monitor: formatRef(ref), checkedAt }, "Newer check already stored, write skipped");
        skippedMonitorsTotal.inc({ reason: "stale" });
        return "stale";
      }
      logger.warn(
        { monitor: formatRef(ref), error: errorMessage(error) },
        "Failed to write monitor status",
      );
      skippedMonitorsTotal.inc({ reason: "write_failed" });
      return "failed";
    }
  };

  const dispatch = async (due: Monitor[], now: number): Promise<CycleSummary> => {
    const summary = emptySummary(due.length);
    const probeable: Monitor[] = [];

    for (const monitor of due) {
      if (monitor.url === "") {
        logger.warn({ monitor: formatRef(monitor.ref) }, "Skipping monitor without URL");
        skippedMonitorsTotal.inc({ reason: "no_url" });
        summary.skipped++;
      } else {
        probeable.push(monitor);
      }
    }

    // Most overdue first; anything past the cap stays due for the next cycle
    probeable.sort(byMostOverdue(now));
    const batch = stopping ? [] : probeable.slice(0, options.maxConcurrentProbes);
    summary.dispatched = batch.length;
    summary.deferred = probeable.length - batch.length;

    if (summary.deferred > 0) {
      logger.info(
        { dispatched: summary.dispatched, deferred: summary.deferred },
        "Due monitors above the concurrency cap deferred to the next cycle",
      );
    }

    const outcomes = await Promise.all(batch.map(checkMonitor));
    for (const outcome of outcomes) {
      switch (outcome) {
        case "written":
          summary.written++;
          break;
        case "vanished":
          summary.vanished++;
          break;
        case "stale":
          summary.stale++;
          break;
        case "failed":
          summary.failedWrites++;
          break;
      }
    }

    return summary;
  };

  const runCycle = async (): Promise<CycleOutcome> => {
    const startedAt = Date.now();

    try {
      const monitors = await store.listAllMonitors();
      const now = clock();
      const due = selectDue(monitors, now);

      logger.debug({ total: monitors.length, due: due.length }, "Scheduler cycle");

      let summary = emptySummary(0);
      if (due.length > 0) {
        state.phase = "cycle-active";
        summary = await dispatch(due, now);
      }
      summary.durationMs = Date.now() - startedAt;

      state.cycles++;
      state.lastCycleAt = now;
      state.lastSummary = summary;
      state.lastError = null;
      cycleDuration.observe(summary.durationMs / 1000);

      return { kind: "completed", summary };
    } catch (error) {
      state.lastError = errorMessage(error);

      if (error instanceof StoreUnavailableError) {
        logger.warn({ error: error.message }, "Store unavailable, skipping cycle");
        return { kind: "store-unavailable", error };
      }

      logger.error({ error }, "An error occurred in the scheduler loop");
      return { kind: "failed", error };
    } finally {
      if (state.phase === "cycle-active") {
        state.phase = state.running ? "idle" : "stopped";
      }
    }
  };

  const runLoop = async (signal: AbortSignal) => {
    logger.info(options, "Scheduler loop started");

    // Each loop exits on its own signal, not the shared running flag
    while (!signal.aborted) {
      const outcome = await runCycle();
      if (signal.aborted) break;

      const waitMs =
        outcome.kind === "store-unavailable" ? options.storeRetryIntervalMs : options.cycleIntervalMs;
      await sleep(waitMs, signal);
    }

    logger.info("Scheduler loop exited");
  };

  const shutdown = async () => {
    logger.info("Stopping scheduler...");
    state.running = false;
    stopping = true;
    abortController?.abort();

    if (loopPromise) {
      await loopPromise;
      loopPromise = null;
    }

    abortController = null;
    stopping = false;
    state.phase = "stopped";
    logger.info("Scheduler stopped");
  };

  return {
    async start() {
      // Let a pending stop finish before the new loop starts
      if (stopPromise) await stopPromise;
      if (state.running) return;

      logger.info("Starting scheduler...");
      state.running = true;
      state.phase = "idle";
      const controller = new AbortController();
      abortController = controller;

      loopPromise = runLoop(controller.signal).catch((error: unknown) => {
        state.lastError = errorMessage(error);
        logger.fatal({ error }, "Scheduler loop crashed");
      });
    },

    stop() {
      if (stopPromise) return stopPromise;
      if (!state.running) return Promise.resolve();

      stopPromise = shutdown().finally(() => {
        stopPromise = null;
      });
      return stopPromise;
    },

    runCycle,

    isRunning(): boolean {
      return state.running;
    },

    getState(): SchedulerState {
      return { ...state };
    },
  };
}
