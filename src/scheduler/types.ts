import type { Probe } from "../checkers/http";
import type { MonitorStore } from "../db/monitor-store";
import type { StoreUnavailableError } from "../lib/errors";
import type { Clock } from "../lib/time";
import type { EpochSeconds } from "../types/monitor";

export interface SchedulerOptions {
  /** Bound on a single probe */
  probeTimeoutSeconds: number;
  /** Wait after a cycle, or after finding nothing due */
  cycleIntervalMs: number;
  /** Wait after the store could not be reached */
  storeRetryIntervalMs: number;
  /** Probes launched per cycle; the rest wait for the next cycle */
  maxConcurrentProbes: number;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerDeps {
  store: MonitorStore;
  probe: Probe;
  clock?: Clock;
  sleep?: Sleep;
  options?: Partial<SchedulerOptions>;
}

export type SchedulerPhase = "stopped" | "idle" | "cycle-active";

export interface CycleSummary {
  /** Monitors found due this cycle */
  due: number;
  /** Probes launched */
  dispatched: number;
  /** Due monitors left for the next cycle by the concurrency cap */
  deferred: number;
  /** Due monitors without a URL */
  skipped: number;
  written: number;
  /** Deleted between listing and writing */
  vanished: number;
  /** A newer check was already stored */
  stale: number;
  failedWrites: number;
  durationMs: number;
}

export type CycleOutcome =
  | { kind: "completed"; summary: CycleSummary }
  | { kind: "store-unavailable"; error: StoreUnavailableError }
  | { kind: "failed"; error: unknown };

export interface SchedulerState {
  phase: SchedulerPhase;
  running: boolean;
  cycles: number;
  lastCycleAt: EpochSeconds | null;
  lastSummary: CycleSummary | null;
  lastError: string | null;
}

/**
 * Outcome of probing and writing one monitor
 */
export type MonitorOutcome = "written" | "vanished" | "stale" | "failed";
