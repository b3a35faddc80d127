/**
 * Prometheus Metrics Export
 *
 * Current state only: the latest status and latency of each monitor plus
 * cumulative counters for the scheduler. History lives in Prometheus.
 */

import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";
import type { CheckedStatus, MonitorRef } from "../types/monitor";

const registry = new Registry();

// Collect default Node.js metrics (CPU, memory, etc.)
collectDefaultMetrics({ register: registry });

/**
 * Monitor state (0 = down, 1 = up)
 */
export const monitorState = new Gauge({
  name: "sitepulse_monitor_state",
  help: "Current state of monitor (0=down, 1=up)",
  labelNames: ["owner", "monitor"] as const,
  registers: [registry],
});

export const monitorLatency = new Gauge({
  name: "sitepulse_monitor_latency_ms",
  help: "Probe latency of the last check in milliseconds",
  labelNames: ["owner", "monitor"] as const,
  registers: [registry],
});

export const checksTotal = new Counter({
  name: "sitepulse_checks_total",
  help: "Total number of probes performed",
  labelNames: ["result", "reason"] as const,
  registers: [registry],
});

export const cycleDuration = new Histogram({
  name: "sitepulse_cycle_duration_seconds",
  help: "Wall time of one scheduler cycle",
  buckets: [0.05, 0.1, 0.5, 1, 2.5, 5, 10, 15, 30],
  registers: [registry],
});

export const storeErrorsTotal = new Counter({
  name: "sitepulse_store_errors_total",
  help: "Failed or timed out store calls",
  labelNames: ["operation"] as const,
  registers: [registry],
});

export const skippedMonitorsTotal = new Counter({
  name: "sitepulse_skipped_monitors_total",
  help: "Due monitors skipped or whose write was abandoned",
  labelNames: ["reason"] as const,
  registers: [registry],
});

/**
 * Get metrics endpoint for Prometheus scraping
 * @returns Prometheus metrics in text format
 */
export async function getMetrics(): Promise<string> {
  return await registry.metrics();
}

export function getMetricsContentType(): string {
  return registry.contentType;
}

/**
 * Record a probe result in Prometheus metrics
 */
export function recordCheckResult(
  ref: MonitorRef,
  result: { state: CheckedStatus; reason: string; latencyMs: number },
): void {
  const labels = { owner: ref.ownerId, monitor: ref.monitorId };
  monitorState.set(labels, result.state === "up" ? 1 : 0);
  monitorLatency.set(labels, result.latencyMs);
  checksTotal.inc({ result: result.state, reason: result.reason });
}

/**
 * Remove the per-monitor series once a monitor is deleted
 */
export function resetMonitorMetrics(ref: MonitorRef): void {
  const labels = { owner: ref.ownerId, monitor: ref.monitorId };
  monitorState.remove(labels);
  monitorLatency.remove(labels);
}
