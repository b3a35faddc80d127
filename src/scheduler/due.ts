import {
  DEFAULT_INTERVAL_SECONDS,
  type EpochSeconds,
  type Monitor,
} from "../types/monitor";

/**
 * Seconds since the last check; Infinity when never checked
 */
export function elapsedSince(monitor: Monitor, now: EpochSeconds): number {
  if (monitor.lastChecked === null) return Number.POSITIVE_INFINITY;
  return now - monitor.lastChecked;
}

/**
 * Effective check interval. A non-positive stored interval makes the monitor
 * due on every cycle rather than being rejected here.
 */
export function effectiveInterval(monitor: Monitor): number {
  return monitor.interval ?? DEFAULT_INTERVAL_SECONDS;
}

export function isDue(monitor: Monitor, now: EpochSeconds): boolean {
  return elapsedSince(monitor, now) > effectiveInterval(monitor);
}

/**
 * Monitors due for a check at `now`, in input order
 */
export function selectDue(monitors: readonly Monitor[], now: EpochSeconds): Monitor[] {
  return monitors.filter((monitor) => isDue(monitor, now));
}

/**
 * Comparator putting never-checked monitors first, then the most overdue.
 * Ties keep their relative order (Array.prototype.sort is stable).
 */
export function byMostOverdue(now: EpochSeconds) {
  const overdue = (monitor: Monitor) =>
    elapsedSince(monitor, now) - effectiveInterval(monitor);

  return (a: Monitor, b: Monitor): number => {
    const da = overdue(a);
    const db = overdue(b);
    if (da === db) return 0;
    return da > db ? -1 : 1;
  };
}
