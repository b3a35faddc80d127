/**
 * Test fixture builders for monitors
 */

import type { Monitor } from "../../types/monitor";

export const NOW = 1_700_000_000;

let sequence = 0;

/**
 * Creates a monitor that was checked `checkedAgo` seconds before NOW.
 * Pass `lastChecked: null` for a never-checked monitor.
 */
export function createMonitor(
  overrides: Partial<Omit<Monitor, "ref">> & {
    ownerId?: string;
    monitorId?: string;
    checkedAgo?: number;
  } = {},
): Monitor {
  sequence++;
  const { ownerId, monitorId, checkedAgo, ...fields } = overrides;

  return {
    ref: {
      ownerId: ownerId ?? "user-1",
      monitorId: monitorId ?? `monitor-${sequence}`,
    },
    url: "https://example.com/",
    name: "Example",
    interval: 60,
    status: "pending",
    lastChecked: checkedAgo === undefined ? null : NOW - checkedAgo,
    createdAt: NOW - 86_400,
    ...fields,
  };
}
