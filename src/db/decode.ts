import { z } from "zod";
import { MalformedMonitorError } from "../lib/errors";
import { toEpochSeconds } from "../lib/time";
import {
  MonitorStatusSchema,
  type Monitor,
  type MonitorRef,
  type MonitorStatus,
} from "../types/monitor";

// Accepts legacy row shapes; normalized below
const MonitorRowSchema = z.object({
  id: z.string().min(1),
  ownerId: z.string().min(1),
  url: z.string().nullish(),
  name: z.string().nullish(),
  interval: z.unknown(),
  status: z.string().nullish(),
  lastChecked: z.unknown(),
  createdAt: z.unknown(),
});

const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Integer seconds, or undefined when absent. Throws on anything non-numeric.
 */
function decodeInterval(ref: MonitorRef, value: unknown): number | undefined {
  if (value === null || value === undefined) return undefined;

  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }

  if (typeof value === "string" && NUMERIC.test(value.trim())) {
    return Math.trunc(Number(value.trim()));
  }

  throw new MalformedMonitorError(ref, "interval", `non-numeric interval ${JSON.stringify(value)}`);
}

function decodeStatus(value: string | null | undefined): MonitorStatus {
  const parsed = MonitorStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : "pending";
}

/**
 * Translate a stored row into a Monitor with epoch-second timestamps.
 * @throws ZodError when the row has no id or owner
 * @throws MalformedMonitorError when the interval is present but not a number
 */
export function decodeMonitorRow(row: unknown): Monitor {
  const parsed = MonitorRowSchema.parse(row);
  const ref: MonitorRef = { ownerId: parsed.ownerId, monitorId: parsed.id };

  return {
    ref,
    url: parsed.url?.trim() ?? "",
    name: parsed.name ?? "",
    interval: decodeInterval(ref, parsed.interval),
    status: decodeStatus(parsed.status),
    lastChecked: toEpochSeconds(parsed.lastChecked),
    createdAt: toEpochSeconds(parsed.createdAt),
  };
}
