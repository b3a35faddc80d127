import { z } from "zod";

/**
 * Seconds since the Unix epoch. May carry a fractional part.
 */
export type EpochSeconds = number;

export const MONITOR_STATUSES = ["pending", "up", "down"] as const;

export const MonitorStatusSchema = z.enum(MONITOR_STATUSES);

export type MonitorStatus = z.infer<typeof MonitorStatusSchema>;

/**
 * The statuses a check can produce. A checked monitor never goes back to pending.
 */
export type CheckedStatus = Exclude<MonitorStatus, "pending">;

export const DEFAULT_INTERVAL_SECONDS = 60;

export interface MonitorRef {
  ownerId: string;
  monitorId: string;
}

export interface Monitor {
  ref: MonitorRef;
  /** Empty when the stored record has no URL */
  url: string;
  name: string;
  /** Seconds between checks; undefined when the record has none */
  interval: number | undefined;
  status: MonitorStatus;
  /** null when never checked */
  lastChecked: EpochSeconds | null;
  createdAt: EpochSeconds | null;
}

// Monitor creation payload accepted by the API
export const CreateMonitorSchema = z.object({
  uid: z.string().trim().min(1),
  url: z.string().trim().url(),
  name: z.string().trim().min(1),
  interval: z.coerce.number().int().min(1).default(DEFAULT_INTERVAL_SECONDS),
});

export const DeleteMonitorSchema = z.object({
  uid: z.string().trim().min(1),
});

export interface NewMonitor {
  ownerId: string;
  url: string;
  name: string;
  interval: number;
}

export function formatRef(ref: MonitorRef): string {
  return `${ref.ownerId}/${ref.monitorId}`;
}
