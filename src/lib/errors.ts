/**
 * Error taxonomy for the scheduler and its store.
 *
 * None of these is fatal to the scheduler loop: each is handled at the
 * boundary where it occurs. An unreachable probe target is not an error at
 * all, it is a `down` probe result.
 */

import type { MonitorRef } from "../types/monitor";

export type ErrorCode =
  | "STORE_UNAVAILABLE"
  | "MONITOR_NOT_FOUND"
  | "STALE_WRITE"
  | "MALFORMED_MONITOR";

export class SitePulseError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The store could not be reached, timed out, or is not configured
 */
export class StoreUnavailableError extends SitePulseError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super("STORE_UNAVAILABLE", message, options);
    this.operation = operation;
  }
}

/**
 * The monitor was deleted between being listed and being written
 */
export class MonitorNotFoundError extends SitePulseError {
  readonly ref: MonitorRef;

  constructor(ref: MonitorRef) {
    super("MONITOR_NOT_FOUND", `Monitor ${ref.ownerId}/${ref.monitorId} not found`);
    this.ref = ref;
  }
}

/**
 * The stored lastChecked is newer than the write being attempted
 */
export class StaleWriteError extends SitePulseError {
  readonly ref: MonitorRef;

  constructor(ref: MonitorRef, checkedAt: number) {
    super(
      "STALE_WRITE",
      `Monitor ${ref.ownerId}/${ref.monitorId} already has a check newer than ${checkedAt}`,
    );
    this.ref = ref;
  }
}

export class MalformedMonitorError extends SitePulseError {
  readonly ref: MonitorRef;
  readonly field: string;

  constructor(ref: MonitorRef, field: string, message: string) {
    super("MALFORMED_MONITOR", `Monitor ${ref.ownerId}/${ref.monitorId}: ${message}`);
    this.ref = ref;
    this.field = field;
  }
}

export function isSitePulseError(error: unknown): error is SitePulseError {
  return error instanceof SitePulseError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
