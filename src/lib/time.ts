import type { EpochSeconds } from "../types/monitor";

// Anything above this is taken as milliseconds (it is ~year 33658 in seconds)
const MILLISECONDS_THRESHOLD = 1e12;

export type Clock = () => EpochSeconds;

export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Normalize a stored timestamp to epoch seconds.
 *
 * Accepts Date objects, epoch numbers in seconds or milliseconds, numeric
 * strings and ISO-8601 strings. Returns null for "never": null, undefined,
 * zero or negative epochs, and anything unparseable.
 */
export function toEpochSeconds(value: unknown): EpochSeconds | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) || ms <= 0 ? null : ms / 1000;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return null;
    return value >= MILLISECONDS_THRESHOLD ? value / 1000 : value;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
      return toEpochSeconds(Number(trimmed));
    }
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) || ms <= 0 ? null : ms / 1000;
  }

  return null;
}

/**
 * Store-native representation of an epoch-seconds value
 */
export function fromEpochSeconds(seconds: EpochSeconds): Date {
  return new Date(Math.round(seconds * 1000));
}
