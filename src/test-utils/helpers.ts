/**
 * Test helper utilities
 */

import type { Clock } from "../lib/time";

/**
 * A promise with its resolve function exposed
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Clock fixed at `start` epoch seconds until moved with set/advance
 */
export interface ManualClock {
  now: Clock;
  set(seconds: number): void;
  advance(seconds: number): void;
}

export function createManualClock(start: number): ManualClock {
  let current = start;
  return {
    now: () => current,
    set(seconds) {
      current = seconds;
    },
    advance(seconds) {
      current += seconds;
    },
  };
}
