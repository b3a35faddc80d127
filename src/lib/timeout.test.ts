import { afterEach, describe, expect, test, vi } from "vitest";
import { withTimeout } from "./timeout";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("resolves with the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000, () => new Error("late"))).resolves.toBe(42);
  });

  test("rejects with the timeout error when the promise hangs", async () => {
    const hanging = new Promise<number>(() => {});

    await expect(withTimeout(hanging, 20, () => new Error("late"))).rejects.toThrow("late");
  });

  test("passes through the promise's own rejection", async () => {
    const failing = Promise.reject(new Error("connection reset"));

    await expect(withTimeout(failing, 1_000, () => new Error("late"))).rejects.toThrow(
      "connection reset",
    );
  });

  test("clears its timer once the promise settles", async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve("done"), 60_000, () => new Error("late"));

    expect(vi.getTimerCount()).toBe(0);
  });
});
