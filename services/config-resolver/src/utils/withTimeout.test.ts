import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { TimeoutError, withTimeout } from "./withTimeout.js";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the wrapped value", async () => {
    await expect(withTimeout(Promise.resolve(42), 100, "lookup")).resolves.toBe(42);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects with a TimeoutError once the deadline passes", async () => {
    const pending = withTimeout(new Promise<never>(() => undefined), 100, "lookup");
    const assertion = expect(pending).rejects.toMatchObject({
      name: "TimeoutError",
      code: "ETIMEDOUT",
      message: "lookup timed out after 100ms",
    });
    await vi.advanceTimersByTimeAsync(101);
    await assertion;
  });

  it("passes through rejections from the wrapped promise", async () => {
    const failure = new Error("connection refused");
    await expect(withTimeout(Promise.reject(failure), 100, "lookup")).rejects.toBe(failure);
  });

  it("exposes the configured timeout", () => {
    expect(new TimeoutError("query", 250).timeoutMs).toBe(250);
  });
});
