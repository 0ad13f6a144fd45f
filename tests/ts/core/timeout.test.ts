import { afterEach, describe, expect, it, vi } from "vitest";
import { TimeoutError } from "../../../src/core/errors.js";
import { createGuard, withTimeout } from "../../../src/core/timeout.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the work's result and clears its timer", async () => {
    vi.useFakeTimers();
    await expect(withTimeout("getAdvertisers", 1000, async () => "ok")).resolves.toBe("ok");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects with TimeoutError once the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout("getAdvertisers", 1000, () => new Promise<string>(() => {}));
    const assertion = expect(pending).rejects.toMatchObject({
      name: "TimeoutError",
      operation: "getAdvertisers",
      timeoutMs: 1000,
      retryable: true,
    });
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does not fire before the deadline", async () => {
    vi.useFakeTimers();
    let settled = false;
    const pending = withTimeout("getAdvertisers", 1000, () => new Promise<string>(() => {})).catch((err: unknown) => {
      settled = true;
      return err;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(await pending).toBeInstanceOf(TimeoutError);
  });

  it("passes the work's own failure through", async () => {
    const failure = new Error("boom");
    await expect(withTimeout("getCampaign", 1000, () => Promise.reject(failure))).rejects.toBe(failure);
  });
});

describe("createGuard", () => {
  it("applies its deadline to every call", async () => {
    const guard = createGuard(20);
    await expect(guard("getCreatives", async () => [1, 2])).resolves.toEqual([1, 2]);
    await expect(guard("getCreatives", () => new Promise<number[]>(() => {}))).rejects.toThrow(
      "getCreatives timed out after 20ms"
    );
  });
});
