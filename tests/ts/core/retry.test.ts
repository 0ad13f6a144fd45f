import { describe, expect, it, vi } from "vitest";
import {
  NotFoundError,
  RequestExhaustedError,
  TimeoutError,
  TransientNetworkError,
} from "../../../src/core/errors.js";
import { logger } from "../../../src/core/logger.js";
import { gatewayRetryCounter } from "../../../src/core/metrics.js";
import { executeWithRetry } from "../../../src/core/retry.js";

function options(operation = "getLineItem") {
  return { operation, entityId: "300", maxAttempts: 3, logger };
}

async function retriesRecorded(operation: string): Promise<number> {
  const metric = await gatewayRetryCounter.get();
  return metric.values.find((value) => value.labels.operation === operation)?.value ?? 0;
}

describe("executeWithRetry", () => {
  it("returns the first result without retrying", async () => {
    const attempt = vi.fn(async () => "line item");
    await expect(executeWithRetry(attempt, options())).resolves.toBe("line item");
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("retries transient failures and returns the later result", async () => {
    const attempt = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientNetworkError("socket hang up"))
      .mockRejectedValueOnce(new TimeoutError("getLineItem", 50))
      .mockResolvedValueOnce("line item");

    await expect(executeWithRetry(attempt, options())).resolves.toBe("line item");
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it("gives up after maxAttempts with RequestExhaustedError", async () => {
    const lastFailure = new TransientNetworkError("third");
    const attempt = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientNetworkError("first"))
      .mockRejectedValueOnce(new TransientNetworkError("second"))
      .mockRejectedValueOnce(lastFailure);

    const error = await executeWithRetry(attempt, options()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RequestExhaustedError);
    expect(error).toMatchObject({
      entityId: "300",
      attempts: 3,
      message: "Could not fetch 300 in 3 attempts",
      cause: lastFailure,
    });
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it("counts an empty result as a used attempt", async () => {
    const attempt = vi.fn(async () => null);
    await expect(executeWithRetry(attempt, options())).rejects.toThrow(RequestExhaustedError);
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it("propagates fatal failures at once", async () => {
    const attempt = vi.fn(async (): Promise<string> => {
      throw new NotFoundError("LineItem", "300");
    });
    await expect(executeWithRetry(attempt, options())).rejects.toThrow(NotFoundError);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("does not retry untagged errors", async () => {
    const attempt = vi.fn(async (): Promise<string> => {
      throw new Error("plain failure");
    });
    await expect(executeWithRetry(attempt, options())).rejects.toThrow("plain failure");
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("records one retry per attempt that is followed by another", async () => {
    const attempt = vi.fn(async (): Promise<string> => {
      throw new TransientNetworkError("reset");
    });
    await executeWithRetry(attempt, options("retryCounterCheck")).catch(() => undefined);
    expect(await retriesRecorded("retryCounterCheck")).toBe(2);
  });
});
