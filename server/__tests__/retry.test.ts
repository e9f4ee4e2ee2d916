import { describe, expect, it, vi } from "vitest";
import { RetryAbortedError, backoffDelay, retryWithBackoff } from "../utils/retry";

describe("backoffDelay", () => {
  it("doubles per attempt up to the maximum", () => {
    expect(backoffDelay(0, 1000, 10000)).toBe(1000);
    expect(backoffDelay(3, 1000, 10000)).toBe(8000);
    expect(backoffDelay(4, 1000, 10000)).toBe(10000);
    expect(backoffDelay(0, 0, 10)).toBe(1);
  });
});

describe("retryWithBackoff", () => {
  it("retries until an attempt succeeds", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValue("ok");
    const onRetry = vi.fn();

    await expect(retryWithBackoff(fn, { maxAttempts: 3, initialDelay: 1, maxDelay: 2, onRetry })).resolves.toBe("ok");
    expect(fn.mock.calls).toEqual([[0], [1], [2]]);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it("rethrows the last error once attempts run out", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(retryWithBackoff(fn, { maxAttempts: 2, initialDelay: 1, maxDelay: 1 })).rejects.toThrow("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("stops waiting between attempts once the signal aborts", async () => {
    const controller = new AbortController();
    const lastError = new Error("503 upstream");
    const fn = vi.fn().mockRejectedValue(lastError);
    setTimeout(() => controller.abort(), 5);

    await expect(
      retryWithBackoff(fn, { maxAttempts: 3, initialDelay: 60000, maxDelay: 60000, signal: controller.signal }),
    ).rejects.toMatchObject({ name: "RetryAbortedError", attempts: 1, lastError });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not start an attempt after the signal aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn();

    await expect(retryWithBackoff(fn, { signal: controller.signal })).rejects.toBeInstanceOf(RetryAbortedError);
    expect(fn).not.toHaveBeenCalled();
  });
});
