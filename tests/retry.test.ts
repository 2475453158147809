import { describe, expect, it, vi } from "vitest";
import {
  AuthenticationFailedError,
  OperationCancelledError,
  RateLimitedError,
  ServiceUnavailableError,
  UpstreamUnavailableError,
} from "../src/domain/errors.js";
import { mapWithConcurrency } from "../src/utils/concurrency.js";
import { RetryPolicy, withRetry } from "../src/utils/retry.js";

const FAST: RetryPolicy = { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 };

describe("withRetry", () => {
  it("retries transient failures until one succeeds", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServiceUnavailableError("svc", "down"))
      .mockRejectedValueOnce(new ServiceUnavailableError("svc", "down"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, FAST, { operation: "test" })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it("rethrows fatal errors without retrying", async () => {
    const fatal = new AuthenticationFailedError("svc");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(fatal);

    await expect(withRetry(fn, FAST, { operation: "test" })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("wraps the last transient failure once attempts run out", async () => {
    const last = new ServiceUnavailableError("svc", "still down");
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(last);

    const error = await withRetry(fn, FAST, { operation: "Embedding batch 1/1" }).catch(
      (caught: unknown) => caught,
    );
    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error instanceof UpstreamUnavailableError && error.attempts).toBe(3);
    expect(error instanceof Error && error.cause).toBe(last);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("waits at least as long as a Retry-After hint", async () => {
    vi.useFakeTimers();
    try {
      const fn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new RateLimitedError("svc", 15))
        .mockResolvedValueOnce("ok");

      const result = withRetry(
        fn,
        { maxAttempts: 2, initialDelayMs: 5, maxDelayMs: 20, backoffMultiplier: 2 },
        { operation: "test" },
      );
      await vi.advanceTimersByTimeAsync(14);
      expect(fn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(result).resolves.toBe("ok");
      expect(fn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it("gives up when a Retry-After hint exceeds the maximum delay", async () => {
    const limited = new RateLimitedError("svc", 1_000);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(limited).mockResolvedValueOnce("ok");

    const error = await withRetry(
      fn,
      { maxAttempts: 3, initialDelayMs: 5, maxDelayMs: 20, backoffMultiplier: 2 },
      { operation: "Embedding batch 1/1" },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error instanceof UpstreamUnavailableError && error.attempts).toBe(1);
    expect(error instanceof Error && error.cause).toBe(limited);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<() => Promise<string>>().mockResolvedValue("ok");

    await expect(
      withRetry(fn, FAST, { operation: "test", signal: controller.signal }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it("abandons the backoff wait on cancellation", async () => {
    const controller = new AbortController();
    const fn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      setTimeout(() => controller.abort(), 10);
      throw new ServiceUnavailableError("svc", "down");
    });

    await expect(
      withRetry(
        fn,
        { maxAttempts: 3, initialDelayMs: 60_000, maxDelayMs: 60_000, backoffMultiplier: 2 },
        { operation: "test", signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order and bounds the calls in flight", async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (delay, index) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, delay));
      active -= 1;
      return index;
    });

    expect(results).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });

  it("starts nothing new after a failure", async () => {
    const started: number[] = [];
    const failure = new Error("boom");

    await expect(
      mapWithConcurrency([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) {
          throw failure;
        }
        return item;
      }),
    ).rejects.toBe(failure);
    expect(started).toEqual([1, 2]);
  });
});
