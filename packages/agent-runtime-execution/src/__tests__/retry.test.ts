import { CancelledError, TransientInfraError } from "@warden/agent-runtime-core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { retry, sleep } from "../utils/retry";

describe("retry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should retry transient errors with exponential backoff", async () => {
    const delays: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientInfraError("503 service unavailable"))
      .mockRejectedValueOnce(new Error("connection reset: ECONNRESET"))
      .mockResolvedValue("ok");

    const promise = retry(fn, {
      maxAttempts: 3,
      initialDelayMs: 100,
      jitter: false,
      onRetry: (_attempt, _error, delay) => delays.push(delay),
    });
    await vi.runAllTimersAsync();
    const result = await promise;

    expect(result).toMatchObject({ success: true, result: "ok", attempts: 3 });
    expect(delays).toEqual([100, 200]);
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it("should not retry permanent errors", async () => {
    const error = new Error("invalid api key");
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    const result = await retry(fn, { maxAttempts: 5 });

    expect(result).toMatchObject({ success: false, error, attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should give up after maxAttempts", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new Error("request timed out"));

    const promise = retry(fn, { maxAttempts: 2, initialDelayMs: 10, jitter: false });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toMatchObject({ success: false, attempts: 2 });
  });

  it("should cap the delay", async () => {
    const delays: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new Error("rate limit exceeded"));

    const promise = retry(fn, {
      maxAttempts: 4,
      initialDelayMs: 1000,
      maxDelayMs: 1500,
      jitter: false,
      onRetry: (_attempt, _error, delay) => delays.push(delay),
    });
    await vi.runAllTimersAsync();
    await promise;

    expect(delays).toEqual([1000, 1500, 1500]);
  });

  it("should stop waiting when the signal aborts", async () => {
    const controller = new AbortController();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new Error("network unreachable"));

    const promise = retry(fn, { maxAttempts: 3, initialDelayMs: 10_000, signal: controller.signal });
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    const result = await promise;

    expect(result.success).toBe(false);
    expect(result.success ? undefined : result.error).toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("sleep", () => {
  it("should reject at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
