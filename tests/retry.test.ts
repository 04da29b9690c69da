import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { RetryController } from "../src/retry.js";
import {
  AuthenticationError,
  CancelledError,
  RetryExhaustedError,
  TransientError,
  classifyError
} from "../src/errors.js";

describe("RetryController", () => {
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps = [];
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("returns the first successful result", async () => {
    const retry = new RetryController({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, { sleep });
    const operation = vi.fn().mockResolvedValue("ok");

    await expect(retry.execute(operation)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it("retries transient failures with exponential backoff", async () => {
    const retry = new RetryController(
      { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 },
      { sleep, random: () => 0 }
    );
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientError("HTTP 503"))
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValue("third time");

    await expect(retry.execute(operation)).resolves.toBe("third time");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([100, 200]);
  });

  it("raises RetryExhaustedError after the last attempt", async () => {
    const retry = new RetryController({ maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100 }, { sleep, random: () => 0 });
    const operation = vi.fn().mockRejectedValue(new TransientError("HTTP 503"));

    const error = await retry.execute(operation, undefined, "round r1").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ message: "round r1 failed after 2 attempt(s): HTTP 503", attempts: 2 });
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([10]);
  });

  it("does not retry fatal errors", async () => {
    const retry = new RetryController({ maxAttempts: 5, baseDelayMs: 10, maxDelayMs: 100 }, { sleep });
    const operation = vi.fn().mockRejectedValue(new AuthenticationError("Session expired"));

    await expect(retry.execute(operation)).rejects.toBeInstanceOf(AuthenticationError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("uses a custom classifier", async () => {
    const retry = new RetryController({ maxAttempts: 5, baseDelayMs: 10, maxDelayMs: 100 }, { sleep });
    const operation = vi.fn().mockRejectedValue(new Error("bad selector"));

    await expect(retry.execute(operation, () => "fatal")).rejects.toThrow("bad selector");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("turns a slow attempt into a transient timeout", async () => {
    vi.useFakeTimers();
    const retry = new RetryController(
      { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100, attemptTimeoutMs: 1000 },
      { sleep, random: () => 0 }
    );
    const operation = vi
      .fn()
      .mockImplementationOnce(() => new Promise<string>(() => {}))
      .mockResolvedValue("fast");

    const result = retry.execute(operation, undefined, "listing");
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toBe("fast");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️  listing: attempt 1/2 failed (listing timed out after 1000ms); retrying in 10ms"
    );
  });

  it("aborts the signal of an attempt that timed out", async () => {
    vi.useFakeTimers();
    const retry = new RetryController(
      { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100, attemptTimeoutMs: 1000 },
      { sleep, random: () => 0 }
    );
    const signals: AbortSignal[] = [];
    const operation = vi.fn(async (attempt: number, signal: AbortSignal) => {
      signals.push(signal);
      if (attempt === 1) await new Promise<never>(() => {});
      return "second";
    });

    const result = retry.execute(operation, undefined, "round r1");
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toBe("second");
    expect(signals.map((signal) => signal.aborted)).toEqual([true, false]);
  });

  describe("delayFor", () => {
    it("doubles the base delay per retry and caps it", () => {
      const retry = new RetryController({ maxAttempts: 6, baseDelayMs: 5000, maxDelayMs: 60000 }, { random: () => 0 });

      expect([0, 1, 2, 3, 4].map((n) => retry.delayFor(n))).toEqual([5000, 10000, 20000, 40000, 60000]);
    });

    it("adds jitter below one base delay", () => {
      const retry = new RetryController({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000 }, { random: () => 0.5 });

      expect(retry.delayFor(1)).toBe(2500);
    });
  });
});

describe("classifyError", () => {
  it("treats authentication and cancellation as fatal", () => {
    expect(classifyError(new AuthenticationError("expired"))).toBe("fatal");
    expect(classifyError(new CancelledError())).toBe("fatal");
  });

  it("treats everything else as transient", () => {
    expect(classifyError(new TransientError("HTTP 503"))).toBe("transient");
    expect(classifyError(new Error("Timeout 30000ms exceeded"))).toBe("transient");
    expect(classifyError("odd value")).toBe("transient");
  });
});
