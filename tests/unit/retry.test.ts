import { describe, it, expect } from "vitest";
import { retryWithBackoff, type RetryOptions } from "../../src/core/retry";

const noDelay: RetryOptions = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

describe("retryWithBackoff", () => {
  it("should return the first successful result", async () => {
    const attempts: number[] = [];

    const result = await retryWithBackoff(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 2) throw new Error("flaky");
      return "ok";
    }, noDelay);

    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2]);
  });

  it("should stop after maxAttempts and rethrow the last error", async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(async (attempt) => {
        calls++;
        throw new Error(`failure ${attempt}`);
      }, noDelay)
    ).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
  });

  it("should stop early when shouldRetry rejects the error", async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new Error("fatal");
        },
        { ...noDelay, shouldRetry: (error) => !(error instanceof Error && error.message === "fatal") }
      )
    ).rejects.toThrow("fatal");
    expect(calls).toBe(1);
  });
});
