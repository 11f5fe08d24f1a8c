import { describe, it, expect } from "vitest";
import { jitteredDelay, retry } from "../../src/utils/retry.js";

describe("retry", () => {
  it("returns on first success", async () => {
    expect(await retry(async () => "ok")).toBe("ok");
  });

  it("passes the attempt number and retries until success", async () => {
    const attempts: number[] = [];
    const result = await retry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error("fail");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 1 },
    );
    expect(result).toBe("ok");
    expect(attempts).toEqual([0, 1, 2]);
  });

  it("throws the last error after max attempts", async () => {
    await expect(
      retry(
        async () => {
          throw new Error("always fails");
        },
        { maxAttempts: 2, baseDelayMs: 1 },
      ),
    ).rejects.toThrow("always fails");
  });

  it("stops at once when shouldRetry declines", async () => {
    let calls = 0;
    await expect(
      retry(
        async () => {
          calls++;
          throw new Error("401 Unauthorized");
        },
        { maxAttempts: 5, baseDelayMs: 1, shouldRetry: () => false },
      ),
    ).rejects.toThrow("401 Unauthorized");
    expect(calls).toBe(1);
  });

  it("respects an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    await expect(
      retry(
        async () => {
          calls++;
          return "never";
        },
        { signal: controller.signal },
      ),
    ).rejects.toThrow();
    expect(calls).toBe(0);
  });
});

describe("jitteredDelay", () => {
  it("stays between half and all of the capped exponential delay", () => {
    for (let i = 0; i < 20; i++) {
      const delay = jitteredDelay(100, 3, 500);
      expect(delay).toBeGreaterThanOrEqual(250);
      expect(delay).toBeLessThanOrEqual(500);
    }
  });
});
