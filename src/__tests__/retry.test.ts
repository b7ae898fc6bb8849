import { describe, it, expect } from "vitest";
import { retryDelay, withRetry } from "../adapters/retry.js";
import { ProviderError } from "../errors.js";

describe("retryDelay", () => {
  it("doubles per attempt and caps at 16x the base", () => {
    const policy = { maxRetries: 10, baseDelayMs: 100 };
    for (const [attempt, raw] of [[0, 100], [1, 200], [3, 800], [4, 1600], [7, 1600]]) {
      const d = retryDelay(policy, attempt);
      expect(d).toBeGreaterThanOrEqual(raw * 0.75);
      expect(d).toBeLessThanOrEqual(raw * 1.25);
    }
  });

  it("is 0 with a zero base", () => {
    expect(retryDelay({ maxRetries: 1, baseDelayMs: 0 }, 3)).toBe(0);
  });
});

describe("withRetry", () => {
  const policy = { maxRetries: 2, baseDelayMs: 0 };

  it("returns the first success", async () => {
    let attempts = 0;
    const result = await withRetry("test", policy, async () => {
      attempts++;
      if (attempts === 1) throw new Error("ECONNRESET");
      return "ok";
    });
    expect(result).toBe("ok");
    expect(attempts).toBe(2);
  });

  it("throws a 4xx immediately", async () => {
    let attempts = 0;
    await expect(withRetry("test", policy, async () => {
      attempts++;
      throw new ProviderError("bad request", 400);
    })).rejects.toThrow("bad request");
    expect(attempts).toBe(1);
  });

  it("stops after maxRetries", async () => {
    let attempts = 0;
    await expect(withRetry("test", policy, async () => {
      attempts++;
      throw new ProviderError("unavailable", 503);
    })).rejects.toThrow("unavailable");
    expect(attempts).toBe(3);
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    let attempts = 0;
    await expect(withRetry("test", { maxRetries: 5, baseDelayMs: 0 }, async () => {
      attempts++;
      controller.abort(new Error("deadline passed"));
      throw new Error("ECONNRESET");
    }, controller.signal)).rejects.toThrow("deadline passed");
    expect(attempts).toBe(1);
  });

  it("cuts a pending wait short on abort", async () => {
    const controller = new AbortController();
    let attempts = 0;
    const start = Date.now();
    const pending = withRetry("test", { maxRetries: 1, baseDelayMs: 60_000 }, async () => {
      attempts++;
      throw new Error("ECONNRESET");
    }, controller.signal);
    setTimeout(() => controller.abort(new Error("panel closed")), 20);

    await expect(pending).rejects.toThrow("panel closed");
    expect(attempts).toBe(1);
    expect(Date.now() - start).toBeLessThan(5000);
  });
});
