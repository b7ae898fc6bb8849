import { describe, it, expect, vi, afterEach } from "vitest";
import { settleAll, successes, withTimeout } from "../concurrency.js";
import { TimeoutError } from "../errors.js";

describe("settleAll", () => {
  it("captures each outcome in task order", async () => {
    const results = await settleAll([
      { label: "a", run: async () => 1 },
      { label: "b", run: async () => { throw new Error("boom"); } },
      { label: "c", run: async () => 3 },
    ]);
    expect(results.map((r) => r.ok)).toEqual([true, false, true]);
    expect(successes(results)).toEqual([1, 3]);
    const failed = results[1];
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error).toBeInstanceOf(Error);
  });

  it("runs tasks concurrently", async () => {
    let running = 0;
    let peak = 0;
    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running--;
      return peak;
    };
    await settleAll([{ label: "a", run: task }, { label: "b", run: task }, { label: "c", run: task }]);
    expect(peak).toBe(3);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the value when in time", async () => {
    await expect(withTimeout(async () => "done", 100, "call")).resolves.toBe("done");
  });

  it("passes the original rejection through", async () => {
    await expect(withTimeout(async () => { throw new Error("nope"); }, 100, "call")).rejects.toThrow("nope");
  });

  it("rejects with TimeoutError after the deadline", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<string>(() => {}), 50, "generation (marx)");
    const assertion = expect(pending).rejects.toThrow("generation (marx) timed out after 50ms");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
  });

  it("aborts the call's signal when the deadline passes", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withTimeout((signal) => {
      seen = signal;
      return new Promise<string>(() => {});
    }, 50, "query embedding");
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TimeoutError);
  });

  it("leaves the signal alone when the call finishes in time", async () => {
    let seen: AbortSignal | undefined;
    await withTimeout(async (signal) => {
      seen = signal;
      return 1;
    }, 100, "call");
    expect(seen?.aborted).toBe(false);
  });
});
