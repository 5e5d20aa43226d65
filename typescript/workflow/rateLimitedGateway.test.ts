import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateLimitedGateway } from "./rateLimitedGateway.js";

describe("RateLimitedGateway", () => {
  let start: number;

  beforeEach(() => {
    vi.useFakeTimers();
    start = Date.now();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function recorder() {
    const admitted: Array<{ id: number; at: number }> = [];
    const operation = (id: number) => async () => {
      admitted.push({ id, at: Date.now() - start });
      return id;
    };
    return { admitted, operation };
  }

  it("admits up to the ceiling immediately and queues the rest for the next window", async () => {
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: 50 });
    const { admitted, operation } = recorder();

    const calls = Array.from({ length: 60 }, (_, id) => gateway.execute(operation(id)));
    const all = Promise.all(calls);

    await vi.advanceTimersByTimeAsync(0);
    expect(admitted).toHaveLength(50);
    expect(admitted.every((a) => a.at === 0)).toBe(true);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(admitted).toHaveLength(50);

    await vi.advanceTimersByTimeAsync(1);
    expect(await all).toEqual(Array.from({ length: 60 }, (_, id) => id));
    expect(admitted.slice(50)).toEqual(
      Array.from({ length: 10 }, (_, i) => ({ id: 50 + i, at: 60_000 }))
    );
  });

  it("admits waiting callers in arrival order", async () => {
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: 2 });
    const { admitted, operation } = recorder();

    const all = Promise.all([1, 2, 3, 4, 5].map((id) => gateway.execute(operation(id))));
    await vi.advanceTimersByTimeAsync(120_000);
    await all;

    expect(admitted).toEqual([
      { id: 1, at: 0 },
      { id: 2, at: 0 },
      { id: 3, at: 60_000 },
      { id: 4, at: 60_000 },
      { id: 5, at: 120_000 },
    ]);
  });

  it("never admits more than the ceiling within any window", async () => {
    const ceiling = 3;
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: ceiling });
    const { admitted, operation } = recorder();
    const calls: Array<Promise<number>> = [];

    // Bursts of uneven size arriving every 20 seconds
    const bursts = [4, 1, 0, 2, 5, 1];
    let id = 0;
    for (const size of bursts) {
      for (let i = 0; i < size; i++) {
        calls.push(gateway.execute(operation(id++)));
      }
      await vi.advanceTimersByTimeAsync(20_000);
    }
    await vi.advanceTimersByTimeAsync(5 * 60_000);
    await Promise.all(calls);

    expect(admitted).toHaveLength(13);
    expect(admitted.map((a) => a.id)).toEqual(Array.from({ length: 13 }, (_, i) => i));
    for (const admission of admitted) {
      const inWindow = admitted.filter(
        (other) => other.at <= admission.at && other.at > admission.at - 60_000
      );
      expect(inWindow.length).toBeLessThanOrEqual(ceiling);
    }
  });

  it("runs operations outside the admission section", async () => {
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: 10 });
    let releaseSlow: () => void = () => {};
    const slow = gateway.execute(
      () => new Promise<string>((resolve) => (releaseSlow = () => resolve("slow")))
    );
    const fast = gateway.execute(async () => "fast");

    await expect(fast).resolves.toBe("fast");
    releaseSlow();
    await expect(slow).resolves.toBe("slow");
  });

  it("propagates operation failures unchanged and still counts the admission", async () => {
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: 5 });
    const failure = new Error("upstream exploded");

    await expect(gateway.execute(() => Promise.reject(failure))).rejects.toBe(failure);
    expect(gateway.currentRate()).toBe(1);
    expect(gateway.availableCapacity()).toBe(4);
  });

  it("frees capacity as admissions age out of the window", async () => {
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: 5 });
    await gateway.execute(async () => undefined);
    await vi.advanceTimersByTimeAsync(30_000);
    await gateway.execute(async () => undefined);

    expect(gateway.currentRate()).toBe(2);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(gateway.currentRate()).toBe(1);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(gateway.currentRate()).toBe(0);
  });

  it("reports callers waiting for capacity", async () => {
    const gateway = new RateLimitedGateway({ maxRequestsPerMinute: 1 });
    const all = Promise.all([1, 2, 3].map(() => gateway.execute(async () => undefined)));

    await vi.advanceTimersByTimeAsync(0);
    expect(gateway.waitingCount()).toBe(2);

    await vi.advanceTimersByTimeAsync(120_000);
    await all;
    expect(gateway.waitingCount()).toBe(0);
  });

  it("rejects a non-positive ceiling", () => {
    expect(() => new RateLimitedGateway({ maxRequestsPerMinute: 0 })).toThrow(RangeError);
  });
});
