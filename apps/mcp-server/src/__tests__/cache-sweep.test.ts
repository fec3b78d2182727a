import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InMemoryResponseCache, noopLogger } from "@repo-relay/core";
import type { ResponseCache } from "@repo-relay/core";
import { startCacheSweepJob } from "../jobs/cache-sweep.js";

describe("startCacheSweepJob", () => {
  let now: number;
  let cache: InMemoryResponseCache;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 0;
    cache = new InMemoryResponseCache({ ttlMs: 1_000, maxEntries: 10, clock: () => now });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("drops expired entries on each tick", async () => {
    await cache.put("old", 1);
    now = 500;
    await cache.put("fresh", 2);
    now = 1_200;

    const stop = startCacheSweepJob({ cache, intervalMs: 100, logger: noopLogger });
    await vi.advanceTimersByTimeAsync(100);

    expect(await cache.size()).toBe(1);
    expect(await cache.get("fresh")).toEqual({ value: 2, createdAt: new Date(500) });
    stop();
  });

  it("stops sweeping once stopped", async () => {
    await cache.put("old", 1);
    now = 5_000;

    const stop = startCacheSweepJob({ cache, intervalMs: 100, logger: noopLogger });
    stop();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(await cache.size()).toBe(1);
  });

  it("logs and survives a failing sweep", async () => {
    const failing: ResponseCache = {
      get: async () => null,
      put: async () => {},
      size: async () => 0,
      stats: () => cache.stats(),
      sweep: async () => {
        throw new Error("store unavailable");
      },
      clear: async () => {},
    };
    const errors: Array<Record<string, unknown>> = [];
    const logger = {
      ...noopLogger,
      error: (obj: Record<string, unknown> | string) => {
        if (typeof obj !== "string") errors.push(obj);
      },
    };

    const stop = startCacheSweepJob({ cache: failing, intervalMs: 100, logger });
    await vi.advanceTimersByTimeAsync(250);
    stop();

    expect(errors).toHaveLength(2);
    expect(errors[0]?.["err"]).toBeInstanceOf(Error);
  });
});
