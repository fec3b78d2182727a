import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryRateLimiter } from "../rate-limit/in-memory.js";

const HOUR = 60 * 60 * 1000;
const T0 = Date.UTC(2026, 0, 1, 9, 0, 0);

describe("InMemoryRateLimiter", () => {
  let now: number;
  let limiter: InMemoryRateLimiter;

  beforeEach(() => {
    now = T0;
    limiter = new InMemoryRateLimiter({ limit: 3, windowMs: HOUR, clock: () => now });
  });

  it("counts down remaining quota and denies past the limit", async () => {
    const first = await limiter.admit("X");
    now += 1_000;
    const second = await limiter.admit("X");
    now += 1_000;
    const third = await limiter.admit("X");

    expect([first.remaining, second.remaining, third.remaining]).toEqual([2, 1, 0]);
    expect(first.allowed && second.allowed && third.allowed).toBe(true);

    now += 10 * 60 * 1000;
    const fourth = await limiter.admit("X");
    expect(fourth.allowed).toBe(false);
    expect(fourth.remaining).toBe(0);
    expect(fourth.resetAt).toEqual(new Date(T0 + HOUR));
  });

  it("starts a new window once resetAt has passed", async () => {
    for (let i = 0; i < 4; i++) await limiter.admit("X");

    now = T0 + HOUR;
    const fifth = await limiter.admit("X");

    expect(fifth.allowed).toBe(true);
    expect(fifth.remaining).toBe(2);
    expect(fifth.resetAt).toEqual(new Date(T0 + 2 * HOUR));
  });

  it("does not consume quota on denial", async () => {
    for (let i = 0; i < 10; i++) await limiter.admit("X");

    const status = await limiter.status("X");
    expect(status.count).toBe(3);
    expect(status.remaining).toBe(0);
  });

  it("keeps separate counters per tool", async () => {
    for (let i = 0; i < 3; i++) await limiter.admit("X");

    const other = await limiter.admit("Y");
    expect(other.allowed).toBe(true);
    expect(other.remaining).toBe(2);
  });

  it("applies per-tool overrides", async () => {
    limiter = new InMemoryRateLimiter({
      limit: 3,
      windowMs: HOUR,
      overrides: { search_code: 1 },
      clock: () => now,
    });

    expect((await limiter.admit("search_code")).allowed).toBe(true);
    expect((await limiter.admit("search_code")).allowed).toBe(false);
    expect((await limiter.admit("get_repository")).remaining).toBe(2);
  });

  describe("status", () => {
    it("reports a full budget for a tool never called", async () => {
      expect(await limiter.status("X")).toEqual({
        toolId: "X",
        count: 0,
        limit: 3,
        remaining: 3,
        resetAt: null,
      });
    });

    it("reports usage without consuming quota", async () => {
      await limiter.admit("X");
      await limiter.status("X");
      await limiter.status("X");

      expect(await limiter.status("X")).toEqual({
        toolId: "X",
        count: 1,
        limit: 3,
        remaining: 2,
        resetAt: new Date(T0 + HOUR).toISOString(),
      });
    });

    it("reports an elapsed window as empty", async () => {
      await limiter.admit("X");
      now = T0 + HOUR + 1;

      const status = await limiter.status("X");
      expect(status.count).toBe(0);
      expect(status.resetAt).toBeNull();
    });

    it("lists every tracked tool sorted by id", async () => {
      await limiter.admit("list_branches");
      await limiter.admit("create_branch");

      const all = await limiter.statusAll();
      expect(all.map((s) => s.toolId)).toEqual(["create_branch", "list_branches"]);
    });
  });

  it("admits exactly `limit` of many concurrent calls", async () => {
    const decisions = await Promise.all(Array.from({ length: 20 }, () => limiter.admit("X")));

    expect(decisions.filter((d) => d.allowed)).toHaveLength(3);
    expect(decisions.filter((d) => !d.allowed)).toHaveLength(17);
    expect((await limiter.status("X")).count).toBe(3);
  });

  it("resets one tool or all tools", async () => {
    await limiter.admit("X");
    await limiter.admit("Y");

    await limiter.reset("X");
    expect((await limiter.status("X")).count).toBe(0);
    expect((await limiter.status("Y")).count).toBe(1);

    await limiter.reset();
    expect(await limiter.statusAll()).toEqual([]);
  });
});
