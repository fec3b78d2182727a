import { describe, it, expect } from "vitest";
import { KeyedLock } from "../utils/keyed-lock.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("KeyedLock", () => {
  it("runs holders of the same key one at a time, in order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all(
      ["a", "b", "c"].map((name) =>
        lock.run("k", async () => {
          events.push(`${name}:start`);
          await tick();
          events.push(`${name}:end`);
        }),
      ),
    );

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("does not serialize different keys", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all(
      ["x", "y"].map((key) =>
        lock.run(key, async () => {
          events.push(`${key}:start`);
          await tick();
          events.push(`${key}:end`);
        }),
      ),
    );

    expect(events.slice(0, 2).sort()).toEqual(["x:start", "y:start"]);
  });

  it("releases the key when the holder throws", async () => {
    const lock = new KeyedLock();

    await expect(lock.run("k", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.run("k", () => "next")).resolves.toBe("next");
    expect(lock.activeKeys).toBe(0);
  });
});

describe("KeyedLock bookkeeping", () => {
  it("keeps a key while callers are queued and drops it after the last one", async () => {
    const lock = new KeyedLock();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = lock.run("k", () => gate);
    const second = lock.run("k", () => "second");
    expect(lock.activeKeys).toBe(1);

    release();
    await first;
    await expect(second).resolves.toBe("second");
    expect(lock.activeKeys).toBe(0);
  });
});
