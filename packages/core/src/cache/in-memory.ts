import type { CacheStats } from "@repo-relay/schemas";
import type { CacheHit, ResponseCache } from "./response-cache.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";

interface CacheEntry {
  value: unknown;
  createdAt: number;
}

export interface InMemoryResponseCacheOptions {
  ttlMs: number;
  maxEntries: number;
  clock?: Clock;
}

/**
 * Map-backed cache with lazy expiry and a size bound.
 *
 * Entries are kept in insertion order (a `put` re-inserts its key), so the
 * first key in the map is always the oldest-created one and overflow
 * eviction drops from the front.
 */
export class InMemoryResponseCache implements ResponseCache {
  private entries = new Map<string, CacheEntry>();
  private lock = new KeyedLock();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: Clock;

  constructor(options: InMemoryResponseCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.clock = options.clock ?? systemClock;
  }

  async get(key: string): Promise<CacheHit | null> {
    return this.lock.run<CacheHit | null>(key, () => {
      const entry = this.entries.get(key);
      if (!entry) {
        this.misses++;
        return null;
      }
      if (this.isExpired(entry, this.clock())) {
        this.entries.delete(key);
        this.misses++;
        return null;
      }
      this.hits++;
      return { value: entry.value, createdAt: new Date(entry.createdAt) };
    });
  }

  async put(key: string, value: unknown): Promise<void> {
    await this.lock.run(key, () => {
      this.entries.delete(key);
      this.entries.set(key, { value, createdAt: this.clock() });

      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    });
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async stats(): Promise<CacheStats> {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  async sweep(): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt >= this.ttlMs;
  }
}
