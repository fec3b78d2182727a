import type { CacheStats } from "@repo-relay/schemas";

export interface CacheHit {
  value: unknown;
  createdAt: Date;
}

/**
 * Time-bounded store of tool results keyed by fingerprint.
 * Async so a shared cache service can replace the in-memory implementation.
 */
export interface ResponseCache {
  /** The stored value while unexpired; `null` for a miss or an expired entry. */
  get(key: string): Promise<CacheHit | null>;
  /** Store `value`, replacing any entry at `key` with a fresh timestamp. */
  put(key: string, value: unknown): Promise<void>;
  size(): Promise<number>;
  stats(): Promise<CacheStats>;
  /** Remove expired entries; resolves to the number removed. */
  sweep(): Promise<number>;
  clear(): Promise<void>;
}
