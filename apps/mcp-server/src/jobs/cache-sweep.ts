import type { ResponseCache, Logger } from "@repo-relay/core";
import { createLogger } from "../logger.js";

export interface CacheSweepJobConfig {
  cache: ResponseCache;
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Periodically drops expired cache entries so idle keys do not hold memory
 * until their next lookup. Returns a function that stops the interval.
 */
export function startCacheSweepJob(config: CacheSweepJobConfig): () => void {
  const { cache, intervalMs = 60_000, logger = createLogger("cache-sweep") } = config;

  let stopped = false;
  let running = false;

  const sweep = async () => {
    if (stopped || running) return;
    running = true;
    try {
      const removed = await cache.sweep();
      if (removed > 0) {
        logger.debug({ removed }, "Swept expired cache entries");
      }
    } catch (err) {
      logger.error({ err }, "Error sweeping response cache");
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void sweep();
  }, intervalMs);
  timer.unref();

  return () => {
    stopped = true;
    clearInterval(timer);
  };
}
