import type { RateLimitStatus } from "@repo-relay/schemas";
import type { AdmissionDecision, RateLimiter } from "./limiter.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";

interface WindowState {
  count: number;
  windowStart: number;
}

export interface InMemoryRateLimiterOptions {
  /** Calls allowed per window for tools without an override. */
  limit: number;
  windowMs: number;
  /** Per-tool limits replacing `limit`. */
  overrides?: Record<string, number>;
  clock?: Clock;
}

/**
 * Process-local fixed-window limiter. Each instance counts on its own, so
 * N instances behind a load balancer allow N × limit calls per window.
 */
export class InMemoryRateLimiter implements RateLimiter {
  private windows = new Map<string, WindowState>();
  private lock = new KeyedLock();

  private readonly limit: number;
  private readonly windowMs: number;
  private readonly overrides: Record<string, number>;
  private readonly clock: Clock;

  constructor(options: InMemoryRateLimiterOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.overrides = options.overrides ?? {};
    this.clock = options.clock ?? systemClock;
  }

  async admit(toolId: string): Promise<AdmissionDecision> {
    return this.lock.run<AdmissionDecision>(toolId, () => {
      const now = this.clock();
      const limit = this.limitFor(toolId);

      let state = this.windows.get(toolId);
      if (!state) {
        state = { count: 0, windowStart: now };
        this.windows.set(toolId, state);
      }
      if (now - state.windowStart >= this.windowMs) {
        state.count = 0;
        state.windowStart = now;
      }

      const resetAt = new Date(state.windowStart + this.windowMs);
      if (state.count < limit) {
        state.count++;
        return { allowed: true, toolId, limit, remaining: limit - state.count, resetAt };
      }
      return { allowed: false, toolId, limit, remaining: 0, resetAt };
    });
  }

  async status(toolId: string): Promise<RateLimitStatus> {
    const limit = this.limitFor(toolId);
    const state = this.windows.get(toolId);
    if (!state || this.clock() - state.windowStart >= this.windowMs) {
      return { toolId, count: 0, limit, remaining: limit, resetAt: null };
    }
    return {
      toolId,
      count: state.count,
      limit,
      remaining: Math.max(0, limit - state.count),
      resetAt: new Date(state.windowStart + this.windowMs).toISOString(),
    };
  }

  async statusAll(): Promise<RateLimitStatus[]> {
    const toolIds = [...this.windows.keys()].sort();
    return Promise.all(toolIds.map((toolId) => this.status(toolId)));
  }

  async reset(toolId?: string): Promise<void> {
    if (toolId === undefined) {
      this.windows.clear();
      return;
    }
    await this.lock.run(toolId, () => {
      this.windows.delete(toolId);
    });
  }

  limitFor(toolId: string): number {
    return this.overrides[toolId] ?? this.limit;
  }
}
