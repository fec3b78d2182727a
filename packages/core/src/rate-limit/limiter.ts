import type { RateLimitStatus } from "@repo-relay/schemas";

export type AdmissionDecision =
  | { allowed: true; toolId: string; limit: number; remaining: number; resetAt: Date }
  | { allowed: false; toolId: string; limit: number; remaining: 0; resetAt: Date };

/**
 * Per-tool call budget over a fixed window.
 *
 * Async so a shared-store implementation can stand in for the in-memory one
 * without the dispatcher changing.
 */
export interface RateLimiter {
  /**
   * Admit one call for `toolId`, consuming quota when allowed.
   * A denial consumes nothing.
   */
  admit(toolId: string): Promise<AdmissionDecision>;

  /** Current usage for `toolId`. Never mutates state. */
  status(toolId: string): Promise<RateLimitStatus>;

  /** Usage for every tool that has been called, sorted by tool id. */
  statusAll(): Promise<RateLimitStatus[]>;

  /** Drop counters for one tool, or for all tools. */
  reset(toolId?: string): Promise<void>;
}
