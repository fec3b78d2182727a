import { z } from "zod";

// ── Tool Errors ────────────────────────────────────────────────────────────

export const ToolErrorKindSchema = z.enum([
  "UnknownTool",
  "InvalidArguments",
  "RateLimitExceeded",
  "PayloadTooLarge",
  "UpstreamError",
]);
export type ToolErrorKind = z.infer<typeof ToolErrorKindSchema>;

/** Wire shape of a failed tool call, as returned to MCP clients. */
export const ToolErrorPayloadSchema = z
  .object({
    kind: ToolErrorKindSchema,
    message: z.string(),
  })
  .passthrough();
export type ToolErrorPayload = z.infer<typeof ToolErrorPayloadSchema>;

// ── Status Snapshot ────────────────────────────────────────────────────────

export const RateLimitStatusSchema = z.object({
  toolId: z.string(),
  count: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  remaining: z.number().int().nonnegative(),
  /** ISO timestamp when the current window closes; null before the first call. */
  resetAt: z.string().datetime().nullable(),
});
export type RateLimitStatus = z.infer<typeof RateLimitStatusSchema>;

export const CacheStatsSchema = z.object({
  size: z.number().int().nonnegative(),
  maxEntries: z.number().int().positive(),
  ttlMs: z.number().int().positive(),
  hits: z.number().int().nonnegative(),
  misses: z.number().int().nonnegative(),
  evictions: z.number().int().nonnegative(),
});
export type CacheStats = z.infer<typeof CacheStatsSchema>;

export const UpstreamStatusSchema = z.union([
  z.object({ connected: z.literal(true), login: z.string() }),
  z.object({ connected: z.literal(false), error: z.string() }),
  z.object({ connected: z.null() }),
]);
export type UpstreamStatus = z.infer<typeof UpstreamStatusSchema>;

export const StatusSnapshotSchema = z.object({
  generatedAt: z.string().datetime(),
  rateLimits: z.array(RateLimitStatusSchema),
  cache: CacheStatsSchema,
  upstream: UpstreamStatusSchema,
});
export type StatusSnapshot = z.infer<typeof StatusSnapshotSchema>;
