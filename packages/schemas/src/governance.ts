import { z } from "zod";
import { ToolNameSchema } from "./mcp.js";

export const DEFAULT_RATE_LIMIT = 100;
export const DEFAULT_RATE_WINDOW_MS = 60 * 60 * 1000; // 1 hour
export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes
export const DEFAULT_CACHE_MAX_ENTRIES = 500;
export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024; // 1 MiB
export const DEFAULT_CACHE_SWEEP_INTERVAL_MS = 60_000;
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/**
 * Startup configuration for the governance layer. Fixed for the lifetime of
 * the process; nothing mutates it at runtime.
 */
export const GovernanceConfigSchema = z.object({
  rateLimit: z.number().int().positive().default(DEFAULT_RATE_LIMIT),
  rateWindowMs: z.number().int().positive().default(DEFAULT_RATE_WINDOW_MS),
  /** Per-tool limits that replace `rateLimit` for the named tools. */
  rateLimitOverrides: z
    .record(z.string(), z.number().int().positive())
    .superRefine((overrides, ctx) => {
      for (const tool of Object.keys(overrides)) {
        if (!ToolNameSchema.safeParse(tool).success) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [tool],
            message: `Unknown tool in rate limit overrides: ${tool}`,
          });
        }
      }
    })
    .default({}),
  cacheTtlMs: z.number().int().positive().default(DEFAULT_CACHE_TTL_MS),
  cacheMaxEntries: z.number().int().positive().default(DEFAULT_CACHE_MAX_ENTRIES),
  cacheSweepIntervalMs: z.number().int().positive().default(DEFAULT_CACHE_SWEEP_INTERVAL_MS),
  maxPayloadBytes: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD_BYTES),
  /** Upper bound on the connection_status identity check. */
  probeTimeoutMs: z.number().int().positive().default(DEFAULT_PROBE_TIMEOUT_MS),
});
export type GovernanceConfig = z.infer<typeof GovernanceConfigSchema>;
export type GovernanceConfigInput = z.input<typeof GovernanceConfigSchema>;
