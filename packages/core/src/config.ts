import { GovernanceConfigSchema } from "@repo-relay/schemas";
import type { GovernanceConfig } from "@repo-relay/schemas";

type Env = Record<string, string | undefined>;

/**
 * Read governance settings from the environment. Missing or non-numeric
 * values fall back to the schema defaults; values that parse but violate the
 * schema (zero, negative) throw.
 */
export function loadGovernanceConfig(env: Env = process.env): GovernanceConfig {
  return GovernanceConfigSchema.parse({
    rateLimit: parseEnvInt(env, "RATE_LIMIT_PER_WINDOW"),
    rateWindowMs: parseEnvInt(env, "RATE_LIMIT_WINDOW_MS"),
    rateLimitOverrides: parseOverrides(env["RATE_LIMIT_OVERRIDES"]),
    cacheTtlMs: parseEnvInt(env, "CACHE_TTL_MS"),
    cacheMaxEntries: parseEnvInt(env, "CACHE_MAX_ENTRIES"),
    cacheSweepIntervalMs: parseEnvInt(env, "CACHE_SWEEP_INTERVAL_MS"),
    maxPayloadBytes: parseEnvInt(env, "MAX_PAYLOAD_BYTES"),
    probeTimeoutMs: parseEnvInt(env, "IDENTITY_PROBE_TIMEOUT_MS"),
  });
}

function parseEnvInt(env: Env, name: string): number | undefined {
  const val = env[name];
  if (!val) return undefined;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Format: "tool:limit" entries, comma-separated. Malformed entries are skipped;
 * unknown tool names are kept so the schema rejects them.
 */
function parseOverrides(raw: string | undefined): Record<string, number> {
  const out: Record<string, number> = {};
  if (!raw?.trim()) return out;

  for (const entry of raw.split(",").map((e) => e.trim()).filter(Boolean)) {
    const [tool, limit] = entry.split(":").map((part) => part.trim());
    if (!tool || !limit) continue;
    const parsed = parseInt(limit, 10);
    if (isNaN(parsed) || parsed <= 0) continue;
    out[tool] = parsed;
  }
  return out;
}
