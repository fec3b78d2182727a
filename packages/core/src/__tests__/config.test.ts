import { describe, it, expect } from "vitest";
import { loadGovernanceConfig } from "../config.js";

describe("loadGovernanceConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadGovernanceConfig({})).toEqual({
      rateLimit: 100,
      rateWindowMs: 3_600_000,
      rateLimitOverrides: {},
      cacheTtlMs: 300_000,
      cacheMaxEntries: 500,
      cacheSweepIntervalMs: 60_000,
      maxPayloadBytes: 1_048_576,
      probeTimeoutMs: 5_000,
    });
  });

  it("reads numeric settings from the environment", () => {
    const config = loadGovernanceConfig({
      RATE_LIMIT_PER_WINDOW: "25",
      RATE_LIMIT_WINDOW_MS: "60000",
      CACHE_TTL_MS: "1000",
      CACHE_MAX_ENTRIES: "10",
      MAX_PAYLOAD_BYTES: "2048",
    });

    expect(config).toMatchObject({
      rateLimit: 25,
      rateWindowMs: 60_000,
      cacheTtlMs: 1_000,
      cacheMaxEntries: 10,
      maxPayloadBytes: 2_048,
    });
  });

  it("falls back to the default for non-numeric values", () => {
    expect(loadGovernanceConfig({ CACHE_TTL_MS: "five minutes" }).cacheTtlMs).toBe(300_000);
  });

  it("rejects values that parse but are not positive", () => {
    expect(() => loadGovernanceConfig({ RATE_LIMIT_PER_WINDOW: "0" })).toThrow();
  });

  it("parses per-tool overrides and skips malformed entries", () => {
    const config = loadGovernanceConfig({
      RATE_LIMIT_OVERRIDES: "search_code:10, create_pull_request:5,broken,list_branches:-1,get_repository:",
    });

    expect(config.rateLimitOverrides).toEqual({ search_code: 10, create_pull_request: 5 });
  });

  it("rejects overrides for tools that do not exist", () => {
    expect(() => loadGovernanceConfig({ RATE_LIMIT_OVERRIDES: "search_code:10,serach_code:5" })).toThrow(
      "Unknown tool in rate limit overrides: serach_code",
    );
  });

  it("reads the identity probe timeout", () => {
    expect(loadGovernanceConfig({ IDENTITY_PROBE_TIMEOUT_MS: "1500" }).probeTimeoutMs).toBe(1_500);
  });
});
