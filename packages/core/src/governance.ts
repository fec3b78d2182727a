import type { GovernanceConfig } from "@repo-relay/schemas";
import { InMemoryRateLimiter } from "./rate-limit/in-memory.js";
import { InMemoryResponseCache } from "./cache/in-memory.js";
import { PayloadGuard } from "./payload/guard.js";
import { StatusReporter } from "./status/reporter.js";
import type { IdentityProbe } from "./status/reporter.js";
import { Dispatcher } from "./dispatcher/dispatcher.js";
import type { ToolHandler } from "./dispatcher/dispatcher.js";
import { TOOL_CATALOG } from "./tools/catalog.js";
import type { ToolDefinition } from "./tools/catalog.js";
import type { GovernanceMetrics } from "./telemetry/metrics.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./utils/clock.js";

export interface GovernanceLayerOptions {
  config: GovernanceConfig;
  handler: ToolHandler;
  identityProbe?: IdentityProbe;
  tools?: readonly ToolDefinition[];
  metrics?: GovernanceMetrics;
  logger?: Logger;
  clock?: Clock;
}

export interface GovernanceLayer {
  dispatcher: Dispatcher;
  limiter: InMemoryRateLimiter;
  cache: InMemoryResponseCache;
  payloadGuard: PayloadGuard;
  reporter: StatusReporter;
}

/** Wire the process-local limiter, cache, guard and reporter into a dispatcher. */
export function createGovernanceLayer(options: GovernanceLayerOptions): GovernanceLayer {
  const { config, clock } = options;
  const tools = options.tools ?? TOOL_CATALOG;

  const limiter = new InMemoryRateLimiter({
    limit: config.rateLimit,
    windowMs: config.rateWindowMs,
    overrides: config.rateLimitOverrides,
    clock,
  });
  const cache = new InMemoryResponseCache({
    ttlMs: config.cacheTtlMs,
    maxEntries: config.cacheMaxEntries,
    clock,
  });
  const payloadGuard = new PayloadGuard(config.maxPayloadBytes);
  const reporter = new StatusReporter({
    limiter,
    cache,
    tools,
    identityProbe: options.identityProbe,
    probeTimeoutMs: config.probeTimeoutMs,
    clock,
  });
  const dispatcher = new Dispatcher({
    limiter,
    cache,
    payloadGuard,
    handler: options.handler,
    reporter,
    tools,
    metrics: options.metrics,
    logger: options.logger,
  });

  return { dispatcher, limiter, cache, payloadGuard, reporter };
}
