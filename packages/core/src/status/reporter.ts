import { DEFAULT_PROBE_TIMEOUT_MS } from "@repo-relay/schemas";
import type { StatusSnapshot, UpstreamStatus } from "@repo-relay/schemas";
import type { RateLimiter } from "../rate-limit/limiter.js";
import type { ResponseCache } from "../cache/response-cache.js";
import type { ToolDefinition } from "../tools/catalog.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";

/**
 * Resolves to the login of the account the upstream credential belongs to.
 * The signal aborts when the probe times out.
 */
export type IdentityProbe = (signal: AbortSignal) => Promise<string>;

export interface StatusReporterOptions {
  limiter: RateLimiter;
  cache: ResponseCache;
  tools: readonly ToolDefinition[];
  identityProbe?: IdentityProbe;
  probeTimeoutMs?: number;
  clock?: Clock;
}

export interface SnapshotOptions {
  /** Run the identity probe (default: true when one is configured). */
  probe?: boolean;
}

/**
 * Read-only view of limiter and cache state. Nothing here consumes quota or
 * touches cache entries, and a failing identity probe is reported in
 * `upstream` rather than thrown.
 */
export class StatusReporter {
  private readonly limiter: RateLimiter;
  private readonly cache: ResponseCache;
  private readonly rateLimitedTools: string[];
  private readonly identityProbe: IdentityProbe | undefined;
  private readonly probeTimeoutMs: number;
  private readonly clock: Clock;

  constructor(options: StatusReporterOptions) {
    this.limiter = options.limiter;
    this.cache = options.cache;
    this.rateLimitedTools = options.tools
      .filter((tool) => tool.toolClass !== "diagnostic")
      .map((tool) => tool.name);
    this.identityProbe = options.identityProbe;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  async snapshot(options: SnapshotOptions = {}): Promise<StatusSnapshot> {
    const [rateLimits, cache, upstream] = await Promise.all([
      Promise.all(this.rateLimitedTools.map((toolId) => this.limiter.status(toolId))),
      this.cache.stats(),
      this.probeUpstream(options.probe ?? true),
    ]);

    return {
      generatedAt: new Date(this.clock()).toISOString(),
      rateLimits,
      cache,
      upstream,
    };
  }

  private async probeUpstream(enabled: boolean): Promise<UpstreamStatus> {
    if (!enabled || !this.identityProbe) return { connected: null };
    const probe = this.identityProbe;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error("identity probe timed out"));
      }, this.probeTimeoutMs);
    });

    try {
      const login = await Promise.race([probe(controller.signal), timeout]);
      return { connected: true, login };
    } catch (err) {
      return { connected: false, error: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}
