import type { RateLimiter } from "../rate-limit/limiter.js";
import type { ResponseCache } from "../cache/response-cache.js";
import { computeFingerprint } from "../cache/fingerprint.js";
import type { PayloadGuard } from "../payload/guard.js";
import type { StatusReporter } from "../status/reporter.js";
import { TOOL_CATALOG } from "../tools/catalog.js";
import type { ToolDefinition } from "../tools/catalog.js";
import {
  ToolError,
  UnknownToolError,
  InvalidArgumentsError,
  RateLimitExceededError,
  PayloadTooLargeError,
  UpstreamError,
} from "../errors.js";
import { getMetrics } from "../telemetry/metrics.js";
import type { GovernanceMetrics } from "../telemetry/metrics.js";
import { noopLogger } from "../logger.js";
import type { Logger } from "../logger.js";

/**
 * The upstream collaborator. Resolves with the tool's result or throws;
 * how it authenticates and transports the request is its own business.
 */
export interface ToolHandler {
  call(toolId: string, args: Record<string, unknown>): Promise<unknown>;
}

export type ToolCallSource = "cache" | "upstream" | "local";

export type ToolCallResult =
  | { ok: true; value: unknown; source: ToolCallSource }
  | { ok: false; error: ToolError };

export interface DispatcherOptions {
  limiter: RateLimiter;
  cache: ResponseCache;
  payloadGuard: PayloadGuard;
  handler: ToolHandler;
  reporter: StatusReporter;
  tools?: readonly ToolDefinition[];
  metrics?: GovernanceMetrics;
  logger?: Logger;
}

type Success = Extract<ToolCallResult, { ok: true }>;

/**
 * Runs one tool call through the governance pipeline:
 * resolve → validate → cache lookup → admission → request size check →
 * upstream call → response size check → cache store.
 *
 * Cache hits cost no quota. Admission is never refunded: a call that fails
 * upstream still counts, since the request was sent. No limiter or cache
 * lock is held while the handler runs.
 */
export class Dispatcher {
  private readonly tools: Map<string, ToolDefinition>;
  private readonly limiter: RateLimiter;
  private readonly cache: ResponseCache;
  private readonly payloadGuard: PayloadGuard;
  private readonly handler: ToolHandler;
  private readonly reporter: StatusReporter;
  private readonly metrics: GovernanceMetrics;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.tools = new Map((options.tools ?? TOOL_CATALOG).map((tool) => [tool.name, tool]));
    this.limiter = options.limiter;
    this.cache = options.cache;
    this.payloadGuard = options.payloadGuard;
    this.handler = options.handler;
    this.reporter = options.reporter;
    this.metrics = options.metrics ?? getMetrics();
    this.logger = options.logger ?? noopLogger;
  }

  async invoke(toolId: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const startedAt = Date.now();
    try {
      const result = await this.run(toolId, args);
      this.logger.debug(
        { toolId, source: result.source, durationMs: Date.now() - startedAt },
        "Tool call succeeded",
      );
      return result;
    } catch (err) {
      if (!(err instanceof ToolError)) throw err;
      this.logFailure(toolId, err, Date.now() - startedAt);
      return { ok: false, error: err };
    }
  }

  getTool(toolId: string): ToolDefinition | undefined {
    return this.tools.get(toolId);
  }

  listTools(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  private async run(toolId: string, rawArgs: Record<string, unknown>): Promise<Success> {
    const tool = this.tools.get(toolId);
    if (!tool) {
      throw new UnknownToolError(toolId, [...this.tools.keys()]);
    }
    const labels = { tool: toolId };
    this.metrics.callsTotal.inc(labels);

    const parsed = tool.inputSchema.safeParse(rawArgs);
    if (!parsed.success) {
      throw new InvalidArgumentsError(toolId, parsed.error.issues);
    }
    const args: Record<string, unknown> = parsed.data;

    if (tool.toolClass === "diagnostic") {
      return { ok: true, value: await this.reporter.snapshot(), source: "local" };
    }

    const cacheKey = tool.cacheable ? computeFingerprint(toolId, args) : null;
    if (cacheKey) {
      const hit = await this.cache.get(cacheKey);
      if (hit) {
        this.metrics.cacheHits.inc(labels);
        return { ok: true, value: hit.value, source: "cache" };
      }
      this.metrics.cacheMisses.inc(labels);
    }

    const decision = await this.limiter.admit(toolId);
    if (!decision.allowed) {
      this.metrics.rateLimited.inc(labels);
      throw new RateLimitExceededError(toolId, decision.limit, decision.resetAt);
    }

    if (tool.toolClass === "write") {
      this.checkPayload(tool, args, "request");
    }

    const value = await this.callHandler(toolId, args);

    if (tool.toolClass === "read") {
      this.checkPayload(tool, value, "response");
    }

    if (cacheKey) {
      await this.cache.put(cacheKey, value);
    }
    return { ok: true, value, source: "upstream" };
  }

  private async callHandler(toolId: string, args: Record<string, unknown>): Promise<unknown> {
    const labels = { tool: toolId };
    const startedAt = Date.now();
    try {
      return await this.handler.call(toolId, args);
    } catch (err) {
      this.metrics.upstreamFailures.inc(labels);
      throw new UpstreamError(toolId, err);
    } finally {
      this.metrics.upstreamLatencyMs.observe(labels, Date.now() - startedAt);
    }
  }

  private checkPayload(tool: ToolDefinition, subject: unknown, direction: "request" | "response"): void {
    try {
      this.payloadGuard.check(payloadOf(tool, subject), direction);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        this.metrics.payloadRejected.inc({ tool: tool.name, direction });
      }
      throw err;
    }
  }

  private logFailure(toolId: string, err: ToolError, durationMs: number): void {
    const context = { toolId, kind: err.kind, durationMs };
    switch (err.kind) {
      case "UpstreamError":
        this.logger.error({ ...context, err }, err.message);
        break;
      case "RateLimitExceeded":
      case "PayloadTooLarge":
        this.logger.warn(context, err.message);
        break;
      default:
        this.logger.info(context, err.message);
    }
  }
}

function payloadOf(tool: ToolDefinition, subject: unknown): string {
  if (tool.payloadField && typeof subject === "object" && subject !== null) {
    const field: unknown = Reflect.get(subject, tool.payloadField);
    if (typeof field === "string") return field;
  }
  return JSON.stringify(subject) ?? "";
}
