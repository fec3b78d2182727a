import type { ZodIssue } from "zod";
import type { ToolErrorKind, ToolErrorPayload } from "@repo-relay/schemas";

/**
 * Base class for every failure the dispatcher reports to a caller.
 * `toJSON()` yields the wire payload sent back to MCP clients.
 */
export abstract class ToolError extends Error {
  abstract readonly kind: ToolErrorKind;

  toJSON(): ToolErrorPayload {
    return { kind: this.kind, message: this.message, ...this.details() };
  }

  protected details(): Record<string, unknown> {
    return {};
  }
}

export class UnknownToolError extends ToolError {
  readonly kind = "UnknownTool" as const;

  constructor(
    public readonly toolId: string,
    public readonly availableTools: readonly string[],
  ) {
    super(`Unknown tool: ${toolId}`);
    this.name = "UnknownToolError";
  }

  protected override details(): Record<string, unknown> {
    return { toolId: this.toolId, availableTools: [...this.availableTools] };
  }
}

export class InvalidArgumentsError extends ToolError {
  readonly kind = "InvalidArguments" as const;

  constructor(
    public readonly toolId: string,
    public readonly issues: readonly ZodIssue[],
  ) {
    const summary = issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    super(`Invalid arguments for ${toolId}: ${summary}`);
    this.name = "InvalidArgumentsError";
  }

  protected override details(): Record<string, unknown> {
    return {
      toolId: this.toolId,
      issues: this.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    };
  }
}

/** Carries the window reset time so callers can back off until then. */
export class RateLimitExceededError extends ToolError {
  readonly kind = "RateLimitExceeded" as const;

  constructor(
    public readonly toolId: string,
    public readonly limit: number,
    public readonly resetAt: Date,
  ) {
    super(`Rate limit of ${limit} calls exceeded for ${toolId}; resets at ${resetAt.toISOString()}`);
    this.name = "RateLimitExceededError";
  }

  protected override details(): Record<string, unknown> {
    return { toolId: this.toolId, limit: this.limit, resetAt: this.resetAt.toISOString() };
  }
}

export type PayloadDirection = "request" | "response";

export class PayloadTooLargeError extends ToolError {
  readonly kind = "PayloadTooLarge" as const;

  constructor(
    public readonly size: number,
    public readonly limit: number,
    public readonly direction: PayloadDirection,
  ) {
    super(`${direction === "request" ? "Request" : "Response"} payload of ${size} bytes exceeds the ${limit} byte limit`);
    this.name = "PayloadTooLargeError";
  }

  protected override details(): Record<string, unknown> {
    return { size: this.size, limit: this.limit, direction: this.direction };
  }
}

/**
 * Wraps a failure thrown by the tool handler. `status` is the upstream HTTP
 * status when the handler's error carries one (Octokit's RequestError does).
 */
export class UpstreamError extends ToolError {
  readonly kind = "UpstreamError" as const;
  readonly status: number | undefined;
  readonly detail: string;

  constructor(
    public readonly toolId: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Upstream call for ${toolId} failed: ${detail}`, { cause });
    this.name = "UpstreamError";
    this.detail = detail;
    this.status = extractStatus(cause);
  }

  protected override details(): Record<string, unknown> {
    return this.status === undefined
      ? { toolId: this.toolId, detail: this.detail }
      : { toolId: this.toolId, detail: this.detail, status: this.status };
  }
}

function extractStatus(cause: unknown): number | undefined {
  if (typeof cause !== "object" || cause === null || !("status" in cause)) return undefined;
  const status = cause.status;
  return typeof status === "number" ? status : undefined;
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}
