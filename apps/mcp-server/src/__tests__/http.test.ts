import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { GovernanceConfigSchema } from "@repo-relay/schemas";
import { createGovernanceLayer } from "@repo-relay/core";
import type { GovernanceLayer } from "@repo-relay/core";
import { GitHubToolHandler } from "../github/handler.js";
import { RepoRelayMcpServer } from "../server.js";
import { buildHttpServer } from "../http.js";
import { createPromMetrics } from "../metrics.js";
import { FakeGitHub } from "./fake-github.js";

describe("HTTP transport", () => {
  let app: FastifyInstance;
  let github: FakeGitHub;
  let layer: GovernanceLayer;

  beforeEach(async () => {
    github = new FakeGitHub();
    const handler = new GitHubToolHandler(github.octokit());
    layer = createGovernanceLayer({
      config: GovernanceConfigSchema.parse({ rateLimit: 10 }),
      handler,
      identityProbe: (signal) => handler.whoami(signal),
      metrics: createPromMetrics(),
    });
    const relay = new RepoRelayMcpServer({ dispatcher: layer.dispatcher });
    app = await buildHttpServer({ relay, reporter: layer.reporter, logger: false });
  });

  afterEach(async () => {
    await app.close();
  });

  it("GET /health reports ok", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe("ok");
  });

  it("GET /status returns the snapshot without probing GitHub", async () => {
    await layer.limiter.admit("search_code");

    const res = await app.inject({ method: "GET", url: "/status" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.upstream).toEqual({ connected: null });
    expect(body.rateLimits).toHaveLength(8);
    expect(body.rateLimits.find((s: { toolId: string }) => s.toolId === "search_code")).toMatchObject({
      count: 1,
      limit: 10,
      remaining: 9,
    });
    expect(github.requests).toHaveLength(0);
  });

  it("GET /metrics exposes the governance series", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.body).toContain("# TYPE repo_relay_tool_calls_total counter");
  });

  it("GET /mcp is not allowed in stateless mode", async () => {
    const res = await app.inject({ method: "GET", url: "/mcp" });

    expect(res.statusCode).toBe(405);
    expect(res.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  it("POST /mcp answers a tools/list request", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/mcp",
      headers: {
        "content-type": "application/json",
        accept: "application/json, text/event-stream",
      },
      payload: { jsonrpc: "2.0", id: 1, method: "tools/list", params: {} },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.id).toBe(1);
    expect(body.result.tools).toHaveLength(9);
  });

  it("hides internal error messages", async () => {
    app.get("/boom", async () => {
      throw new Error("secret detail");
    });

    const res = await app.inject({ method: "GET", url: "/boom" });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Internal server error", statusCode: 500 });
  });
});
