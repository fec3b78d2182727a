import Fastify from "fastify";
import type { FastifyError, FastifyInstance } from "fastify";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { StatusReporter } from "@repo-relay/core";
import type { RepoRelayMcpServer } from "./server.js";
import { metricsRoute } from "./metrics.js";

export interface HttpServerOptions {
  relay: RepoRelayMcpServer;
  reporter: StatusReporter;
  /** Fastify request logging (default: true). */
  logger?: boolean;
}

const METHOD_NOT_ALLOWED = {
  jsonrpc: "2.0",
  error: { code: -32000, message: "Method not allowed." },
  id: null,
};

/**
 * Stateless streamable-HTTP MCP endpoint plus operational routes.
 * Each POST /mcp gets its own MCP server and transport, both closed when
 * the response ends; governance state lives in the shared dispatcher.
 */
export async function buildHttpServer(options: HttpServerOptions): Promise<FastifyInstance> {
  const { relay, reporter } = options;
  const app = Fastify({ logger: options.logger ?? true });

  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const message = statusCode >= 500 ? "Internal server error" : error.message;

    if (statusCode >= 500) {
      app.log.error(error);
    }

    return reply.code(statusCode).send({
      error: message,
      statusCode,
    });
  });

  app.post("/mcp", async (request, reply) => {
    const mcpServer = relay.createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    reply.raw.on("close", () => {
      Promise.all([transport.close(), mcpServer.close()]).catch((err: unknown) => {
        app.log.warn({ err }, "Error closing MCP request transport");
      });
    });

    await mcpServer.connect(transport);
    reply.hijack();
    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  app.get("/mcp", async (_request, reply) => reply.code(405).send(METHOD_NOT_ALLOWED));
  app.delete("/mcp", async (_request, reply) => reply.code(405).send(METHOD_NOT_ALLOWED));

  app.get("/health", async () => ({ status: "ok", timestamp: new Date().toISOString() }));

  // Snapshot without the identity probe; no GitHub request per poll.
  app.get("/status", async () => reporter.snapshot({ probe: false }));

  app.get("/metrics", metricsRoute);

  return app;
}
