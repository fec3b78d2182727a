import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";
import { UpstreamError, noopLogger } from "@repo-relay/core";
import type { Dispatcher, Logger } from "@repo-relay/core";

export const SERVER_NAME = "repo-relay";
export const SERVER_VERSION = "0.1.0";

export interface RepoRelayMcpServerOptions {
  dispatcher: Dispatcher;
  logger?: Logger;
}

export type ToolCallResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Exposes the governed tool catalog over MCP. Every call goes through the
 * dispatcher; failures come back as `isError` results carrying the error's
 * JSON form, never as transport errors.
 */
export class RepoRelayMcpServer {
  private dispatcher: Dispatcher;
  private logger: Logger;

  constructor(options: RepoRelayMcpServerOptions) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Builds an MCP server with every tool registered. Stdio mode uses one for
   * the process lifetime; HTTP mode builds one per request.
   */
  createMcpServer(): McpServer {
    const mcpServer = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
    for (const def of this.dispatcher.listTools()) {
      // Fields are registered loose so the dispatcher's own validation
      // produces the InvalidArguments payload.
      const looseShape = Object.fromEntries(
        Object.keys(def.inputSchema.shape).map((key): [string, z.ZodTypeAny] => [key, z.unknown().optional()]),
      );
      mcpServer.tool(def.name, def.description, looseShape, async (args: Record<string, unknown>) => {
        return this.handleToolCall(def.name, args);
      });
    }
    return mcpServer;
  }

  async handleToolCall(toolName: string, args: Record<string, unknown>): Promise<ToolCallResponse> {
    try {
      const result = await this.dispatcher.invoke(toolName, args);
      if (result.ok) {
        return { content: [{ type: "text", text: JSON.stringify(result.value, null, 2) }] };
      }
      return errorResponse(result.error.toJSON());
    } catch (err) {
      this.logger.error({ err, toolName }, "Unexpected error handling tool call");
      return errorResponse(new UpstreamError(toolName, err).toJSON());
    }
  }

  async start(transport: Transport = new StdioServerTransport()): Promise<McpServer> {
    const mcpServer = this.createMcpServer();
    await mcpServer.connect(transport);
    return mcpServer;
  }
}

function errorResponse(error: Record<string, unknown>): ToolCallResponse {
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify({ error }) }],
  };
}
