import { z } from "zod";

export const ServerConfigSchema = z.object({
  githubToken: z.string({ required_error: "GITHUB_TOKEN is required" }).min(1, "GITHUB_TOKEN is required"),
  transport: z.enum(["stdio", "http"]).default("stdio"),
  host: z.string().min(1).default("0.0.0.0"),
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Reads the transport and credential settings. Governance limits are
 * loaded separately by `loadGovernanceConfig`.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return ServerConfigSchema.parse({
    githubToken: nonEmpty(env["GITHUB_TOKEN"]),
    transport: nonEmpty(env["MCP_TRANSPORT"]),
    host: nonEmpty(env["HOST"]),
    port: nonEmpty(env["PORT"]),
    logLevel: nonEmpty(env["LOG_LEVEL"]),
  });
}
