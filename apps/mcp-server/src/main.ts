import { Octokit } from "@octokit/rest";
import { createGovernanceLayer, loadGovernanceConfig, setMetrics } from "@repo-relay/core";
import { loadServerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createPromMetrics } from "./metrics.js";
import { GitHubToolHandler } from "./github/handler.js";
import { RepoRelayMcpServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { buildHttpServer } from "./http.js";
import { startCacheSweepJob } from "./jobs/cache-sweep.js";

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function main() {
  const serverConfig = loadServerConfig();
  const governanceConfig = loadGovernanceConfig();
  const logger = createLogger(SERVER_NAME, serverConfig.logLevel);

  // ── Upstream ─────────────────────────────────────────────────────────
  const octokit = new Octokit({
    auth: serverConfig.githubToken,
    userAgent: `${SERVER_NAME}/${SERVER_VERSION}`,
  });
  const handler = new GitHubToolHandler(octokit);

  // ── Governance ───────────────────────────────────────────────────────
  const metrics = createPromMetrics();
  setMetrics(metrics);
  const layer = createGovernanceLayer({
    config: governanceConfig,
    handler,
    identityProbe: (signal) => handler.whoami(signal),
    metrics,
    logger: createLogger("dispatcher", serverConfig.logLevel),
  });
  const stopSweep = startCacheSweepJob({
    cache: layer.cache,
    intervalMs: governanceConfig.cacheSweepIntervalMs,
    logger: createLogger("cache-sweep", serverConfig.logLevel),
  });

  const relay = new RepoRelayMcpServer({ dispatcher: layer.dispatcher, logger });

  logger.info(
    {
      transport: serverConfig.transport,
      rateLimit: governanceConfig.rateLimit,
      rateWindowMs: governanceConfig.rateWindowMs,
      cacheTtlMs: governanceConfig.cacheTtlMs,
      maxPayloadBytes: governanceConfig.maxPayloadBytes,
    },
    "Governance layer ready",
  );

  if (serverConfig.transport === "stdio") {
    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      stopSweep();
      process.exit(0);
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    await relay.start();
    return;
  }

  const server = await buildHttpServer({ relay, reporter: layer.reporter });

  // Graceful shutdown: drain connections on SIGTERM/SIGINT
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down gracefully`);
    stopSweep();

    const forceTimer = setTimeout(() => {
      server.log.warn(`Shutdown did not complete within ${SHUTDOWN_TIMEOUT_MS}ms, forcing exit`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceTimer.unref();

    try {
      await server.close();
    } catch (err) {
      server.log.error({ err }, "Error during graceful shutdown");
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  await server.listen({ port: serverConfig.port, host: serverConfig.host });
  server.log.info({ host: serverConfig.host, port: serverConfig.port }, "MCP HTTP server listening");
}

main().catch((err) => {
  console.error("Fatal error starting MCP server:", err);
  process.exit(1);
});
