import { describe, it, expect } from "vitest";
import { loadServerConfig } from "../config.js";

describe("loadServerConfig", () => {
  it("applies defaults around the required token", () => {
    expect(loadServerConfig({ GITHUB_TOKEN: "test-secret" })).toEqual({
      githubToken: "test-secret",
      transport: "stdio",
      host: "0.0.0.0",
      port: 8080,
      logLevel: "info",
    });
  });

  it("reads HTTP transport settings", () => {
    const config = loadServerConfig({
      GITHUB_TOKEN: "test-secret",
      MCP_TRANSPORT: "http",
      HOST: "127.0.0.1",
      PORT: "9090",
      LOG_LEVEL: "debug",
    });

    expect(config).toMatchObject({ transport: "http", host: "127.0.0.1", port: 9090, logLevel: "debug" });
  });

  it("requires GITHUB_TOKEN", () => {
    expect(() => loadServerConfig({})).toThrow("GITHUB_TOKEN is required");
    expect(() => loadServerConfig({ GITHUB_TOKEN: "  " })).toThrow("GITHUB_TOKEN is required");
  });

  it("rejects an unknown transport", () => {
    expect(() => loadServerConfig({ GITHUB_TOKEN: "test-secret", MCP_TRANSPORT: "grpc" })).toThrow();
  });
});
