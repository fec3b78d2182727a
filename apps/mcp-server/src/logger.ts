import pino from "pino";
import type { Logger } from "@repo-relay/core";

/**
 * Logs go to stderr: in stdio mode stdout carries the MCP protocol stream.
 */
export function createLogger(name?: string, level = process.env["LOG_LEVEL"] ?? "info"): Logger {
  return pino({ name: name ?? "repo-relay", level }, pino.destination(2));
}
