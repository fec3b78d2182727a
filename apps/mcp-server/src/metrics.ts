import client from "prom-client";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { GovernanceMetrics, Counter, Histogram } from "@repo-relay/core";

const register = new client.Registry();
client.collectDefaultMetrics({ register });

class PromCounter implements Counter {
  private counter: client.Counter;
  constructor(name: string, help: string, labelNames: string[]) {
    this.counter = new client.Counter({ name, help, labelNames, registers: [register] });
  }
  inc(labels?: Record<string, string>, value?: number): void {
    if (labels) {
      this.counter.inc(labels, value ?? 1);
    } else {
      this.counter.inc(value ?? 1);
    }
  }
}

class PromHistogram implements Histogram {
  private histogram: client.Histogram;
  constructor(name: string, help: string, labelNames: string[], buckets?: number[]) {
    this.histogram = new client.Histogram({ name, help, labelNames, buckets, registers: [register] });
  }
  observe(labels: Record<string, string>, value: number): void {
    this.histogram.observe(labels, value);
  }
}

const TOOL_LABELS = ["tool"];
const LATENCY_BUCKETS = [25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

let promMetrics: GovernanceMetrics | null = null;

/** Registers the governance series once; later calls return the same instance. */
export function createPromMetrics(): GovernanceMetrics {
  promMetrics ??= {
    callsTotal: new PromCounter("repo_relay_tool_calls_total", "Tool calls received", TOOL_LABELS),
    cacheHits: new PromCounter("repo_relay_cache_hits_total", "Calls answered from the response cache", TOOL_LABELS),
    cacheMisses: new PromCounter("repo_relay_cache_misses_total", "Cacheable calls not found in the cache", TOOL_LABELS),
    rateLimited: new PromCounter("repo_relay_rate_limited_total", "Calls denied by the rate limiter", TOOL_LABELS),
    payloadRejected: new PromCounter(
      "repo_relay_payload_rejected_total",
      "Calls rejected for payload size",
      ["tool", "direction"],
    ),
    upstreamFailures: new PromCounter("repo_relay_upstream_failures_total", "Failed GitHub API calls", TOOL_LABELS),
    upstreamLatencyMs: new PromHistogram(
      "repo_relay_upstream_latency_ms",
      "GitHub API call latency in ms",
      TOOL_LABELS,
      LATENCY_BUCKETS,
    ),
  };
  return promMetrics;
}

export async function metricsRoute(_request: FastifyRequest, reply: FastifyReply) {
  const metrics = await register.metrics();
  return reply.type(register.contentType).send(metrics);
}
