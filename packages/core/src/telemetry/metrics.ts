/**
 * Metrics abstraction compatible with Prometheus/prom-client.
 * The server wires prom-client counters through setMetrics(); otherwise
 * in-memory counters are used, which tests can read back.
 */

export interface GovernanceMetrics {
  callsTotal: Counter;
  cacheHits: Counter;
  cacheMisses: Counter;
  rateLimited: Counter;
  payloadRejected: Counter;
  upstreamFailures: Counter;
  upstreamLatencyMs: Histogram;
}

export interface Counter {
  inc(labels?: Record<string, string>, value?: number): void;
}

export interface Histogram {
  observe(labels: Record<string, string>, value: number): void;
}

export class InMemoryCounter implements Counter {
  private value = 0;
  inc(_labels?: Record<string, string>, amount = 1): void {
    this.value += amount;
  }
  get(): number {
    return this.value;
  }
}

export class InMemoryHistogram implements Histogram {
  private values: number[] = [];
  observe(_labels: Record<string, string>, value: number): void {
    this.values.push(value);
  }
  getValues(): number[] {
    return [...this.values];
  }
}

export interface InMemoryGovernanceMetrics extends GovernanceMetrics {
  callsTotal: InMemoryCounter;
  cacheHits: InMemoryCounter;
  cacheMisses: InMemoryCounter;
  rateLimited: InMemoryCounter;
  payloadRejected: InMemoryCounter;
  upstreamFailures: InMemoryCounter;
  upstreamLatencyMs: InMemoryHistogram;
}

let activeMetrics: GovernanceMetrics | null = null;

export function setMetrics(metrics: GovernanceMetrics): void {
  activeMetrics = metrics;
}

export function getMetrics(): GovernanceMetrics {
  if (!activeMetrics) {
    activeMetrics = createInMemoryMetrics();
  }
  return activeMetrics;
}

export function createInMemoryMetrics(): InMemoryGovernanceMetrics {
  return {
    callsTotal: new InMemoryCounter(),
    cacheHits: new InMemoryCounter(),
    cacheMisses: new InMemoryCounter(),
    rateLimited: new InMemoryCounter(),
    payloadRejected: new InMemoryCounter(),
    upstreamFailures: new InMemoryCounter(),
    upstreamLatencyMs: new InMemoryHistogram(),
  };
}
