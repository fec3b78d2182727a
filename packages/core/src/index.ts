// Errors
export {
  ToolError,
  UnknownToolError,
  InvalidArgumentsError,
  RateLimitExceededError,
  PayloadTooLargeError,
  UpstreamError,
  isToolError,
} from "./errors.js";
export type { PayloadDirection } from "./errors.js";

// Rate limiting
export { InMemoryRateLimiter } from "./rate-limit/in-memory.js";
export type { InMemoryRateLimiterOptions } from "./rate-limit/in-memory.js";
export type { RateLimiter, AdmissionDecision } from "./rate-limit/limiter.js";

// Response cache
export { InMemoryResponseCache } from "./cache/in-memory.js";
export type { InMemoryResponseCacheOptions } from "./cache/in-memory.js";
export type { ResponseCache, CacheHit } from "./cache/response-cache.js";
export { computeFingerprint } from "./cache/fingerprint.js";

// Payload guard
export { PayloadGuard } from "./payload/guard.js";
export type { Payload } from "./payload/guard.js";

// Tools
export { TOOL_CATALOG } from "./tools/catalog.js";
export type { ToolDefinition, ToolClass } from "./tools/catalog.js";

// Dispatcher
export { Dispatcher } from "./dispatcher/dispatcher.js";
export type {
  DispatcherOptions,
  ToolHandler,
  ToolCallResult,
  ToolCallSource,
} from "./dispatcher/dispatcher.js";

// Status
export { StatusReporter } from "./status/reporter.js";
export type { StatusReporterOptions, SnapshotOptions, IdentityProbe } from "./status/reporter.js";

// Wiring and configuration
export { createGovernanceLayer } from "./governance.js";
export type { GovernanceLayer, GovernanceLayerOptions } from "./governance.js";
export { loadGovernanceConfig } from "./config.js";

// Telemetry
export {
  getMetrics,
  setMetrics,
  createInMemoryMetrics,
  InMemoryCounter,
  InMemoryHistogram,
} from "./telemetry/metrics.js";
export type {
  GovernanceMetrics,
  InMemoryGovernanceMetrics,
  Counter,
  Histogram,
} from "./telemetry/metrics.js";

// Utilities
export { canonicalJson } from "./utils/canonical-json.js";
export { KeyedLock } from "./utils/keyed-lock.js";
export { systemClock } from "./utils/clock.js";
export type { Clock } from "./utils/clock.js";
export { noopLogger } from "./logger.js";
export type { Logger } from "./logger.js";
