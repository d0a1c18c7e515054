export type { Logger, LogLevel, LogMeta } from "./logger.js";
export type { Clock } from "./clock.js";
export type {
  MetricsCollector,
  Counter,
  Histogram,
  Gauge,
  HistogramSnapshot,
  Labels,
  RecordedMetric,
} from "./metrics.js";
export type {
  CircuitBreaker,
  CircuitBreakerOptions,
  CircuitBreakerSnapshot,
} from "./circuit-breaker.js";
export { CircuitState } from "./circuit-breaker.js";
export type { RetryPolicy, AttemptOutcome, RetryRun, RetryHooks } from "./retry.js";
export type { RateLimiter, RateLimiterOptions, RateLimiterStats } from "./rate-limiter.js";
export type {
  Cache,
  CacheLookup,
  CacheEntryMetadata,
  CacheStats,
  MaintenanceReport,
  MemoryProbe,
} from "./cache.js";
export { PressureStage } from "./cache.js";
export type {
  HttpMethod,
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from "./http-transport.js";
export type { SocketConnection, SocketTransport } from "./socket-transport.js";
export type {
  Disposer,
  SingletonHandle,
  SingletonRegistry,
  SingletonRegistryStats,
} from "./singleton-registry.js";
export type { ConfigProvider } from "./config-provider.js";
