/**
 * Component resolvers: every long-lived instance is built lazily through the
 * singleton registry, so dropping a name rebuilds it on next use. Components
 * reach each other through these resolvers, never through captured instances.
 */

import type { Cache, MemoryProbe } from "../core/ports/cache.js";
import { CircuitState } from "../core/ports/circuit-breaker.js";
import type { Clock } from "../core/ports/clock.js";
import type { ConfigProvider } from "../core/ports/config-provider.js";
import type { HttpTransport } from "../core/ports/http-transport.js";
import type { Logger } from "../core/ports/logger.js";
import type { MetricsCollector } from "../core/ports/metrics.js";
import type { SingletonRegistry } from "../core/ports/singleton-registry.js";
import type { SocketTransport } from "../core/ports/socket-transport.js";
import { createTtlCache } from "../infrastructure/cache/ttl-cache.js";
import {
  type AppConfig,
  createConfigProvider,
  retryPolicyFromConfig,
} from "../infrastructure/config/config.js";
import { type LogStreams, createLogger } from "../infrastructure/logging/logger.js";
import { createMetricsCollector } from "../infrastructure/metrics/prometheus.js";
import { type HttpClient, createHttpClient } from "../infrastructure/network/http-client.js";
import {
  type WebSocketClient,
  createWebSocketClient,
} from "../infrastructure/network/websocket-client.js";
import {
  type CircuitBreakerRegistry,
  createCircuitBreakerRegistry,
} from "../infrastructure/resilience/circuit-breaker-registry.js";
import { createSlidingWindowRateLimiter } from "../infrastructure/resilience/rate-limiter.js";
import { Components } from "../shared/container.js";
import { type HealthService, createHealthService } from "./services/health.service.js";

export const VERSION = "1.0.0";

export interface ComponentDeps {
  readonly registry: SingletonRegistry;
  readonly config: AppConfig;
  readonly clock: Clock;
  readonly httpTransport: HttpTransport;
  readonly socketTransport: SocketTransport;
  readonly memoryProbe: MemoryProbe;
  readonly logStreams?: LogStreams;
}

export interface ComponentResolvers {
  readonly config: () => ConfigProvider;
  readonly logger: () => Logger;
  readonly metrics: () => MetricsCollector;
  readonly cache: () => Cache;
  readonly breakers: () => CircuitBreakerRegistry;
  readonly http: () => HttpClient;
  readonly websocket: () => WebSocketClient;
  readonly health: () => HealthService;
}

// Gauge encoding: 0=closed, 1=half_open, 2=open
const stateValue = (state: CircuitState): number =>
  state === CircuitState.CLOSED ? 0 : state === CircuitState.HALF_OPEN ? 1 : 2;

export const createComponents = (deps: ComponentDeps): ComponentResolvers => {
  const { registry, config, clock, httpTransport, socketTransport, memoryProbe } = deps;

  const logger = (): Logger =>
    registry.getOrCreate(Components.Logger, () =>
      createLogger(config.log.level, {}, config.log.format, deps.logStreams),
    );

  const metrics = (): MetricsCollector =>
    registry.getOrCreate(Components.Metrics, () => createMetricsCollector());

  const configProvider = (): ConfigProvider =>
    registry.getOrCreate(Components.Config, () => createConfigProvider(config));

  const cache = (): Cache =>
    registry.getOrCreate(Components.Cache, () =>
      createTtlCache(config.cache, {
        clock,
        memoryProbe,
        onEvict: (reason, count) => metrics().cacheEvictionsTotal.inc({ reason }, count),
      }),
    );

  const breakers = (): CircuitBreakerRegistry =>
    registry.getOrCreate(Components.CircuitBreakers, () =>
      createCircuitBreakerRegistry(
        {
          ...config.circuitBreaker,
          onStateChange: (name, from, to) => {
            logger().warn("Circuit breaker state changed", { circuitBreaker: name, from, to });
            metrics().circuitBreakerState.set(stateValue(to), { name });
          },
        },
        clock,
      ),
    );

  const http = (): HttpClient =>
    registry.getOrCreate(Components.HttpClient, () =>
      createHttpClient({
        transport: httpTransport,
        breakers,
        limiter: createSlidingWindowRateLimiter(config.rateLimit, clock),
        clock,
        logger: () => logger().child({ component: Components.HttpClient }),
        metrics,
        cache,
        retryPolicy: retryPolicyFromConfig(config.retry),
        requestTimeoutMs: config.network.requestTimeoutMs,
        ...(config.network.baseUrl !== undefined ? { baseUrl: config.network.baseUrl } : {}),
      }),
    );

  const websocket = (): WebSocketClient =>
    registry.getOrCreate(
      Components.WebSocketClient,
      () =>
        createWebSocketClient({
          transport: socketTransport,
          breakers,
          limiter: createSlidingWindowRateLimiter(config.rateLimit, clock),
          clock,
          logger: () => logger().child({ component: Components.WebSocketClient }),
          metrics,
          retryPolicy: retryPolicyFromConfig(config.retry),
          requestTimeoutMs: config.network.requestTimeoutMs,
          connectTimeoutMs: config.network.connectTimeoutMs,
        }),
      async (client) => {
        await client.reset();
      },
    );

  const health = (): HealthService =>
    registry.getOrCreate(Components.Health, () =>
      createHealthService({
        logger: logger().child({ service: "health" }),
        version: VERSION,
        clock,
        memoryProbe,
        cache,
        breakers,
      }),
    );

  return {
    config: configProvider,
    logger,
    metrics,
    cache,
    breakers,
    http,
    websocket,
    health,
  };
};
