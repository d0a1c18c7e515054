import { z } from "zod";
import { createComponents, type ComponentResolvers } from "./application/components.js";
import { type Gateway, createGateway } from "./application/gateway/gateway.js";
import { createCacheInterface } from "./application/gateway/handlers/cache.handler.js";
import { createCircuitBreakerInterface } from "./application/gateway/handlers/circuit-breaker.handler.js";
import { createConfigInterface } from "./application/gateway/handlers/config.handler.js";
import { createHealthInterface } from "./application/gateway/handlers/health.handler.js";
import { createHttpInterface } from "./application/gateway/handlers/http.handler.js";
import { createLoggingInterface } from "./application/gateway/handlers/logging.handler.js";
import { createMetricsInterface } from "./application/gateway/handlers/metrics.handler.js";
import { createSingletonInterface } from "./application/gateway/handlers/singleton.handler.js";
import { createWebSocketInterface } from "./application/gateway/handlers/websocket.handler.js";
import { validation } from "./core/errors/app-error.js";
import type { MemoryProbe } from "./core/ports/cache.js";
import type { Clock } from "./core/ports/clock.js";
import type { HttpTransport } from "./core/ports/http-transport.js";
import type { SingletonRegistry } from "./core/ports/singleton-registry.js";
import type { SocketTransport } from "./core/ports/socket-transport.js";
import { type OperationResult, toOperationResult } from "./core/types/operation-result.js";
import { err } from "./core/types/result.js";
import { createProcessMemoryProbe } from "./infrastructure/cache/memory-probe.js";
import { createSystemClock } from "./infrastructure/clock/system-clock.js";
import { type AppConfig, loadConfig } from "./infrastructure/config/config.js";
import type { LogStreams } from "./infrastructure/logging/logger.js";
import { createFetchTransport } from "./infrastructure/network/fetch-transport.js";
import { createWsTransport } from "./infrastructure/network/ws-transport.js";
import { createSingletonRegistry } from "./shared/container.js";
import { generateId } from "./shared/utils/id.js";

export interface RuntimeOverrides {
  readonly clock?: Clock;
  readonly httpTransport?: HttpTransport;
  readonly socketTransport?: SocketTransport;
  readonly memoryProbe?: MemoryProbe;
  readonly logStreams?: LogStreams;
  readonly registry?: SingletonRegistry;
}

export interface Runtime {
  readonly gateway: Gateway;
  readonly registry: SingletonRegistry;
  readonly components: ComponentResolvers;
}

/**
 * Compose the dependency graph. Nothing is constructed here beyond the
 * registry and the gateway: components are built on first use.
 */
export const createRuntime = (config: AppConfig, overrides: RuntimeOverrides = {}): Runtime => {
  const clock = overrides.clock ?? createSystemClock();
  const registry = overrides.registry ?? createSingletonRegistry({ wallTime: clock.wallTime });

  const components = createComponents({
    registry,
    config,
    clock,
    httpTransport: overrides.httpTransport ?? createFetchTransport(),
    socketTransport: overrides.socketTransport ?? createWsTransport(),
    memoryProbe: overrides.memoryProbe ?? createProcessMemoryProbe(config.memory.limitMb),
    ...(overrides.logStreams !== undefined ? { logStreams: overrides.logStreams } : {}),
  });

  const gateway = createGateway({
    routes: [
      createCacheInterface(components.cache),
      createHttpInterface(components.http),
      createWebSocketInterface(components.websocket),
      createCircuitBreakerInterface(components.breakers),
      createSingletonInterface(() => registry),
      createLoggingInterface(components.logger),
      createMetricsInterface(components.metrics),
      createConfigInterface(components.config),
      createHealthInterface(components.health),
    ],
    clock,
    logger: components.logger,
    metrics: components.metrics,
    generateId,
  });

  return { gateway, registry, components };
};

const operationRequestSchema = z.object({
  interface: z.string().min(1),
  operation: z.string().min(1),
  kwargs: z.record(z.unknown()).default({}),
  correlation_id: z.string().min(1).optional(),
});

// One runtime per warm process; configuration errors surface on the first event
let runtime: Runtime | undefined;

/**
 * Function entry point. Accepts an OperationRequest event and always answers
 * with an OperationResult.
 */
export const handler = async (event: unknown): Promise<OperationResult> => {
  runtime ??= createRuntime(loadConfig());

  const parsed = operationRequestSchema.safeParse(event);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "event"}: ${i.message}`);
    return toOperationResult(err(validation("Invalid operation request", { issues })), generateId());
  }
  return runtime.gateway.dispatch(parsed.data);
};
