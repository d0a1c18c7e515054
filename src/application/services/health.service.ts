import { type Cache, type MemoryProbe, PressureStage } from "../../core/ports/cache.js";
import { CircuitState } from "../../core/ports/circuit-breaker.js";
import type { Clock } from "../../core/ports/clock.js";
import type { Logger } from "../../core/ports/logger.js";
import type { CircuitBreakerRegistry } from "../../infrastructure/resilience/circuit-breaker-registry.js";

export type HealthLevel = "ok" | "degraded" | "down";

export interface HealthStatus {
  readonly status: HealthLevel;
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: HealthLevel;
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  readonly clock: Pick<Clock, "now" | "wallTime">;
  readonly memoryProbe: MemoryProbe;
  /** Resolved on each check so a rebuilt cache or breaker table is seen */
  readonly cache: () => Cache;
  readonly breakers: () => CircuitBreakerRegistry;
  /** Seconds since process start */
  readonly uptime?: () => number;
}

const MEMORY_DEGRADED = 0.85;
const MEMORY_DOWN = 0.95;

const round = (n: number): number => Math.round(n * 100) / 100;

const cacheHealth = (stage: PressureStage): HealthLevel => {
  switch (stage) {
    case PressureStage.NORMAL:
    case PressureStage.ELEVATED:
      return "ok";
    case PressureStage.HIGH:
    case PressureStage.CRITICAL:
      return "degraded";
    case PressureStage.EMERGENCY:
      return "down";
  }
};

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version, clock, memoryProbe } = deps;
  const uptime = deps.uptime ?? (() => process.uptime());

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running health check");
      const start = clock.now();

      const checks: Record<string, ComponentHealth> = {};

      // Memory check against the host ceiling
      const memory = memoryProbe();
      checks["memory"] = {
        status: memory >= MEMORY_DOWN ? "down" : memory >= MEMORY_DEGRADED ? "degraded" : "ok",
        details: `${Math.round(memory * 100)}% of limit`,
      };

      // Cache pressure
      const cacheStats = deps.cache().stats();
      checks["cache"] = {
        status: cacheHealth(cacheStats.stage),
        details: `${cacheStats.entries} entries, pressure ${cacheStats.stage}`,
      };

      // One check per breaker
      for (const cb of deps.breakers().all()) {
        const cbState = cb.state;
        if (cbState === CircuitState.OPEN) {
          checks[`circuit:${cb.name}`] = {
            status: "down",
            details: `Circuit breaker OPEN, failures: ${cb.failureCount}`,
          };
        } else if (cbState === CircuitState.HALF_OPEN) {
          checks[`circuit:${cb.name}`] = {
            status: "degraded",
            details: "Circuit breaker HALF_OPEN, probing recovery",
          };
        } else {
          checks[`circuit:${cb.name}`] = { status: "ok" };
        }
      }

      // Determine overall status
      const allChecks = Object.entries(checks);
      const downComponents = allChecks.filter(([, c]) => c.status === "down");
      const degradedComponents = allChecks.filter(([, c]) => c.status === "degraded");

      // A down dependency degrades the bridge; it keeps answering either way
      const overallStatus: HealthLevel =
        downComponents.length > 0 || degradedComponents.length > 0 ? "degraded" : "ok";

      const latencyMs = round(clock.now() - start);
      const overall: HealthStatus = {
        status: overallStatus,
        version,
        uptime: uptime(),
        timestamp: clock.wallTime().toISOString(),
        checks,
      };

      if (overallStatus !== "ok") {
        const failedNames = [...downComponents, ...degradedComponents].map(([name]) => name);
        logger.warn("Health check degraded", { failedComponents: failedNames, latencyMs });
      } else {
        logger.debug("Health check passed", { latencyMs });
      }

      return overall;
    },
  };
};
