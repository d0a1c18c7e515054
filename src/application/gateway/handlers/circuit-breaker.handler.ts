import { z } from "zod";
import { type AppError, validation } from "../../../core/errors/app-error.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import type { CircuitBreakerRegistry } from "../../../infrastructure/resilience/circuit-breaker-registry.js";
import { type InterfaceRoute, defineInterface } from "../define-interface.js";

const name = z.string().min(1);

const circuitBreakerOperations = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("get"), name }).strict(),
  z.object({ operation: z.literal("get_all_states") }).strict(),
  z.object({ operation: z.literal("reset"), name }).strict(),
  z.object({ operation: z.literal("reset_all") }).strict(),
]);

type CircuitBreakerOperation = z.infer<typeof circuitBreakerOperations>;

const handleCircuitBreaker = (
  breakers: CircuitBreakerRegistry,
  request: CircuitBreakerOperation,
): Result<unknown, AppError> => {
  switch (request.operation) {
    case "get":
      // Reads never create a breaker
      if (!breakers.has(request.name)) {
        return err(validation("Unknown circuit breaker", { name: request.name }));
      }
      return ok(breakers.get(request.name).snapshot());
    case "get_all_states":
      return ok(breakers.snapshots());
    case "reset":
      return ok({ reset: breakers.reset(request.name) });
    case "reset_all":
      return ok({ reset: breakers.resetAll() });
  }
};

export const createCircuitBreakerInterface = (
  resolve: () => CircuitBreakerRegistry,
): InterfaceRoute =>
  defineInterface({
    name: "circuit_breaker",
    resolve,
    schema: circuitBreakerOperations,
    handle: handleCircuitBreaker,
  });
