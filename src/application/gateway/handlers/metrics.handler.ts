import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import type { MetricsCollector } from "../../../core/ports/metrics.js";
import { type Result, ok } from "../../../core/types/result.js";
import { type InterfaceRoute, defineInterface } from "../define-interface.js";

const metricsOperations = z.discriminatedUnion("operation", [
  z
    .object({
      operation: z.literal("record"),
      name: z.string().min(1),
      value: z.number().finite(),
      unit: z.string().min(1).optional(),
    })
    .strict(),
  z.object({ operation: z.literal("get_stats") }).strict(),
  z.object({ operation: z.literal("serialize") }).strict(),
  z.object({ operation: z.literal("reset") }).strict(),
]);

type MetricsOperation = z.infer<typeof metricsOperations>;

const handleMetrics = (
  metrics: MetricsCollector,
  request: MetricsOperation,
): Result<unknown, AppError> => {
  switch (request.operation) {
    case "record":
      metrics.record(request.name, request.value, request.unit);
      return ok({ recorded: true });
    case "get_stats":
      return ok({ metrics: metrics.snapshot() });
    case "serialize":
      return ok({ contentType: "text/plain; version=0.0.4", body: metrics.serialize() });
    case "reset":
      metrics.reset();
      return ok({ reset: true });
  }
};

export const createMetricsInterface = (resolve: () => MetricsCollector): InterfaceRoute =>
  defineInterface({ name: "metrics", resolve, schema: metricsOperations, handle: handleMetrics });
