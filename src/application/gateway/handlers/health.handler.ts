import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import { type Result, ok } from "../../../core/types/result.js";
import type { HealthService } from "../../services/health.service.js";
import { type InterfaceRoute, defineInterface } from "../define-interface.js";

const healthOperations = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("check") }).strict(),
]);

type HealthOperation = z.infer<typeof healthOperations>;

const handleHealth = async (
  health: HealthService,
  request: HealthOperation,
): Promise<Result<unknown, AppError>> => {
  switch (request.operation) {
    case "check":
      return ok(await health.check());
  }
};

export const createHealthInterface = (resolve: () => HealthService): InterfaceRoute =>
  defineInterface({ name: "health", resolve, schema: healthOperations, handle: handleHealth });
