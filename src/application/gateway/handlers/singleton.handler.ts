import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import type { SingletonRegistry } from "../../../core/ports/singleton-registry.js";
import { type Result, ok } from "../../../core/types/result.js";
import { type InterfaceRoute, type OperationContext, defineInterface } from "../define-interface.js";

const name = z.string().min(1);

const singletonOperations = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("exists"), name }).strict(),
  z.object({ operation: z.literal("delete"), name }).strict(),
  z.object({ operation: z.literal("list") }).strict(),
  z.object({ operation: z.literal("reset_all") }).strict(),
]);

type SingletonOperation = z.infer<typeof singletonOperations>;

const handleSingleton = async (
  registry: SingletonRegistry,
  request: SingletonOperation,
  ctx: OperationContext,
): Promise<Result<unknown, AppError>> => {
  switch (request.operation) {
    case "exists":
      return ok({ exists: registry.exists(request.name) });
    case "delete":
      return ok({ deleted: await registry.delete(request.name) });
    case "list":
      return ok({
        instances: registry.names().map((n) => ({
          name: n,
          createdAt: registry.handle(n)?.createdAt ?? null,
        })),
        stats: registry.stats(),
      });
    case "reset_all": {
      const removed = await registry.clear();
      ctx.logger.warn("All singletons dropped", { removed });
      return ok({ removed });
    }
  }
};

export const createSingletonInterface = (resolve: () => SingletonRegistry): InterfaceRoute =>
  defineInterface({ name: "singleton", resolve, schema: singletonOperations, handle: handleSingleton });
