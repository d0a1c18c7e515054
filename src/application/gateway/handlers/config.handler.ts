import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import type { ConfigProvider } from "../../../core/ports/config-provider.js";
import { type Result, ok } from "../../../core/types/result.js";
import { type InterfaceRoute, defineInterface } from "../define-interface.js";

const configOperations = z.discriminatedUnion("operation", [
  z
    .object({
      operation: z.literal("get"),
      key: z.string().min(1),
      /** Returned instead of an error when the key is unknown */
      default: z.unknown().optional(),
    })
    .strict(),
]);

type ConfigOperation = z.infer<typeof configOperations>;

const handleConfig = (provider: ConfigProvider, request: ConfigOperation): Result<unknown, AppError> => {
  switch (request.operation) {
    case "get": {
      const value = provider.get(request.key);
      if (!value.ok && request.default !== undefined) {
        return ok(request.default);
      }
      return value;
    }
  }
};

export const createConfigInterface = (resolve: () => ConfigProvider): InterfaceRoute =>
  defineInterface({ name: "config", resolve, schema: configOperations, handle: handleConfig });
