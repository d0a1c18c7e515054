import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import type { Logger } from "../../../core/ports/logger.js";
import { type Result, ok } from "../../../core/types/result.js";
import { type InterfaceRoute, type OperationContext, defineInterface } from "../define-interface.js";

const message = z.string();
const meta = z.record(z.unknown()).optional();

const loggingOperations = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("log_debug"), message, meta }).strict(),
  z.object({ operation: z.literal("log_info"), message, meta }).strict(),
  z.object({ operation: z.literal("log_warning"), message, meta }).strict(),
  z.object({ operation: z.literal("log_error"), message, meta }).strict(),
]);

type LoggingOperation = z.infer<typeof loggingOperations>;

/**
 * Integration code logs through the gateway so every line carries the
 * correlation id of the dispatch that produced it.
 */
const handleLogging = (
  logger: Logger,
  request: LoggingOperation,
  ctx: OperationContext,
): Result<unknown, AppError> => {
  const log = logger.child({ correlationId: ctx.correlationId });
  switch (request.operation) {
    case "log_debug":
      log.debug(request.message, request.meta);
      return ok({ logged: true });
    case "log_info":
      log.info(request.message, request.meta);
      return ok({ logged: true });
    case "log_warning":
      log.warn(request.message, request.meta);
      return ok({ logged: true });
    case "log_error":
      log.error(request.message, request.meta);
      return ok({ logged: true });
  }
};

export const createLoggingInterface = (resolve: () => Logger): InterfaceRoute =>
  defineInterface({ name: "logging", resolve, schema: loggingOperations, handle: handleLogging });
