import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import { type Result, ok } from "../../../core/types/result.js";
import type { WebSocketClient } from "../../../infrastructure/network/websocket-client.js";
import { type InterfaceRoute, type OperationContext, defineInterface } from "../define-interface.js";

const url = z.string().min(1);
const connection_id = z.string().min(1);
const timeout_ms = z.number().int().positive().optional();
const connect_timeout_ms = z.number().int().positive().optional();

const websocketOperations = z.discriminatedUnion("operation", [
  z
    .object({
      operation: z.literal("request"),
      url,
      message: z.unknown(),
      timeout_ms,
      connect_timeout_ms,
    })
    .strict(),
  z.object({ operation: z.literal("connect"), url, connect_timeout_ms }).strict(),
  z.object({ operation: z.literal("send"), connection_id, message: z.unknown() }).strict(),
  z.object({ operation: z.literal("receive"), connection_id, timeout_ms }).strict(),
  z.object({ operation: z.literal("close"), connection_id }).strict(),
  z.object({ operation: z.literal("get_stats") }).strict(),
  z.object({ operation: z.literal("reset") }).strict(),
]);

type WebSocketOperation = z.infer<typeof websocketOperations>;

const handleWebSocket = async (
  client: WebSocketClient,
  request: WebSocketOperation,
  ctx: OperationContext,
): Promise<Result<unknown, AppError>> => {
  switch (request.operation) {
    case "request":
      return client.request(request.url, request.message, {
        correlationId: ctx.correlationId,
        ...(request.timeout_ms !== undefined ? { timeoutMs: request.timeout_ms } : {}),
        ...(request.connect_timeout_ms !== undefined
          ? { connectTimeoutMs: request.connect_timeout_ms }
          : {}),
      });
    case "connect":
      return client.connect(request.url, {
        correlationId: ctx.correlationId,
        ...(request.connect_timeout_ms !== undefined
          ? { connectTimeoutMs: request.connect_timeout_ms }
          : {}),
      });
    case "send":
      return client.send(request.connection_id, request.message);
    case "receive":
      return client.receive(
        request.connection_id,
        request.timeout_ms !== undefined ? { timeoutMs: request.timeout_ms } : {},
      );
    case "close":
      return client.close(request.connection_id);
    case "get_stats":
      return ok(client.getStats());
    case "reset":
      return ok({ closed: await client.reset() });
  }
};

export const createWebSocketInterface = (resolve: () => WebSocketClient): InterfaceRoute =>
  defineInterface({ name: "websocket", resolve, schema: websocketOperations, handle: handleWebSocket });
