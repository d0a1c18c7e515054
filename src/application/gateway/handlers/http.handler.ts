import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import { type Result, ok } from "../../../core/types/result.js";
import type { HttpClient, HttpRequestOptions } from "../../../infrastructure/network/http-client.js";
import { type InterfaceRoute, type OperationContext, defineInterface } from "../define-interface.js";

const url = z.string().min(1);
const headers = z.record(z.string()).optional();
const query = z.record(z.union([z.string(), z.number(), z.boolean()])).optional();
const timeout_ms = z.number().int().positive().optional();
const cache_ttl_seconds = z.number().int().positive().optional();

const httpOperations = z.discriminatedUnion("operation", [
  z
    .object({
      operation: z.literal("request"),
      method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"]),
      url,
      headers,
      query,
      json: z.unknown().optional(),
      timeout_ms,
      cache_ttl_seconds,
    })
    .strict(),
  z.object({ operation: z.literal("get"), url, headers, query, timeout_ms, cache_ttl_seconds }).strict(),
  z
    .object({ operation: z.literal("post"), url, json: z.unknown().optional(), headers, query, timeout_ms })
    .strict(),
  z
    .object({ operation: z.literal("put"), url, json: z.unknown().optional(), headers, query, timeout_ms })
    .strict(),
  z.object({ operation: z.literal("delete"), url, headers, query, timeout_ms }).strict(),
  z
    .object({
      operation: z.literal("configure_retry"),
      max_attempts: z.number().optional(),
      backoff_base_ms: z.number().optional(),
      backoff_multiplier: z.number().optional(),
      retriable_status_codes: z.array(z.number()).optional(),
    })
    .strict(),
  z.object({ operation: z.literal("get_state") }).strict(),
  z.object({ operation: z.literal("reset_state") }).strict(),
]);

type HttpOperation = z.infer<typeof httpOperations>;

interface RequestFields {
  readonly headers?: Record<string, string> | undefined;
  readonly query?: Record<string, string | number | boolean> | undefined;
  readonly json?: unknown;
  readonly timeout_ms?: number | undefined;
  readonly cache_ttl_seconds?: number | undefined;
}

const toOptions = (fields: RequestFields, ctx: OperationContext): HttpRequestOptions => ({
  ...(fields.headers !== undefined ? { headers: fields.headers } : {}),
  ...(fields.query !== undefined ? { query: fields.query } : {}),
  ...(fields.json !== undefined ? { json: fields.json } : {}),
  ...(fields.timeout_ms !== undefined ? { timeoutMs: fields.timeout_ms } : {}),
  ...(fields.cache_ttl_seconds !== undefined ? { cacheTtlSeconds: fields.cache_ttl_seconds } : {}),
  correlationId: ctx.correlationId,
});

const handleHttp = async (
  client: HttpClient,
  request: HttpOperation,
  ctx: OperationContext,
): Promise<Result<unknown, AppError>> => {
  switch (request.operation) {
    case "request":
      return client.request(request.method, request.url, toOptions(request, ctx));
    case "get":
      return client.get(request.url, toOptions(request, ctx));
    case "post":
      return client.post(request.url, request.json, toOptions(request, ctx));
    case "put":
      return client.put(request.url, request.json, toOptions(request, ctx));
    case "delete":
      return client.delete(request.url, toOptions(request, ctx));
    case "configure_retry": {
      const { max_attempts, backoff_base_ms, backoff_multiplier, retriable_status_codes } = request;
      return client.configureRetry({
        ...(max_attempts !== undefined ? { maxAttempts: max_attempts } : {}),
        ...(backoff_base_ms !== undefined ? { backoffBaseMs: backoff_base_ms } : {}),
        ...(backoff_multiplier !== undefined ? { backoffMultiplier: backoff_multiplier } : {}),
        ...(retriable_status_codes !== undefined
          ? { retriableStatusCodes: retriable_status_codes }
          : {}),
      });
    }
    case "get_state":
      return ok(client.getState());
    case "reset_state":
      client.resetState();
      return ok({ reset: true });
  }
};

export const createHttpInterface = (resolve: () => HttpClient): InterfaceRoute =>
  defineInterface({ name: "http", resolve, schema: httpOperations, handle: handleHttp });
