import { z } from "zod";
import type { AppError } from "../../../core/errors/app-error.js";
import type { Cache } from "../../../core/ports/cache.js";
import { type Result, map, ok } from "../../../core/types/result.js";
import { type InterfaceRoute, defineInterface } from "../define-interface.js";

const key = z.string();

const cacheOperations = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("get"), key }).strict(),
  z
    .object({
      operation: z.literal("set"),
      key,
      value: z.unknown(),
      ttl_seconds: z.number().int().optional(),
    })
    .strict(),
  z.object({ operation: z.literal("has"), key }).strict(),
  z.object({ operation: z.literal("invalidate"), key }).strict(),
  z.object({ operation: z.literal("clear") }).strict(),
  z.object({ operation: z.literal("cleanup_expired") }).strict(),
  z.object({ operation: z.literal("maintain") }).strict(),
  z.object({ operation: z.literal("metadata"), key }).strict(),
  z.object({ operation: z.literal("stats") }).strict(),
]);

type CacheOperation = z.infer<typeof cacheOperations>;

const handleCache = (cache: Cache, request: CacheOperation): Result<unknown, AppError> => {
  switch (request.operation) {
    case "get":
      return ok(cache.get(request.key));
    case "set":
      return map(cache.set(request.key, request.value, request.ttl_seconds), (metadata) => ({
        stored: true,
        metadata,
      }));
    case "has":
      return ok({ exists: cache.has(request.key) });
    case "invalidate":
      return ok({ invalidated: cache.invalidate(request.key) });
    case "clear":
      return ok({ cleared: cache.clear() });
    case "cleanup_expired":
      return ok({ removed: cache.cleanupExpired() });
    case "maintain":
      return ok(cache.maintain());
    case "metadata":
      return ok(cache.metadata(request.key));
    case "stats":
      return ok(cache.stats());
  }
};

export const createCacheInterface = (resolve: () => Cache): InterfaceRoute =>
  defineInterface({ name: "cache", resolve, schema: cacheOperations, handle: handleCache });
