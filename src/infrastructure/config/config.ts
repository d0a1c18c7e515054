import { z } from "zod";
import { type AppError, InvalidConfigError, validation } from "../../core/errors/app-error.js";
import type { ConfigProvider } from "../../core/ports/config-provider.js";
import type { RetryPolicy } from "../../core/ports/retry.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Runtime config: validated once per warm process via Zod.
 * Every knob has a default, so an empty environment is a valid one.
 */

const lowercase = (value: unknown): unknown => (typeof value === "string" ? value.toLowerCase() : value);

const statusCodeList = z
  .string()
  .default("408,429,500,502,503,504")
  .transform((s) =>
    s
      .split(",")
      .map((c) => c.trim())
      .filter((c) => c.length > 0)
      .map(Number),
  )
  .pipe(z.array(z.number().int().min(100).max(599)).min(1));

const pressureSchema = z
  .object({
    elevated: z.coerce.number().gt(0).max(1).default(0.75),
    high: z.coerce.number().gt(0).max(1).default(0.85),
    critical: z.coerce.number().gt(0).max(1).default(0.95),
    emergency: z.coerce.number().gt(0).max(1).default(0.98),
  })
  .refine((p) => p.elevated < p.high && p.high < p.critical && p.critical < p.emergency, {
    message: "Pressure thresholds must be strictly ascending (elevated < high < critical < emergency)",
  });

const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("production"),

  log: z.object({
    level: z.preprocess(
      lowercase,
      z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    ),
    format: z.enum(["pretty", "json"]).default("json"),
  }),

  retry: z.object({
    maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    backoffBaseMs: z.coerce.number().int().min(50).max(1000).default(100),
    backoffMultiplier: z.coerce.number().min(1).max(5).default(2),
    retriableStatusCodes: statusCodeList,
  }),

  rateLimit: z.object({
    maxOperations: z.coerce.number().int().min(1).max(10_000).default(500),
    windowMs: z.coerce.number().int().positive().default(1_000),
  }),

  circuitBreaker: z.object({
    failureThreshold: z.coerce.number().int().min(1).max(20).default(5),
    recoveryTimeoutMs: z.coerce.number().int().min(20_000).max(60_000).default(45_000),
    halfOpenMaxProbes: z.coerce.number().int().min(1).max(2).default(1),
  }),

  cache: z
    .object({
      defaultTtlSeconds: z.coerce.number().int().positive().default(300),
      maxTtlSeconds: z.coerce.number().int().positive().default(3_600),
      maxBytes: z.coerce.number().int().positive().default(8 * 1024 * 1024),
      maxEntries: z.coerce.number().int().positive().default(1_000),
      maxKeyLength: z.coerce.number().int().min(1).max(1_024).default(250),
      pressure: pressureSchema,
    })
    .refine((c) => c.defaultTtlSeconds <= c.maxTtlSeconds, {
      message: "Default TTL must not exceed the maximum TTL",
      path: ["defaultTtlSeconds"],
    }),

  memory: z.object({
    limitMb: z.coerce.number().int().positive().default(128),
  }),

  network: z.object({
    requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
    connectTimeoutMs: z.coerce.number().int().positive().default(5_000),
    baseUrl: z.string().url().optional(),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type Environment = Readonly<Record<string, string | undefined>>;

const fromEnvironment = (env: Environment) => ({
  env: env["NODE_ENV"],
  log: {
    level: env["LOG_LEVEL"],
    format: env["LOG_FORMAT"],
  },
  retry: {
    maxAttempts: env["RETRY_MAX_ATTEMPTS"],
    backoffBaseMs: env["RETRY_BACKOFF_BASE_MS"],
    backoffMultiplier: env["RETRY_BACKOFF_MULTIPLIER"],
    retriableStatusCodes: env["RETRY_STATUS_CODES"],
  },
  rateLimit: {
    maxOperations: env["RATE_LIMIT_MAX_OPERATIONS"],
    windowMs: env["RATE_LIMIT_WINDOW_MS"],
  },
  circuitBreaker: {
    failureThreshold: env["CB_FAILURE_THRESHOLD"],
    recoveryTimeoutMs: env["CB_RECOVERY_TIMEOUT_MS"],
    halfOpenMaxProbes: env["CB_HALF_OPEN_MAX_PROBES"],
  },
  cache: {
    defaultTtlSeconds: env["CACHE_TTL"],
    maxTtlSeconds: env["CACHE_MAX_TTL"],
    maxBytes: env["CACHE_MAX_BYTES"],
    maxEntries: env["CACHE_MAX_ENTRIES"],
    maxKeyLength: env["CACHE_MAX_KEY_LENGTH"],
    pressure: {
      elevated: env["CACHE_PRESSURE_ELEVATED"],
      high: env["CACHE_PRESSURE_HIGH"],
      critical: env["CACHE_PRESSURE_CRITICAL"],
      emergency: env["CACHE_PRESSURE_EMERGENCY"],
    },
  },
  memory: {
    limitMb: env["MEMORY_LIMIT_MB"] ?? env["AWS_LAMBDA_FUNCTION_MEMORY_SIZE"],
  },
  network: {
    requestTimeoutMs: env["REQUEST_TIMEOUT_MS"],
    connectTimeoutMs: env["CONNECT_TIMEOUT_MS"],
    baseUrl: env["HOME_ASSISTANT_URL"],
  },
});

const collectIssues = (error: z.ZodError): Record<string, string[]> => {
  const issues: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join(".") || "config";
    (issues[path] ??= []).push(issue.message);
  }
  return issues;
};

/** Validate an environment map; never throws. */
export const parseConfig = (env: Environment): Result<AppConfig, AppError> => {
  const result = configSchema.safeParse(fromEnvironment(env));
  if (!result.success) {
    return err(validation("Invalid configuration", { issues: collectIssues(result.error) }));
  }
  return ok(result.data);
};

/**
 * Load config from the process environment.
 * Throws InvalidConfigError: misconfiguration is fatal at construction time.
 */
export const loadConfig = (env: Environment = process.env): AppConfig => {
  const result = configSchema.safeParse(fromEnvironment(env));
  if (!result.success) {
    throw new InvalidConfigError("Invalid configuration", collectIssues(result.error));
  }
  return result.data;
};

export const retryPolicyFromConfig = (retry: AppConfig["retry"]): RetryPolicy =>
  Object.freeze({
    maxAttempts: retry.maxAttempts,
    backoffBaseMs: retry.backoffBaseMs,
    backoffMultiplier: retry.backoffMultiplier,
    retriableStatusCodes: new Set(retry.retriableStatusCodes),
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Read-only dotted-path lookup over a validated config ("retry.maxAttempts"). */
export const createConfigProvider = (config: AppConfig): ConfigProvider => ({
  get(path: string): Result<unknown, AppError> {
    const segments = path.split(".").filter((s) => s.length > 0);
    let current: unknown = config;
    for (const segment of segments) {
      if (!isRecord(current) || !Object.hasOwn(current, segment)) {
        return err(validation(`Unknown configuration key: ${path}`, { key: path }));
      }
      current = current[segment];
    }
    return ok(current);
  },
});
