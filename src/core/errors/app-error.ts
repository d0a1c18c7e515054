/**
 * Canonical error shape: every expected failure in the runtime is an AppError
 * so the gateway, logging and metrics layers share a single taxonomy.
 *
 * Exceptions are reserved for construction-time misconfiguration
 * (see InvalidConfigError) and programmer errors.
 */

export const ErrorKind = {
  /** Bad input to an API (out-of-range config, malformed key, bad kwargs) */
  VALIDATION: "ValidationError",
  /** Admission rejected by the local sliding-window limiter; never retried */
  RATE_LIMITED: "RateLimitError",
  /** Admission rejected by a circuit breaker; never retried, no I/O attempted */
  CIRCUIT_OPEN: "CircuitOpenError",
  /** Transport-level failure (refused, reset, DNS) */
  CONNECTION: "ConnectionError",
  /** Per-attempt timeout elapsed */
  TIMEOUT: "TimeoutError",
  /** All attempts consumed without success */
  RETRY_EXHAUSTED: "RetryExhaustedError",
  /** Remote answered with a non-retriable, non-success status */
  HTTP_STATUS: "HttpStatusError",
  /** Unknown interface or operation at the gateway */
  DISPATCH: "DispatchError",
  /** A handler or component factory failed unexpectedly */
  OPERATION: "OperationError",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface AppError {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const RETRIABLE: ReadonlySet<ErrorKind> = new Set([ErrorKind.CONNECTION, ErrorKind.TIMEOUT]);

/** Transport failures may be retried; everything else surfaces immediately. */
export const isRetriable = (kind: ErrorKind): boolean => RETRIABLE.has(kind);

/** Factory helpers */
export const appError = (
  kind: ErrorKind,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { kind, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const validation = (message: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorKind.VALIDATION, message, details);

export const rateLimited = (scope: string): AppError =>
  appError(ErrorKind.RATE_LIMITED, `Rate limit exceeded for ${scope}`, { scope });

export const circuitOpen = (dependency: string): AppError =>
  appError(ErrorKind.CIRCUIT_OPEN, `Circuit breaker "${dependency}" is OPEN`, { dependency });

export const connectionFailed = (target: string, cause?: unknown): AppError =>
  appError(
    ErrorKind.CONNECTION,
    `Connection to ${target} failed${cause instanceof Error ? `: ${cause.message}` : ""}`,
    { target },
    cause,
  );

export const timedOut = (target: string, timeoutMs: number): AppError =>
  appError(ErrorKind.TIMEOUT, `Timed out after ${timeoutMs}ms waiting for ${target}`, {
    target,
    timeoutMs,
  });

export const retryExhausted = (attempts: number, last: AppError): AppError =>
  appError(ErrorKind.RETRY_EXHAUSTED, `Gave up after ${attempts} attempts: ${last.message}`, {
    attempts,
    lastErrorKind: last.kind,
    ...last.details,
  });

export const httpStatusError = (status: number, url: string): AppError =>
  appError(ErrorKind.HTTP_STATUS, `Request to ${url} failed with status ${status}`, {
    status,
    url,
  });

export const dispatchError = (message: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorKind.DISPATCH, message, details);

export const operationFailed = (message: string, cause?: unknown): AppError =>
  appError(ErrorKind.OPERATION, message, undefined, cause);

/** Render anything thrown into a readable message. */
export const describeError = (e: unknown): string => {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  try {
    // undefined, functions and symbols stringify to undefined
    return JSON.stringify(e) ?? String(e);
  } catch {
    // BigInt and circular structures
    return String(e);
  }
};

/**
 * Thrown only while constructing a component with invalid configuration.
 * Expected runtime failures never use exceptions.
 */
export class InvalidConfigError extends Error {
  readonly issues: Record<string, string[]>;

  constructor(message: string, issues: Record<string, string[]> = {}) {
    super(message);
    this.issues = issues;
    this.name = "InvalidConfigError";
  }
}
