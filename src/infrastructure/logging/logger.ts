import type { LogLevel, LogMeta, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Output sinks; swapped out in tests */
export interface LogStreams {
  readonly stdout: { write(line: string): unknown };
  readonly stderr: { write(line: string): unknown };
}

const SECRET_KEY = /token|secret|password|passwd|authorization|api[-_]?key|cookie/i;
const REDACTED = "[REDACTED]";
const MAX_DEPTH = 6;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" &&
  value !== null &&
  (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null);

/**
 * Replace values under secret-looking keys. Walks plain objects and arrays;
 * Errors are reduced to their message.
 */
export const redact = (value: unknown, depth = 0): unknown => {
  if (value instanceof Error) return value.message;
  if (depth >= MAX_DEPTH) return value;
  if (Array.isArray(value)) return value.map((v) => redact(v, depth + 1));
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[key] = SECRET_KEY.test(key) ? REDACTED : redact(v, depth + 1);
  }
  return out;
};

/**
 * Format a log entry as structured JSON (one object per line, for CloudWatch / ELK).
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
    ...meta,
  };
  return `${JSON.stringify(entry)}\n`;
};

/**
 * Logger: zero dependencies.
 * Supports two modes:
 * - "pretty": ANSI-colored human-readable output (local development)
 * - "json": structured JSON lines (default for the deployed function)
 */
export const createLogger = (
  minLevel: LogLevel = "info",
  bindings: LogMeta = {},
  format: LogFormat = "pretty",
  streams: LogStreams = process,
): Logger => {
  const minPriority = LEVEL_PRIORITY[minLevel];

  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const allMeta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({ ...bindings, ...meta })) {
      allMeta[key] = SECRET_KEY.test(key) ? REDACTED : redact(value);
    }
    const line = formatter(level, msg, allMeta);

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
      streams.stderr.write(line);
    } else {
      streams.stdout.write(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger(minLevel, { ...bindings, ...extra }, format, streams),
  };
};
