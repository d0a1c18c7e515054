import type { LogLevel } from "../core/ports/logger.js";

// ── ANSI escape sequences ──────────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const dim = (s: string) => `${esc("2")}${s}${reset}`;

const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;
const magenta = (s: string) => `${esc("35")}${s}${reset}`;

const bgRed = (s: string) => `${esc("41")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

const timestamp = (): string => {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
};

const levelBadge = (level: LogLevel): string => {
  switch (level) {
    case "debug":
      return gray("DBG");
    case "info":
      return green("INF");
    case "warn":
      return yellow("WRN");
    case "error":
      return red("ERR");
    case "fatal":
      return bgRed("FTL");
  }
};

const stringify = (v: unknown): string =>
  typeof v === "object" && v !== null ? JSON.stringify(v) : String(v);

const formatMeta = (meta: Record<string, unknown>): string => {
  const entries = Object.entries(meta);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${dim(k)}${dim("=")}${white(stringify(v))}`);
  return ` ${parts.join(" ")}`;
};

/** Short correlation tag so one dispatch can be followed across lines */
const correlationTag = (meta: Record<string, unknown>): string => {
  const id = meta["correlationId"];
  return typeof id === "string" ? ` ${magenta(`[${id.slice(0, 8)}]`)}` : "";
};

// ── Public formatter ────────────────────────────────────────────────────

/**
 * Format a structured log entry (used by the Logger port).
 *
 *   INF 12:34:56.789 [3f2a9c1e] Dispatch completed  interface=cache operation=get
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => {
  const ts = dim(gray(timestamp()));
  const badge = levelBadge(level);
  const { correlationId: _correlationId, ...rest } = meta;
  const metaStr = formatMeta(rest);
  return `  ${badge} ${ts}${correlationTag(meta)} ${white(msg)}${metaStr}\n`;
};
