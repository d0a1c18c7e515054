import { type AppError, connectionFailed, timedOut } from "../../src/core/errors/app-error.js";
import type { Clock } from "../../src/core/ports/clock.js";
import type {
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from "../../src/core/ports/http-transport.js";
import type { SocketConnection, SocketTransport } from "../../src/core/ports/socket-transport.js";
import { type Result, err, ok } from "../../src/core/types/result.js";
import type { LogStreams } from "../../src/infrastructure/logging/logger.js";

// ── Clock ───────────────────────────────────────────────────────────

export interface FakeClock extends Clock {
  advance(ms: number): void;
  /** Every delay passed to sleep(), in order */
  readonly sleeps: number[];
}

/** Manual clock; sleep() advances time instantly. */
export const createFakeClock = (startMs = 0, wallStart = "2026-01-01T00:00:00.000Z"): FakeClock => {
  let current = startMs;
  const wallBase = new Date(wallStart).getTime();
  const sleeps: number[] = [];
  return {
    now: () => current,
    wallTime: () => new Date(wallBase + current - startMs),
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
    advance: (ms) => {
      current += ms;
    },
    sleeps,
  };
};

// ── HTTP ────────────────────────────────────────────────────────────

export type ScriptedReply = number | AppError | TransportResponse;

export interface FakeHttpTransport extends HttpTransport {
  readonly requests: TransportRequest[];
}

const asResponse = (reply: number | TransportResponse): TransportResponse => {
  if (typeof reply !== "number") return reply;
  return {
    status: reply,
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ status: reply }),
  };
};

/**
 * Answers requests from a script, one reply per send. A number is a JSON
 * response with that status; an AppError is a transport failure. The last
 * reply repeats once the script runs out.
 */
export const createFakeHttpTransport = (script: readonly ScriptedReply[]): FakeHttpTransport => {
  const requests: TransportRequest[] = [];
  return {
    requests,
    async send(request): Promise<Result<TransportResponse, AppError>> {
      requests.push(request);
      const reply = script[Math.min(requests.length - 1, script.length - 1)] ?? 200;
      if (typeof reply === "object" && "kind" in reply) return err(reply);
      return ok(asResponse(reply));
    },
  };
};

export const refused = (url = "http://ha.local"): AppError => connectionFailed(url);

// ── WebSocket ───────────────────────────────────────────────────────

export interface FakeSocketOptions {
  /**
   * Frames returned by receive(), in order. A null entry, or an exhausted
   * list, makes that receive time out.
   */
  readonly replies?: readonly (string | null)[];
  /** Fail this many connect() calls before succeeding */
  readonly failConnects?: number;
}

export interface FakeSocketTransport extends SocketTransport {
  readonly connects: string[];
  readonly sent: string[];
  closeCount(): number;
}

export const createFakeSocketTransport = (options: FakeSocketOptions = {}): FakeSocketTransport => {
  const replies = [...(options.replies ?? [])];
  let failConnects = options.failConnects ?? 0;
  const connects: string[] = [];
  const sent: string[] = [];
  let closes = 0;

  return {
    connects,
    sent,
    closeCount: () => closes,
    async connect(url, _timeoutMs): Promise<Result<SocketConnection, AppError>> {
      connects.push(url);
      if (failConnects > 0) {
        failConnects--;
        return err(connectionFailed(url));
      }
      return ok({
        url,
        async send(data) {
          sent.push(data);
          return ok(undefined);
        },
        async receive(timeoutMs) {
          const next = replies.shift();
          return next === undefined || next === null ? err(timedOut(url, timeoutMs)) : ok(next);
        },
        async close() {
          closes++;
        },
      });
    },
  };
};

// ── Logging ─────────────────────────────────────────────────────────

export interface CapturedStreams extends LogStreams {
  readonly out: string[];
  readonly errors: string[];
}

export const captureStreams = (): CapturedStreams => {
  const out: string[] = [];
  const errors: string[] = [];
  return {
    out,
    errors,
    stdout: { write: (line: string) => out.push(line) },
    stderr: { write: (line: string) => errors.push(line) },
  };
};
