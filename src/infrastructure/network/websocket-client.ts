/**
 * Retrying WebSocket client: persistent-connection counterpart of the HTTP
 * client, sharing its admission and retry rules.
 *
 * `request()` runs connect → send → receive → close as one attempt and closes
 * the connection exactly once per attempt, whichever step fails. Only a failed
 * connect is retried: once a send has been attempted the message is never
 * repeated. The explicit connect/send/receive/close operations work on
 * tracked connection ids.
 */

import { type AppError, validation } from "../../core/errors/app-error.js";
import type { CircuitBreaker } from "../../core/ports/circuit-breaker.js";
import type { Clock } from "../../core/ports/clock.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import type { RateLimiter, RateLimiterStats } from "../../core/ports/rate-limiter.js";
import type { AttemptOutcome, RetryPolicy } from "../../core/ports/retry.js";
import type { SocketConnection, SocketTransport } from "../../core/ports/socket-transport.js";
import { type ConnectionId, brand } from "../../core/types/brand.js";
import { type Result, err, ok, tryCatch } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import type { CircuitBreakerRegistry } from "../resilience/circuit-breaker-registry.js";
import { DEFAULT_RETRY_POLICY, describeRetryPolicy, executeWithRetry } from "../resilience/retry.js";
import {
  type ClientCounters,
  admit,
  deliveredAttempt,
  emptyCounters,
  failedAttempt,
  outcomeLabel,
  settleRun,
} from "./admission.js";

export interface WebSocketCallOptions {
  /** Receive timeout; defaults to the client's request timeout */
  readonly timeoutMs?: number;
  readonly connectTimeoutMs?: number;
  readonly correlationId?: string;
}

export interface WebSocketReply {
  /** Parsed JSON frame, or the raw text when it is not JSON */
  readonly response: unknown;
  readonly attemptsUsed: number;
}

export interface OpenedConnection {
  readonly connectionId: ConnectionId;
  readonly url: string;
  readonly attemptsUsed: number;
}

export interface WebSocketStats {
  readonly openConnections: number;
  readonly connectionsOpened: number;
  readonly connectionsClosed: number;
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly statistics: Readonly<ClientCounters>;
  readonly retryPolicy: ReturnType<typeof describeRetryPolicy>;
  readonly rateLimiter: RateLimiterStats;
}

export interface WebSocketClient {
  request(
    url: string,
    message: unknown,
    options?: WebSocketCallOptions,
  ): Promise<Result<WebSocketReply, AppError>>;
  connect(url: string, options?: WebSocketCallOptions): Promise<Result<OpenedConnection, AppError>>;
  send(connectionId: string, message: unknown): Promise<Result<{ readonly sent: true }, AppError>>;
  receive(
    connectionId: string,
    options?: Pick<WebSocketCallOptions, "timeoutMs">,
  ): Promise<Result<{ readonly message: unknown }, AppError>>;
  close(connectionId: string): Promise<Result<{ readonly closed: boolean }, AppError>>;
  getStats(): WebSocketStats;
  /** Close and forget every open connection; returns how many were closed */
  reset(): Promise<number>;
}

/** Shared components are resolved on every call, as in the HTTP client. */
interface WebSocketClientDeps {
  readonly transport: SocketTransport;
  readonly breakers: () => CircuitBreakerRegistry;
  readonly limiter: RateLimiter;
  readonly clock: Clock;
  readonly logger: () => Logger;
  readonly metrics: () => MetricsCollector;
  readonly retryPolicy?: RetryPolicy;
  readonly requestTimeoutMs: number;
  readonly connectTimeoutMs: number;
}

interface TrackedConnection {
  readonly connection: SocketConnection;
  readonly host: string;
}

const TRANSPORT = "websocket";

const parseTarget = (url: string): Result<URL, AppError> => {
  const parsed = tryCatch(() => new URL(url));
  if (!parsed.ok || (parsed.value.protocol !== "ws:" && parsed.value.protocol !== "wss:")) {
    return err(validation("WebSocket URL must be an absolute ws:// or wss:// URL", { url }));
  }
  return ok(parsed.value);
};

const encodeMessage = (message: unknown): Result<string, AppError> => {
  const encoded = tryCatch(() => JSON.stringify(message));
  if (!encoded.ok || encoded.value === undefined) {
    return err(validation("WebSocket message must be JSON-serialisable"));
  }
  return ok(encoded.value);
};

const decodeMessage = (text: string): unknown => {
  const parsed = tryCatch((): unknown => JSON.parse(text));
  return parsed.ok ? parsed.value : text;
};

export const createWebSocketClient = (deps: WebSocketClientDeps): WebSocketClient => {
  const { transport, breakers, limiter, clock, logger, metrics, requestTimeoutMs, connectTimeoutMs } =
    deps;
  const policy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;

  const open = new Map<ConnectionId, TrackedConnection>();
  let counters = emptyCounters();
  let connectionsOpened = 0;
  let connectionsClosed = 0;
  let messagesSent = 0;
  let messagesReceived = 0;

  const retryHooks = (log: Logger, metricsSink: MetricsCollector) => ({
    sleep: clock.sleep,
    onRetry: (attemptNumber: number, delayMs: number) => {
      counters.retries++;
      metricsSink.networkRetriesTotal.inc({ transport: TRANSPORT });
      log.info("Retrying WebSocket call", { attempt: attemptNumber, delayMs });
    },
  });

  const childLogger = (url: string, correlationId: string | undefined): Logger =>
    logger().child({
      transport: TRANSPORT,
      url,
      ...(correlationId !== undefined ? { correlationId } : {}),
    });

  const closeTracked = async (connection: SocketConnection): Promise<void> => {
    await connection.close();
    connectionsClosed++;
  };

  /** Run admission plus the retry loop for one call against `url`. */
  const guarded = async <T>(
    url: string,
    log: Logger,
    attempt: (breaker: CircuitBreaker, attemptNumber: number) => Promise<AttemptOutcome<T, AppError>>,
  ): Promise<Result<{ value: T; attemptsUsed: number }, AppError>> => {
    const target = parseTarget(url);
    if (!target.ok) return target;

    counters.requests++;
    const metricsSink = metrics();
    const breaker = breakers().get(target.value.host);
    const admitted = admit({ transport: TRANSPORT, limiter, breaker, metrics: metricsSink, counters });
    if (!admitted.ok) {
      log.warn("WebSocket call rejected before connecting", { errorKind: admitted.error.kind });
      return admitted;
    }

    const run = await executeWithRetry(policy, (n) => attempt(breaker, n), retryHooks(log, metricsSink));
    const settled = settleRun(policy, run);
    metricsSink.networkRequestsTotal.inc({ transport: TRANSPORT, outcome: outcomeLabel(settled) });

    if (!settled.ok) {
      counters.failures++;
      log.warn("WebSocket call failed", {
        errorKind: settled.error.kind,
        attemptsUsed: run.attemptsUsed,
      });
      return settled;
    }
    counters.successes++;
    return ok({ value: settled.value, attemptsUsed: run.attemptsUsed });
  };

  const lookup = (connectionId: string): Result<TrackedConnection, AppError> => {
    const tracked = open.get(brand<string, "ConnectionId">(connectionId));
    return tracked ? ok(tracked) : err(validation("Unknown connection id", { connectionId }));
  };

  return {
    async request(url, message, options = {}) {
      const encoded = encodeMessage(message);
      if (!encoded.ok) return encoded;
      const log = childLogger(url, options.correlationId);
      const receiveTimeoutMs = options.timeoutMs ?? requestTimeoutMs;
      const connectTimeout = options.connectTimeoutMs ?? connectTimeoutMs;

      const result = await guarded<unknown>(url, log, async (breaker, attemptNumber) => {
        const connected = await transport.connect(url, connectTimeout);
        if (!connected.ok) {
          log.debug("Connect failed", { attempt: attemptNumber, errorKind: connected.error.kind });
          return failedAttempt(breaker, connected.error);
        }
        connectionsOpened++;
        const connection = connected.value;

        try {
          const sent = await connection.send(encoded.value);
          if (!sent.ok) return deliveredAttempt(breaker, sent.error);
          messagesSent++;

          const received = await connection.receive(receiveTimeoutMs);
          if (!received.ok) {
            log.debug("Receive failed", { attempt: attemptNumber, errorKind: received.error.kind });
            return deliveredAttempt(breaker, received.error);
          }
          messagesReceived++;
          breaker.recordSuccess();
          return { kind: "success", value: decodeMessage(received.value) };
        } finally {
          await closeTracked(connection);
        }
      });

      if (!result.ok) return result;
      return ok({ response: result.value.value, attemptsUsed: result.value.attemptsUsed });
    },

    async connect(url, options = {}) {
      const log = childLogger(url, options.correlationId);
      const connectTimeout = options.connectTimeoutMs ?? connectTimeoutMs;

      const result = await guarded<SocketConnection>(url, log, async (breaker) => {
        const connected = await transport.connect(url, connectTimeout);
        if (!connected.ok) return failedAttempt(breaker, connected.error);
        breaker.recordSuccess();
        return { kind: "success", value: connected.value };
      });
      if (!result.ok) return result;

      const connectionId = brand<string, "ConnectionId">(generateId());
      open.set(connectionId, { connection: result.value.value, host: new URL(url).host });
      connectionsOpened++;
      log.debug("Connection opened", { connectionId });
      return ok({ connectionId, url, attemptsUsed: result.value.attemptsUsed });
    },

    async send(connectionId, message) {
      const tracked = lookup(connectionId);
      if (!tracked.ok) return tracked;
      const encoded = encodeMessage(message);
      if (!encoded.ok) return encoded;

      const breaker = breakers().get(tracked.value.host);
      const sent = await tracked.value.connection.send(encoded.value);
      if (!sent.ok) {
        breaker.recordFailure();
        return sent;
      }
      breaker.recordSuccess();
      messagesSent++;
      return ok({ sent: true as const });
    },

    async receive(connectionId, options = {}) {
      const tracked = lookup(connectionId);
      if (!tracked.ok) return tracked;

      const breaker = breakers().get(tracked.value.host);
      const received = await tracked.value.connection.receive(options.timeoutMs ?? requestTimeoutMs);
      if (!received.ok) {
        breaker.recordFailure();
        return received;
      }
      breaker.recordSuccess();
      messagesReceived++;
      return ok({ message: decodeMessage(received.value) });
    },

    async close(connectionId) {
      const id = brand<string, "ConnectionId">(connectionId);
      const tracked = open.get(id);
      if (!tracked) return ok({ closed: false });
      open.delete(id);
      await closeTracked(tracked.connection);
      return ok({ closed: true });
    },

    getStats(): WebSocketStats {
      return {
        openConnections: open.size,
        connectionsOpened,
        connectionsClosed,
        messagesSent,
        messagesReceived,
        statistics: { ...counters },
        retryPolicy: describeRetryPolicy(policy),
        rateLimiter: limiter.stats(),
      };
    },

    async reset(): Promise<number> {
      const tracked = [...open.values()];
      open.clear();
      await Promise.all(tracked.map(({ connection }) => closeTracked(connection)));
      counters = emptyCounters();
      connectionsOpened = 0;
      connectionsClosed = 0;
      messagesSent = 0;
      messagesReceived = 0;
      limiter.reset();
      logger().info("WebSocket client reset", { transport: TRANSPORT, closed: tracked.length });
      return tracked.length;
    },
  };
};
