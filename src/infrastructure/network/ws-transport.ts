/**
 * WebSocket transport backed by the `ws` client.
 *
 * Inbound text frames are queued until a receive() claims them; a receive()
 * issued first parks a waiter instead. Every wait is bounded by a timeout.
 */

import { Buffer } from "node:buffer";
import WebSocket from "ws";
import { type AppError, connectionFailed, timedOut } from "../../core/errors/app-error.js";
import type { SocketConnection, SocketTransport } from "../../core/ports/socket-transport.js";
import { type Result, err, ok } from "../../core/types/result.js";

interface WsTransportOptions {
  /** Grace period for the closing handshake before the socket is terminated */
  readonly closeTimeoutMs?: number;
}

const rawToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

const wrapSocket = (socket: WebSocket, url: string, closeTimeoutMs: number): SocketConnection => {
  const inbox: string[] = [];
  const waiters: Array<(result: Result<string, AppError>) => void> = [];
  let closedError: AppError | null = null;
  let closing: Promise<void> | null = null;
  let lastError: unknown;

  socket.on("message", (data) => {
    const text = rawToString(data);
    const waiter = waiters.shift();
    if (waiter) {
      waiter(ok(text));
    } else {
      inbox.push(text);
    }
  });

  // ws emits "error" before "close"; keep the cause for the waiters
  socket.on("error", (error) => {
    lastError = error;
  });

  socket.on("close", () => {
    closedError = connectionFailed(url, lastError ?? new Error("connection closed"));
    for (const waiter of waiters.splice(0)) {
      waiter(err(closedError));
    }
  });

  return {
    url,

    send(data: string): Promise<Result<void, AppError>> {
      if (socket.readyState !== WebSocket.OPEN) {
        return Promise.resolve(err(closedError ?? connectionFailed(url, new Error("socket not open"))));
      }
      return new Promise((resolve) => {
        socket.send(data, (error) => {
          resolve(error ? err(connectionFailed(url, error)) : ok(undefined));
        });
      });
    },

    receive(timeoutMs: number): Promise<Result<string, AppError>> {
      const queued = inbox.shift();
      if (queued !== undefined) return Promise.resolve(ok(queued));
      if (closedError) return Promise.resolve(err(closedError));

      return new Promise((resolve) => {
        const waiter = (result: Result<string, AppError>): void => {
          clearTimeout(timer);
          resolve(result);
        };
        const timer = setTimeout(() => {
          const index = waiters.indexOf(waiter);
          if (index !== -1) waiters.splice(index, 1);
          resolve(err(timedOut(url, timeoutMs)));
        }, timeoutMs);
        waiters.push(waiter);
      });
    },

    close(): Promise<void> {
      if (closing) return closing;
      closing = new Promise((resolve) => {
        if (socket.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        const timer = setTimeout(() => socket.terminate(), closeTimeoutMs);
        socket.once("close", () => {
          clearTimeout(timer);
          resolve();
        });
        socket.close();
      });
      return closing;
    },
  };
};

export const createWsTransport = (options: WsTransportOptions = {}): SocketTransport => {
  const closeTimeoutMs = options.closeTimeoutMs ?? 1_000;

  return {
    connect(url: string, timeoutMs: number): Promise<Result<SocketConnection, AppError>> {
      return new Promise((resolve) => {
        let socket: WebSocket;
        try {
          // The deadline below is the only connect timeout, so an expired
          // handshake always surfaces as TimeoutError
          socket = new WebSocket(url);
        } catch (error: unknown) {
          resolve(err(connectionFailed(url, error)));
          return;
        }

        const timer = setTimeout(() => {
          socket.terminate();
          resolve(err(timedOut(url, timeoutMs)));
        }, timeoutMs);

        const onError = (error: Error): void => {
          clearTimeout(timer);
          resolve(err(connectionFailed(url, error)));
        };

        socket.once("error", onError);
        socket.once("open", () => {
          clearTimeout(timer);
          socket.off("error", onError);
          resolve(ok(wrapSocket(socket, url, closeTimeoutMs)));
        });
      });
    },
  };
};
