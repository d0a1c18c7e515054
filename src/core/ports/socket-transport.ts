/**
 * Port: persistent-connection transport (WebSocket-style client).
 * Every operation takes an explicit timeout and never blocks indefinitely.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface SocketConnection {
  readonly url: string;
  send(data: string): Promise<Result<void, AppError>>;
  /** Next text frame, or TimeoutError after `timeoutMs` */
  receive(timeoutMs: number): Promise<Result<string, AppError>>;
  /** Idempotent; resolves once the connection is released */
  close(): Promise<void>;
}

export interface SocketTransport {
  connect(url: string, timeoutMs: number): Promise<Result<SocketConnection, AppError>>;
}
