/**
 * Port: request/response transport. One call = one attempt; retries,
 * breakers and admission live above this seam.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export interface TransportRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string | undefined;
  readonly timeoutMs: number;
}

export interface TransportResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  /** Raw response text; callers decide how to parse it */
  readonly body: string;
}

export interface HttpTransport {
  /** Err is always ConnectionError or TimeoutError; any HTTP status is Ok */
  send(request: TransportRequest): Promise<Result<TransportResponse, AppError>>;
}
