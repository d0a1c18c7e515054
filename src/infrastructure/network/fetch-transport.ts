/**
 * HTTP transport over the global `fetch`. One call is one attempt: an
 * AbortController enforces the per-attempt timeout, and every HTTP status
 * (including 4xx/5xx) is returned as Ok for the client to classify.
 */

import { connectionFailed, timedOut } from "../../core/errors/app-error.js";
import type { HttpTransport, TransportRequest } from "../../core/ports/http-transport.js";
import { err, ok } from "../../core/types/result.js";

interface FetchTransportOptions {
  /** Sent unless the request sets its own User-Agent */
  readonly userAgent?: string;
}

export const createFetchTransport = (options: FetchTransportOptions = {}): HttpTransport => {
  const userAgent = options.userAgent ?? "voice-bridge-runtime/1.0.0";

  return {
    async send(request: TransportRequest) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), request.timeoutMs);

      try {
        const response = await fetch(request.url, {
          method: request.method,
          headers: { "User-Agent": userAgent, ...request.headers },
          body: request.body,
          signal: controller.signal,
        });
        // Reading the body stays under the same deadline
        const body = await response.text();

        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key] = value;
        });

        return ok({ status: response.status, headers, body });
      } catch (error: unknown) {
        if (controller.signal.aborted) {
          return err(timedOut(request.url, request.timeoutMs));
        }
        return err(connectionFailed(request.url, error));
      } finally {
        clearTimeout(timer);
      }
    },
  };
};
