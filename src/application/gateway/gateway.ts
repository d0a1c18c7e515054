/**
 * Gateway dispatcher: the single entry point integration code calls.
 *
 * Resolves `(interface, operation, kwargs)` to a route, invokes it, and turns
 * whatever happens into a complete OperationResult. Nothing throws across
 * this boundary. Correlation ids, logging, metrics and call counting all
 * happen here and nowhere else.
 */

import {
  type AppError,
  describeError,
  dispatchError,
  operationFailed,
} from "../../core/errors/app-error.js";
import type { Clock } from "../../core/ports/clock.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MetricsCollector } from "../../core/ports/metrics.js";
import { type CorrelationId, brand } from "../../core/types/brand.js";
import {
  type OperationRequest,
  type OperationResult,
  toOperationResult,
} from "../../core/types/operation-result.js";
import { type Result, err } from "../../core/types/result.js";
import type { InterfaceRoute } from "./define-interface.js";

export interface ExecuteOptions {
  readonly correlationId?: string;
}

export interface GatewayStats {
  /** Dispatch counts keyed by "interface.operation" */
  readonly calls: Record<string, number>;
  /** Failed dispatch counts keyed by "interface.operation" */
  readonly failures: Record<string, number>;
  /** Operations available per interface */
  readonly interfaces: Record<string, readonly string[]>;
}

export interface Gateway {
  execute(
    iface: string,
    operation: string,
    kwargs?: Readonly<Record<string, unknown>>,
    options?: ExecuteOptions,
  ): Promise<OperationResult>;
  dispatch(request: OperationRequest): Promise<OperationResult>;
  stats(): GatewayStats;
}

interface GatewayDeps {
  readonly routes: readonly InterfaceRoute[];
  readonly clock: Pick<Clock, "now">;
  /** Resolved per dispatch, so a replaced logger or collector takes effect */
  readonly logger: () => Logger;
  readonly metrics: () => MetricsCollector;
  readonly generateId: () => string;
}

export const createGateway = (deps: GatewayDeps): Gateway => {
  const { clock, generateId } = deps;
  const routes = new Map(deps.routes.map((route) => [route.name, route] as const));
  const calls = new Map<string, number>();
  const failures = new Map<string, number>();

  const bump = (counts: Map<string, number>, key: string): void => {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  };

  const invoke = async (
    iface: string,
    operation: string,
    kwargs: Readonly<Record<string, unknown>>,
    correlationId: CorrelationId,
    logger: Logger,
  ): Promise<Result<unknown, AppError>> => {
    const route = routes.get(iface);
    if (!route) {
      return err(
        dispatchError(`Unknown interface "${iface}"`, {
          interface: iface,
          available: [...routes.keys()].sort(),
        }),
      );
    }
    try {
      return await route.invoke(operation, kwargs, { correlationId, logger });
    } catch (error: unknown) {
      logger.error("Operation threw", { error: describeError(error) });
      return err(operationFailed(`${iface}.${operation} failed: ${describeError(error)}`, error));
    }
  };

  const instrumented = async (
    iface: string,
    operation: string,
    kwargs: Readonly<Record<string, unknown>>,
    correlationId: CorrelationId,
  ): Promise<Result<unknown, AppError>> => {
    const logger = deps.logger().child({ correlationId, interface: iface, operation });
    const metrics = deps.metrics();
    const start = clock.now();

    logger.debug("Dispatching operation");
    const result = await invoke(iface, operation, kwargs, correlationId, logger);
    const durationMs = Math.round((clock.now() - start) * 100) / 100;

    const key = `${iface}.${operation}`;
    bump(calls, key);
    const outcome = result.ok ? "success" : result.error.kind;
    metrics.gatewayOperationsTotal.inc({ interface: iface, operation, outcome });
    metrics.gatewayOperationDurationMs.observe(durationMs, { interface: iface });

    if (result.ok) {
      logger.debug("Operation completed", { durationMs });
    } else {
      bump(failures, key);
      logger.info("Operation failed", {
        durationMs,
        errorKind: result.error.kind,
        error: result.error.message,
      });
    }
    return result;
  };

  const execute: Gateway["execute"] = async (iface, operation, kwargs = {}, options = {}) => {
    const correlationId = brand<string, "CorrelationId">(options.correlationId ?? generateId());
    try {
      const result = await instrumented(iface, operation, kwargs, correlationId);
      return toOperationResult(result, correlationId);
    } catch (error: unknown) {
      // Logger or metrics could not be built; still answer with a full result
      const failure = operationFailed(`Gateway failure: ${describeError(error)}`, error);
      return toOperationResult(err(failure), correlationId);
    }
  };

  return {
    execute,

    dispatch: (request) =>
      execute(
        request.interface,
        request.operation,
        request.kwargs ?? {},
        request.correlation_id !== undefined ? { correlationId: request.correlation_id } : {},
      ),

    stats(): GatewayStats {
      const interfaces: Record<string, readonly string[]> = {};
      for (const [name, route] of routes) {
        interfaces[name] = route.operations;
      }
      return {
        calls: Object.fromEntries(calls),
        failures: Object.fromEntries(failures),
        interfaces,
      };
    },
  };
};
