import type { AppError, ErrorKind } from "../errors/app-error.js";
import type { Result } from "./result.js";

/**
 * Wire-level result of a gateway dispatch. Field names follow the gateway
 * contract consumed by integration code, hence snake_case.
 *
 * Never partially populated: either `data` or the full error triple.
 */
export type OperationResult<T = unknown> = OperationSuccess<T> | OperationFailure;

export interface OperationSuccess<T> {
  readonly success: true;
  readonly data: T;
  readonly correlation_id: string;
}

export interface OperationFailure {
  readonly success: false;
  readonly error: string;
  readonly error_kind: ErrorKind;
  readonly details?: Record<string, unknown>;
  readonly correlation_id: string;
}

/** Unit of work accepted by the gateway. */
export interface OperationRequest {
  readonly interface: string;
  readonly operation: string;
  readonly kwargs?: Record<string, unknown>;
  readonly correlation_id?: string;
}

export const toOperationResult = <T>(
  result: Result<T, AppError>,
  correlationId: string,
): OperationResult<T> => {
  if (result.ok) {
    return { success: true, data: result.value, correlation_id: correlationId };
  }
  const { kind, message, details } = result.error;
  return details !== undefined
    ? { success: false, error: message, error_kind: kind, details, correlation_id: correlationId }
    : { success: false, error: message, error_kind: kind, correlation_id: correlationId };
};
