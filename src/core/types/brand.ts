/**
 * Branded / Opaque type utility.
 * Prevents accidental interchange of structurally identical primitives.
 *
 * @example
 * type ConnectionId = Brand<string, "ConnectionId">;
 * const id: ConnectionId = brand("ws-1");
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type CorrelationId = Brand<string, "CorrelationId">;
export type ConnectionId = Brand<string, "ConnectionId">;

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;
