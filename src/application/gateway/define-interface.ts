/**
 * Interface definitions: one closed operation set per gateway interface.
 *
 * Each interface pairs a zod discriminated union (keyed on `operation`) with
 * a handler whose switch over that union is checked for exhaustiveness at
 * compile time. `defineInterface` erases the component and request types
 * behind a closure so the gateway can keep every route in one table.
 */

import type { z } from "zod";
import { type AppError, dispatchError, validation } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { CorrelationId } from "../../core/types/brand.js";
import { type Result, err } from "../../core/types/result.js";

export interface OperationContext {
  readonly correlationId: CorrelationId;
  /** Logger with the correlation id and interface bound */
  readonly logger: Logger;
}

export type OperationOptions = z.ZodDiscriminatedUnionOption<"operation">[];

export interface InterfaceDefinition<C, O extends OperationOptions> {
  readonly name: string;
  /** Resolve the backing component (through the singleton registry) */
  readonly resolve: () => C;
  readonly schema: z.ZodDiscriminatedUnion<"operation", O>;
  readonly handle: (
    component: C,
    request: z.output<O[number]>,
    ctx: OperationContext,
  ) => Result<unknown, AppError> | Promise<Result<unknown, AppError>>;
}

export interface InterfaceRoute {
  readonly name: string;
  readonly operations: readonly string[];
  invoke(
    operation: string,
    kwargs: Readonly<Record<string, unknown>>,
    ctx: OperationContext,
  ): Promise<Result<unknown, AppError>>;
}

const describeIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });

export const defineInterface = <C, O extends OperationOptions>(
  definition: InterfaceDefinition<C, O>,
): InterfaceRoute => {
  const { name, resolve, schema, handle } = definition;
  const operations = [...schema.optionsMap.keys()].map(String).sort();

  return {
    name,
    operations,

    async invoke(operation, kwargs, ctx) {
      if (!operations.includes(operation)) {
        return err(
          dispatchError(`Unknown operation "${operation}" for interface "${name}"`, {
            interface: name,
            operation,
            available: operations,
          }),
        );
      }

      const parsed = schema.safeParse({ ...kwargs, operation });
      if (!parsed.success) {
        return err(
          validation(`Invalid arguments for ${name}.${operation}`, {
            issues: describeIssues(parsed.error),
          }),
        );
      }

      // Construction failures propagate to the gateway as OperationError
      const component = resolve();
      return handle(component, parsed.data, ctx);
    },
  };
};
