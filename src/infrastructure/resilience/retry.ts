/**
 * Retry with exponential backoff: bounded, deterministic retry loop shared by
 * the HTTP and WebSocket clients.
 *
 *   - delay(i) = backoffBaseMs × backoffMultiplier^i, no jitter
 *   - total sleep budget is known up front (see retryBudgetMs)
 *   - the caller classifies each attempt; only "retriable" outcomes loop
 */

import { z } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import type { AttemptOutcome, RetryHooks, RetryPolicy, RetryRun } from "../../core/ports/retry.js";
import { type Result, err, ok } from "../../core/types/result.js";

export const DEFAULT_RETRIABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  backoffBaseMs: 100,
  backoffMultiplier: 2.0,
  retriableStatusCodes: new Set(DEFAULT_RETRIABLE_STATUS_CODES),
});

export const retryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10),
    backoffBaseMs: z.number().int().min(50).max(1000),
    backoffMultiplier: z.number().min(1).max(5),
    retriableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .partial()
  .strict();

export type RetryPolicyInput = z.infer<typeof retryPolicySchema>;

/**
 * Validate a (possibly partial) policy description and build a new immutable
 * policy. Missing fields are taken from `base`.
 */
export const parseRetryPolicy = (
  input: unknown,
  base: RetryPolicy = DEFAULT_RETRY_POLICY,
): Result<RetryPolicy, AppError> => {
  const parsed = retryPolicySchema.safeParse(input ?? {});
  if (!parsed.success) {
    return err(
      validation("Invalid retry policy", {
        issues: parsed.error.issues.map((i) => `${i.path.join(".") || "policy"}: ${i.message}`),
      }),
    );
  }
  const { maxAttempts, backoffBaseMs, backoffMultiplier, retriableStatusCodes } = parsed.data;
  return ok(
    Object.freeze({
      maxAttempts: maxAttempts ?? base.maxAttempts,
      backoffBaseMs: backoffBaseMs ?? base.backoffBaseMs,
      backoffMultiplier: backoffMultiplier ?? base.backoffMultiplier,
      retriableStatusCodes:
        retriableStatusCodes !== undefined
          ? new Set(retriableStatusCodes)
          : new Set(base.retriableStatusCodes),
    }),
  );
};

/** Delay before retry number `retryIndex` (0-based). */
export const backoffDelay = (policy: RetryPolicy, retryIndex: number): number =>
  policy.backoffBaseMs * policy.backoffMultiplier ** retryIndex;

/** Sum of every backoff sleep a fully exhausted call would perform. */
export const retryBudgetMs = (policy: RetryPolicy): number => {
  let total = 0;
  for (let i = 0; i < policy.maxAttempts - 1; i++) {
    total += backoffDelay(policy, i);
  }
  return total;
};

export const isRetriableStatus = (policy: RetryPolicy, status: number): boolean =>
  policy.retriableStatusCodes.has(status);

/** Plain JSON view of a policy (sets do not serialise). */
export const describeRetryPolicy = (policy: RetryPolicy) => ({
  maxAttempts: policy.maxAttempts,
  backoffBaseMs: policy.backoffBaseMs,
  backoffMultiplier: policy.backoffMultiplier,
  retriableStatusCodes: [...policy.retriableStatusCodes].sort((a, b) => a - b),
  budgetMs: retryBudgetMs(policy),
});

interface ExecuteHooks extends RetryHooks {
  readonly sleep: (ms: number) => Promise<void>;
}

/**
 * Run `attempt` until it succeeds, fails terminally, or the policy's attempts
 * are used up. The 1-based attempt number is passed to each call.
 */
export const executeWithRetry = async <T, E>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T, E>>,
  hooks: ExecuteHooks,
): Promise<RetryRun<T, E>> => {
  const delaysMs: number[] = [];
  let attemptNumber = 1;

  for (;;) {
    const outcome = await attempt(attemptNumber);

    if (outcome.kind !== "retriable" || attemptNumber >= policy.maxAttempts) {
      return { outcome, attemptsUsed: attemptNumber, delaysMs };
    }

    const delay = backoffDelay(policy, attemptNumber - 1);
    hooks.onRetry?.(attemptNumber, delay);
    await hooks.sleep(delay);
    delaysMs.push(delay);
    attemptNumber++;
  }
};
