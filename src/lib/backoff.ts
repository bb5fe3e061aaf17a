/**
 * @fileoverview Retry-with-backoff executor
 * @module lib/backoff
 *
 * @description
 * A policy value plus a stateless executor. Each call to `retryWithBackoff`
 * owns its own attempt counter and clock reading, so concurrent invocations
 * never interfere.
 *
 * Lifecycle of one invocation:
 * Running -> Succeeded, Running -> BackoffWait -> Running, and
 * Running | BackoffWait -> Exhausted (RetryExhaustedError) or
 * Cancelled (RetryCancelledError).
 */

import {
  BackoffPolicy,
  DEFAULT_BACKOFF_POLICY,
  RetryCancelledError,
  RetryExhaustedError,
} from "../types/Backoff";
import { Logger } from "./logger";

/**
 * Suspends for `ms`, rejecting early if `signal` fires
 */
export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Information passed to the onRetry hook before each wait
 */
export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  attempt: number;

  /** Error thrown by that attempt */
  error: unknown;

  /** Delay before the next attempt, in ms */
  delayMs: number;

  /** Time spent so far, in ms */
  elapsedMs: number;
}

/**
 * Options for a retry invocation
 */
export interface RetryOptions {
  /** Backoff policy; defaults to DEFAULT_BACKOFF_POLICY */
  policy?: BackoffPolicy;

  /** Cancellation or deadline (e.g. `AbortSignal.timeout(ms)`) */
  signal?: AbortSignal;

  /** Errors for which this returns false propagate immediately; defaults to retrying all */
  isRetryable?: (error: unknown) => boolean;

  /** Called before each backoff wait */
  onRetry?: (event: RetryEvent) => void;

  /** Logs each retry at warn level when provided */
  logger?: Logger;

  /** Monotonic clock in ms */
  now?: () => number;

  /** Timed wait between attempts */
  sleep?: SleepFunction;

  /** Uniform random source in [0, 1) used for jitter */
  random?: () => number;
}

/**
 * Validates a policy and fills omitted fields from the default
 *
 * @param {Partial<BackoffPolicy>} overrides - Fields to change
 * @returns {BackoffPolicy} Complete policy
 * @throws {RangeError} If any field is out of range
 *
 * @example
 * ```typescript
 * const policy = createBackoffPolicy({ maxAttempts: 5, maxElapsedMs: null });
 * ```
 */
export function createBackoffPolicy(overrides: Partial<BackoffPolicy> = {}): BackoffPolicy {
  const policy: BackoffPolicy = { ...DEFAULT_BACKOFF_POLICY, ...overrides };

  if (!(policy.initialIntervalMs >= 0)) {
    throw new RangeError("initialIntervalMs must be >= 0");
  }
  if (!(policy.multiplier >= 1)) {
    throw new RangeError("multiplier must be >= 1");
  }
  if (!(policy.maxIntervalMs >= policy.initialIntervalMs)) {
    throw new RangeError("maxIntervalMs must be >= initialIntervalMs");
  }
  if (policy.maxElapsedMs !== null && !(policy.maxElapsedMs >= 0)) {
    throw new RangeError("maxElapsedMs must be >= 0 or null");
  }
  if (
    policy.maxAttempts !== undefined &&
    !(Number.isInteger(policy.maxAttempts) && policy.maxAttempts >= 1)
  ) {
    throw new RangeError("maxAttempts must be a positive integer");
  }
  if (!(policy.randomizationFactor >= 0 && policy.randomizationFactor <= 1)) {
    throw new RangeError("randomizationFactor must be between 0 and 1");
  }

  return policy;
}

/**
 * Computes the delay before retry number `retry` (0-based)
 *
 * @param {BackoffPolicy} policy - Backoff policy
 * @param {number} retry - Number of retries already performed
 * @param {Function} random - Uniform random source in [0, 1)
 * @returns {number} Delay in ms
 *
 * @example
 * ```typescript
 * computeBackoffDelay(TESTING_BACKOFF_POLICY, 0); // 100
 * computeBackoffDelay(TESTING_BACKOFF_POLICY, 3); // 800
 * computeBackoffDelay(TESTING_BACKOFF_POLICY, 9); // 1000 (capped)
 * ```
 */
export function computeBackoffDelay(
  policy: BackoffPolicy,
  retry: number,
  random: () => number = Math.random
): number {
  const base = Math.min(
    policy.initialIntervalMs * Math.pow(policy.multiplier, retry),
    policy.maxIntervalMs
  );

  if (policy.randomizationFactor === 0) {
    return base;
  }

  const delta = policy.randomizationFactor * base;
  return Math.round(base - delta + random() * (2 * delta));
}

/**
 * Timer-based sleep that rejects with the signal's reason on abort
 *
 * @param {number} ms - Milliseconds to sleep
 * @param {AbortSignal} signal - Optional cancellation signal
 * @returns {Promise<void>}
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Invokes `operation` until it succeeds, the policy runs out, or the signal fires
 *
 * @param {Function} operation - Work to attempt; receives the 1-based attempt number
 * @param {RetryOptions} options - Policy, cancellation and test hooks
 * @returns {Promise<T>} The first successful result
 * @throws {RetryExhaustedError} When attempts or elapsed time exceed the policy
 * @throws {RetryCancelledError} When the signal fires before success
 * @throws Any error for which `isRetryable` returns false, unwrapped
 *
 * @example
 * ```typescript
 * const state = await retryWithBackoff(() => client.getState(), {
 *   policy: TESTING_BACKOFF_POLICY,
 *   signal: AbortSignal.timeout(30_000),
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy = options.policy ?? DEFAULT_BACKOFF_POLICY;
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const isRetryable = options.isRetryable ?? (() => true);
  const { signal } = options;

  const startedAt = now();
  let attempt = 0;
  let lastError: unknown;

  for (;;) {
    if (signal?.aborted) {
      throw new RetryCancelledError(signal.reason, attempt, lastError);
    }

    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;
    }

    if (signal?.aborted) {
      throw new RetryCancelledError(signal.reason, attempt, lastError);
    }

    const elapsedMs = now() - startedAt;

    if (policy.maxAttempts !== undefined && attempt >= policy.maxAttempts) {
      throw new RetryExhaustedError(attempt, elapsedMs, lastError);
    }

    const delayMs = computeBackoffDelay(policy, attempt - 1, random);

    if (policy.maxElapsedMs !== null && elapsedMs + delayMs > policy.maxElapsedMs) {
      throw new RetryExhaustedError(attempt, elapsedMs, lastError);
    }

    options.onRetry?.({ attempt, error: lastError, delayMs, elapsedMs });
    options.logger?.warn("Retrying after error", {
      attempt,
      delay_ms: delayMs,
      elapsed_ms: elapsedMs,
      error: lastError instanceof Error ? lastError.message : String(lastError),
    });

    try {
      await wait(delayMs, signal);
    } catch (reason) {
      if (signal?.aborted) {
        throw new RetryCancelledError(signal.reason, attempt, lastError);
      }
      throw reason;
    }
  }
}
