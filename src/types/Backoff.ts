/**
 * @fileoverview Backoff policy and retry error definitions
 * @module types/Backoff
 */

/**
 * Backoff policy governing delay growth and limits between retry attempts
 *
 * @interface BackoffPolicy
 */
export interface BackoffPolicy {
  /**
   * Delay before the first retry, in ms
   */
  initialIntervalMs: number;

  /**
   * Growth factor applied per retry
   */
  multiplier: number;

  /**
   * Upper bound for the un-jittered delay, in ms
   */
  maxIntervalMs: number;

  /**
   * Give up once elapsed time plus the next delay exceeds this; null is unlimited
   */
  maxElapsedMs: number | null;

  /**
   * Give up after this many attempts (the first call counts)
   */
  maxAttempts?: number;

  /**
   * Jitter as a fraction of the delay, 0 to 1; 0 disables jitter
   */
  randomizationFactor: number;
}

/**
 * Default policy for production callers
 */
export const DEFAULT_BACKOFF_POLICY: Readonly<BackoffPolicy> = {
  initialIntervalMs: 500,
  multiplier: 1.5,
  maxIntervalMs: 60_000,
  maxElapsedMs: 15 * 60_000,
  randomizationFactor: 0.5,
};

/**
 * Tight policy used by tests so they fail fast instead of hanging
 */
export const TESTING_BACKOFF_POLICY: Readonly<BackoffPolicy> = {
  initialIntervalMs: 100,
  multiplier: 2,
  maxIntervalMs: 1_000,
  maxElapsedMs: 10_000,
  randomizationFactor: 0,
};

/**
 * Thrown when a policy runs out before the operation succeeds
 *
 * @class RetryExhaustedError
 * @extends Error
 */
export class RetryExhaustedError extends Error {
  /** Number of times the operation was invoked */
  public readonly attempts: number;

  /** Time spent retrying, in ms */
  public readonly elapsedMs: number;

  /** Error from the final attempt */
  public readonly lastError: unknown;

  constructor(attempts: number, elapsedMs: number, lastError: unknown) {
    super(
      `Retry exhausted after ${attempts} attempt(s) in ${elapsedMs}ms: ${describeError(lastError)}`,
      { cause: lastError }
    );
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    this.lastError = lastError;
  }
}

/**
 * Thrown when the caller's signal fires before the operation succeeds
 *
 * @class RetryCancelledError
 * @extends Error
 */
export class RetryCancelledError extends Error {
  /** The abort reason supplied by the signal */
  public readonly reason: unknown;

  /** Error from the most recent attempt, if any attempt ran */
  public readonly lastError: unknown;

  /** Number of times the operation was invoked */
  public readonly attempts: number;

  constructor(reason: unknown, attempts: number, lastError: unknown) {
    super(`Retry cancelled after ${attempts} attempt(s): ${describeError(reason)}`, {
      cause: reason,
    });
    this.name = "RetryCancelledError";
    this.reason = reason;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? "unknown" : String(error);
}
