/**
 * @fileoverview Polling for eventually-consistent entitlement state
 * @module client/convergence
 *
 * @description
 * A read that follows a write may be served before the write is visible.
 * `awaitEntitlementState` polls getState under retryWithBackoff until the
 * expected state shows up, keeping that tolerance out of business logic.
 */

import {
  EntitlementError,
  EntitlementStateSnapshot,
  LicenseState,
} from "../types/Entitlement";
import { DEFAULT_BACKOFF_POLICY } from "../types/Backoff";
import { retryWithBackoff, RetryOptions } from "../lib/backoff";
import { EntitlementClient } from "./entitlementClient";

/**
 * What the polled snapshot must look like
 */
export interface StateExpectation {
  state: LicenseState;

  /** Expected activation code, when it matters */
  activationCode?: string;

  /**
   * Expected expiry compared at whole-second precision; null requires no expiry
   */
  expiresAt?: Date | null;

  /** Extra check, e.g. "expires more than a year from now" */
  check?: (snapshot: EntitlementStateSnapshot) => string | null;
}

/**
 * Returns why a snapshot does not match an expectation, or null if it does
 *
 * @param {EntitlementStateSnapshot} snapshot - Observed state
 * @param {StateExpectation} expected - Expected state
 * @returns {string | null} Mismatch description
 */
export function describeMismatch(
  snapshot: EntitlementStateSnapshot,
  expected: StateExpectation
): string | null {
  if (snapshot.state !== expected.state) {
    return `expected entitlement state to be ${expected.state} but was ${snapshot.state}`;
  }

  if (expected.activationCode !== undefined && snapshot.activationCode !== expected.activationCode) {
    return "incorrect activation code";
  }

  if (expected.expiresAt === null && snapshot.expiresAt !== undefined) {
    return `expected no expiry but found ${snapshot.expiresAt.toISOString()}`;
  }

  if (expected.expiresAt) {
    const want = Math.floor(expected.expiresAt.getTime() / 1000);
    const got = snapshot.expiresAt ? Math.floor(snapshot.expiresAt.getTime() / 1000) : undefined;
    if (got !== want) {
      return `expected expiry ${new Date(want * 1000).toISOString()} but was ${
        got === undefined ? "none" : new Date(got * 1000).toISOString()
      }`;
    }
  }

  return expected.check ? expected.check(snapshot) : null;
}

/**
 * Polls getState until it matches `expected`
 *
 * @param {EntitlementClient} client - Shared client handle
 * @param {StateExpectation} expected - State to wait for
 * @param {RetryOptions} options - Retry options; the policy defaults to DEFAULT_BACKOFF_POLICY
 * @returns {Promise<EntitlementStateSnapshot>} The first matching snapshot
 * @throws {RetryExhaustedError} If the state does not converge within the policy
 * @throws {RetryCancelledError} If the signal fires first
 * @throws {EntitlementError} Immediately, for non-retryable service errors
 *
 * @example
 * ```typescript
 * await client.activate(code);
 * await awaitEntitlementState(client, { state: "ACTIVE", activationCode: code });
 * ```
 */
export async function awaitEntitlementState(
  client: Pick<EntitlementClient, "getState">,
  expected: StateExpectation,
  options: RetryOptions = {}
): Promise<EntitlementStateSnapshot> {
  return retryWithBackoff(
    async () => {
      const snapshot = await client.getState({ signal: options.signal });
      const mismatch = describeMismatch(snapshot, expected);
      if (mismatch) {
        throw new EntitlementError(mismatch, "STATE_NOT_CONVERGED");
      }
      return snapshot;
    },
    {
      policy: DEFAULT_BACKOFF_POLICY,
      isRetryable: (error) => !(error instanceof EntitlementError) || error.retryable,
      ...options,
    }
  );
}
