/**
 * @fileoverview Entitlement record and state derivation
 * @module services/entitlementStateMachine
 *
 * @description
 * Holds the single mutable entitlement record. The license state is never
 * stored: it is derived from the record and the supplied time on every read,
 * so expiry needs no timer.
 */

import {
  EntitlementError,
  EntitlementRecord,
  EntitlementStateSnapshot,
  LicenseState,
} from "../types/Entitlement";
import { ValidatedActivationCode } from "../types/ActivationCode";

/**
 * Truncates a date to whole seconds, the precision the protocol carries
 *
 * @param {Date} date - Date to truncate
 * @returns {Date} New date with milliseconds dropped
 */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * Picks the stored expiry: the earlier of the requested expiry and the
 * code's own. A request can shorten an activation but never extend it.
 *
 * @param {Date | undefined} requested - Expiry supplied with Activate
 * @param {Date | undefined} codeExpiry - Expiry embedded in the activation code
 * @returns {Date | undefined} Effective expiry, undefined when neither is set
 */
export function effectiveExpiry(
  requested: Date | undefined,
  codeExpiry: Date | undefined
): Date | undefined {
  if (requested === undefined) {
    return codeExpiry;
  }
  if (codeExpiry === undefined || requested.getTime() < codeExpiry.getTime()) {
    return requested;
  }
  return codeExpiry;
}

/**
 * Derives the license state of a record at a point in time
 *
 * @param {EntitlementRecord} record - Stored record
 * @param {Date} now - Time to evaluate against
 * @returns {LicenseState} Derived state
 * @throws {EntitlementError} STATE_INCONSISTENT if the record breaks its invariants
 */
export function deriveLicenseState(record: EntitlementRecord, now: Date): LicenseState {
  if (record.activationCode === undefined) {
    if (record.expiresAt !== undefined) {
      throw new EntitlementError(
        "Entitlement record has an expiry but no activation code",
        "STATE_INCONSISTENT"
      );
    }
    return "NONE";
  }

  if (record.expiresAt === undefined) {
    return "ACTIVE";
  }

  const expiresAtMs = record.expiresAt.getTime();
  if (Number.isNaN(expiresAtMs)) {
    throw new EntitlementError("Entitlement record has an invalid expiry", "STATE_INCONSISTENT");
  }

  return expiresAtMs > now.getTime() ? "ACTIVE" : "EXPIRED";
}

/**
 * EntitlementStateMachine
 *
 * @class EntitlementStateMachine
 * @description Not synchronized on its own; EntitlementService serializes
 * every call through its lock.
 *
 * @example
 * ```typescript
 * const machine = new EntitlementStateMachine();
 * machine.activate(validated);
 * machine.getState(new Date()).state; // "ACTIVE"
 * ```
 */
export class EntitlementStateMachine {
  private record: EntitlementRecord = {};

  /**
   * Overwrites the record. Allowed from every state; the last writer wins.
   *
   * @param {ValidatedActivationCode} activation - Output of the validator
   * @param {Date} requestedExpiry - Optional expiry supplied by the caller
   * @returns {EntitlementStateSnapshot} The record as stored, with its state at `now`
   */
  activate(
    activation: ValidatedActivationCode,
    requestedExpiry?: Date,
    now: Date = new Date()
  ): EntitlementStateSnapshot {
    const expiry = effectiveExpiry(requestedExpiry, activation.expiresAt);
    this.record = {
      activationCode: activation.code,
      expiresAt: expiry === undefined ? undefined : truncateToSeconds(expiry),
    };
    return this.getState(now);
  }

  /**
   * Clears the record. A no-op when nothing is installed.
   */
  deactivate(): void {
    this.record = {};
  }

  /**
   * Reads the record and derives its state at `now`
   *
   * @param {Date} now - Time to evaluate against
   * @returns {EntitlementStateSnapshot} Derived state plus the stored fields verbatim
   */
  getState(now: Date = new Date()): EntitlementStateSnapshot {
    const state = deriveLicenseState(this.record, now);
    if (state === "NONE") {
      return { state };
    }
    return {
      state,
      activationCode: this.record.activationCode,
      expiresAt: this.record.expiresAt === undefined ? undefined : new Date(this.record.expiresAt),
    };
  }

  /**
   * Replaces the record without validation. Used to load a record from
   * outside; an inconsistent record surfaces on the next read.
   *
   * @param {EntitlementRecord} record - Record to install
   */
  restore(record: EntitlementRecord): void {
    this.record = {
      activationCode: record.activationCode,
      expiresAt: record.expiresAt === undefined ? undefined : new Date(record.expiresAt),
    };
  }
}
