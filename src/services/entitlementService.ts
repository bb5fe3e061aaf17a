/**
 * @fileoverview Entitlement service: the RPC-facing façade over the state machine
 * @module services/entitlementService
 */

import {
  EntitlementError,
  EntitlementRecord,
  EntitlementStateSnapshot,
  LicenseState,
} from "../types/Entitlement";
import { ActivationCodeValidator } from "./activationCode";
import { EntitlementStateMachine } from "./entitlementStateMachine";
import { Mutex } from "../lib/mutex";
import { Logger, maskActivationCode } from "../lib/logger";

/**
 * Dependencies of the entitlement service
 */
export interface EntitlementServiceOptions {
  /** Offline activation code validator */
  validator: ActivationCodeValidator;

  /** Clock used to derive state; defaults to the wall clock */
  now?: () => Date;

  /** Logger; defaults to one tagged with the service name */
  logger?: Logger;

  /** Record to start from; defaults to an empty record (NONE) */
  initialRecord?: EntitlementRecord;
}

/**
 * EntitlementService
 *
 * @class EntitlementService
 *
 * @description
 * Every call is one atomic transaction against the record. Validation runs
 * before the lock is taken, and the critical sections do no I/O, so no call
 * waits on anything but the lock itself.
 *
 * The service applies no authorization: any caller that can reach it can
 * change the license state.
 *
 * @example
 * ```typescript
 * const service = new EntitlementService({ validator });
 * await service.activate(code);
 * const { state } = await service.getState();
 * ```
 */
export class EntitlementService {
  private readonly validator: ActivationCodeValidator;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly machine = new EntitlementStateMachine();
  private readonly mutex = new Mutex();

  constructor(options: EntitlementServiceOptions) {
    this.validator = options.validator;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? new Logger({ service: "entitlement" });
    if (options.initialRecord) {
      this.machine.restore(options.initialRecord);
    }
  }

  /**
   * Installs an activation code, replacing whatever was installed before
   *
   * @param {string} code - Activation code
   * @param {Date} expiresAt - Optional expiry; can shorten but not extend the code's own
   * @returns {Promise<EntitlementStateSnapshot>} The state right after the write
   * @throws {EntitlementError} INVALID_CODE if validation fails; the record is left untouched
   */
  async activate(code: string, expiresAt?: Date): Promise<EntitlementStateSnapshot> {
    const validation = this.validator(code);
    if (!validation.valid) {
      this.logger.warn("Activation rejected", {
        code_prefix: typeof code === "string" ? maskActivationCode(code.trim()) : undefined,
        reason: validation.error,
      });
      throw new EntitlementError(validation.error, validation.code);
    }

    const { activation } = validation;
    const snapshot = await this.transact("activate", () =>
      this.machine.activate(activation, expiresAt, this.now())
    );

    this.logger.info("Entitlement activated", {
      code_prefix: maskActivationCode(activation.code),
      customer_id: activation.customerId,
      state: snapshot.state,
      expires_at: snapshot.expiresAt?.toISOString() ?? null,
    });

    return snapshot;
  }

  /**
   * Removes any installed activation code. Succeeds from every state,
   * including NONE and an inconsistent record, any number of times in a row.
   */
  async deactivate(): Promise<void> {
    const previous = await this.transact("deactivate", () => {
      const before = this.previousState();
      this.machine.deactivate();
      return before;
    });

    this.logger.info("Entitlement deactivated", { previous_state: previous });
  }

  /**
   * Reads the record and derives its state at the current time
   *
   * @returns {Promise<EntitlementStateSnapshot>} State, code and expiry
   * @throws {EntitlementError} STATE_INCONSISTENT if the record breaks its invariants
   */
  async getState(): Promise<EntitlementStateSnapshot> {
    return this.transact("getState", () => this.machine.getState(this.now()));
  }

  /**
   * Runs a critical section under the lock and reports invariant breaks
   */
  private async transact<T>(operation: string, section: () => T): Promise<T> {
    try {
      return await this.mutex.runExclusive(section);
    } catch (error) {
      if (error instanceof EntitlementError && error.code === "STATE_INCONSISTENT") {
        this.logger.child({ operation }).error("Entitlement invariant violated", { error });
      }
      throw error;
    }
  }

  /**
   * State before a deactivation, for logging; INCONSISTENT when the record
   * breaks its invariants
   */
  private previousState(): LicenseState | "INCONSISTENT" {
    try {
      return this.machine.getState(this.now()).state;
    } catch (error) {
      if (error instanceof EntitlementError && error.code === "STATE_INCONSISTENT") {
        this.logger.warn("Clearing inconsistent entitlement record", { reason: error.message });
        return "INCONSISTENT";
      }
      throw error;
    }
  }
}

/**
 * Creates an entitlement service (factory function)
 *
 * @param {EntitlementServiceOptions} options - Service dependencies
 * @returns {EntitlementService} New service instance with an empty record
 */
export function createEntitlementService(
  options: EntitlementServiceOptions
): EntitlementService {
  return new EntitlementService(options);
}
