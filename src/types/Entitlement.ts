/**
 * @fileoverview Entitlement record, state and RPC type definitions
 * @module types/Entitlement
 */

/**
 * Derived license status
 * - NONE: never activated, or deactivated
 * - ACTIVE: activated and not past its expiry
 * - EXPIRED: activated, but the expiry has passed
 */
export type LicenseState = "NONE" | "ACTIVE" | "EXPIRED";

/**
 * All license states, in declaration order
 */
export const LICENSE_STATES: readonly LicenseState[] = ["NONE", "ACTIVE", "EXPIRED"];

/**
 * The single mutable entitlement record held by a service instance
 *
 * @interface EntitlementRecord
 * @description State is never stored here. It is derived from these two
 * fields and the current time on every read.
 */
export interface EntitlementRecord {
  /** Activation code; absent when no license is installed */
  activationCode?: string;

  /** Expiry; absent means the activation never expires */
  expiresAt?: Date;
}

/**
 * Result of reading the entitlement record at a point in time
 */
export interface EntitlementStateSnapshot {
  state: LicenseState;
  activationCode?: string;
  expiresAt?: Date;
}

/**
 * Request body for POST activate
 *
 * @example
 * ```typescript
 * const request: ActivateRequest = {
 *   activation_code: "eyJhbGciOiJSUzI1NiIsInR5cCI6IkpXVCJ9...",
 *   expires: "2027-01-01T00:00:00.000Z"
 * };
 * ```
 */
export interface ActivateRequest {
  /** Signed activation code */
  activation_code: string;

  /** Optional ISO-8601 expiry overriding (never extending) the code's own */
  expires?: string | null;
}

/**
 * Success response without a payload (activate, deactivate)
 */
export interface EmptySuccessResponse {
  success: true;
}

/**
 * Success response for getState
 */
export interface GetStateSuccessResponse {
  success: true;

  /** Derived license state */
  state: LicenseState;

  /** Installed activation code, or "" when state is NONE */
  activation_code: string;

  /** ISO-8601 expiry at whole-second precision, or null when none */
  expires: string | null;
}

/**
 * Error response shared by every endpoint
 */
export interface ErrorResponse {
  success: false;

  /** Human-readable error message */
  error: string;

  /** Machine-readable error code */
  code: ErrorCode;
}

export type ActivateResponse = EmptySuccessResponse | ErrorResponse;
export type DeactivateResponse = EmptySuccessResponse | ErrorResponse;
export type GetStateResponse = GetStateSuccessResponse | ErrorResponse;

/**
 * Error codes for entitlement operations
 */
export type ErrorCode =
  | "INVALID_CODE"
  | "INVALID_EXPIRY"
  | "MISSING_FIELDS"
  | "INVALID_METHOD"
  | "TRANSIENT_UNAVAILABLE"
  | "STATE_NOT_CONVERGED"
  | "STATE_INCONSISTENT"
  | "INTERNAL_ERROR";

/**
 * Error code to HTTP status code mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, number> = {
  INVALID_CODE: 400,
  INVALID_EXPIRY: 400,
  MISSING_FIELDS: 400,
  INVALID_METHOD: 405,
  STATE_NOT_CONVERGED: 409,
  TRANSIENT_UNAVAILABLE: 503,
  STATE_INCONSISTENT: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Error code to human-readable message mapping
 */
export const ERROR_MESSAGE_MAP: Record<ErrorCode, string> = {
  INVALID_CODE: "Invalid activation code",
  INVALID_EXPIRY: "expires must be an ISO-8601 timestamp",
  MISSING_FIELDS: "Missing required field: activation_code",
  INVALID_METHOD: "Method not allowed",
  STATE_NOT_CONVERGED: "Entitlement state has not converged",
  TRANSIENT_UNAVAILABLE: "Entitlement service is temporarily unavailable",
  STATE_INCONSISTENT: "Entitlement record is inconsistent",
  INTERNAL_ERROR: "Internal server error",
};

/**
 * Codes a caller may reasonably retry
 */
const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "TRANSIENT_UNAVAILABLE",
  "STATE_NOT_CONVERGED",
]);

/**
 * Type guard for error codes received over the wire
 *
 * @param {unknown} value - Candidate code
 * @returns {boolean} True if value is a known ErrorCode
 */
export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(ERROR_STATUS_MAP, value);
}

/**
 * Type guard for license states received over the wire
 */
export function isLicenseState(value: unknown): value is LicenseState {
  return typeof value === "string" && LICENSE_STATES.some((state) => state === value);
}

/**
 * Custom error class for entitlement failures
 *
 * @class EntitlementError
 * @extends Error
 *
 * @example
 * ```typescript
 * throw new EntitlementError("Activation code has expired", "INVALID_CODE");
 * ```
 */
export class EntitlementError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: ErrorCode;

  /**
   * Whether a caller may retry the failed call
   */
  public readonly retryable: boolean;

  /**
   * HTTP status code associated with the code
   */
  public readonly statusCode: number;

  /**
   * Creates an EntitlementError
   *
   * @param {string} message - Human-readable error message
   * @param {ErrorCode} code - Error code
   * @param {ErrorOptions} options - Standard error options (cause)
   */
  constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "EntitlementError";
    this.code = code;
    this.retryable = RETRYABLE_CODES.has(code);
    this.statusCode = ERROR_STATUS_MAP[code];
  }
}
