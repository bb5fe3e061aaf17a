/**
 * @fileoverview Offline activation code validation
 * @module services/activationCode
 */

import { ErrorCode } from "../types/Entitlement";
import {
  ActivationCodeVerifyOptions,
  ValidatedActivationCode,
} from "../types/ActivationCode";
import { claimsExpiry, isCompactJws, verifyActivationToken } from "../lib/jwt";

/**
 * Upper bound on accepted activation code length
 */
export const MAX_ACTIVATION_CODE_LENGTH = 8192;

/**
 * Activation code validation result
 */
export type ActivationCodeValidationResult =
  | { valid: true; activation: ValidatedActivationCode }
  | { valid: false; error: string; code: ErrorCode };

/**
 * Validator signature injected into the entitlement service
 */
export type ActivationCodeValidator = (code: string) => ActivationCodeValidationResult;

/**
 * Validates an activation code without any network access
 *
 * @param {string} code - The activation code to validate
 * @param {ActivationCodeVerifyOptions} options - Public key and expected issuer
 * @returns {ActivationCodeValidationResult} Validation result
 *
 * @example
 * ```typescript
 * const result = validateActivationCode(code, { publicKey });
 * if (!result.valid) {
 *   throw new EntitlementError(result.error, result.code);
 * }
 * ```
 */
export function validateActivationCode(
  code: string,
  options: ActivationCodeVerifyOptions
): ActivationCodeValidationResult {
  if (!code || typeof code !== "string" || code.trim() === "") {
    return invalid("Activation code is required");
  }

  const trimmed = code.trim();

  if (trimmed.length > MAX_ACTIVATION_CODE_LENGTH) {
    return invalid(`Activation code exceeds ${MAX_ACTIVATION_CODE_LENGTH} characters`);
  }

  if (!isCompactJws(trimmed)) {
    return invalid("Invalid activation code format");
  }

  const verification = verifyActivationToken(trimmed, options);
  if (!verification.valid || !verification.claims) {
    return invalid(verification.error ?? "Invalid activation code");
  }

  return {
    valid: true,
    activation: {
      code: trimmed,
      customerId: verification.claims.sub,
      expiresAt: claimsExpiry(verification.claims),
      features: verification.claims.features,
    },
  };
}

/**
 * Binds a validator to lazily resolved verification options
 *
 * @param {Function} resolveOptions - Called on every validation, so parameters
 *   are read at request time rather than at module load
 * @returns {ActivationCodeValidator} Validator for the entitlement service
 */
export function createActivationCodeValidator(
  resolveOptions: () => ActivationCodeVerifyOptions
): ActivationCodeValidator {
  return (code: string) => validateActivationCode(code, resolveOptions());
}

function invalid(error: string): ActivationCodeValidationResult {
  return { valid: false, error, code: "INVALID_CODE" };
}
