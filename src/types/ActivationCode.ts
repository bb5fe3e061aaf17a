/**
 * @fileoverview Activation code claim type definitions
 * @module types/ActivationCode
 */

/**
 * Claims embedded in a signed activation code
 *
 * @interface ActivationCodeClaims
 * @description An activation code is an RS256 JWT issued by the licensing
 * authority. Only the public half of the signing key is known to the service.
 *
 * @example
 * ```typescript
 * const claims: ActivationCodeClaims = {
 *   sub: "customer_123",
 *   iss: "enterprise-licensing",
 *   iat: 1700000000,
 *   exp: 1831536000,
 *   features: ["audit-log", "sso"]
 * };
 * ```
 */
export interface ActivationCodeClaims {
  /** Customer the code was issued to */
  sub: string;

  /** Issuing authority */
  iss?: string;

  /** Issued At timestamp (Unix seconds) */
  iat?: number;

  /** Expiration timestamp (Unix seconds); absent means the code never expires */
  exp?: number;

  /** Enterprise features unlocked by the code */
  features: string[];
}

/**
 * Options for activation code verification
 */
export interface ActivationCodeVerifyOptions {
  /** PEM-encoded RSA public key of the licensing authority */
  publicKey: string;

  /** Expected `iss` claim; the check is skipped when empty */
  issuer?: string;
}

/**
 * Result of activation code signature verification
 */
export interface ActivationCodeVerifyResult {
  /** Whether the signature and claims are valid */
  valid: boolean;

  /** Decoded claims if valid */
  claims?: ActivationCodeClaims;

  /** Error message if invalid */
  error?: string;
}

/**
 * An activation code that passed offline validation.
 * Only the validator produces values of this type.
 */
export interface ValidatedActivationCode {
  /** The activation code exactly as submitted (trimmed) */
  readonly code: string;

  /** Customer the code was issued to */
  readonly customerId: string;

  /** The code's own expiry, if it carries one */
  readonly expiresAt?: Date;

  /** Enterprise features unlocked by the code */
  readonly features: readonly string[];
}
