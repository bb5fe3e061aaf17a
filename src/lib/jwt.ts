/**
 * @fileoverview Activation code signature verification
 * @module lib/jwt
 */

import jwt from "jsonwebtoken";
import {
  ActivationCodeClaims,
  ActivationCodeVerifyOptions,
  ActivationCodeVerifyResult,
} from "../types/ActivationCode";

/**
 * Activation codes are signed by the licensing authority's private key
 */
const JWT_ALGORITHM = "RS256";

/**
 * Compact JWS shape: three base64url segments
 */
const COMPACT_JWS_REGEX = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

/**
 * Checks that a string has the compact JWS shape
 *
 * @param {string} token - Candidate token
 * @returns {boolean} True if the token has three base64url segments
 */
export function isCompactJws(token: string): boolean {
  return COMPACT_JWS_REGEX.test(token);
}

/**
 * Verifies an activation code's signature and decodes its claims
 *
 * @param {string} token - The activation code
 * @param {ActivationCodeVerifyOptions} options - Public key and expected issuer
 * @returns {ActivationCodeVerifyResult} Verification result with claims or error
 *
 * @example
 * ```typescript
 * const result = verifyActivationToken(code, { publicKey, issuer: "enterprise-licensing" });
 * if (result.valid) {
 *   console.log(result.claims.sub);
 * }
 * ```
 */
export function verifyActivationToken(
  token: string,
  options: ActivationCodeVerifyOptions
): ActivationCodeVerifyResult {
  if (!token || token.trim() === "") {
    return { valid: false, error: "Activation code cannot be empty" };
  }

  if (!options.publicKey || options.publicKey.trim() === "") {
    return { valid: false, error: "Verification key is not configured" };
  }

  try {
    const decoded = jwt.verify(token, options.publicKey, {
      algorithms: [JWT_ALGORITHM],
      issuer: options.issuer ? options.issuer : undefined,
    });

    if (typeof decoded === "string") {
      return { valid: false, error: "Activation code payload must be a JSON object" };
    }

    if (typeof decoded.sub !== "string" || decoded.sub.trim() === "") {
      return { valid: false, error: "Activation code missing required claims" };
    }

    const features: unknown = decoded.features;
    if (
      features !== undefined &&
      !(Array.isArray(features) && features.every((f) => typeof f === "string"))
    ) {
      return { valid: false, error: "Activation code features must be a list of strings" };
    }

    const claims: ActivationCodeClaims = {
      sub: decoded.sub,
      iss: decoded.iss,
      iat: decoded.iat,
      exp: decoded.exp,
      features: Array.isArray(features) ? features.filter((f): f is string => typeof f === "string") : [],
    };

    return { valid: true, claims };
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return { valid: false, error: "Activation code has expired" };
    }
    if (error instanceof jwt.NotBeforeError) {
      return { valid: false, error: "Activation code is not yet valid" };
    }
    if (error instanceof jwt.JsonWebTokenError) {
      if (error.message.startsWith("jwt issuer invalid")) {
        return { valid: false, error: "Activation code issuer is invalid" };
      }
      return { valid: false, error: "Activation code signature is invalid" };
    }
    return { valid: false, error: "Activation code verification failed" };
  }
}

/**
 * Converts a JWT `exp` claim to a Date
 *
 * @param {ActivationCodeClaims} claims - Decoded claims
 * @returns {Date | undefined} The expiry, or undefined when the code never expires
 */
export function claimsExpiry(claims: ActivationCodeClaims): Date | undefined {
  return claims.exp === undefined ? undefined : new Date(claims.exp * 1000);
}
