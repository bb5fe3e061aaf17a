/**
 * @fileoverview Parameterized configuration for the entitlement functions
 * @module lib/params
 */

import { defineString } from "firebase-functions/params";

/**
 * PEM-encoded RSA public key of the licensing authority.
 * Literal `\n` sequences are accepted in place of newlines.
 */
export const activationPublicKey = defineString("ACTIVATION_PUBLIC_KEY", {
  description: "RSA public key (PEM) used to verify activation codes",
});

/**
 * Expected `iss` claim of activation codes; empty disables the check
 */
export const activationCodeIssuer = defineString("ACTIVATION_CODE_ISSUER", {
  default: "enterprise-licensing",
});

/**
 * Region the entitlement functions are deployed to
 */
export const entitlementRegion = defineString("ENTITLEMENT_REGION", {
  default: "europe-west1",
});

/**
 * Normalizes a PEM value read from configuration
 *
 * @param {string} value - Raw parameter value
 * @returns {string} PEM with real newlines
 */
export function normalizePem(value: string): string {
  return value.trim().replace(/\\n/g, "\n");
}
