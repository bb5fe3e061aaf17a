/**
 * @fileoverview Enterprise Entitlement Service - Firebase Cloud Functions Entry Point
 * @module index
 *
 * @description
 * This is the main entry point for all Cloud Functions.
 * All functions are exported from this file and deployed to Firebase.
 */

// ==================== ENTITLEMENT ENDPOINTS ====================

/**
 * POST /activate
 *
 * Installs an activation code, optionally with an earlier expiry.
 * Re-activation from any state replaces the installed code.
 *
 * @see {@link module:api/enterprise/activate}
 */
export { activate } from "./api/enterprise";

/**
 * POST /deactivate
 *
 * Removes the installed activation code. Always succeeds.
 *
 * @see {@link module:api/enterprise/deactivate}
 */
export { deactivate } from "./api/enterprise";

/**
 * GET /getState
 *
 * Returns NONE, ACTIVE or EXPIRED, derived at read time, with the
 * installed code and expiry.
 *
 * @see {@link module:api/enterprise/getState}
 */
export { getState } from "./api/enterprise";
