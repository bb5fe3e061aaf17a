/**
 * @fileoverview Client-side entry point: entitlement client and convergence polling
 * @module client
 */

export * from "./entitlementClient";
export * from "./convergence";
export * from "../lib/backoff";
export * from "../types/Backoff";
export * from "../types/Entitlement";
