/**
 * @fileoverview Central export for all type definitions
 * @module types
 */

export * from "./ActivationCode";
export * from "./Backoff";
export * from "./Entitlement";
