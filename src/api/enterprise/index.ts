/**
 * @fileoverview Entitlement Cloud Functions
 * @module api/enterprise
 *
 * @description
 * One service instance per function instance. The three functions below
 * share it, so the record lives as long as the instance does.
 */

import { onRequest, HttpsOptions } from "firebase-functions/v2/https";
import { createEntitlementService } from "../../services/entitlementService";
import { createActivationCodeValidator } from "../../services/activationCode";
import {
  activationCodeIssuer,
  activationPublicKey,
  entitlementRegion,
  normalizePem,
} from "../../lib/params";
import { createLogger } from "../../lib/logger";
import { createActivateHandler } from "./activate";
import { createDeactivateHandler } from "./deactivate";
import { createGetStateHandler } from "./getState";

/**
 * Options shared by the entitlement functions. A single instance keeps
 * one record per deployment.
 */
const FUNCTION_OPTIONS: HttpsOptions = {
  region: entitlementRegion,
  cors: true,
  maxInstances: 1,
};

/**
 * Service instance shared by all entitlement endpoints
 */
export const entitlementService = createEntitlementService({
  validator: createActivationCodeValidator(() => ({
    publicKey: normalizePem(activationPublicKey.value()),
    issuer: activationCodeIssuer.value(),
  })),
  logger: createLogger({ service: "entitlement" }),
});

/**
 * Cloud Function: POST /activate
 */
export const activate = onRequest(FUNCTION_OPTIONS, createActivateHandler(entitlementService));

/**
 * Cloud Function: POST /deactivate
 */
export const deactivate = onRequest(FUNCTION_OPTIONS, createDeactivateHandler(entitlementService));

/**
 * Cloud Function: GET /getState
 */
export const getState = onRequest(FUNCTION_OPTIONS, createGetStateHandler(entitlementService));
