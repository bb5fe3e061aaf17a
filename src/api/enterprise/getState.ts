/**
 * @fileoverview getState endpoint
 * @module api/enterprise/getState
 */

import { Request, Response } from "express";
import { EntitlementService } from "../../services/entitlementService";
import { beginRequest, sendFailure } from "../../middleware/request";
import { EntitlementStateSnapshot, GetStateSuccessResponse } from "../../types/Entitlement";

/**
 * Serializes a snapshot for the wire
 *
 * @param {EntitlementStateSnapshot} snapshot - Service result
 * @returns {GetStateSuccessResponse} Response body
 */
export function toGetStateResponse(snapshot: EntitlementStateSnapshot): GetStateSuccessResponse {
  return {
    success: true,
    state: snapshot.state,
    activation_code: snapshot.activationCode ?? "",
    expires: snapshot.expiresAt ? snapshot.expiresAt.toISOString() : null,
  };
}

/**
 * Creates the getState handler
 *
 * @param {EntitlementService} service - Service owning the entitlement record
 * @returns Request handler
 *
 * @description
 * Success Response (200):
 * ```json
 * {
 *   "success": true,
 *   "state": "EXPIRED",
 *   "activation_code": "eyJhbGciOiJSUzI1NiIs...",
 *   "expires": "2026-10-19T09:59:30.000Z"
 * }
 * ```
 */
export function createGetStateHandler(service: EntitlementService) {
  return async (req: Request, res: Response): Promise<void> => {
    const logger = beginRequest(req, res, { endpoint: "getState", methods: ["GET", "POST"] });
    if (!logger) {
      return;
    }

    try {
      const snapshot = await service.getState();
      logger.debug("State read", { state: snapshot.state });
      res.status(200).json(toGetStateResponse(snapshot));
    } catch (error) {
      sendFailure(res, error, logger);
    }
  };
}
