/**
 * @fileoverview POST deactivate endpoint
 * @module api/enterprise/deactivate
 */

import { Request, Response } from "express";
import { EntitlementService } from "../../services/entitlementService";
import { beginRequest, sendFailure } from "../../middleware/request";
import { DeactivateResponse } from "../../types/Entitlement";

/**
 * Creates the deactivate handler. Responds 200 whether or not anything was
 * installed; there is no "nothing to deactivate" error.
 *
 * @param {EntitlementService} service - Service owning the entitlement record
 * @returns Request handler
 */
export function createDeactivateHandler(service: EntitlementService) {
  return async (req: Request, res: Response): Promise<void> => {
    const logger = beginRequest(req, res, { endpoint: "deactivate", methods: ["POST"] });
    if (!logger) {
      return;
    }

    try {
      await service.deactivate();
      const body: DeactivateResponse = { success: true };
      res.status(200).json(body);
    } catch (error) {
      sendFailure(res, error, logger);
    }
  };
}
