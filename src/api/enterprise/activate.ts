/**
 * @fileoverview POST activate endpoint
 * @module api/enterprise/activate
 */

import { Request, Response } from "express";
import { EntitlementService } from "../../services/entitlementService";
import { beginRequest, sendError, sendFailure } from "../../middleware/request";
import { maskActivationCode } from "../../lib/logger";
import { ActivateResponse } from "../../types/Entitlement";

/**
 * Parsed activate request
 */
interface ParsedActivateRequest {
  activationCode: string;
  expiresAt?: Date;
}

/**
 * Validates incoming request body
 *
 * @param {unknown} body - Request body
 * @returns Parsed request, or the error code and message to respond with
 */
export function parseActivateBody(
  body: unknown
):
  | { valid: true; data: ParsedActivateRequest }
  | { valid: false; code: "MISSING_FIELDS" | "INVALID_EXPIRY"; error: string } {
  if (!body || typeof body !== "object") {
    return { valid: false, code: "MISSING_FIELDS", error: "Request body is required" };
  }

  const activationCode: unknown = Reflect.get(body, "activation_code");
  const expires: unknown = Reflect.get(body, "expires");

  if (typeof activationCode !== "string" || activationCode.trim() === "") {
    return { valid: false, code: "MISSING_FIELDS", error: "activation_code is required" };
  }

  if (expires === undefined || expires === null) {
    return { valid: true, data: { activationCode: activationCode.trim() } };
  }

  if (typeof expires !== "string") {
    return { valid: false, code: "INVALID_EXPIRY", error: "expires must be an ISO-8601 string" };
  }

  const expiresAt = new Date(expires);
  if (Number.isNaN(expiresAt.getTime())) {
    return { valid: false, code: "INVALID_EXPIRY", error: `expires is not a valid timestamp: ${expires}` };
  }

  return { valid: true, data: { activationCode: activationCode.trim(), expiresAt } };
}

/**
 * Creates the activate handler
 *
 * @param {EntitlementService} service - Service owning the entitlement record
 * @returns Request handler
 *
 * @description
 * Request:
 * ```json
 * POST /activate
 * { "activation_code": "eyJhbGciOiJSUzI1NiIs...", "expires": "2027-01-01T00:00:00Z" }
 * ```
 *
 * Success Response (200): `{ "success": true }`
 *
 * Error Response (400): `{ "success": false, "error": "...", "code": "INVALID_CODE" }`
 */
export function createActivateHandler(service: EntitlementService) {
  return async (req: Request, res: Response): Promise<void> => {
    const logger = beginRequest(req, res, { endpoint: "activate", methods: ["POST"] });
    if (!logger) {
      return;
    }

    const parsed = parseActivateBody(req.body);
    if (!parsed.valid) {
      logger.warn("Invalid request body", { error: parsed.error });
      sendError(res, parsed.code, parsed.error);
      return;
    }

    const { activationCode, expiresAt } = parsed.data;
    logger.info("Processing activation", {
      code_prefix: maskActivationCode(activationCode),
      expires_at: expiresAt?.toISOString() ?? null,
    });

    try {
      await service.activate(activationCode, expiresAt);
      const body: ActivateResponse = { success: true };
      res.status(200).json(body);
    } catch (error) {
      sendFailure(res, error, logger);
    }
  };
}
