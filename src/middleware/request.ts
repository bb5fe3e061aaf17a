/**
 * @fileoverview Request prelude shared by the entitlement endpoints
 * @module middleware/request
 */

import { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger, Logger } from "../lib/logger";
import {
  EntitlementError,
  ERROR_MESSAGE_MAP,
  ERROR_STATUS_MAP,
  ErrorCode,
  ErrorResponse,
} from "../types/Entitlement";

/**
 * Options for the request prelude
 */
export interface PreludeOptions {
  /** Endpoint name used in logs */
  endpoint: string;

  /** HTTP methods the endpoint accepts (OPTIONS is always answered) */
  methods: readonly string[];
}

/**
 * Extracts client IP from request
 *
 * @param {Request} req - The request object
 * @returns {string} The first X-Forwarded-For hop, or the socket address
 */
export function getClientIP(req: Request): string {
  const forwarded = req.headers["x-forwarded-for"];
  if (typeof forwarded === "string") {
    return forwarded.split(",")[0].trim();
  }
  return req.ip || req.socket?.remoteAddress || "unknown";
}

/**
 * Sends an error response for a known error code
 *
 * @param {Response} res - The response object
 * @param {ErrorCode} code - Error code
 * @param {string} message - Optional message overriding the default
 */
export function sendError(res: Response, code: ErrorCode, message?: string): void {
  const body: ErrorResponse = {
    success: false,
    error: message ?? ERROR_MESSAGE_MAP[code],
    code,
  };
  res.status(ERROR_STATUS_MAP[code]).json(body);
}

/**
 * Sets common headers, answers preflight and rejects wrong methods
 *
 * @param {Request} req - The request object
 * @param {Response} res - The response object
 * @param {PreludeOptions} options - Endpoint name and accepted methods
 * @returns {Logger | null} Request-scoped logger, or null when a response was already sent
 */
export function beginRequest(
  req: Request,
  res: Response,
  options: PreludeOptions
): Logger | null {
  const requestId = uuidv4();
  const logger = createRequestLogger(requestId, options.endpoint, getClientIP(req));

  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", [...options.methods, "OPTIONS"].join(", "));
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
  res.setHeader("X-Request-ID", requestId);

  if (req.method === "OPTIONS") {
    res.status(204).send("");
    return null;
  }

  if (!options.methods.includes(req.method)) {
    logger.warn("Invalid HTTP method", { method: req.method });
    sendError(res, "INVALID_METHOD", `Method not allowed. Use ${options.methods.join(" or ")}`);
    return null;
  }

  logger.debug("Received request");
  return logger;
}

/**
 * Converts a thrown error into a response
 *
 * @param {Response} res - The response object
 * @param {unknown} error - Error thrown by the service
 * @param {Logger} logger - Request-scoped logger
 */
export function sendFailure(res: Response, error: unknown, logger: Logger): void {
  if (error instanceof EntitlementError) {
    if (error.code === "STATE_INCONSISTENT" || error.statusCode >= 500) {
      logger.error("Entitlement request failed", { error, code: error.code });
    } else {
      logger.warn("Entitlement request rejected", { code: error.code, reason: error.message });
    }
    sendError(res, error.code, error.message);
    return;
  }

  logger.error("Unexpected error", {
    error: error instanceof Error ? error : new Error(String(error)),
  });
  sendError(res, "INTERNAL_ERROR");
}
