/**
 * @fileoverview Structured logging utility for the entitlement service
 * @module lib/logger
 */

import * as cloudLogger from "firebase-functions/logger";

/**
 * Log levels supported by the logger
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Context data for structured logs
 */
export interface LogContext {
  /** Request ID for tracing */
  request_id?: string;

  /** Endpoint being called */
  endpoint?: string;

  /** Client IP address */
  ip_address?: string;

  /** Truncated activation code, never the full value */
  code_prefix?: string;

  /** Derived license state */
  state?: string;

  /** Retry attempt number */
  attempt?: number;

  /** Additional context data */
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
}

/**
 * Logger class for structured logging
 *
 * @class Logger
 * @description Provides consistent structured logging across all functions
 *
 * @example
 * ```typescript
 * const logger = new Logger({ endpoint: "activate" });
 * logger.info("Entitlement activated", { code_prefix: "eyJhbGciOiJS..." });
 * logger.error("Activation failed", { error });
 * ```
 */
export class Logger {
  private baseContext: LogContext;

  /**
   * Creates a new Logger instance
   *
   * @param {LogContext} baseContext - Default context to include in all logs
   */
  constructor(baseContext: LogContext = {}) {
    this.baseContext = baseContext;
  }

  /**
   * Creates a child logger with additional context
   *
   * @param {LogContext} additionalContext - Additional context to merge
   * @returns {Logger} New logger instance with merged context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.baseContext, ...additionalContext });
  }

  private formatEntry(
    level: LogLevel,
    message: string,
    context: LogContext = {}
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.baseContext, ...context },
    };
  }

  debug(message: string, context: LogContext = {}): void {
    cloudLogger.debug(this.formatEntry("debug", message, context));
  }

  info(message: string, context: LogContext = {}): void {
    cloudLogger.info(this.formatEntry("info", message, context));
  }

  warn(message: string, context: LogContext = {}): void {
    cloudLogger.warn(this.formatEntry("warn", message, context));
  }

  /**
   * Logs an error message
   *
   * @param {string} message - Log message
   * @param {LogContext} context - Additional context (an `error` entry is expanded)
   */
  error(message: string, context: LogContext = {}): void {
    const { error, ...rest } = context;
    const expanded: LogContext =
      error instanceof Error
        ? {
          ...rest,
          error_name: error.name,
          error_message: error.message,
          error_stack: error.stack,
        }
        : context;
    cloudLogger.error(this.formatEntry("error", message, expanded));
  }
}

/**
 * Creates a new Logger instance (factory function)
 *
 * @param {LogContext} context - Initial context
 * @returns {Logger} New logger instance
 */
export function createLogger(context: LogContext = {}): Logger {
  return new Logger(context);
}

/**
 * Creates a request-scoped logger
 *
 * @param {string} requestId - Unique request identifier
 * @param {string} endpoint - Endpoint being called
 * @param {string} ipAddress - Client IP address
 * @returns {Logger} Logger instance with request context
 *
 * @example
 * ```typescript
 * const reqLogger = createRequestLogger("req_123", "getState", "192.168.1.1");
 * reqLogger.info("Processing request");
 * ```
 */
export function createRequestLogger(
  requestId: string,
  endpoint: string,
  ipAddress: string
): Logger {
  return new Logger({
    request_id: requestId,
    endpoint,
    ip_address: ipAddress,
  });
}

/**
 * Shortens an activation code for log output
 *
 * @param {string} code - Activation code
 * @returns {string} First 12 characters followed by an ellipsis
 */
export function maskActivationCode(code: string): string {
  return code.length <= 12 ? code : `${code.substring(0, 12)}...`;
}
