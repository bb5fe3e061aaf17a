/**
 * @fileoverview HTTP client for the entitlement functions
 * @module client/entitlementClient
 *
 * @description
 * Construct one client with `createEntitlementClient` and pass it to the code
 * that needs it. Construction resolves the endpoint and binds the transport;
 * it is a one-time cost, so the handle should be reused rather than rebuilt
 * per call.
 */

import {
  ActivateRequest,
  EntitlementError,
  EntitlementStateSnapshot,
  ERROR_MESSAGE_MAP,
  isErrorCode,
  isLicenseState,
} from "../types/Entitlement";
import { Logger } from "../lib/logger";

/**
 * How the endpoint was discovered
 */
export type EndpointMode = "explicit" | "in-cluster" | "development";

/**
 * A resolved service endpoint
 */
export interface EntitlementEndpoint {
  /** Base URL; function names are appended as path segments */
  baseUrl: string;
  mode: EndpointMode;
}

/**
 * Environment variables read during endpoint discovery
 */
export type EndpointEnvironment = Partial<Record<string, string>>;

/**
 * Client construction options
 */
export interface EntitlementClientOptions {
  /** Skips discovery when provided */
  endpoint?: EntitlementEndpoint;

  /** Environment used for discovery; defaults to process.env */
  env?: EndpointEnvironment;

  /** Transport; defaults to the global fetch */
  fetch?: typeof fetch;

  /** Per-request timeout in ms */
  timeoutMs?: number;

  logger?: Logger;
}

/**
 * Per-call options
 */
export interface CallOptions {
  /** Cancels the request */
  signal?: AbortSignal;
}

/**
 * Default per-request timeout in milliseconds
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Functions emulator defaults used outside a cluster
 */
const DEV_EMULATOR_HOST = "http://127.0.0.1:5001";
const DEV_PROJECT_ID = "demo-entitlements";
const DEV_REGION = "europe-west1";
const DEFAULT_SERVICE_PORT = "8080";

/**
 * HTTP statuses that mean the service could not be reached right now
 */
const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([502, 503, 504]);

/**
 * Resolves the service endpoint from the environment
 *
 * @param {EndpointEnvironment} env - Environment variables
 * @returns {EntitlementEndpoint} Resolved endpoint
 *
 * @description
 * 1. ENTITLEMENT_SERVICE_URL, used as-is
 * 2. ENTITLEMENT_SERVICE_HOST (+ ENTITLEMENT_SERVICE_PORT), for callers inside the cluster
 * 3. The local Functions emulator for GCLOUD_PROJECT / ENTITLEMENT_REGION
 */
export function resolveEntitlementEndpoint(
  env: EndpointEnvironment = process.env
): EntitlementEndpoint {
  const explicitUrl = env.ENTITLEMENT_SERVICE_URL?.trim();
  if (explicitUrl) {
    return { baseUrl: explicitUrl.replace(/\/+$/, ""), mode: "explicit" };
  }

  const host = env.ENTITLEMENT_SERVICE_HOST?.trim();
  if (host) {
    const port = env.ENTITLEMENT_SERVICE_PORT?.trim() || DEFAULT_SERVICE_PORT;
    return { baseUrl: `http://${host}:${port}`, mode: "in-cluster" };
  }

  const project = env.GCLOUD_PROJECT?.trim() || DEV_PROJECT_ID;
  const region = env.ENTITLEMENT_REGION?.trim() || DEV_REGION;
  return { baseUrl: `${DEV_EMULATOR_HOST}/${project}/${region}`, mode: "development" };
}

/**
 * EntitlementClient
 *
 * @class EntitlementClient
 *
 * @example
 * ```typescript
 * const client = createEntitlementClient();
 * await client.activate(code);
 * const { state } = await client.getState();
 * ```
 */
export class EntitlementClient {
  readonly endpoint: EntitlementEndpoint;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(endpoint: EntitlementEndpoint, options: EntitlementClientOptions = {}) {
    this.endpoint = endpoint;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? new Logger({ component: "entitlement-client" });
  }

  /**
   * Installs an activation code
   *
   * @param {string} activationCode - Activation code
   * @param {Date} expires - Optional expiry, sent at whole-second precision
   */
  async activate(activationCode: string, expires?: Date, options: CallOptions = {}): Promise<void> {
    const body: ActivateRequest = {
      activation_code: activationCode,
      expires: expires ? expires.toISOString() : null,
    };
    await this.call("activate", "POST", { ...body }, options);
  }

  /**
   * Removes the installed activation code; succeeds from every state
   */
  async deactivate(options: CallOptions = {}): Promise<void> {
    await this.call("deactivate", "POST", {}, options);
  }

  /**
   * Reads the current entitlement state
   *
   * @returns {Promise<EntitlementStateSnapshot>} State, code and expiry
   */
  async getState(options: CallOptions = {}): Promise<EntitlementStateSnapshot> {
    const body = await this.call("getState", "GET", undefined, options);
    return parseGetStateBody(body);
  }

  /**
   * Core request method
   */
  private async call(
    functionName: string,
    method: "GET" | "POST",
    payload: Record<string, unknown> | undefined,
    options: CallOptions
  ): Promise<unknown> {
    const url = `${this.endpoint.baseUrl}/${functionName}`;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    this.logger.debug("Calling entitlement service", { url, method });

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: payload ? { "Content-Type": "application/json" } : undefined,
        body: payload ? JSON.stringify(payload) : undefined,
        signal,
      });
      body = await readJson(response);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      throw new EntitlementError(
        `Entitlement service unreachable at ${url}: ${error instanceof Error ? error.message : String(error)}`,
        "TRANSIENT_UNAVAILABLE",
        { cause: error }
      );
    }

    if (response.ok) {
      return body;
    }

    if (TRANSIENT_STATUSES.has(response.status)) {
      throw new EntitlementError(
        `Entitlement service returned ${response.status}`,
        "TRANSIENT_UNAVAILABLE"
      );
    }

    const code: unknown = isRecord(body) ? body.code : undefined;
    const message: unknown = isRecord(body) ? body.error : undefined;
    if (isErrorCode(code)) {
      throw new EntitlementError(
        typeof message === "string" ? message : ERROR_MESSAGE_MAP[code],
        code
      );
    }

    throw new EntitlementError(
      `Entitlement service returned ${response.status} ${response.statusText}`,
      "INTERNAL_ERROR"
    );
  }
}

/**
 * Builds a client handle (factory function)
 *
 * @param {EntitlementClientOptions} options - Endpoint or environment, transport, timeout
 * @returns {EntitlementClient} Client to be reused for the caller's lifetime
 */
export function createEntitlementClient(
  options: EntitlementClientOptions = {}
): EntitlementClient {
  const endpoint = options.endpoint ?? resolveEntitlementEndpoint(options.env);
  return new EntitlementClient(endpoint, options);
}

/**
 * Parses a getState response body
 *
 * @param {unknown} body - Decoded JSON body
 * @returns {EntitlementStateSnapshot} Snapshot
 * @throws {EntitlementError} INTERNAL_ERROR if the body is malformed
 */
export function parseGetStateBody(body: unknown): EntitlementStateSnapshot {
  if (!isRecord(body) || !isLicenseState(body.state)) {
    throw new EntitlementError("Malformed getState response", "INTERNAL_ERROR");
  }

  const snapshot: EntitlementStateSnapshot = { state: body.state };

  if (typeof body.activation_code === "string" && body.activation_code !== "") {
    snapshot.activationCode = body.activation_code;
  }

  if (typeof body.expires === "string") {
    const expiresAt = new Date(body.expires);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new EntitlementError(`Malformed expiry in getState response: ${body.expires}`, "INTERNAL_ERROR");
    }
    snapshot.expiresAt = expiresAt;
  }

  return snapshot;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { error: text };
  }
}
