/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Recorder errors carry a
 * `code`, which maps to an HTTP status; anything else is a 500.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ApiErrorCode } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Partial<Record<ApiErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,

  // Recorder errors
  UNKNOWN_TYPE: 404,
  TYPE_CONFLICT: 409,
  INVALID_TYPE_NAME: 400,
  INVALID_CAPACITY: 400,
  REENTRANT_LISTENER_MUTATION: 409,
};

function mappedStatus(err: Error): [ApiErrorCode, ContentfulStatusCode] | undefined {
  if (!("code" in err) || typeof err.code !== "string") return undefined;
  const code = err.code;
  if (!isApiErrorCode(code)) return undefined;
  const status = STATUS_MAP[code];
  return status === undefined ? undefined : [code, status];
}

function isApiErrorCode(code: string): code is ApiErrorCode {
  return Object.hasOwn(STATUS_MAP, code);
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const mapped = mappedStatus(err);

  // Unmapped errors never expose their message
  if (mapped === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const [code, status] = mapped;
  return c.json(createErrorEnvelope(code, err.message), status);
}
