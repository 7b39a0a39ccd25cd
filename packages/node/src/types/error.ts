/**
 * Error envelope returned by every failing request:
 * `{ error: { code, message, details? } }`.
 */

import type { EventHistoryErrorCode } from "@hindsight/event-history";

/** HTTP-level codes plus the recorder's own error codes. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  | EventHistoryErrorCode;

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}
