/**
 * Request correlation.
 *
 * A caller-supplied X-Request-Id is reused when it is a short token of
 * safe characters; anything else is replaced with a fresh UUID. The id
 * is echoed on every response, including error responses.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveRequestId(header: string | undefined): string {
  if (header !== undefined && REQUEST_ID_PATTERN.test(header)) {
    return header;
  }
  return randomUUID();
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
    c.set("requestId", requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
