/**
 * Request logging middleware.
 *
 * One pino line per request, written through a child logger bound to the
 * request id. Level follows the response: 5xx error, 4xx warn, else info.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function requestLogger(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const started = performance.now();
    await next();

    const status = c.res.status;
    const log = logger.child({ requestId: c.get("requestId") });
    log[levelForStatus(status)](
      {
        method: c.req.method,
        path: c.req.path,
        status,
        durationMs: Math.round(performance.now() - started),
      },
      `${c.req.method} ${c.req.path} ${status}`,
    );
  };
}
