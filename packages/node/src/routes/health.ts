/**
 * Health check routes.
 *
 * GET /health   liveness, 200 whenever the process answers
 * GET /ready    503 until the recorder is subscribed to the bus
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({ status: "ok", uptimeSeconds: Math.floor(process.uptime()) });
  });

  // Ready means subscribed; a dormant recorder is still ready.
  routes.get("/ready", (c) => {
    const service = c.get("service");
    const running = service.isRunning();
    const body = {
      status: running ? "ready" : "not_ready",
      recording: service.history.isActive(),
      timestamp: new Date().toISOString(),
    };
    return running ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
