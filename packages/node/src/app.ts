/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Tests call this directly and drive the app through app.request();
 * main.ts adds the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { EventBus } from "./event-bus.js";
import { EventHistoryService } from "./services/history-service.js";
import type { EventHistoryServiceConfig } from "./services/history-service.js";
import pino from "pino";
import type { Logger } from "pino";
import { handleError, requestIdMiddleware, requestLogger } from "./middleware/index.js";
import {
  createEventRoutes,
  createEventTypeRoutes,
  createHealthRoutes,
  createHistoryRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig?: EventHistoryServiceConfig | undefined;
  /** Bus to subscribe the recorder to. Default: a new one */
  readonly bus?: EventBus | undefined;
  /** Request log destination. Default: no request logging */
  readonly requestLog?: Logger | undefined;
  /** Records queued per history stream client before it is disconnected */
  readonly streamBufferLimit?: number | undefined;
  /** Subscribe the recorder before returning. Default: true */
  readonly autoStart?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: EventHistoryService;
  readonly bus: EventBus;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const bus = options.bus ?? new EventBus();
  const service = new EventHistoryService(bus, options.serviceConfig);

  if (options.autoStart !== false) {
    service.start();
  }

  const logger = options.requestLog ?? pino({ level: "silent" });
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.requestLog !== undefined) {
    app.use("*", requestLogger(options.requestLog));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    c.set("bus", bus);
    c.set("logger", logger);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/history", createHistoryRoutes({ streamBufferLimit: options.streamBufferLimit }));
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/types", createEventTypeRoutes());

  return { app, service, bus };
}
