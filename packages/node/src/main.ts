/**
 * @hindsight/node — Entry point.
 *
 * Loads config, starts the recorder service and the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { loadConfig, parseTypeHierarchy } from "./config.js";
import { createLogger } from "./logger.js";
import { createApp } from "./app.js";
import { EventBus } from "./event-bus.js";

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config);

  const bus = new EventBus(logger.child({ component: "event-bus" }));
  const { app, service } = createApp({
    bus,
    serviceConfig: {
      rootType: config.HISTORY_ROOT_TYPE,
      types: parseTypeHierarchy(config.HISTORY_TYPES),
      maxEntries: config.HISTORY_MAX_ENTRIES,
      startActive: config.HISTORY_START_ACTIVE,
      logger: logger.child({ component: "history-service" }),
    },
    requestLog: logger.child({ component: "http" }),
    streamBufferLimit: config.HISTORY_STREAM_BUFFER,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Hindsight node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "HTTP server did not close cleanly");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
