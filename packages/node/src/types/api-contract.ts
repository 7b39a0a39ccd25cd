/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Logger } from "pino";
import type { EventBus } from "../event-bus.js";
import type { EventHistoryService } from "../services/history-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The recorder service */
    service: EventHistoryService;

    /** Bus that incoming events are published to */
    bus: EventBus;

    /** Request log destination (silent unless configured) */
    logger: Logger;
  };
}
