/**
 * Event ingestion route.
 *
 * POST /api/v1/events  publish an event to the bus
 *
 * The recorder sees the event like any other bus subscriber; it is only
 * kept when recording is active.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PublishEventSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(PublishEventSchema), (c) => {
    const event = c.get("validatedBody");
    const history = c.get("service").history;
    const before = history.lastOccurredAt;

    const delivered = c.get("bus").publish(event);

    return c.json(
      {
        accepted: true,
        delivered,
        recorded: history.lastOccurredAt > before,
      },
      202,
    );
  });

  return routes;
}
