/**
 * Event type hierarchy routes.
 *
 * GET  /api/v1/types  registered types with their parents
 * POST /api/v1/types  define a type
 */

import { Hono } from "hono";
import type { TypeHandle } from "@hindsight/event-history";
import type { AppEnv } from "../types/api-contract.js";
import { DefineTypeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

function toTypeDto(type: TypeHandle): { name: string; parent: string | null } {
  return { name: type.name, parent: type.parent?.name ?? null };
}

export function createEventTypeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const hierarchy = c.get("service").hierarchy;
    return c.json({ root: hierarchy.root.name, data: hierarchy.types().map(toTypeDto) });
  });

  // Errors (UNKNOWN_TYPE, TYPE_CONFLICT) go through the global error handler
  routes.post("/", validateBody(DefineTypeSchema), (c) => {
    const body = c.get("validatedBody");
    const type = c.get("service").hierarchy.define(body.name, body.parent);
    return c.json(toTypeDto(type), 201);
  });

  return routes;
}
