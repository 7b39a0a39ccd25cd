/**
 * Request validation with Zod.
 *
 * `validateBody` parses the JSON body, `validateQuery` the query string.
 * Parsed values land in `validatedBody` / `validatedQuery`; failures are
 * answered with a 400 VALIDATION_ERROR envelope listing every issue.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodErrors(error: z.ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function rejectInvalid(c: Context, message: string, error?: z.ZodError): Response {
  const details = error === undefined ? undefined : { issues: formatZodErrors(error) };
  return c.json(createErrorEnvelope("VALIDATION_ERROR", message, details), 400);
}

export function validateBody<T>(
  schema: Schema<T>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return rejectInvalid(c, "Invalid JSON in request body");
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return rejectInvalid(c, "Request body validation failed", result.error);
    }
    c.set("validatedBody", result.data);
    await next();
  };
}

export function validateQuery<T>(
  schema: Schema<T>,
): MiddlewareHandler<{ Variables: { validatedQuery: T } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return rejectInvalid(c, "Invalid query parameters", result.error);
    }
    c.set("validatedQuery", result.data);
    await next();
  };
}
