/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import type { EventRecord } from "@hindsight/event-history";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Comma-separated type names → array (absent stays absent). */
const TypeListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  )
  .optional();

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// =============================================================================
// History DTOs
// =============================================================================

export const HistoryQuerySchema = PaginationQuerySchema.extend({
  include: TypeListSchema,
  exclude: TypeListSchema,
});

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;

export const HistoryTextQuerySchema = z.object({
  filtered: TypeListSchema,
  highlighted: TypeListSchema,
  format: z.enum(["text", "html"]).default("text"),
});

export type HistoryTextQuery = z.infer<typeof HistoryTextQuerySchema>;

export const SetActiveSchema = z.object({
  active: z.boolean(),
});

export type SetActiveDto = z.infer<typeof SetActiveSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

const TypeNameSchema = z
  .string()
  .max(256)
  .refine((name) => name.trim() !== "", "Type name must not be blank");

export const PublishEventSchema = z.object({
  type: TypeNameSchema,
  metadata: z.object({
    eventId: z.string().min(1),
    timestamp: z.string().datetime(),
    source: z.string().min(1),
    correlationId: z.string().optional(),
  }),
  payload: z.record(z.unknown()).default({}),
});

export type PublishEventDto = z.infer<typeof PublishEventSchema>;

// =============================================================================
// Type DTOs
// =============================================================================

export const DefineTypeSchema = z.object({
  name: TypeNameSchema,
  parent: TypeNameSchema.optional(),
});

export type DefineTypeDto = z.infer<typeof DefineTypeSchema>;

// =============================================================================
// Responses
// =============================================================================

export interface EventRecordDto {
  readonly type: string;
  readonly occurredAt: number;
  readonly recordedAt: string;
  readonly renderedForm: string;
  readonly event: EventRecord["event"];
}

export function toEventRecordDto(record: EventRecord): EventRecordDto {
  return {
    type: record.eventType.name,
    occurredAt: record.occurredAt,
    recordedAt: record.recordedAt,
    renderedForm: record.renderedForm,
    event: record.event,
  };
}
