/**
 * Event records.
 *
 * Records are frozen on construction and never mutated afterwards.
 */

import { canonicalize } from "json-canonicalize";
import type { ObservedEvent } from "@hindsight/types";
import type { EventRecord, EventRenderer, TypeHandle } from "./types.js";

/**
 * Default renderer: the type name followed by the canonical JSON payload.
 *
 * Canonical JSON keeps the text stable whatever order the producer
 * wrote the payload keys in.
 */
export const defaultRenderer: EventRenderer = (event, type) =>
  `${type.name} ${canonicalize(event.payload)}`;

export function createEventRecord(
  event: ObservedEvent,
  eventType: TypeHandle,
  renderedForm: string,
  occurredAt: number,
  recordedAt: string,
): EventRecord {
  return Object.freeze({
    eventType,
    renderedForm,
    occurredAt,
    recordedAt,
    event,
  });
}
