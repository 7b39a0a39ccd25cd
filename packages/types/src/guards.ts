/**
 * Runtime guards for events crossing into the recorder from untyped code.
 */

import type { EventMetadata, ObservedEvent } from "./event.js";

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  return (
    isPlainRecord(value) &&
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.source === "string" &&
    isOptionalString(value.correlationId)
  );
}

/** A non-blank type name, valid metadata and an object payload. */
export function isObservedEvent(value: unknown): value is ObservedEvent {
  return (
    isPlainRecord(value) &&
    typeof value.type === "string" &&
    value.type.trim() !== "" &&
    isEventMetadata(value.metadata) &&
    isPlainRecord(value.payload)
  );
}
