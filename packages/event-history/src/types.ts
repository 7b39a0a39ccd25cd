/**
 * Core types.
 *
 * Defines the records, listeners and extension points of the recorder.
 *
 * Design principles:
 * - Records are immutable after creation
 * - The history is append-only; only a bulk clear removes records
 * - Recording happens only while the recorder is active
 * - Listeners are notified synchronously, in registration order
 */

import type { Logger } from "pino";
import type { ObservedEvent } from "@hindsight/types";
import type { EventTypeHierarchy } from "./type-hierarchy.js";

// =============================================================================
// Type Handles
// =============================================================================

/**
 * Identifies a concrete event type within a type hierarchy.
 */
export interface TypeHandle {
  /** Event type name, as carried by `ObservedEvent.type` */
  readonly name: string;

  /** Direct supertype (undefined only for the hierarchy root) */
  readonly parent: TypeHandle | undefined;

  /** True iff this type is `candidate` or one of its ancestors. */
  isAssignableFrom(candidate: TypeHandle): boolean;

  /** This type followed by each ancestor, ending at the root. */
  ancestry(): readonly TypeHandle[];
}

/**
 * A set of event types used as a query or render filter.
 *
 * Members may be handles or type names. Duplicates are harmless.
 */
export type TypeFilter =
  | ReadonlySet<TypeHandle | string>
  | readonly (TypeHandle | string)[];

// =============================================================================
// Event Record
// =============================================================================

/**
 * One recorded event.
 */
export interface EventRecord {
  /** Concrete type of the event */
  readonly eventType: TypeHandle;

  /** Text form produced by the recorder's renderer */
  readonly renderedForm: string;

  /** Position in arrival order among recorded events (1-based) */
  readonly occurredAt: number;

  /** When the record was made (informational, not used for ordering) */
  readonly recordedAt: string;

  /** The original event */
  readonly event: ObservedEvent;
}

// =============================================================================
// Extension Points
// =============================================================================

/**
 * Observer of newly recorded events.
 *
 * Called synchronously while the listener registry is held.
 * A listener must not add or remove listeners from inside `eventOccurred`.
 */
export interface EventHistoryListener {
  eventOccurred(record: EventRecord): void;
}

/**
 * Produces the text form stored on each record.
 */
export type EventRenderer = (event: ObservedEvent, type: TypeHandle) => string;

/**
 * Encodes one record for `toText`, with or without emphasis.
 */
export type EntryEncoder = (record: EventRecord, emphasized: boolean) => string;

// =============================================================================
// Options
// =============================================================================

export interface EventHistoryOptions {
  /** Type hierarchy used to resolve event types. Default: a fresh one rooted at "event" */
  readonly hierarchy?: EventTypeHierarchy;

  /** Renderer for `renderedForm`. Default: type name + canonical JSON payload */
  readonly renderer?: EventRenderer;

  /** Per-entry encoder for `toText`. Default: textEncoder */
  readonly encoder?: EntryEncoder;

  /** Maximum retained records; 0 or absent means unbounded */
  readonly maxEntries?: number;

  /** Logger for lifecycle messages. Default: silent */
  readonly logger?: Logger;

  /** Clock for `recordedAt`. Default: Date.now */
  readonly now?: () => number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventHistory operations.
 */
export type EventHistoryErrorCode =
  | "TYPE_CONFLICT"
  | "UNKNOWN_TYPE"
  | "INVALID_TYPE_NAME"
  | "INVALID_CAPACITY"
  | "REENTRANT_LISTENER_MUTATION";

/**
 * Error thrown by EventHistory operations.
 */
export class EventHistoryError extends Error {
  constructor(
    public readonly code: EventHistoryErrorCode,
    message: string,
    public readonly typeName?: string,
  ) {
    super(message);
    this.name = "EventHistoryError";
  }
}
