/**
 * Event Types
 *
 * Shapes of the application events Hindsight observes.
 *
 * Rules:
 * - Events are immutable after creation
 * - `type` names a node in the event type hierarchy
 * - The payload is opaque to the recorder; only renderers look inside it
 */

/**
 * Metadata common to all observed events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp set by the producer */
  readonly timestamp: string;

  /** Which component of the host application emitted this event */
  readonly source: string;

  /** ID for grouping related events */
  readonly correlationId?: string | undefined;
}

/**
 * An application event as delivered by the upstream dispatcher.
 */
export interface ObservedEvent {
  /** Event type name (e.g., "window.opened", "document.saved") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload */
  readonly payload: Readonly<Record<string, unknown>>;
}
