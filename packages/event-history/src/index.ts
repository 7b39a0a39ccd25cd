/**
 * @hindsight/event-history — In-memory event history recorder.
 *
 * Provides:
 * - EventHistory, the recorder (activation, recording, query, render)
 * - EventTypeHierarchy for pluggable, hierarchical event types
 * - covers() for hierarchy-aware type filtering
 * - HistoryLog, ActivationController and ListenerRegistry building blocks
 * - Text and HTML per-entry encoders
 *
 * @packageDocumentation
 */

// Core types
export type {
  TypeHandle,
  TypeFilter,
  EventRecord,
  EventHistoryListener,
  EventRenderer,
  EntryEncoder,
  EventHistoryOptions,
  EventHistoryErrorCode,
} from "./types.js";
export { EventHistoryError } from "./types.js";

// Type hierarchy
export { EventTypeHierarchy, DEFAULT_ROOT_TYPE } from "./type-hierarchy.js";
export { covers } from "./type-matcher.js";

// Building blocks
export { createEventRecord, defaultRenderer } from "./event-record.js";
export { HistoryLog } from "./history-log.js";
export { ActivationController } from "./activation.js";
export type {
  ActivationState,
  ActivationCause,
  ActivationObserver,
} from "./activation.js";
export { ListenerRegistry } from "./listener-registry.js";
export { QueryEngine } from "./query-engine.js";
export { textEncoder, htmlEncoder, escapeHtml } from "./encoders.js";

// Recorder
export { EventHistory } from "./event-history.js";
