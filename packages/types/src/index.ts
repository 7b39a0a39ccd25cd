/**
 * @hindsight/types — Shared event shapes for the Hindsight packages.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards are the only runtime code
 */

export type { EventMetadata, ObservedEvent } from "./event.js";

export { isEventMetadata, isObservedEvent } from "./guards.js";
