/**
 * EventHistory, the recorder.
 *
 * Observes events pushed by an upstream dispatcher and keeps a history
 * of them while active. Registering the first listener switches
 * recording on; removing the last one switches it off. `setActive`
 * writes the same flag directly, and whichever write came last wins.
 *
 * While dormant, `onEvent` returns immediately: nothing is resolved,
 * rendered or stored.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ObservedEvent } from "@hindsight/types";
import { ActivationController } from "./activation.js";
import { textEncoder } from "./encoders.js";
import { createEventRecord, defaultRenderer } from "./event-record.js";
import { HistoryLog } from "./history-log.js";
import { ListenerRegistry } from "./listener-registry.js";
import { QueryEngine } from "./query-engine.js";
import { EventTypeHierarchy } from "./type-hierarchy.js";
import type {
  EntryEncoder,
  EventHistoryListener,
  EventHistoryOptions,
  EventRecord,
  EventRenderer,
  TypeFilter,
} from "./types.js";

export class EventHistory {
  readonly hierarchy: EventTypeHierarchy;

  private readonly _log: HistoryLog;
  private readonly _activation: ActivationController;
  private readonly _listeners: ListenerRegistry;
  private readonly _queries: QueryEngine;
  private readonly _renderer: EventRenderer;
  private readonly _logger: Logger;
  private readonly _now: () => number;

  /** Ordinal of the last recorded event */
  private _sequence = 0;

  constructor(options: EventHistoryOptions = {}) {
    this.hierarchy = options.hierarchy ?? new EventTypeHierarchy();
    this._renderer = options.renderer ?? defaultRenderer;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._now = options.now ?? Date.now;

    this._log = new HistoryLog(options.maxEntries ?? 0);
    this._activation = new ActivationController((from, to, cause) => {
      this._logger.debug({ from, to, cause }, "Event history activation changed");
    });
    this._listeners = new ListenerRegistry(this._activation);
    this._queries = new QueryEngine(
      this._log,
      this.hierarchy,
      options.encoder ?? textEncoder,
    );
  }

  // ─── Activation ─────────────────────────────────────────────────────

  setActive(active: boolean): void {
    this._activation.set(active);
  }

  isActive(): boolean {
    return this._activation.isActive();
  }

  // ─── Recording ──────────────────────────────────────────────────────

  /**
   * Upstream push interface: one call per delivered event.
   *
   * @returns The new record, or undefined if the recorder is dormant
   */
  onEvent(event: ObservedEvent): EventRecord | undefined {
    if (!this._activation.isActive()) return undefined;

    const eventType = this.hierarchy.resolve(event.type);
    const record = createEventRecord(
      event,
      eventType,
      this._renderer(event, eventType),
      ++this._sequence,
      new Date(this._now()).toISOString(),
    );

    const evicted = this._log.append(record);
    if (evicted > 0) {
      this._logger.warn(
        { evicted, capacity: this._log.capacity },
        "History capacity reached, oldest events evicted",
      );
    }

    this._listeners.notifyAll(record);
    return record;
  }

  clear(): void {
    const cleared = this._log.size;
    this._log.clear();
    this._logger.debug({ cleared }, "Event history cleared");
  }

  // ─── Query ──────────────────────────────────────────────────────────

  /**
   * Recorded events in arrival order.
   *
   * @param includes - Types to keep (with their subtypes). Default: all
   * @param excludes - Types to drop (with their subtypes). Default: none
   */
  events(includes?: TypeFilter, excludes?: TypeFilter): readonly EventRecord[] {
    return this._queries.query(includes, excludes);
  }

  /**
   * History as text, one encoded entry per record.
   *
   * @param filteredOut - Types whose records are left out entirely
   * @param highlighted - Types whose records are emphasized
   * @param encoder - Overrides the configured per-entry encoder
   */
  toText(
    filteredOut?: TypeFilter,
    highlighted?: TypeFilter,
    encoder?: EntryEncoder,
  ): string {
    return this._queries.render(filteredOut, highlighted, encoder);
  }

  get size(): number {
    return this._log.size;
  }

  /** Maximum retained records (0 = unbounded). */
  get capacity(): number {
    return this._log.capacity;
  }

  /**
   * `occurredAt` of the most recent record, 0 before the first. Unlike
   * `size`, it moves on every recording, through eviction and `clear()`.
   */
  get lastOccurredAt(): number {
    return this._sequence;
  }

  // ─── Listeners ──────────────────────────────────────────────────────

  /**
   * Register a listener; recording switches on.
   *
   * Must not be called from inside a listener callback.
   */
  addListener(listener: EventHistoryListener): void {
    this._listeners.register(listener);
  }

  /**
   * Unregister a listener; recording switches off once none remain.
   *
   * Must not be called from inside a listener callback.
   */
  removeListener(listener: EventHistoryListener): void {
    this._listeners.unregister(listener);
  }

  get listenerCount(): number {
    return this._listeners.size;
  }
}
