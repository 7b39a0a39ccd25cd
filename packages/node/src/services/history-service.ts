/**
 * EventHistoryService: Composition root for the recorder.
 *
 * Builds the type hierarchy from configuration, owns the EventHistory,
 * and connects it to the event bus between start() and stop().
 */

import pino from "pino";
import type { Logger } from "pino";
import { EventHistory, EventTypeHierarchy } from "@hindsight/event-history";
import type { EventBus, Subscription } from "../event-bus.js";
import type { TypeDefinition } from "../config.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EventHistoryServiceConfig {
  readonly rootType?: string | undefined;
  readonly types?: readonly TypeDefinition[] | undefined;
  /** 0 = unbounded */
  readonly maxEntries?: number | undefined;
  readonly startActive?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class EventHistoryService {
  readonly hierarchy: EventTypeHierarchy;
  readonly history: EventHistory;

  private readonly _bus: EventBus;
  private readonly _logger: Logger;
  private _subscription: Subscription | undefined;

  constructor(bus: EventBus, config: EventHistoryServiceConfig = {}) {
    this._bus = bus;
    this._logger = config.logger ?? pino({ level: "silent" });

    this.hierarchy = new EventTypeHierarchy(config.rootType);
    for (const definition of config.types ?? []) {
      this.hierarchy.define(definition.name, definition.parent);
    }

    this.history = new EventHistory({
      hierarchy: this.hierarchy,
      maxEntries: config.maxEntries ?? 0,
      logger: this._logger.child({ component: "event-history" }),
    });

    if (config.startActive === true) {
      this.history.setActive(true);
    }
  }

  /** Subscribe the recorder to the bus. No-op when already running. */
  start(): void {
    if (this._subscription !== undefined) return;

    this._subscription = this._bus.subscribe((event) => {
      this.history.onEvent(event);
    });
    this._logger.info(
      { types: this.hierarchy.size, active: this.history.isActive() },
      "Event history service started",
    );
  }

  /** Unsubscribe from the bus. Recorded history is kept. */
  stop(): void {
    if (this._subscription === undefined) return;

    this._subscription.unsubscribe();
    this._subscription = undefined;
    this._logger.info({ recorded: this.history.size }, "Event history service stopped");
  }

  isRunning(): boolean {
    return this._subscription !== undefined;
  }
}
