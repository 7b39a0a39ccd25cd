/**
 * In-process event bus.
 *
 * The upstream dispatcher the recorder subscribes to. Every published
 * event is delivered once to each subscriber, synchronously and in
 * subscription order. A subscriber that throws is logged and skipped;
 * the remaining subscribers still receive the event.
 */

import pino from "pino";
import type { Logger } from "pino";
import { isObservedEvent } from "@hindsight/types";
import type { ObservedEvent } from "@hindsight/types";

export type BusHandler = (event: ObservedEvent) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

export class EventBus {
  private readonly _handlers = new Set<BusHandler>();
  private readonly _logger: Logger;
  private _published = 0;

  constructor(logger?: Logger) {
    this._logger = logger ?? pino({ level: "silent" });
  }

  subscribe(handler: BusHandler): Subscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  /**
   * Deliver an event to every subscriber.
   *
   * @returns Number of subscribers that handled the event without throwing
   * @throws {TypeError} for a malformed event; nothing is delivered
   */
  publish(event: ObservedEvent): number {
    if (!isObservedEvent(event)) {
      throw new TypeError("Refusing to publish a malformed event");
    }
    this._published++;
    let delivered = 0;
    for (const handler of [...this._handlers]) {
      try {
        handler(event);
        delivered++;
      } catch (err) {
        this._logger.error(
          { err, type: event.type, eventId: event.metadata.eventId },
          "Event subscriber failed",
        );
      }
    }
    return delivered;
  }

  get subscriberCount(): number {
    return this._handlers.size;
  }

  /** Total events published since construction. */
  get publishedCount(): number {
    return this._published;
  }
}
