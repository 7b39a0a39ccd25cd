/**
 * Listener registry.
 *
 * Holds the registered listeners and delivers records to them.
 *
 * Membership never changes while a notification pass is running: a
 * listener removed before a pass starts is not called, and a removal
 * cannot land in the middle of a pass. A listener that adds or removes
 * listeners from inside its own callback gets a
 * REENTRANT_LISTENER_MUTATION error. Nested passes are allowed, so a
 * listener may itself emit events that are recorded and delivered.
 */

import type { ActivationController } from "./activation.js";
import type { EventHistoryListener, EventRecord } from "./types.js";
import { EventHistoryError } from "./types.js";

export class ListenerRegistry {
  /** Insertion-ordered; a listener appears at most once. */
  private readonly _listeners = new Set<EventHistoryListener>();
  /** Depth of nested notification passes */
  private _notifying = 0;

  constructor(private readonly _activation: ActivationController) {}

  /**
   * Add a listener and switch recording on.
   *
   * Registering a listener twice keeps its original position.
   */
  register(listener: EventHistoryListener): void {
    this._assertNotNotifying();
    this._listeners.add(listener);
    this._activation.listenerAdded();
  }

  /**
   * Remove a listener. Removing the last one switches recording off.
   *
   * @returns True if the listener was registered
   */
  unregister(listener: EventHistoryListener): boolean {
    this._assertNotNotifying();
    const removed = this._listeners.delete(listener);
    if (removed && this._listeners.size === 0) {
      this._activation.listenersEmptied();
    }
    return removed;
  }

  /**
   * Deliver a record to every listener, in registration order.
   *
   * An error thrown by a listener propagates to the caller and stops the
   * pass.
   */
  notifyAll(record: EventRecord): void {
    this._notifying++;
    try {
      for (const listener of this._listeners) {
        listener.eventOccurred(record);
      }
    } finally {
      this._notifying--;
    }
  }

  has(listener: EventHistoryListener): boolean {
    return this._listeners.has(listener);
  }

  get size(): number {
    return this._listeners.size;
  }

  /** True while a notification pass is running. */
  get busy(): boolean {
    return this._notifying > 0;
  }

  private _assertNotNotifying(): void {
    if (this._notifying > 0) {
      throw new EventHistoryError(
        "REENTRANT_LISTENER_MUTATION",
        "Listeners cannot be added or removed while a notification is in progress",
      );
    }
  }
}
