/**
 * Event type hierarchy.
 *
 * A registry of event type handles arranged in a single-rooted tree.
 * The root covers every event type; each other type names its direct
 * supertype when it is defined.
 *
 * Types are registered at run time, so new event families can be plugged
 * in without touching the recorder. Names that arrive on events but were
 * never defined are attached directly under the root by `resolve()`.
 */

import type { TypeHandle } from "./types.js";
import { EventHistoryError } from "./types.js";

export const DEFAULT_ROOT_TYPE = "event";

class EventTypeHandle implements TypeHandle {
  constructor(
    readonly name: string,
    readonly parent: EventTypeHandle | undefined,
  ) {}

  isAssignableFrom(candidate: TypeHandle): boolean {
    let current: TypeHandle | undefined = candidate;
    while (current !== undefined) {
      if (current === this) return true;
      current = current.parent;
    }
    return false;
  }

  ancestry(): readonly TypeHandle[] {
    const chain: TypeHandle[] = [];
    let current: TypeHandle | undefined = this;
    while (current !== undefined) {
      chain.push(current);
      current = current.parent;
    }
    return chain;
  }

  toString(): string {
    return this.name;
  }
}

export class EventTypeHierarchy {
  private readonly _types = new Map<string, EventTypeHandle>();
  private readonly _root: EventTypeHandle;

  constructor(rootName: string = DEFAULT_ROOT_TYPE) {
    this._validateName(rootName);
    this._root = new EventTypeHandle(rootName, undefined);
    this._types.set(rootName, this._root);
  }

  /** The type that covers every event type. */
  get root(): TypeHandle {
    return this._root;
  }

  /**
   * Register an event type under `parent` (the root when omitted).
   *
   * Defining an existing name again under the same parent returns the
   * existing handle.
   *
   * @throws EventHistoryError UNKNOWN_TYPE if the parent is not registered
   * @throws EventHistoryError TYPE_CONFLICT if the name exists under another parent
   */
  define(name: string, parent?: TypeHandle | string): TypeHandle {
    this._validateName(name);
    const parentHandle = this._lookupParent(parent);

    const existing = this._types.get(name);
    if (existing !== undefined) {
      if (existing === this._root) {
        throw new EventHistoryError(
          "TYPE_CONFLICT",
          `"${name}" is the hierarchy root and cannot be redefined`,
          name,
        );
      }
      if (existing.parent !== parentHandle) {
        throw new EventHistoryError(
          "TYPE_CONFLICT",
          `Event type "${name}" is already defined under "${existing.parent?.name ?? "(root)"}"`,
          name,
        );
      }
      return existing;
    }

    const handle = new EventTypeHandle(name, parentHandle);
    this._types.set(name, handle);
    return handle;
  }

  get(name: string): TypeHandle | undefined {
    return this._types.get(name);
  }

  has(name: string): boolean {
    return this._types.has(name);
  }

  /**
   * @throws EventHistoryError UNKNOWN_TYPE if no type has this name
   */
  require(name: string): TypeHandle {
    const handle = this._types.get(name);
    if (handle === undefined) {
      throw new EventHistoryError(
        "UNKNOWN_TYPE",
        `Unknown event type "${name}"`,
        name,
      );
    }
    return handle;
  }

  /**
   * Handle for an incoming event's type name, registering unseen names
   * as direct children of the root. Never throws: a blank name resolves
   * to the root itself.
   */
  resolve(name: string): TypeHandle {
    if (name.trim().length === 0) return this._root;
    return this._types.get(name) ?? this.define(name);
  }

  /** All handles in definition order, root first. */
  types(): readonly TypeHandle[] {
    return [...this._types.values()];
  }

  get size(): number {
    return this._types.size;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _lookupParent(parent: TypeHandle | string | undefined): EventTypeHandle {
    if (parent === undefined) {
      return this._root;
    }
    const name = typeof parent === "string" ? parent : parent.name;
    const handle = this._types.get(name);
    if (handle === undefined || (typeof parent !== "string" && handle !== parent)) {
      throw new EventHistoryError(
        "UNKNOWN_TYPE",
        `Parent type "${name}" is not defined in this hierarchy`,
        name,
      );
    }
    return handle;
  }

  private _validateName(name: string): void {
    if (name.trim().length === 0) {
      throw new EventHistoryError(
        "INVALID_TYPE_NAME",
        "Event type name must be a non-empty string",
      );
    }
  }
}
