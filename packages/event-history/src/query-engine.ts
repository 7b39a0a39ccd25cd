/**
 * Query and render.
 *
 * Both operations read a snapshot of the history log and never mutate
 * it, so they may interleave freely with recording.
 *
 * Defaults for absent filters:
 * - query includes: the hierarchy root (everything passes)
 * - query excludes, render filteredOut, render highlighted: nothing
 */

import type { HistoryLog } from "./history-log.js";
import type { EventTypeHierarchy } from "./type-hierarchy.js";
import { covers } from "./type-matcher.js";
import type { EntryEncoder, EventRecord, TypeFilter, TypeHandle } from "./types.js";

export class QueryEngine {
  constructor(
    private readonly _log: HistoryLog,
    private readonly _hierarchy: EventTypeHierarchy,
    private readonly _encoder: EntryEncoder,
  ) {}

  /**
   * Records covered by `includes` and not covered by `excludes`, in
   * arrival order.
   */
  query(includes?: TypeFilter, excludes?: TypeFilter): readonly EventRecord[] {
    const include =
      includes !== undefined ? this._handles(includes) : [this._hierarchy.root];
    const exclude = excludes !== undefined ? this._handles(excludes) : [];

    return this._log.snapshot().filter((record) => {
      if (!covers(include, record.eventType)) return false;
      return !covers(exclude, record.eventType);
    });
  }

  /**
   * Concatenated encoding of every record not covered by `filteredOut`,
   * emphasizing records covered by `highlighted`.
   */
  render(
    filteredOut?: TypeFilter,
    highlighted?: TypeFilter,
    encoder: EntryEncoder = this._encoder,
  ): string {
    const filtered = filteredOut !== undefined ? this._handles(filteredOut) : [];
    const emphasized = highlighted !== undefined ? this._handles(highlighted) : [];

    let text = "";
    for (const record of this._log.snapshot()) {
      if (covers(filtered, record.eventType)) continue;
      text += encoder(record, covers(emphasized, record.eventType));
    }
    return text;
  }

  /**
   * Resolve a filter to handles. Names not in the hierarchy cover
   * nothing and are dropped rather than registered.
   */
  private _handles(filter: TypeFilter): TypeHandle[] {
    const handles: TypeHandle[] = [];
    for (const member of filter) {
      if (typeof member !== "string") {
        handles.push(member);
        continue;
      }
      const handle = this._hierarchy.get(member);
      if (handle !== undefined) {
        handles.push(handle);
      }
    }
    return handles;
  }
}
