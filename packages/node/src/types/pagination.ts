/**
 * Cursor-based pagination over arrival-ordered records.
 *
 * Records carry a strictly increasing `occurredAt`, so a cursor only
 * needs the last position a client has seen. It survives `clear()`:
 * positions are never reused.
 */

import { z } from "zod";

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

// { p: occurredAt of the last record on the previous page }
const CursorSchema = z.object({ p: z.number().int().nonnegative() });

export function encodeCursor(position: number): string {
  return Buffer.from(JSON.stringify({ p: position })).toString("base64url");
}

/**
 * Decode a cursor into the last seen position, or undefined when the
 * cursor is not one this service issued.
 */
export function decodeCursor(cursor: string): number | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(raw);
  return parsed.success ? parsed.data.p : undefined;
}

// =============================================================================
// Paging
// =============================================================================

/** Index of the first item whose position is greater than `after`. */
function firstIndexAfter<T>(
  items: readonly T[],
  after: number,
  getPosition: (item: T) => number,
): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item !== undefined && getPosition(item) <= after) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Page through items sorted by ascending position.
 *
 * An undecodable cursor restarts from the first item.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => number,
): PaginatedResponse<T> {
  const after = query.cursor === undefined ? undefined : decodeCursor(query.cursor);
  const from = after === undefined ? 0 : firstIndexAfter(items, after, getPosition);
  const to = from + query.limit;

  const data = items.slice(from, to);
  const hasMore = to < items.length;
  const last = data[data.length - 1];

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(getPosition(last)) : null,
      hasMore,
    },
  };
}
