/**
 * Type coverage.
 *
 * A filter type covers itself and every subtype. `covers` is pure and
 * total: an empty filter covers nothing, and it has no notion of an
 * absent filter. Callers decide what "no filter" means.
 */

import type { TypeHandle } from "./types.js";

/**
 * True iff some member of `filterSet` is `candidate` or an ancestor of it.
 */
export function covers(
  filterSet: Iterable<TypeHandle>,
  candidate: TypeHandle,
): boolean {
  for (const type of filterSet) {
    if (type.isAssignableFrom(candidate)) return true;
  }
  return false;
}
