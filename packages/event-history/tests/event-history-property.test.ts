/**
 * Property-based tests for EventHistory.
 *
 * Uses fast-check to verify invariants:
 * 1. events() returns recorded events in arrival order
 * 2. Filtered queries are order-preserving subsequences of events()
 * 3. include/exclude follow hierarchy coverage
 * 4. Nothing is recorded while dormant
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { ObservedEvent } from "@hindsight/types";
import { EventHistory } from "../src/event-history.js";
import { EventTypeHierarchy } from "../src/type-hierarchy.js";

// =============================================================================
// Arbitraries
// =============================================================================

const TYPE_NAMES = ["input", "key", "mouse", "click", "output", "render"] as const;

function uiHierarchy(): EventTypeHierarchy {
  const hierarchy = new EventTypeHierarchy();
  hierarchy.define("input");
  hierarchy.define("key", "input");
  hierarchy.define("mouse", "input");
  hierarchy.define("click", "mouse");
  hierarchy.define("output");
  hierarchy.define("render", "output");
  return hierarchy;
}

const arbEvent: fc.Arbitrary<ObservedEvent> = fc.record({
  type: fc.constantFrom(...TYPE_NAMES),
  metadata: fc.record({
    eventId: fc.uuid(),
    timestamp: fc.constant("2026-01-01T00:00:00.000Z"),
    source: fc.constantFrom("keyboard", "pointer", "renderer"),
  }),
  payload: fc.dictionary(fc.string(), fc.integer()),
});

const arbFilter = fc.subarray([...TYPE_NAMES]);

function record(events: readonly ObservedEvent[]): EventHistory {
  const history = new EventHistory({ hierarchy: uiHierarchy() });
  history.setActive(true);
  for (const event of events) {
    history.onEvent(event);
  }
  return history;
}

// =============================================================================
// Tests
// =============================================================================

describe("event history property tests", () => {
  it("events() preserves arrival order", () => {
    fc.assert(
      fc.property(fc.array(arbEvent, { maxLength: 30 }), (events) => {
        const history = record(events);
        const recorded = history.events();

        expect(recorded.map((r) => r.event)).toEqual(events);
        expect(recorded.map((r) => r.occurredAt)).toEqual(
          events.map((_, i) => i + 1),
        );
      }),
      { numRuns: 50 },
    );
  });

  it("filtered queries are ordered subsequences following coverage", () => {
    fc.assert(
      fc.property(
        fc.array(arbEvent, { maxLength: 30 }),
        arbFilter,
        arbFilter,
        (events, includes, excludes) => {
          const history = record(events);
          const hierarchy = history.hierarchy;

          const coveredBy = (names: readonly string[], type: string): boolean =>
            hierarchy
              .require(type)
              .ancestry()
              .some((ancestor) => names.includes(ancestor.name));

          const expected = history
            .events()
            .filter(
              (r) =>
                coveredBy(includes, r.eventType.name) &&
                !coveredBy(excludes, r.eventType.name),
            );

          expect(history.events(includes, excludes)).toEqual(expected);
        },
      ),
      { numRuns: 100 },
    );
  });

  it("events(includes) excludes nothing beyond what includes fails to cover", () => {
    fc.assert(
      fc.property(fc.array(arbEvent, { maxLength: 30 }), arbFilter, (events, includes) => {
        const history = record(events);
        expect(history.events(includes)).toEqual(history.events(includes, []));
      }),
      { numRuns: 50 },
    );
  });

  it("records nothing while dormant", () => {
    fc.assert(
      fc.property(fc.array(arbEvent, { maxLength: 30 }), arbFilter, (events, includes) => {
        const history = new EventHistory({ hierarchy: uiHierarchy() });
        for (const event of events) {
          history.onEvent(event);
        }
        expect(history.events()).toEqual([]);
        expect(history.events(includes)).toEqual([]);
      }),
      { numRuns: 50 },
    );
  });
});
