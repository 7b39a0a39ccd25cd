/**
 * Tests for covers().
 *
 * Includes property-based checks that coverage follows ancestry.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { covers } from "../src/type-matcher.js";
import { EventTypeHierarchy } from "../src/type-hierarchy.js";

function shapes(): EventTypeHierarchy {
  const hierarchy = new EventTypeHierarchy();
  hierarchy.define("A");
  hierarchy.define("B", "A");
  hierarchy.define("C", "B");
  hierarchy.define("D");
  return hierarchy;
}

// =============================================================================
// Unit
// =============================================================================

describe("covers", () => {
  it("an empty filter covers nothing", () => {
    const hierarchy = shapes();
    expect(covers([], hierarchy.require("A"))).toBe(false);
    expect(covers(new Set(), hierarchy.root)).toBe(false);
  });

  it("a supertype covers its subtypes", () => {
    const hierarchy = shapes();
    const a = hierarchy.require("A");
    expect(covers([a], hierarchy.require("A"))).toBe(true);
    expect(covers([a], hierarchy.require("B"))).toBe(true);
    expect(covers([a], hierarchy.require("C"))).toBe(true);
    expect(covers([a], hierarchy.require("D"))).toBe(false);
  });

  it("a subtype does not cover its supertype", () => {
    const hierarchy = shapes();
    expect(covers([hierarchy.require("B")], hierarchy.require("A"))).toBe(false);
  });

  it("any matching member is enough", () => {
    const hierarchy = shapes();
    const filter = [hierarchy.require("D"), hierarchy.require("B")];
    expect(covers(filter, hierarchy.require("C"))).toBe(true);
  });

  it("duplicates are harmless", () => {
    const hierarchy = shapes();
    const d = hierarchy.require("D");
    expect(covers([d, d, d], hierarchy.require("D"))).toBe(true);
    expect(covers([d, d], hierarchy.require("A"))).toBe(false);
  });

  it("the root covers everything", () => {
    const hierarchy = shapes();
    for (const type of hierarchy.types()) {
      expect(covers([hierarchy.root], type)).toBe(true);
    }
  });
});

// =============================================================================
// Properties
// =============================================================================

describe("covers property tests", () => {
  const names = ["A", "B", "C", "D"] as const;

  it("agrees with ancestry membership", () => {
    fc.assert(
      fc.property(
        fc.subarray([...names]),
        fc.constantFrom(...names),
        (filterNames, candidateName) => {
          const hierarchy = shapes();
          const filter = filterNames.map((n) => hierarchy.require(n));
          const candidate = hierarchy.require(candidateName);

          const expected = candidate
            .ancestry()
            .some((ancestor) => filter.includes(ancestor));
          expect(covers(filter, candidate)).toBe(expected);
        },
      ),
      { numRuns: 100 },
    );
  });
});
