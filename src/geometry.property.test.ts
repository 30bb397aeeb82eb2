// Property-Based Tests: stable identity selection and grid mapping

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { chooseStableIdentities, gridIndex3x3 } from "./geometry.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Identity → frame count tally with distinct identities. */
const arbitraryTally = (): fc.Arbitrary<Map<number, number>> =>
  fc
    .array(fc.tuple(fc.integer({ min: 0, max: 586 }), fc.integer({ min: 1, max: 50 })), { maxLength: 40 })
    .map((entries) => new Map(entries));

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("chooseStableIdentities", () => {
  it("returns min(N, distinct) identities drawn from the tally", () => {
    fc.assert(
      fc.property(arbitraryTally(), fc.integer({ min: 0, max: 12 }), (tally, n) => {
        const chosen = chooseStableIdentities(tally, n);
        expect(chosen.length).toBe(Math.min(n, tally.size));
        expect(new Set(chosen).size).toBe(chosen.length);
        for (const id of chosen) expect(tally.has(id)).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("orders by descending count, then ascending identity", () => {
    fc.assert(
      fc.property(arbitraryTally(), fc.integer({ min: 0, max: 12 }), (tally, n) => {
        const chosen = chooseStableIdentities(tally, n);
        for (let i = 1; i < chosen.length; i++) {
          const prev = tally.get(chosen[i - 1]) ?? 0;
          const cur = tally.get(chosen[i]) ?? 0;
          expect(prev > cur || (prev === cur && chosen[i - 1] < chosen[i])).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("never leaves out an identity seen more often than one it chose", () => {
    fc.assert(
      fc.property(arbitraryTally(), fc.integer({ min: 0, max: 12 }), (tally, n) => {
        const chosen = new Set(chooseStableIdentities(tally, n));
        const minChosen = Math.min(...[...chosen].map((id) => tally.get(id) ?? 0));
        for (const [id, count] of tally) {
          if (!chosen.has(id)) expect(count).toBeLessThanOrEqual(minChosen);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("is idempotent and independent of insertion order", () => {
    fc.assert(
      fc.property(arbitraryTally(), fc.integer({ min: 0, max: 12 }), (tally, n) => {
        const reversed = new Map([...tally.entries()].reverse());
        const first = chooseStableIdentities(tally, n);
        expect(chooseStableIdentities(tally, n)).toEqual(first);
        expect(chooseStableIdentities(reversed, n)).toEqual(first);
      }),
      { numRuns: 200 },
    );
  });
});

describe("gridIndex3x3", () => {
  it("always lands in 0..8 with row-major layout", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (x, y) => {
          const cell = gridIndex3x3(x, y);
          expect(cell).toBeGreaterThanOrEqual(0);
          expect(cell).toBeLessThanOrEqual(8);
          expect(gridIndex3x3(x, 0)).toBe(cell % 3);
          expect(gridIndex3x3(0, y)).toBe(Math.floor(cell / 3) * 3);
        },
      ),
      { numRuns: 200 },
    );
  });
});
