/**
 * Property-based reconciliation tests.
 *
 * Two generators feed the properties:
 * - flat sheets whose tags are unique within each dataset
 * - nested sheets of level-bearing rows that repeat tags across levels, so
 *   parent-child keys and tags are shared, but never repeat a primary key
 *   within a dataset
 *
 * For such inputs:
 * 1. Swapping source and test swaps the values of every changed cell
 * 2. Reconciling a dataset against itself reports nothing
 * 3. The result is a pure function of the inputs
 */
import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DifferenceRecord, RawRecord } from "@treerecon/types";
import { Reconciler } from "../src/reconciler.js";
import type { ReconciliationResult } from "../src/types.js";
import { rec, sheet } from "./fixtures.js";

const reconciler = new Reconciler();

const uniqueTagRows = fc
  .uniqueArray(
    fc.record({
      tag: fc.integer({ min: 0, max: 9 }),
      level: fc.option(fc.integer({ min: 0, max: 3 }), { nil: null }),
      name: fc.constantFrom("alpha", "beta"),
      value: fc.constantFrom("", "x", "y"),
    }),
    { selector: (r) => r.tag, maxLength: 8 },
  )
  .map((rows): RawRecord[] =>
    rows.map((r) => rec(r.level, `T${r.tag}`, r.name, { Value: r.value })),
  );

function hasUniqueKeys(rows: readonly RawRecord[]): boolean {
  const { notices } = reconciler.assemble([sheet(rows)], "source");
  return notices.every((n) => n.kind !== "duplicate-key");
}

const nestedRows = fc
  .array(
    fc.record({
      tag: fc.constantFrom("T0", "T1", "T2"),
      level: fc.integer({ min: 0, max: 3 }),
      name: fc.constantFrom("alpha", "beta", "gamma"),
      value: fc.constantFrom("", "x", "y"),
    }),
    { maxLength: 7 },
  )
  .map((rows): RawRecord[] => rows.map((r) => rec(r.level, r.tag, r.name, { Value: r.value })))
  .filter(hasUniqueKeys);

const CHANGED = new Set(["Changed", "Changed (Fallback)", "Changed (Loose Match)"]);

/** Changed cells keyed by tag and column, with (test, source) values. */
function changedCells(differences: readonly DifferenceRecord[]): Map<string, [string, string]> {
  const cells = new Map<string, [string, string]>();
  for (const d of differences) {
    if (!CHANGED.has(d.changeType)) continue;
    cells.set(`${d.tag}/${d.column}`, [d.testValue, d.sourceValue]);
  }
  return cells;
}

/**
 * Changed cells of every matched pair as "sourceRow|testRow|column|type".
 * Pass `swapped` for a run with the datasets exchanged.
 */
function changedPairs(result: ReconciliationResult, swapped: boolean): string[] {
  const pairs: string[] = [];
  for (const match of result.matches) {
    if (match.sourceRowIndex === null) continue;
    const [sourceRow, testRow] = swapped
      ? [match.testRowIndex, match.sourceRowIndex]
      : [match.sourceRowIndex, match.testRowIndex];
    for (const [column, changeType] of Object.entries(match.cellChanges)) {
      if (CHANGED.has(changeType)) pairs.push(`${sourceRow}|${testRow}|${column}|${changeType}`);
    }
  }
  return pairs.sort();
}

describe("reconciliation properties", () => {
  it("swapping the datasets swaps every changed value", () => {
    fc.assert(
      fc.property(uniqueTagRows, uniqueTagRows, (source, test) => {
        const forward = reconciler.reconcileTables([sheet(source)], [sheet(test)]);
        const backward = reconciler.reconcileTables([sheet(test)], [sheet(source)]);

        const swapped = new Map(
          [...changedCells(backward.differences)].map(([key, [t, s]]): [string, [string, string]] => [
            key,
            [s, t],
          ]),
        );
        expect(swapped).toEqual(changedCells(forward.differences));
      }),
    );
  });

  it("swapping nested datasets keeps the same changed pairs", () => {
    fc.assert(
      fc.property(nestedRows, nestedRows, (source, test) => {
        const forward = reconciler.reconcileTables([sheet(source)], [sheet(test)]);
        const backward = reconciler.reconcileTables([sheet(test)], [sheet(source)]);

        expect(changedPairs(backward, true)).toEqual(changedPairs(forward, false));
      }),
    );
  });

  it("reports nothing for a dataset against itself", () => {
    fc.assert(
      fc.property(fc.oneof(uniqueTagRows, nestedRows), (rows) => {
        const result = reconciler.reconcileTables([sheet(rows)], [sheet(rows)]);
        expect(result.differences).toEqual([]);
        expect(result.summary.unmatchedTestRows).toBe(0);
      }),
    );
  });

  it("yields the same result and digest on every run", () => {
    fc.assert(
      fc.property(nestedRows, nestedRows, (source, test) => {
        const a = reconciler.reconcileTables([sheet(source)], [sheet(test)]);
        const b = reconciler.reconcileTables([sheet(source)], [sheet(test)]);
        expect(b).toEqual(a);
        expect(b.digest).toBe(a.digest);
      }),
    );
  });
});
