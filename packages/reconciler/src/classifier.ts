/**
 * Diff Classifier
 *
 * Turns a pair of cell values into a change label. Comparison is exact
 * text comparison after trimming: "1.0" and "1" are different values.
 */

import type {
  ChangeType,
  DifferenceRecord,
  MatchTier,
  PathedRow,
} from "@treerecon/types";
import { readCell } from "./normalizer.js";

const CHANGED_BY_TIER: Readonly<Record<MatchTier, ChangeType>> = {
  "primary-key": "Changed",
  "parent-child": "Changed (Fallback)",
  "loose-tag": "Changed (Loose Match)",
};

export type RowPresence = "New in Test" | "Missing in Test";

/**
 * Label one cell of a matched row pair, or null when unchanged.
 */
export function classifyCell(
  testValue: string,
  sourceValue: string,
  tier: MatchTier,
): ChangeType | null {
  const test = testValue.trim();
  const source = sourceValue.trim();

  if (test === source) return null;
  if (source === "") return "New in Test";
  if (test === "") return "Missing in Test";
  return CHANGED_BY_TIER[tier];
}

/**
 * Cell-level records for a matched pair, in column order.
 */
export function compareRows(
  testRow: PathedRow,
  sourceRow: PathedRow,
  columns: readonly string[],
  tier: MatchTier,
): DifferenceRecord[] {
  const records: DifferenceRecord[] = [];

  for (const column of columns) {
    const testValue = readCell(testRow.cells, column);
    const sourceValue = readCell(sourceRow.cells, column);
    const changeType = classifyCell(testValue, sourceValue, tier);

    if (changeType !== null) {
      records.push({
        path: testRow.path ?? "",
        tag: testRow.tag,
        column,
        testValue,
        sourceValue,
        changeType,
      });
    }
  }

  return records;
}

/**
 * One record per column for a row whose key exists on one side only.
 * Row presence takes precedence: no cell comparison runs for such a row.
 */
export function rowPresenceRecords(
  row: PathedRow,
  columns: readonly string[],
  presence: RowPresence,
): DifferenceRecord[] {
  return columns.map((column) => {
    const value = readCell(row.cells, column);
    return {
      path: row.path ?? "",
      tag: row.tag,
      column,
      testValue: presence === "New in Test" ? value : "",
      sourceValue: presence === "Missing in Test" ? value : "",
      changeType: presence,
    };
  });
}
