/**
 * Difference Types
 *
 * The change taxonomy and the records the reconciler emits.
 * Records are append-only: produced once per reconciliation, never mutated.
 */

/**
 * Change labels, exactly as they appear in reports.
 *
 * "Unchanged" is implicit: equal cells are never recorded.
 */
export type ChangeType =
  | "Changed"                 // Both sides present and unequal (primary key match)
  | "New in Test"             // Only the test side has a value / row
  | "Missing in Test"         // Only the source side has a value / row
  | "Changed (Fallback)"      // Changed, matched through the parent-child key
  | "Changed (Loose Match)";  // Changed, matched through a globally unique tag

export const CHANGE_TYPES: readonly ChangeType[] = [
  "Changed",
  "New in Test",
  "Missing in Test",
  "Changed (Fallback)",
  "Changed (Loose Match)",
] as const;

/**
 * Matching tier that paired a test row with a source row.
 */
export type MatchTier = "primary-key" | "parent-child" | "loose-tag";

export const MATCH_TIERS: readonly MatchTier[] = [
  "primary-key",
  "parent-child",
  "loose-tag",
] as const;

/**
 * Visual encoding tokens the report renderer maps to colours.
 * The core never interprets them.
 */
export type ChangeStyle =
  | "changed"
  | "added"
  | "removed"
  | "fallback-changed"
  | "loose-changed";

export const CHANGE_STYLES: Readonly<Record<ChangeType, ChangeStyle>> = {
  "Changed": "changed",
  "New in Test": "added",
  "Missing in Test": "removed",
  "Changed (Fallback)": "fallback-changed",
  "Changed (Loose Match)": "loose-changed",
};

/**
 * One reported discrepancy for one column of one logical row.
 */
export interface DifferenceRecord {
  /** Hierarchy path of the row; "" when the row has none */
  readonly path: string;
  readonly tag: string;
  readonly column: string;
  readonly testValue: string;
  readonly sourceValue: string;
  readonly changeType: ChangeType;
}
