/**
 * @treerecon/reconciler domain types.
 *
 * Assembled datasets, tier matching, and the reconciliation result handed to
 * the report assembler.
 */

import type {
  ChangeType,
  ColumnMapping,
  DifferenceRecord,
  MatchTier,
  PathedRow,
} from "@treerecon/types";

export type DatasetSide = "source" | "test";

// =============================================================================
// Datasets
// =============================================================================

/** An ordered, normalised, path-augmented dataset. */
export interface Dataset {
  readonly side: DatasetSide;
  readonly mapping: ColumnMapping;

  /** Every column seen across the input tables, in first-seen order */
  readonly columns: readonly string[];

  /** All rows in input order; `row.index` is the position in this list */
  readonly rows: readonly PathedRow[];

  /** Rows minus discarded primary-key duplicates, in input order */
  readonly retained: readonly PathedRow[];

  /** First row per primary key (HierarchyPath, tag) */
  readonly clean: ReadonlyMap<string, PathedRow>;

  readonly keys: ReadonlySet<string>;
}

// =============================================================================
// Notices (diagnostics returned as data)
// =============================================================================

/** A level value that could not be read; the row was treated as level-less. */
export interface MalformedLevelNotice {
  readonly kind: "malformed-level";
  readonly side: DatasetSide;
  readonly rowIndex: number;
  readonly table: string;
  readonly rawValue: string;
}

/** A later row with an already-seen primary key, dropped from matching. */
export interface DuplicateKeyNotice {
  readonly kind: "duplicate-key";
  readonly side: DatasetSide;
  readonly rowIndex: number;
  readonly keptRowIndex: number;
  readonly path: string;
  readonly tag: string;
}

/**
 * A parent-child key shared by more than one unclaimed source row or more
 * than one pending test row.
 */
export interface AmbiguousParentChildNotice {
  readonly kind: "ambiguous-parent-child";
  readonly testRowIndex: number;
  readonly parentChildKey: string;
  readonly tag: string;
  /** Unclaimed source rows carrying the key */
  readonly candidateRowIndexes: readonly number[];
  /** Pending test rows carrying the key, this one included */
  readonly testRowIndexes: readonly number[];
}

/** A tag skipped by the loose tier because it is not unique on both sides. */
export interface AmbiguousLooseTagNotice {
  readonly kind: "ambiguous-loose-tag";
  readonly testRowIndex: number;
  readonly tag: string;
  readonly sourceCount: number;
  readonly testCount: number;
}

export type DatasetNotice = MalformedLevelNotice | DuplicateKeyNotice;
export type MatchNotice = AmbiguousParentChildNotice | AmbiguousLooseTagNotice;
export type ReconciliationNotice = DatasetNotice | MatchNotice;

export interface AssembledDataset {
  readonly dataset: Dataset;
  readonly notices: readonly DatasetNotice[];
}

// =============================================================================
// Tier Matching
// =============================================================================

export interface TierContext {
  readonly source: Dataset;
  readonly test: Dataset;
  /** Source row indexes already matched by an earlier tier */
  readonly claimed: ReadonlySet<number>;
}

export interface TierOutcome {
  /** Test row index → matched source row */
  readonly matches: ReadonlyMap<number, PathedRow>;
  readonly notices: readonly MatchNotice[];
}

/**
 * One strategy of the fallback cascade.
 * Pure: the outcome depends only on its arguments.
 */
export interface TierMatcher {
  readonly tier: MatchTier;
  match(pending: readonly PathedRow[], context: TierContext): TierOutcome;
}

// =============================================================================
// Reconciliation Result
// =============================================================================

/** How one test row was resolved. */
export interface RowMatch {
  readonly testRowIndex: number;
  /** null when the row is new in test */
  readonly sourceRowIndex: number | null;
  readonly tier: MatchTier | null;
  /** Change recorded per comparable column; unchanged columns are absent */
  readonly cellChanges: Readonly<Record<string, ChangeType>>;
}

/** A flat table handed to the report assembler. */
export interface OutputTable {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, string>>[];
}

export interface ReconciliationSummary {
  readonly totalSourceRows: number;
  readonly totalTestRows: number;
  readonly comparableColumnCount: number;

  readonly matchedByTier: Readonly<Record<MatchTier, number>>;
  readonly unmatchedTestRows: number;
  readonly unmatchedSourceRows: number;

  readonly countsByChangeType: Readonly<Record<ChangeType, number>>;

  readonly allReconciled: boolean;
}

export interface ReconciliationResult {
  /** Columns compared cell by cell, in source order */
  readonly comparableColumns: readonly string[];

  /** Test rows with the test column set, cleaned for export */
  readonly reconciledTable: OutputTable;

  /** Every source row with the source column set, cleaned for export */
  readonly strippedSource: OutputTable;

  /** Ordered discrepancies: test rows first, then missing source rows */
  readonly differences: readonly DifferenceRecord[];

  /** One entry per test row, in test order */
  readonly matches: readonly RowMatch[];

  /**
   * Source rows reported Missing in Test: keyed rows without a primary-key
   * match, and level-less rows no tier matched
   */
  readonly unmatchedSourceRows: readonly number[];

  readonly summary: ReconciliationSummary;
  readonly notices: readonly ReconciliationNotice[];

  /** SHA-256 of the canonical JSON of `differences` */
  readonly digest: string;
}
