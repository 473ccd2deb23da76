/**
 * Reconciler: Top-level coordinator
 *
 * Runs the three matching tiers in order (primary key → parent-child →
 * loose tag), hands every matched pair to the diff classifier, and reports
 * rows present on one side only.
 *
 * A test row is offered to a tier only when every earlier tier failed for
 * it; the first tier that matches wins. Fallback runs test → source only:
 * a source row whose primary key has no match in test is reported
 * Missing in Test even when a fallback tier paired a test row with it.
 *
 * Usage:
 *   const reconciler = new Reconciler();
 *   const result = reconciler.reconcileTables(sourceSheets, testSheets);
 */

import type {
  ChangeType,
  ColumnMapping,
  DifferenceRecord,
  MatchTier,
  PathedRow,
  RawTable,
} from "@treerecon/types";
import { isColumnMapping } from "@treerecon/types";
import { compareRows, rowPresenceRecords } from "./classifier.js";
import {
  DERIVED_COLUMNS,
  assembleDataset,
  comparableColumns,
} from "./dataset.js";
import { digestDifferences } from "./digest.js";
import { ReconcilerError } from "./errors.js";
import { LooseTagMatcher } from "./loose-tag-matcher.js";
import { cleanExportText, readCell } from "./normalizer.js";
import { ParentChildMatcher } from "./parent-child-matcher.js";
import { PrimaryKeyMatcher } from "./primary-key-matcher.js";
import type {
  AssembledDataset,
  Dataset,
  DatasetSide,
  MatchNotice,
  OutputTable,
  ReconciliationResult,
  ReconciliationSummary,
  RowMatch,
  TierMatcher,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  levelColumns: ["Lvl", "Level"],
  nameColumn: "Name",
  tagColumn: "XML Tag",
  placeholderPrefix: "Unnamed",
};

export interface ReconcilerConfig {
  /** Overrides for the structural column headers */
  readonly mapping?: Partial<ColumnMapping>;
  /** Drop rows whose every cell is empty. Default: true */
  readonly dropBlankRows?: boolean;
}

interface Assignment {
  readonly source: PathedRow;
  readonly tier: MatchTier;
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  private readonly matchers: readonly TierMatcher[] = [
    new PrimaryKeyMatcher(),
    new ParentChildMatcher(),
    new LooseTagMatcher(),
  ];
  private readonly mapping: ColumnMapping;
  private readonly dropBlankRows: boolean;

  constructor(config: ReconcilerConfig = {}) {
    const mapping = { ...DEFAULT_COLUMN_MAPPING, ...config.mapping };
    if (!isColumnMapping(mapping)) {
      throw new ReconcilerError(
        "INVALID_MAPPING",
        "Column mapping needs at least one level column and non-empty name and tag columns",
      );
    }
    this.mapping = mapping;
    this.dropBlankRows = config.dropBlankRows ?? true;
  }

  getMapping(): ColumnMapping {
    return this.mapping;
  }

  /**
   * Concatenate, normalise and path-augment the tables of one dataset.
   */
  assemble(tables: readonly RawTable[], side: DatasetSide): AssembledDataset {
    return assembleDataset(tables, {
      side,
      mapping: this.mapping,
      dropBlankRows: this.dropBlankRows,
    });
  }

  /**
   * Assemble both datasets and reconcile them.
   * Assembly diagnostics are merged ahead of the matching diagnostics.
   */
  reconcileTables(
    sourceTables: readonly RawTable[],
    testTables: readonly RawTable[],
  ): ReconciliationResult {
    const source = this.assemble(sourceTables, "source");
    const test = this.assemble(testTables, "test");
    const result = this.reconcile(source.dataset, test.dataset);

    return {
      ...result,
      notices: [...source.notices, ...test.notices, ...result.notices],
    };
  }

  /**
   * Reconcile two assembled datasets.
   */
  reconcile(source: Dataset, test: Dataset): ReconciliationResult {
    const columns = comparableColumns(source, test);
    const { assignments, notices } = this.runTiers(source, test);

    // A source row with a key is present in test only through a primary-key
    // match; fallback pairs run test → source and leave it missing. A
    // level-less row has no key, so a loose match covers it.
    const present = new Set<number>();
    for (const assignment of assignments.values()) {
      if (assignment.tier === "primary-key" || assignment.source.path === null) {
        present.add(assignment.source.index);
      }
    }

    const differences: DifferenceRecord[] = [];
    const matches: RowMatch[] = [];

    for (const row of test.rows) {
      const assignment = assignments.get(row.index);
      const records = assignment
        ? compareRows(row, assignment.source, columns, assignment.tier)
        : rowPresenceRecords(row, columns, "New in Test");

      differences.push(...records);
      matches.push({
        testRowIndex: row.index,
        sourceRowIndex: assignment ? assignment.source.index : null,
        tier: assignment ? assignment.tier : null,
        cellChanges: Object.fromEntries(
          records.map((r): [string, ChangeType] => [r.column, r.changeType]),
        ),
      });
    }

    const unmatchedSourceRows: number[] = [];
    for (const row of source.retained) {
      if (present.has(row.index)) continue;
      unmatchedSourceRows.push(row.index);
      differences.push(...rowPresenceRecords(row, columns, "Missing in Test"));
    }

    const summary = this.computeSummary(
      source,
      test,
      columns,
      matches,
      unmatchedSourceRows,
      differences,
    );

    return {
      comparableColumns: columns,
      reconciledTable: toOutputTable(test),
      strippedSource: toOutputTable(source),
      differences,
      matches,
      unmatchedSourceRows,
      summary,
      notices,
      digest: digestDifferences(differences),
    };
  }

  // ===========================================================================
  // Tier Cascade
  // ===========================================================================

  private runTiers(
    source: Dataset,
    test: Dataset,
  ): { assignments: Map<number, Assignment>; notices: MatchNotice[] } {
    const assignments = new Map<number, Assignment>();
    const claimed = new Set<number>();
    const notices: MatchNotice[] = [];

    for (const matcher of this.matchers) {
      const pending = test.rows.filter((row) => !assignments.has(row.index));
      if (pending.length === 0) break;

      const outcome = matcher.match(pending, { source, test, claimed });
      notices.push(...outcome.notices);

      for (const [testIndex, sourceRow] of outcome.matches) {
        assignments.set(testIndex, { source: sourceRow, tier: matcher.tier });
      }
      // Claims are applied between tiers, so several test rows may share a
      // source row within one tier but a later tier never takes it
      for (const sourceRow of outcome.matches.values()) {
        claimed.add(sourceRow.index);
      }
    }

    return { assignments, notices };
  }

  // ===========================================================================
  // Summary Computation
  // ===========================================================================

  private computeSummary(
    source: Dataset,
    test: Dataset,
    columns: readonly string[],
    matches: readonly RowMatch[],
    unmatchedSourceRows: readonly number[],
    differences: readonly DifferenceRecord[],
  ): ReconciliationSummary {
    const matchedByTier: Record<MatchTier, number> = {
      "primary-key": 0,
      "parent-child": 0,
      "loose-tag": 0,
    };
    for (const match of matches) {
      if (match.tier !== null) matchedByTier[match.tier] += 1;
    }

    const countsByChangeType: Record<ChangeType, number> = {
      "Changed": 0,
      "New in Test": 0,
      "Missing in Test": 0,
      "Changed (Fallback)": 0,
      "Changed (Loose Match)": 0,
    };
    for (const difference of differences) {
      countsByChangeType[difference.changeType] += 1;
    }

    return {
      totalSourceRows: source.rows.length,
      totalTestRows: test.rows.length,
      comparableColumnCount: columns.length,
      matchedByTier,
      unmatchedTestRows: matches.filter((m) => m.tier === null).length,
      unmatchedSourceRows: unmatchedSourceRows.length,
      countsByChangeType,
      allReconciled: differences.length === 0,
    };
  }
}

// =============================================================================
// Output Tables
// =============================================================================

function toOutputTable(dataset: Dataset): OutputTable {
  const columns = dataset.columns.filter((c) => !DERIVED_COLUMNS.includes(c));
  const rows = dataset.rows.map((row) =>
    Object.fromEntries(
      columns.map((column) => [column, cleanExportText(readCell(row.cells, column))]),
    ),
  );
  return { columns, rows };
}
