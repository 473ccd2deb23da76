/**
 * @treerecon/reconciler: Hierarchical reconciliation engine.
 *
 * Reconciles a source and a test version of a tree-shaped mapping sheet
 * whose rows carry no identifier:
 * - Row identity is rebuilt from level, tag and name (hierarchy paths)
 * - Rows are paired through a three-tier cascade:
 *   1. primary key (HierarchyPath, tag)
 *   2. parent-child key (last two path components, tag)
 *   3. loose tag (tag unique in both datasets)
 * - Every compared cell is classified into a small change taxonomy
 *
 * Pure and synchronous: no I/O, no clocks, no shared state.
 */

// Reconciler (top-level coordinator)
export { Reconciler, DEFAULT_COLUMN_MAPPING } from "./reconciler.js";
export type { ReconcilerConfig } from "./reconciler.js";

// Matchers
export { PrimaryKeyMatcher } from "./primary-key-matcher.js";
export { ParentChildMatcher } from "./parent-child-matcher.js";
export { LooseTagMatcher } from "./loose-tag-matcher.js";

// Pipeline stages
export {
  normalizeCell,
  normalizeRecord,
  parseLevel,
  readCell,
  cleanExportText,
} from "./normalizer.js";
export {
  buildHierarchy,
  renderComponent,
  deriveParentChildKey,
  COMPONENT_SEPARATOR,
  PATH_SEPARATOR,
} from "./hierarchy.js";
export {
  assembleDataset,
  comparableColumns,
  primaryKey,
  DERIVED_COLUMNS,
} from "./dataset.js";
export type { AssembleOptions } from "./dataset.js";
export { classifyCell, compareRows, rowPresenceRecords } from "./classifier.js";
export type { RowPresence } from "./classifier.js";
export { digestDifferences } from "./digest.js";

// Report model
export {
  assembleReport,
  uniqueSheetName,
  SHEET_NAME_LIMIT,
  STRIPPED_SOURCE_SHEET,
  MERGED_OUTPUT_SHEET,
  DIFFERENCES_SHEET,
  DIFFERENCE_COLUMNS,
} from "./report.js";
export type { ReportWorkbook, ReportSheet, StyleMark } from "./report.js";

// Errors
export { ReconcilerError, MalformedLevelError } from "./errors.js";
export type { ReconcilerErrorCode } from "./errors.js";

// Types
export type {
  DatasetSide,
  Dataset,
  AssembledDataset,

  // Matching
  TierMatcher,
  TierContext,
  TierOutcome,

  // Notices
  MalformedLevelNotice,
  DuplicateKeyNotice,
  AmbiguousParentChildNotice,
  AmbiguousLooseTagNotice,
  DatasetNotice,
  MatchNotice,
  ReconciliationNotice,

  // Results
  RowMatch,
  OutputTable,
  ReconciliationSummary,
  ReconciliationResult,
} from "./types.js";
