/**
 * @treerecon/types: Shared domain types for the treerecon stack.
 *
 * These types are used across all treerecon packages:
 * - Raw tables as handed over by spreadsheet parsers
 * - Normalised and path-augmented rows
 * - The change taxonomy and difference records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Table types
export type {
  CellValue,
  RawRecord,
  RawTable,
  ColumnMapping,
  Row,
  PathedRow,
} from "./table.js";

// Difference types
export type {
  ChangeType,
  ChangeStyle,
  MatchTier,
  DifferenceRecord,
} from "./difference.js";
export { CHANGE_TYPES, CHANGE_STYLES, MATCH_TIERS } from "./difference.js";

// Runtime type guards
export {
  isCellValue,
  isRawRecord,
  isRawTable,
  isColumnMapping,
  isChangeType,
  isMatchTier,
  isDifferenceRecord,
} from "./guards.js";
