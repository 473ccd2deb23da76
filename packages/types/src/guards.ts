/**
 * Runtime Type Guards
 *
 * Narrowing functions for treerecon domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { CellValue, RawRecord, RawTable, ColumnMapping } from "./table.js";
import type { ChangeType, DifferenceRecord, MatchTier } from "./difference.js";
import { CHANGE_TYPES, MATCH_TIERS } from "./difference.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Table guards
// =============================================================================

export function isCellValue(value: unknown): value is CellValue {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function isRawRecord(value: unknown): value is RawRecord {
  if (!isObject(value)) return false;
  return Object.values(value).every(isCellValue);
}

export function isRawTable(value: unknown): value is RawTable {
  if (!isObject(value)) return false;
  return (
    typeof value.name === "string" &&
    Array.isArray(value.rows) &&
    value.rows.every(isRawRecord)
  );
}

export function isColumnMapping(value: unknown): value is ColumnMapping {
  if (!isObject(value)) return false;
  return (
    Array.isArray(value.levelColumns) &&
    value.levelColumns.length > 0 &&
    value.levelColumns.every((c) => typeof c === "string" && c.length > 0) &&
    typeof value.nameColumn === "string" &&
    value.nameColumn.length > 0 &&
    typeof value.tagColumn === "string" &&
    value.tagColumn.length > 0 &&
    typeof value.placeholderPrefix === "string"
  );
}

// =============================================================================
// Difference guards
// =============================================================================

const CHANGE_TYPE_SET = new Set<string>(CHANGE_TYPES);
const MATCH_TIER_SET = new Set<string>(MATCH_TIERS);

export function isChangeType(value: unknown): value is ChangeType {
  return typeof value === "string" && CHANGE_TYPE_SET.has(value);
}

export function isMatchTier(value: unknown): value is MatchTier {
  return typeof value === "string" && MATCH_TIER_SET.has(value);
}

export function isDifferenceRecord(value: unknown): value is DifferenceRecord {
  if (!isObject(value)) return false;
  return (
    typeof value.path === "string" &&
    typeof value.tag === "string" &&
    typeof value.column === "string" &&
    typeof value.testValue === "string" &&
    typeof value.sourceValue === "string" &&
    isChangeType(value.changeType)
  );
}
