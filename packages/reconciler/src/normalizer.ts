/**
 * Row Normalizer
 *
 * Coerces every raw cell to a canonical empty-or-trimmed string before any
 * comparison logic runs, and reads the structural fields of a row.
 */

import type { CellValue, ColumnMapping, RawRecord } from "@treerecon/types";
import { MalformedLevelError } from "./errors.js";

const INTEGER_LEVEL = /^\d+(?:\.0+)?$/;

// Spreadsheet line-break artefacts that must not survive into exported tables
const LINE_BREAK_ARTEFACTS = /_x000D_|\r|\n/g;

/**
 * Canonical text of a cell: "" for absent values, trimmed text otherwise.
 */
export function normalizeCell(value: CellValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && Number.isNaN(value)) return "";
  return String(value).trim();
}

/**
 * Normalise a raw record over the full column list of its dataset.
 * Columns the record lacks become "".
 */
export function normalizeRecord(
  record: RawRecord,
  columns: readonly string[],
): Readonly<Record<string, string>> {
  // fromEntries defines own properties, "__proto__" included
  return Object.fromEntries(
    columns.map((column) => [
      column,
      normalizeCell(Object.hasOwn(record, column) ? record[column] : null),
    ]),
  );
}

/**
 * Text of one normalised cell; "" when the row has no such column.
 * Only own properties count, so a header named like an Object.prototype
 * member never reads an inherited value.
 */
export function readCell(
  cells: Readonly<Record<string, string>>,
  column: string,
): string {
  return Object.hasOwn(cells, column) ? (cells[column] ?? "") : "";
}

export function isBlankRecord(cells: Readonly<Record<string, string>>): boolean {
  return Object.values(cells).every((v) => v === "");
}

/**
 * Text of the first level column that carries a value, or "".
 */
export function resolveLevelText(
  cells: Readonly<Record<string, string>>,
  mapping: ColumnMapping,
): string {
  for (const column of mapping.levelColumns) {
    const value = readCell(cells, column);
    if (value !== "") {
      return value;
    }
  }
  return "";
}

/**
 * Parse a normalised level value.
 *
 * "" is an absent level (null). Integral values, including the "2.0" form
 * spreadsheets produce for numeric columns, parse to their integer.
 *
 * @throws {MalformedLevelError} for anything else
 */
export function parseLevel(text: string): number | null {
  if (text === "") return null;
  if (!INTEGER_LEVEL.test(text)) {
    throw new MalformedLevelError(text);
  }
  return Number.parseInt(text, 10);
}

/**
 * Replace embedded line breaks with spaces for tabular export.
 */
export function cleanExportText(text: string): string {
  return text.replace(LINE_BREAK_ARTEFACTS, " ");
}
