/**
 * Report model.
 *
 * Lays a reconciliation result out as the sheets of the output workbook,
 * with a style token on every cell or row that carries a change. Writing
 * the workbook and turning tokens into colours is left to the renderer.
 *
 * Sheet order:
 * 1. Every original source sheet, unchanged
 * 2. "Stripped Source": normalised source rows; unmatched rows marked removed
 * 3. "Merged Output"  : the reconciled test table; changed cells marked
 * 4. "Differences"    : one row per record (only when there are any)
 */

import type { CellValue, ChangeStyle, RawTable } from "@treerecon/types";
import { CHANGE_STYLES } from "@treerecon/types";
import { collectColumns } from "./dataset.js";
import type { OutputTable, ReconciliationResult } from "./types.js";

/** Longest sheet name spreadsheet applications accept. */
export const SHEET_NAME_LIMIT = 31;

export const STRIPPED_SOURCE_SHEET = "Stripped Source";
export const MERGED_OUTPUT_SHEET = "Merged Output";
export const DIFFERENCES_SHEET = "Differences";

export const DIFFERENCE_COLUMNS: readonly string[] = [
  "Hierarchy Path",
  "Tag",
  "Column",
  "Test Value",
  "Source Value",
  "Change Type",
];

const FORBIDDEN_SHEET_CHARS = /[[\]:*?/\\]/g;

/** Style of one cell, or of a whole row when `column` is null. */
export interface StyleMark {
  readonly row: number;
  readonly column: number | null;
  readonly style: ChangeStyle;
}

export interface ReportSheet {
  readonly name: string;
  readonly columns: readonly string[];
  readonly rows: readonly (readonly string[])[];
  readonly styles: readonly StyleMark[];
}

export interface ReportWorkbook {
  readonly sheets: readonly ReportSheet[];
}

// =============================================================================
// Helpers
// =============================================================================

function displayCell(value: CellValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && Number.isNaN(value)) return "";
  return String(value);
}

/**
 * A sheet name that fits the length limit and is unique within the workbook.
 */
export function uniqueSheetName(name: string, used: ReadonlySet<string>): string {
  const base = name.replace(FORBIDDEN_SHEET_CHARS, "_").trim() || "Sheet";
  let candidate = base.slice(0, SHEET_NAME_LIMIT);
  let n = 2;
  while (used.has(candidate)) {
    const suffix = ` (${n})`;
    candidate = base.slice(0, SHEET_NAME_LIMIT - suffix.length) + suffix;
    n += 1;
  }
  return candidate;
}

function tableRows(table: OutputTable): string[][] {
  return table.rows.map((row) => table.columns.map((c) => row[c] ?? ""));
}

// =============================================================================
// Assembly
// =============================================================================

export function assembleReport(
  result: ReconciliationResult,
  sourceTables: readonly RawTable[] = [],
): ReportWorkbook {
  const used = new Set<string>();
  const sheets: ReportSheet[] = [];

  const addSheet = (sheet: Omit<ReportSheet, "name">, name: string): void => {
    const unique = uniqueSheetName(name, used);
    used.add(unique);
    sheets.push({ name: unique, ...sheet });
  };

  for (const table of sourceTables) {
    const columns = collectColumns([table]);
    addSheet(
      {
        columns,
        rows: table.rows.map((record) =>
          columns.map((c) => displayCell(Object.hasOwn(record, c) ? record[c] : null)),
        ),
        styles: [],
      },
      table.name,
    );
  }

  addSheet(
    {
      columns: result.strippedSource.columns,
      rows: tableRows(result.strippedSource),
      styles: result.unmatchedSourceRows.map((row) => ({
        row,
        column: null,
        style: CHANGE_STYLES["Missing in Test"],
      })),
    },
    STRIPPED_SOURCE_SHEET,
  );

  const mergedColumns = result.reconciledTable.columns;
  const mergedStyles: StyleMark[] = [];
  for (const match of result.matches) {
    for (const [column, changeType] of Object.entries(match.cellChanges)) {
      const columnIndex = mergedColumns.indexOf(column);
      if (columnIndex === -1) continue;
      mergedStyles.push({
        row: match.testRowIndex,
        column: columnIndex,
        style: CHANGE_STYLES[changeType],
      });
    }
  }

  addSheet(
    {
      columns: mergedColumns,
      rows: tableRows(result.reconciledTable),
      styles: mergedStyles,
    },
    MERGED_OUTPUT_SHEET,
  );

  if (result.differences.length > 0) {
    addSheet(
      {
        columns: DIFFERENCE_COLUMNS,
        rows: result.differences.map((d) => [
          d.path,
          d.tag,
          d.column,
          d.testValue,
          d.sourceValue,
          d.changeType,
        ]),
        styles: result.differences.map((d, row) => ({
          row,
          column: null,
          style: CHANGE_STYLES[d.changeType],
        })),
      },
      DIFFERENCES_SHEET,
    );
  }

  return { sheets };
}
