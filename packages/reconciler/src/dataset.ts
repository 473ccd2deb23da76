/**
 * Dataset Assembler
 *
 * Concatenates every input table of one dataset into a single ordered row
 * sequence, normalises it, and rebuilds hierarchy paths over the whole
 * sequence. The path stack is not reset between tables: the tables are
 * read as one continuous walk.
 *
 * Also derives the views the matchers join on: the first-occurrence
 * "clean" table keyed by (HierarchyPath, tag) and its key set.
 */

import type { ColumnMapping, PathedRow, RawTable, Row } from "@treerecon/types";
import { isRawTable } from "@treerecon/types";
import { MalformedLevelError, ReconcilerError } from "./errors.js";
import { buildHierarchy } from "./hierarchy.js";
import {
  isBlankRecord,
  normalizeRecord,
  parseLevel,
  readCell,
  resolveLevelText,
} from "./normalizer.js";
import type {
  AssembledDataset,
  Dataset,
  DatasetNotice,
  DatasetSide,
} from "./types.js";

/** Columns earlier runs may have written; never compared or exported. */
export const DERIVED_COLUMNS: readonly string[] = [
  "Hierarchy Path",
  "Parent-Child Key",
];

export interface AssembleOptions {
  readonly side: DatasetSide;
  readonly mapping: ColumnMapping;
  /** Drop rows whose every cell is empty. Default: true */
  readonly dropBlankRows?: boolean;
}

/**
 * Primary join key of a row.
 */
export function primaryKey(path: string, tag: string): string {
  return JSON.stringify([path, tag]);
}

/**
 * Every header in first-seen order across all tables.
 */
export function collectColumns(tables: readonly RawTable[]): string[] {
  const seen = new Set<string>();
  for (const table of tables) {
    for (const record of table.rows) {
      for (const column of Object.keys(record)) {
        seen.add(column);
      }
    }
  }
  return [...seen];
}

export function assembleDataset(
  tables: readonly RawTable[],
  options: AssembleOptions,
): AssembledDataset {
  for (const table of tables) {
    if (!isRawTable(table)) {
      throw new ReconcilerError(
        "INVALID_TABLE",
        `Input to the ${options.side} dataset is not a table of flat records`,
      );
    }
  }

  const { side, mapping } = options;
  const dropBlankRows = options.dropBlankRows ?? true;
  const columns = collectColumns(tables);
  const notices: DatasetNotice[] = [];
  const rows: Row[] = [];

  for (const table of tables) {
    for (const record of table.rows) {
      const cells = normalizeRecord(record, columns);
      if (dropBlankRows && isBlankRecord(cells)) continue;

      const index = rows.length;
      const levelText = resolveLevelText(cells, mapping);
      let level: number | null;
      try {
        level = parseLevel(levelText);
      } catch (err: unknown) {
        if (!(err instanceof MalformedLevelError)) throw err;
        level = null;
        notices.push({
          kind: "malformed-level",
          side,
          rowIndex: index,
          table: table.name,
          rawValue: err.rawValue,
        });
      }

      rows.push({
        index,
        table: table.name,
        level,
        name: readCell(cells, mapping.nameColumn),
        tag: readCell(cells, mapping.tagColumn),
        cells,
      });
    }
  }

  const pathed = buildHierarchy(rows);
  const clean = new Map<string, PathedRow>();
  const retained: PathedRow[] = [];

  for (const row of pathed) {
    if (row.path === null) {
      retained.push(row);
      continue;
    }

    const key = primaryKey(row.path, row.tag);
    const kept = clean.get(key);
    if (kept !== undefined) {
      notices.push({
        kind: "duplicate-key",
        side,
        rowIndex: row.index,
        keptRowIndex: kept.index,
        path: row.path,
        tag: row.tag,
      });
      continue;
    }

    clean.set(key, row);
    retained.push(row);
  }

  const dataset: Dataset = {
    side,
    mapping,
    columns,
    rows: pathed,
    retained,
    clean,
    keys: new Set(clean.keys()),
  };

  return { dataset, notices };
}

/**
 * Whether a column is structural or a spreadsheet artefact for this mapping.
 */
export function isStructuralColumn(column: string, mapping: ColumnMapping): boolean {
  return (
    mapping.levelColumns.includes(column) ||
    column === mapping.tagColumn ||
    DERIVED_COLUMNS.includes(column) ||
    (mapping.placeholderPrefix !== "" && column.startsWith(mapping.placeholderPrefix))
  );
}

/**
 * Non-structural columns present in both datasets, in source order.
 */
export function comparableColumns(source: Dataset, test: Dataset): string[] {
  const testColumns = new Set(test.columns);
  return source.columns.filter(
    (column) =>
      testColumns.has(column) &&
      !isStructuralColumn(column, source.mapping) &&
      !isStructuralColumn(column, test.mapping),
  );
}
