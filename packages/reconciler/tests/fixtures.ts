/**
 * Test builders for mapping-sheet records.
 */

import type { CellValue, RawRecord, RawTable, Row } from "@treerecon/types";
import { assembleDataset } from "../src/dataset.js";
import { DEFAULT_COLUMN_MAPPING } from "../src/reconciler.js";
import type { Dataset } from "../src/types.js";

/** A mapping-sheet record with the default structural headers. */
export function rec(
  level: CellValue,
  tag: string,
  name: string,
  extra: Record<string, CellValue> = {},
): RawRecord {
  return { Lvl: level, Name: name, "XML Tag": tag, ...extra };
}

export function sheet(rows: readonly RawRecord[], name: string = "Sheet1"): RawTable {
  return { name, rows };
}

/** A normalised row for path-builder tests. */
export function row(index: number, level: number | null, tag: string, name: string): Row {
  return {
    index,
    table: "Sheet1",
    level,
    name,
    tag,
    cells: { Name: name, "XML Tag": tag },
  };
}

/** Assemble a single-sheet source and test dataset with the default mapping. */
export function datasets(
  source: readonly RawRecord[],
  test: readonly RawRecord[],
): { source: Dataset; test: Dataset } {
  const mapping = DEFAULT_COLUMN_MAPPING;
  return {
    source: assembleDataset([sheet(source)], { side: "source", mapping }).dataset,
    test: assembleDataset([sheet(test)], { side: "test", mapping }).dataset,
  };
}
