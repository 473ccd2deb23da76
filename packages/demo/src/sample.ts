/**
 * Sample mapping sheets for the walkthrough.
 *
 * The test version wraps the invoice lines in a new "Lines" group, widens
 * one format, makes the unit price mandatory, drops the line note and adds
 * a currency field.
 */

import type { CellValue, RawRecord, RawTable } from "@treerecon/types";

function field(
  level: CellValue,
  tag: string,
  name: string,
  format: string,
  mandatory: "Y" | "N",
): RawRecord {
  return { Lvl: level, Name: name, "XML Tag": tag, Format: format, Mandatory: mandatory };
}

export const SOURCE_SHEETS: readonly RawTable[] = [
  {
    name: "Header",
    rows: [
      field(0, "Invoice", "Invoice", "", "Y"),
      field(1, "Id", "Invoice Number", "an..35", "Y"),
      field(1, "Date", "Issue Date", "n8", "Y"),
    ],
  },
  {
    name: "Body",
    rows: [
      field(1, "Line", "Invoice Line", "", "Y"),
      field(2, "Qty", "Quantity", "n..15", "Y"),
      field(2, "Price", "Unit Price", "n..15", "N"),
      field(2, "Note", "Line Note", "an..512", "N"),
    ],
  },
];

export const TEST_SHEETS: readonly RawTable[] = [
  {
    name: "Header",
    rows: [
      field(0, "Invoice", "Invoice", "", "Y"),
      field(1, "Id", "Invoice Number", "an..50", "Y"),
      field(1, "Date", "Issue Date", "n8", "Y"),
    ],
  },
  {
    name: "Body",
    rows: [
      field(1, "Lines", "Invoice Lines", "", "Y"),
      field(2, "Line", "Invoice Line", "", "Y"),
      field(3, "Qty", "Quantity", "n..15", "Y"),
      field(3, "Price", "Unit Price", "n..15", "Y"),
      field(1, "Currency", "Currency Code", "a3", "Y"),
    ],
  },
];
