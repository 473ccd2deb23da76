/**
 * Table Types
 *
 * Tabular inputs as handed over by a spreadsheet parser, and the rows the
 * reconciler derives from them.
 *
 * Rules:
 * - Rows carry no stable identifier; order is the only record of tree shape
 * - Every cell is a trimmed string once normalised (empty means absent)
 * - Nothing here is mutated after construction
 */

/**
 * A raw cell value as produced by a spreadsheet or CSV parser.
 */
export type CellValue = string | number | boolean | null | undefined;

/**
 * A raw record keyed by column header.
 */
export type RawRecord = Readonly<Record<string, CellValue>>;

/**
 * One parsed table (e.g. one sheet of a workbook).
 */
export interface RawTable {
  /** Sheet or table name (e.g., "Header", "Body") */
  readonly name: string;

  readonly rows: readonly RawRecord[];
}

/**
 * Which headers carry the structural fields of a mapping sheet.
 */
export interface ColumnMapping {
  /**
   * Candidate level columns, in priority order.
   * The first one present with a non-empty value is used.
   */
  readonly levelColumns: readonly string[];

  readonly nameColumn: string;

  readonly tagColumn: string;

  /** Headers starting with this prefix are spreadsheet placeholders (e.g., "Unnamed: 3") */
  readonly placeholderPrefix: string;
}

/**
 * A normalised row.
 */
export interface Row {
  /** Position in the concatenated sequence of all tables */
  readonly index: number;

  /** Table the row was read from */
  readonly table: string;

  /** Nesting level; null when absent or malformed (row cannot be placed in the tree) */
  readonly level: number | null;

  readonly name: string;
  readonly tag: string;

  /** Every column of the dataset, trimmed; columns missing from the record are "" */
  readonly cells: Readonly<Record<string, string>>;
}

/**
 * A row augmented with its reconstructed identity.
 */
export interface PathedRow extends Row {
  /** Full ancestry path ("TAG__Name > TAG__Name"); null when the row has no level */
  readonly path: string | null;

  /** Last two non-empty path components; null when the row has no level */
  readonly parentChildKey: string | null;
}
