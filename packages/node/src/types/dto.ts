/**
 * Request DTOs.
 *
 * Zod schemas for the JSON bodies the API accepts. A dataset arrives as
 * the tables a spreadsheet parser produced: one entry per sheet, each row
 * a flat record keyed by column header.
 */

import { z } from "zod";

// =============================================================================
// Tables
// =============================================================================

export const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RawTableSchema = z.object({
  name: z.string(),
  rows: z.array(z.record(CellSchema)),
});

export const DatasetSchema = z.object({
  tables: z.array(RawTableSchema),
});

// =============================================================================
// Column Mapping
// =============================================================================

export const ColumnMappingSchema = z
  .object({
    levelColumns: z.array(z.string().min(1)).min(1),
    nameColumn: z.string().min(1),
    tagColumn: z.string().min(1),
    placeholderPrefix: z.string(),
  })
  .partial()
  .strict();

// =============================================================================
// Reconciliation DTOs
// =============================================================================

export const ReconcileSchema = z.object({
  source: DatasetSchema,
  test: DatasetSchema,
  /** Overrides the configured structural headers for this request */
  mapping: ColumnMappingSchema.optional(),
  dropBlankRows: z.boolean().optional(),
});

export type RawTableDto = z.infer<typeof RawTableSchema>;
export type ColumnMappingDto = z.infer<typeof ColumnMappingSchema>;
export type ReconcileDto = z.infer<typeof ReconcileSchema>;
