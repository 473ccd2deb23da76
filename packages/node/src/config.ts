/**
 * @treerecon/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ReconcilerConfig } from "@treerecon/reconciler";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Structural column headers
  LEVEL_COLUMNS: z.string().default("Lvl,Level"),
  NAME_COLUMN: z.string().min(1).default("Name"),
  TAG_COLUMN: z.string().min(1).default("XML Tag"),
  PLACEHOLDER_PREFIX: z.string().default("Unnamed"),

  DROP_BLANK_ROWS: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),

  // Request bodies carry whole workbooks
  MAX_BODY_BYTES: z.coerce.number().int().min(1024).default(10 * 1024 * 1024),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Column List Parsing
// =============================================================================

/**
 * Parse the LEVEL_COLUMNS env var into header names, in priority order.
 *
 * Format: "Lvl,Level"
 */
export function parseColumnList(raw: string): readonly string[] {
  const columns = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");

  if (columns.length === 0) {
    throw new Error("LEVEL_COLUMNS must name at least one column");
  }
  if (new Set(columns).size !== columns.length) {
    throw new Error(`LEVEL_COLUMNS lists a column twice: "${raw}"`);
  }

  return columns;
}

/**
 * Reconciler settings derived from the loaded configuration.
 */
export function toReconcilerConfig(config: AppConfig): ReconcilerConfig {
  return {
    mapping: {
      levelColumns: parseColumnList(config.LEVEL_COLUMNS),
      nameColumn: config.NAME_COLUMN,
      tagColumn: config.TAG_COLUMN,
      placeholderPrefix: config.PLACEHOLDER_PREFIX,
    },
    dropBlankRows: config.DROP_BLANK_ROWS,
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
