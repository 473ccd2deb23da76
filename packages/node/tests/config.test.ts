/**
 * Tests for config.ts: parseColumnList, loadConfig, toReconcilerConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, parseColumnList, toReconcilerConfig } from "../src/config.js";

// =============================================================================
// parseColumnList
// =============================================================================

describe("parseColumnList", () => {
  it("splits comma-separated headers in order", () => {
    expect(parseColumnList("Lvl,Level")).toEqual(["Lvl", "Level"]);
  });

  it("trims whitespace and skips empty entries", () => {
    expect(parseColumnList(" Depth , ,Lvl ")).toEqual(["Depth", "Lvl"]);
  });

  it("throws when no header remains", () => {
    expect(() => parseColumnList(" , ")).toThrow("LEVEL_COLUMNS must name at least one column");
  });

  it("throws on a repeated header", () => {
    expect(() => parseColumnList("Lvl,Lvl")).toThrow("LEVEL_COLUMNS lists a column twice");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      LEVEL_COLUMNS: "Lvl,Level",
      NAME_COLUMN: "Name",
      TAG_COLUMN: "XML Tag",
      PLACEHOLDER_PREFIX: "Unnamed",
      DROP_BLANK_ROWS: true,
      MAX_BODY_BYTES: 10485760,
    });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadConfig({ PORT: "8080", DROP_BLANK_ROWS: "false", MAX_BODY_BYTES: "2048" });

    expect(config.PORT).toBe(8080);
    expect(config.DROP_BLANK_ROWS).toBe(false);
    expect(config.MAX_BODY_BYTES).toBe(2048);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
    expect(() => loadConfig({ DROP_BLANK_ROWS: "yes" })).toThrow(ZodError);
    expect(() => loadConfig({ TAG_COLUMN: "" })).toThrow(ZodError);
  });
});

// =============================================================================
// toReconcilerConfig
// =============================================================================

describe("toReconcilerConfig", () => {
  it("builds the reconciler mapping from the environment", () => {
    const config = loadConfig({
      LEVEL_COLUMNS: "Depth",
      TAG_COLUMN: "Element",
      DROP_BLANK_ROWS: "false",
    });

    expect(toReconcilerConfig(config)).toEqual({
      mapping: {
        levelColumns: ["Depth"],
        nameColumn: "Name",
        tagColumn: "Element",
        placeholderPrefix: "Unnamed",
      },
      dropBlankRows: false,
    });
  });
});
