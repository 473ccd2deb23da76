/**
 * Walkthrough tests, rendered without colour.
 */
import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { SOURCE_SHEETS, TEST_SHEETS } from "../src/sample.js";
import { runWalkthrough } from "../src/walkthrough.js";

const plain = new Chalk({ level: 0 });

describe("runWalkthrough", () => {
  const { result, steps } = runWalkthrough(plain, SOURCE_SHEETS, TEST_SHEETS);

  it("exercises every tier on the sample sheets", () => {
    expect(result.summary.matchedByTier).toEqual({
      "primary-key": 3,
      "parent-child": 2,
      "loose-tag": 1,
    });
    expect(result.summary.unmatchedTestRows).toBe(2);
    expect(result.summary.unmatchedSourceRows).toBe(4);
  });

  it("classifies the sample changes", () => {
    expect(result.summary.countsByChangeType).toEqual({
      "Changed": 1,
      "New in Test": 6,
      "Missing in Test": 12,
      "Changed (Fallback)": 1,
      "Changed (Loose Match)": 0,
    });
  });

  it("renders the steps in order", () => {
    expect(steps.map((s) => s.title)).toEqual([
      "Load sheets",
      "Rebuild hierarchy paths",
      "Match rows (3 tiers)",
      "Classify differences",
      "Diagnostics",
      "Summary",
    ]);
  });

  it("shows the path of a row under the inserted group", () => {
    const paths = steps[1]?.lines ?? [];
    expect(paths[5]).toBe(
      "    → test row 5      Invoice__Invoice > Lines__Invoice Lines > Line__Invoice Line > Qty__Quantity",
    );
  });

  it("names the tier of each match", () => {
    const matches = steps[2]?.lines ?? [];
    expect(matches[4]).toBe("    → test row 4      source row 3 by loose tag");
    expect(matches[3]).toBe("    ! test row 3 has no source counterpart");
  });

  it("ends with the verdict", () => {
    const summary = steps[5]?.lines ?? [];
    expect(summary[summary.length - 1]).toBe("    ! Datasets differ");
  });
});
