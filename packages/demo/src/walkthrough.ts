/**
 * Walkthrough steps.
 *
 * Runs one reconciliation and renders each stage as a titled block of
 * terminal lines. Rendering is separate from printing so the colours can
 * be switched off.
 */

import type { ChalkInstance } from "chalk";
import { Reconciler } from "@treerecon/reconciler";
import type {
  ReconciliationNotice,
  ReconciliationResult,
} from "@treerecon/reconciler";
import type { ChangeType, MatchTier, RawTable } from "@treerecon/types";

export interface WalkthroughStep {
  readonly title: string;
  readonly lines: readonly string[];
}

export interface Walkthrough {
  readonly result: ReconciliationResult;
  readonly steps: readonly WalkthroughStep[];
}

const TIER_LABELS: Record<MatchTier, string> = {
  "primary-key": "primary key",
  "parent-child": "parent-child",
  "loose-tag": "loose tag",
};

function colourFor(c: ChalkInstance, changeType: ChangeType): ChalkInstance {
  switch (changeType) {
    case "Changed":
      return c.yellow;
    case "New in Test":
      return c.green;
    case "Missing in Test":
      return c.red;
    case "Changed (Fallback)":
      return c.magenta;
    case "Changed (Loose Match)":
      return c.cyan;
  }
}

function describeNotice(notice: ReconciliationNotice): string {
  switch (notice.kind) {
    case "malformed-level":
      return `${notice.side} row ${notice.rowIndex}: unreadable level "${notice.rawValue}"`;
    case "duplicate-key":
      return `${notice.side} row ${notice.rowIndex}: duplicates row ${notice.keptRowIndex} at ${notice.path}`;
    case "ambiguous-parent-child":
      return `test row ${notice.testRowIndex}: ${notice.candidateRowIndexes.length} source and ${notice.testRowIndexes.length} test rows share ${notice.parentChildKey}`;
    case "ambiguous-loose-tag":
      return `test row ${notice.testRowIndex}: tag ${notice.tag} occurs ${notice.sourceCount}x in source, ${notice.testCount}x in test`;
  }
}

function info(c: ChalkInstance, label: string, value: string): string {
  return c.gray("    → ") + c.gray(label.padEnd(16)) + c.white(value);
}

function ok(c: ChalkInstance, msg: string): string {
  return c.green("    ✓ ") + c.white(msg);
}

function warn(c: ChalkInstance, msg: string): string {
  return c.yellow("    ! ") + c.yellow(msg);
}

function hashLine(c: ChalkInstance, label: string, hash: string): string {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  return c.gray("    → ") + c.gray(label.padEnd(16)) + c.yellow(short);
}

export function runWalkthrough(
  c: ChalkInstance,
  sourceSheets: readonly RawTable[],
  testSheets: readonly RawTable[],
  reconciler: Reconciler = new Reconciler(),
): Walkthrough {
  const result = reconciler.reconcileTables(sourceSheets, testSheets);
  const { summary } = result;
  const test = reconciler.assemble(testSheets, "test").dataset;

  const load: string[] = [];
  for (const [side, sheets] of [["source", sourceSheets], ["test", testSheets]] as const) {
    for (const sheet of sheets) {
      load.push(info(c, `${side}/${sheet.name}`, `${sheet.rows.length} rows`));
    }
  }
  load.push(ok(c, `Comparing ${result.comparableColumns.join(", ")}`));

  const paths = test.rows.map((row) =>
    info(c, `test row ${row.index}`, row.path ?? c.dim("(no level)")),
  );

  const matches = result.matches.map((match) =>
    match.tier === null
      ? warn(c, `test row ${match.testRowIndex} has no source counterpart`)
      : info(
          c,
          `test row ${match.testRowIndex}`,
          `source row ${match.sourceRowIndex} by ${TIER_LABELS[match.tier]}`,
        ),
  );

  const differences =
    result.differences.length === 0
      ? [ok(c, "No differences")]
      : result.differences.map((d) => {
          const colour = colourFor(c, d.changeType);
          return `    ${colour(d.changeType.padEnd(22))} ${c.white(d.path || "(no path)")} ${c.gray(d.column)}: ${c.gray(JSON.stringify(d.sourceValue))} → ${c.white(JSON.stringify(d.testValue))}`;
        });

  const diagnostics =
    result.notices.length === 0
      ? [ok(c, "No ambiguous or malformed rows")]
      : result.notices.map((notice) => warn(c, describeNotice(notice)));

  const totals = [
    info(c, "matched", `${summary.matchedByTier["primary-key"]} / ${summary.matchedByTier["parent-child"]} / ${summary.matchedByTier["loose-tag"]} (key / parent-child / tag)`),
    info(c, "new in test", String(summary.unmatchedTestRows)),
    info(c, "missing in test", String(summary.unmatchedSourceRows)),
    info(c, "differences", String(result.differences.length)),
    hashLine(c, "digest", result.digest),
    summary.allReconciled ? ok(c, "Datasets reconciled") : warn(c, "Datasets differ"),
  ];

  return {
    result,
    steps: [
      { title: "Load sheets", lines: load },
      { title: "Rebuild hierarchy paths", lines: paths },
      { title: "Match rows (3 tiers)", lines: matches },
      { title: "Classify differences", lines: differences },
      { title: "Diagnostics", lines: diagnostics },
      { title: "Summary", lines: totals },
    ],
  };
}
