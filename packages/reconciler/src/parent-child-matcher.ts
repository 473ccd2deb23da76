/**
 * Parent-Child Matcher (tier 2)
 *
 * Recovers rows whose ancestry changed above their immediate parent: an
 * ancestor inserted, removed or renamed, or the row moved one level while
 * keeping its local context.
 *
 * Strategy:
 * 1. Index unclaimed clean source rows by (ParentChildKey, tag)
 * 2. Index the pending test rows by the same key
 * 3. Match only when exactly one row on each side shares the key; report
 *    every other shared key as ambiguous
 */

import type { MatchTier, PathedRow } from "@treerecon/types";
import type {
  MatchNotice,
  TierContext,
  TierMatcher,
  TierOutcome,
} from "./types.js";

function fallbackKey(parentChildKey: string, tag: string): string {
  return JSON.stringify([parentChildKey, tag]);
}

function indexByFallbackKey(rows: Iterable<PathedRow>): Map<string, PathedRow[]> {
  const byKey = new Map<string, PathedRow[]>();
  for (const row of rows) {
    if (row.parentChildKey === null) continue;
    const key = fallbackKey(row.parentChildKey, row.tag);
    const list = byKey.get(key) ?? [];
    list.push(row);
    byKey.set(key, list);
  }
  return byKey;
}

export class ParentChildMatcher implements TierMatcher {
  readonly tier: MatchTier = "parent-child";

  match(pending: readonly PathedRow[], context: TierContext): TierOutcome {
    const matches = new Map<number, PathedRow>();
    const notices: MatchNotice[] = [];

    const unclaimed = [...context.source.clean.values()].filter(
      (row) => !context.claimed.has(row.index),
    );
    const sourceByKey = indexByFallbackKey(unclaimed);
    const testByKey = indexByFallbackKey(pending);

    for (const row of pending) {
      if (row.parentChildKey === null) continue;

      const key = fallbackKey(row.parentChildKey, row.tag);
      const candidates = sourceByKey.get(key);
      if (candidates === undefined) continue;

      const peers = testByKey.get(key) ?? [row];
      const [only] = candidates;
      if (candidates.length === 1 && peers.length === 1 && only !== undefined) {
        matches.set(row.index, only);
        continue;
      }

      notices.push({
        kind: "ambiguous-parent-child",
        testRowIndex: row.index,
        parentChildKey: row.parentChildKey,
        tag: row.tag,
        candidateRowIndexes: candidates.map((c) => c.index),
        testRowIndexes: peers.map((p) => p.index),
      });
    }

    return { matches, notices };
  }
}
