/**
 * Primary Key Matcher (tier 1)
 *
 * Joins test rows to the clean source view on (HierarchyPath, tag).
 * Covers almost every row when the tree shape is stable.
 */

import type { MatchTier, PathedRow } from "@treerecon/types";
import { primaryKey } from "./dataset.js";
import type { TierContext, TierMatcher, TierOutcome } from "./types.js";

export class PrimaryKeyMatcher implements TierMatcher {
  readonly tier: MatchTier = "primary-key";

  match(pending: readonly PathedRow[], context: TierContext): TierOutcome {
    const matches = new Map<number, PathedRow>();

    for (const row of pending) {
      if (row.path === null) continue; // Level-less rows have no primary key

      const sourceRow = context.source.clean.get(primaryKey(row.path, row.tag));
      if (sourceRow !== undefined && !context.claimed.has(sourceRow.index)) {
        matches.set(row.index, sourceRow);
      }
    }

    return { matches, notices: [] };
  }
}
