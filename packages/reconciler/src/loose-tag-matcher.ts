/**
 * Loose Tag Matcher (tier 3)
 *
 * Last resort for rows with no structural correlation at all: pairs rows on
 * tag alone, and only when the tag occurs exactly once in the whole source
 * dataset and exactly once in the whole test dataset. Uniqueness is counted
 * over every row of each dataset, not over the rows still unmatched.
 *
 * Empty tags never match.
 */

import type { MatchTier, PathedRow } from "@treerecon/types";
import type {
  Dataset,
  MatchNotice,
  TierContext,
  TierMatcher,
  TierOutcome,
} from "./types.js";

interface TagIndex {
  readonly counts: ReadonlyMap<string, number>;
  readonly firstRow: ReadonlyMap<string, PathedRow>;
}

function indexTags(dataset: Dataset): TagIndex {
  const counts = new Map<string, number>();
  const firstRow = new Map<string, PathedRow>();

  for (const row of dataset.rows) {
    if (row.tag === "") continue;
    counts.set(row.tag, (counts.get(row.tag) ?? 0) + 1);
    if (!firstRow.has(row.tag)) {
      firstRow.set(row.tag, row);
    }
  }

  return { counts, firstRow };
}

export class LooseTagMatcher implements TierMatcher {
  readonly tier: MatchTier = "loose-tag";

  match(pending: readonly PathedRow[], context: TierContext): TierOutcome {
    const matches = new Map<number, PathedRow>();
    const notices: MatchNotice[] = [];

    const source = indexTags(context.source);
    const test = indexTags(context.test);

    for (const row of pending) {
      if (row.tag === "") continue;

      const sourceCount = source.counts.get(row.tag) ?? 0;
      const testCount = test.counts.get(row.tag) ?? 0;

      if (sourceCount === 0) continue; // Nothing to pair with

      if (sourceCount > 1 || testCount > 1) {
        notices.push({
          kind: "ambiguous-loose-tag",
          testRowIndex: row.index,
          tag: row.tag,
          sourceCount,
          testCount,
        });
        continue;
      }

      const sourceRow = source.firstRow.get(row.tag);
      if (sourceRow !== undefined && !context.claimed.has(sourceRow.index)) {
        matches.set(row.index, sourceRow);
      }
    }

    return { matches, notices };
  }
}
