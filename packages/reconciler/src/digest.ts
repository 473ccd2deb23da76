/**
 * Difference digest.
 *
 * SHA-256 over the RFC 8785 canonical JSON of the difference list, so two
 * runs over the same inputs can be compared by a single hex string.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { DifferenceRecord } from "@treerecon/types";

export function digestDifferences(differences: readonly DifferenceRecord[]): string {
  return createHash("sha256").update(canonicalize(differences)).digest("hex");
}
