import type { ResultSet } from "./resultTypes.js";

/**
 * Picks the result set with the greatest timestamp. Timestamps are compared
 * as plain strings; on a tie the earlier candidate wins.
 */
export function selectLatest(family: readonly ResultSet[]): ResultSet | undefined {
  let latest: ResultSet | undefined;
  for (const candidate of family) {
    if (latest === undefined || candidate.timestamp > latest.timestamp) {
      latest = candidate;
    }
  }
  return latest;
}
