// Speaker Match - Ranker/Filter

import type { MatchSet, ScoredMatch } from "./types.js";

/**
 * Keep matches with `score >= threshold` and order them by score, highest
 * first. Array.prototype.sort is stable, so equal scores keep their input
 * (catalog) order. The input array is left untouched.
 */
export function rankMatches(scored: readonly ScoredMatch[], threshold: number): MatchSet {
  return scored
    .filter((match) => match.score >= threshold)
    .sort((a, b) => b.score - a.score);
}
