// Speaker Match - Shared TypeScript interfaces and types

// ─── Catalog ────────────────────────────────────────────────────────────────────

/** One conference speaker as harvested into the catalog. `name` is a display key, not unique. */
export interface SpeakerRecord {
  readonly name: string;
  readonly title: string;
  readonly organization: string;
  readonly bio: string;
}

// ─── Query ──────────────────────────────────────────────────────────────────────

export interface Query {
  /** The caller's free-text business context. */
  readonly text: string;
  /** Minimum acceptable score, 0-10 inclusive. */
  readonly threshold: number;
}

// ─── Results ────────────────────────────────────────────────────────────────────

/**
 * A speaker plus the model's verdict. `score` is expected in 0-10 but is not
 * clamped; a misbehaving model can push it outside that range.
 */
export interface ScoredMatch extends SpeakerRecord {
  readonly score: number;
  readonly reasoning: string;
}

/** Matches at or above the threshold, score descending, ties in catalog order. */
export type MatchSet = ScoredMatch[];

export interface RecommendationResponse {
  matches: MatchSet;
  /** Catalog size, i.e. how many speakers were scored. */
  total_count: number;
  matched_count: number;
}

// ─── JSON ───────────────────────────────────────────────────────────────────────

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}
