// Speaker Match - Item Scorer
// Scores one speaker against one query. Every failure on the way (provider,
// parse, timeout, request deadline) is caught here and becomes a zero-score
// match whose reasoning carries the cause, so one bad item never aborts a batch.

import { runWithDeadline } from "./deadline.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { extractJson } from "./response-parser.js";
import type { ScoringClient } from "./scoring-client.js";
import { buildScoringPrompt } from "./scoring-prompt.js";
import type { JsonObject, Query, ScoredMatch, SpeakerRecord } from "./types.js";

export interface SpeakerScorerOptions {
  /** Per-item deadline. Omit for none. */
  itemTimeoutMs?: number;
  logger?: Logger;
}

export interface ScoreVerdict {
  score: number;
  reasoning: string;
}

/**
 * Read `{score, reasoning}` from a parsed reply. Missing or unusable keys
 * fall back to 0 and "" rather than failing: a finite number or numeric
 * string is accepted for `score`, a string for `reasoning`.
 */
export function readVerdict(parsed: JsonObject): ScoreVerdict {
  const rawScore = parsed.score;
  let score = 0;
  if (typeof rawScore === "number" && Number.isFinite(rawScore)) {
    score = rawScore;
  } else if (typeof rawScore === "string" && rawScore.trim() !== "") {
    const n = Number(rawScore);
    if (Number.isFinite(n)) score = n;
  }

  const reasoning = typeof parsed.reasoning === "string" ? parsed.reasoning : "";
  return { score, reasoning };
}

function toMatch(speaker: SpeakerRecord, verdict: ScoreVerdict): ScoredMatch {
  return {
    name: speaker.name,
    title: speaker.title,
    organization: speaker.organization,
    bio: speaker.bio,
    score: verdict.score,
    reasoning: verdict.reasoning,
  };
}

export class SpeakerScorer {
  private readonly client: ScoringClient;
  private readonly itemTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(client: ScoringClient, options: SpeakerScorerOptions = {}) {
    this.client = client;
    this.itemTimeoutMs = options.itemTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Score `speaker` for `query`. Never rejects.
   * `signal` is the request-wide cancellation; once aborted, the item is
   * scored as a failure without contacting the provider.
   */
  async score(query: Query, speaker: SpeakerRecord, signal?: AbortSignal): Promise<ScoredMatch> {
    const prompt = buildScoringPrompt(query, speaker);

    try {
      const reply = await runWithDeadline(
        (itemSignal) => this.client.complete(prompt, itemSignal),
        { timeoutMs: this.itemTimeoutMs, signal },
      );
      return toMatch(speaker, readVerdict(extractJson(reply)));
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.warn(`Error scoring ${speaker.name || "<unnamed>"}: ${reason}`);
      return toMatch(speaker, { score: 0, reasoning: `Error: ${reason}` });
    }
  }
}
