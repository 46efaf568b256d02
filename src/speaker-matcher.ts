// Speaker Match - Fan-out Orchestrator
//
// One scoring call per catalog entry, at most `concurrency` in flight, joined
// with a full barrier: the batch resolves only after every item has a result.
// A request-wide deadline aborts whatever is still running; the scorer turns
// those items (and any not yet started) into zero-score failures, so the
// batch still yields exactly one ScoredMatch per speaker.

import { setMaxListeners } from "node:events";
import { mapWithConcurrency } from "./bounded-pool.js";
import { DEFAULT_MATCHER_CONFIG, type MatcherConfig } from "./config.js";
import { ScoringTimeoutError, UpstreamUnavailableError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { rankMatches } from "./ranker.js";
import type { MatchSet, Query, ScoredMatch, SpeakerRecord } from "./types.js";

/** Anything that can score one speaker without ever rejecting. */
export interface ItemScorer {
  score(query: Query, speaker: SpeakerRecord, signal?: AbortSignal): Promise<ScoredMatch>;
}

export interface SpeakerMatcherOptions {
  concurrency?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
}

export interface RequestContext {
  /** Correlates log lines for one request. */
  requestId?: string;
}

export class SpeakerMatcher {
  private readonly scorer: ItemScorer;
  private readonly concurrency: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(scorer: ItemScorer, options: SpeakerMatcherOptions = {}) {
    this.scorer = scorer;
    this.concurrency = options.concurrency ?? DEFAULT_MATCHER_CONFIG.concurrency;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_MATCHER_CONFIG.requestTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /** Build a matcher from the `matcher` section of AppConfig. */
  static fromConfig(scorer: ItemScorer, config: MatcherConfig, logger?: Logger): SpeakerMatcher {
    return new SpeakerMatcher(scorer, {
      concurrency: config.concurrency,
      requestTimeoutMs: config.requestTimeoutMs,
      logger,
    });
  }

  /**
   * Score every speaker in `catalog`. The result has one entry per speaker,
   * in catalog order, regardless of which calls finished first.
   *
   * @throws UpstreamUnavailableError if the catalog is empty (no calls are made).
   */
  async scoreAll(
    query: Query,
    catalog: readonly SpeakerRecord[],
    context: RequestContext = {},
  ): Promise<ScoredMatch[]> {
    if (catalog.length === 0) {
      throw new UpstreamUnavailableError("Speaker catalog is empty; nothing to score");
    }

    const tag = context.requestId ? `[${context.requestId}] ` : "";
    const controller = new AbortController();
    // Each in-flight item listens on this signal.
    setMaxListeners(Math.max(10, Math.min(this.concurrency, catalog.length)), controller.signal);
    const deadline = Number.isFinite(this.requestTimeoutMs)
      ? setTimeout(() => {
          this.logger.warn(`${tag}Request deadline of ${this.requestTimeoutMs}ms reached, abandoning outstanding speakers`);
          controller.abort(
            new ScoringTimeoutError(
              `Request deadline of ${this.requestTimeoutMs}ms exceeded`,
              this.requestTimeoutMs,
            ),
          );
        }, this.requestTimeoutMs)
      : null;

    const startedAt = Date.now();
    this.logger.info(`${tag}Scoring ${catalog.length} speakers (concurrency ${this.concurrency})...`);

    try {
      const scored = await mapWithConcurrency(catalog, this.concurrency, (speaker) =>
        this.scorer.score(query, speaker, controller.signal),
      );
      this.logger.info(`${tag}Scored ${scored.length} speakers in ${Date.now() - startedAt}ms`);
      return scored;
    } finally {
      if (deadline) clearTimeout(deadline);
    }
  }

  /** Score the whole catalog, then filter and rank at `query.threshold`. */
  async recommend(
    query: Query,
    catalog: readonly SpeakerRecord[],
    context: RequestContext = {},
  ): Promise<MatchSet> {
    const scored = await this.scoreAll(query, catalog, context);
    const matches = rankMatches(scored, query.threshold);
    const tag = context.requestId ? `[${context.requestId}] ` : "";
    this.logger.info(`${tag}Found ${matches.length} matches above threshold ${query.threshold}`);
    return matches;
  }
}
