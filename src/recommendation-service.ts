// Speaker Match - Recommendation Service
// The boundary the HTTP layer calls: validates input before any scoring
// work, checks the catalog is available, and shapes the response.

import { UpstreamUnavailableError, ValidationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RequestContext, SpeakerMatcher } from "./speaker-matcher.js";
import type { RecommendationResponse, SpeakerRecord } from "./types.js";

export const MIN_THRESHOLD = 0;
export const MAX_THRESHOLD = 10;

export interface RecommendationServiceOptions {
  matcher: SpeakerMatcher;
  catalog: readonly SpeakerRecord[];
  /** Why the catalog is empty, when loading failed. Reported to callers. */
  catalogError?: string;
  /** Minimum trimmed query length. Defaults to 10. */
  minQueryLength?: number;
  logger?: Logger;
}

export class RecommendationService {
  private readonly matcher: SpeakerMatcher;
  private readonly catalog: readonly SpeakerRecord[];
  private readonly catalogError?: string;
  private readonly minQueryLength: number;
  private readonly logger: Logger;

  constructor(options: RecommendationServiceOptions) {
    this.matcher = options.matcher;
    this.catalog = options.catalog;
    this.catalogError = options.catalogError;
    this.minQueryLength = options.minQueryLength ?? 10;
    this.logger = options.logger ?? silentLogger;
  }

  get speakerCount(): number {
    return this.catalog.length;
  }

  listSpeakers(): readonly SpeakerRecord[] {
    return this.catalog;
  }

  /**
   * Rank the catalog against `queryText`.
   *
   * @throws ValidationError for a short/empty query or a threshold outside [0, 10].
   * @throws UpstreamUnavailableError when no catalog is loaded.
   */
  async recommend(
    queryText: unknown,
    threshold: unknown,
    context: RequestContext = {},
  ): Promise<RecommendationResponse> {
    if (typeof queryText !== "string") {
      throw new ValidationError("must be a string", "query");
    }
    const text = queryText.trim();
    if (text.length < this.minQueryLength) {
      throw new ValidationError(`must be at least ${this.minQueryLength} characters`, "query");
    }
    if (typeof threshold !== "number" || !Number.isFinite(threshold)) {
      throw new ValidationError("must be a number", "threshold");
    }
    if (threshold < MIN_THRESHOLD || threshold > MAX_THRESHOLD) {
      throw new ValidationError(`must be between ${MIN_THRESHOLD} and ${MAX_THRESHOLD}`, "threshold");
    }

    if (this.catalog.length === 0) {
      const detail = this.catalogError ? `: ${this.catalogError}` : "";
      this.logger.error(`Recommendation requested but speaker data is not loaded${detail}`);
      throw new UpstreamUnavailableError(`Speaker data not loaded${detail}`);
    }

    const matches = await this.matcher.recommend({ text, threshold }, this.catalog, context);
    return {
      matches,
      total_count: this.catalog.length,
      matched_count: matches.length,
    };
  }
}
