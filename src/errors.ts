// Speaker Match - Error hierarchy
//
// Per-item errors (ProviderError, ParseError, ScoringTimeoutError) are caught
// by the SpeakerScorer and turned into zero-score matches. Only
// ValidationError and UpstreamUnavailableError ever fail a request.

/** Base error for everything this project throws. `code` is stable for programmatic matching. */
export class MatcherError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "MatcherError";
    this.code = code;
  }
}

/** Malformed caller input (empty query, out-of-range threshold). */
export class ValidationError extends MatcherError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Network, auth or provider-side failure of a single completion call. */
export class ProviderError extends MatcherError {
  readonly provider: string;
  readonly status?: number;
  constructor(provider: string, message: string, status?: number) {
    super("PROVIDER_ERROR", `[${provider}] ${message}`);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = status;
  }
}

/** No JSON object could be located in a model reply. */
export class ParseError extends MatcherError {
  constructor(message: string) {
    super("PARSE_ERROR", message);
    this.name = "ParseError";
  }
}

/** A scoring call outlived its item timeout or the request deadline. */
export class ScoringTimeoutError extends MatcherError {
  readonly timeoutMs: number;
  constructor(message: string, timeoutMs: number) {
    super("SCORING_TIMEOUT", message);
    this.name = "ScoringTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The speaker catalog failed to load or is empty. */
export class UpstreamUnavailableError extends MatcherError {
  constructor(message: string) {
    super("UPSTREAM_UNAVAILABLE", message);
    this.name = "UpstreamUnavailableError";
  }
}

/** Invalid environment configuration at start-up. */
export class ConfigError extends MatcherError {
  readonly variable: string;
  constructor(variable: string, message: string) {
    super("CONFIG_ERROR", `${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** Best-effort human-readable message for anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
