// Speaker Match - Configuration
// Reads the process environment (populated from .env by dotenv in index.ts)
// into a typed, validated AppConfig.

import { ConfigError } from "./errors.js";

export type ProviderName = "openai" | "anthropic";

export const PROVIDERS: readonly ProviderName[] = ["openai", "anthropic"];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-4.1",
  anthropic: "claude-sonnet-4-5-20250929",
};

export interface ScoringConfig {
  provider: ProviderName;
  apiKey: string;
  model: string;
  temperature: number;
  /** Output token limit for one completion. */
  maxTokens: number;
}

export interface MatcherConfig {
  /** Maximum scoring calls in flight per request. */
  concurrency: number;
  /** Deadline for one speaker's scoring call. */
  itemTimeoutMs: number;
  /** Deadline for the whole batch; outstanding items are scored as failures. */
  requestTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  catalogPath: string;
  minQueryLength: number;
  defaultThreshold: number;
  scoring: ScoringConfig;
  matcher: MatcherConfig;
}

/** Threshold used when a /match request omits one. */
export const DEFAULT_THRESHOLD = 6;

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  concurrency: 10,
  itemTimeoutMs: 30_000,
  requestTimeoutMs: 120_000,
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  check: (n: number) => boolean,
  rule: string,
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(name, `expected ${rule}, got "${raw}"`);
  }
  return value;
}

const positiveInt = (n: number) => Number.isInteger(n) && n > 0;

function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value);
}

/**
 * Build the application config from environment variables.
 * Only the API key of the selected provider is required.
 *
 * @throws ConfigError on a missing key or an unparsable value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const providerRaw = (env.SCORING_PROVIDER ?? "openai").trim().toLowerCase();
  if (!isProviderName(providerRaw)) {
    throw new ConfigError(
      "SCORING_PROVIDER",
      `expected one of ${PROVIDERS.join(", ")}, got "${providerRaw}"`,
    );
  }
  const provider = providerRaw;

  const keyVar = provider === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY";
  const apiKey = env[keyVar]?.trim();
  if (!apiKey) {
    throw new ConfigError(keyVar, "is not set. Add it to your .env file.");
  }

  return {
    port: readNumber(env, "PORT", 8000, (n) => Number.isInteger(n) && n >= 0 && n < 65536, "a port number"),
    catalogPath: env.SPEAKER_CATALOG_PATH?.trim() || "data/speakers.json",
    minQueryLength: readNumber(env, "MIN_QUERY_LENGTH", 10, (n) => Number.isInteger(n) && n >= 1, "an integer >= 1"),
    defaultThreshold: readNumber(env, "DEFAULT_THRESHOLD", DEFAULT_THRESHOLD, (n) => n >= 0 && n <= 10, "a number in [0, 10]"),
    scoring: {
      provider,
      apiKey,
      model: env.SCORING_MODEL?.trim() || DEFAULT_MODELS[provider],
      temperature: readNumber(env, "SCORING_TEMPERATURE", 0.1, (n) => n >= 0 && n <= 2, "a number in [0, 2]"),
      maxTokens: readNumber(env, "SCORING_MAX_TOKENS", 1024, positiveInt, "a positive integer"),
    },
    matcher: {
      concurrency: readNumber(env, "SCORING_CONCURRENCY", DEFAULT_MATCHER_CONFIG.concurrency, positiveInt, "a positive integer"),
      itemTimeoutMs: readNumber(env, "ITEM_TIMEOUT_MS", DEFAULT_MATCHER_CONFIG.itemTimeoutMs, positiveInt, "a positive integer"),
      requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT_MS", DEFAULT_MATCHER_CONFIG.requestTimeoutMs, positiveInt, "a positive integer"),
    },
  };
}
