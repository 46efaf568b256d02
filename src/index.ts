// Speaker Match - Entry point
// Loads configuration and the speaker catalog, wires the scoring pipeline
// and starts the server.

import "dotenv/config";
import { loadCatalog } from "./catalog.js";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { RecommendationService } from "./recommendation-service.js";
import { createScoringClient } from "./scoring-client.js";
import { SCORING_SYSTEM_PROMPT } from "./scoring-prompt.js";
import { createAppServer } from "./server.js";
import { SpeakerMatcher } from "./speaker-matcher.js";
import { SpeakerScorer } from "./speaker-scorer.js";
import type { SpeakerRecord } from "./types.js";

export const APP_NAME = "Speaker Match";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

logInit(`Scoring provider: ${config.scoring.provider} (${config.scoring.model})`);

// ─── Speaker catalog ────────────────────────────────────────────────────────────

// A missing catalog does not stop the server: /match answers 503 until it is fixed.
let catalog: SpeakerRecord[] = [];
let catalogError: string | undefined;
try {
  catalog = await loadCatalog(config.catalogPath);
  logInit(`Loaded ${catalog.length} speakers from ${config.catalogPath}`);
} catch (err) {
  catalogError = errorMessage(err);
  console.error(`[ERROR] [${ts()}] Error loading speakers: ${catalogError}`);
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

logInit("Creating scoring client...");
const scoringClient = createScoringClient(config.scoring, SCORING_SYSTEM_PROMPT);

const scorer = new SpeakerScorer(scoringClient, {
  itemTimeoutMs: config.matcher.itemTimeoutMs,
  logger: createConsoleLogger("SpeakerScorer"),
});
const matcher = SpeakerMatcher.fromConfig(scorer, config.matcher, createConsoleLogger("SpeakerMatcher"));
const service = new RecommendationService({
  matcher,
  catalog,
  catalogError,
  minQueryLength: config.minQueryLength,
  logger: createConsoleLogger("RecommendationService"),
});

logInit(
  `Matcher: concurrency=${config.matcher.concurrency}, itemTimeout=${config.matcher.itemTimeoutMs}ms, ` +
    `requestTimeout=${config.matcher.requestTimeoutMs}ms`,
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  service,
  defaultThreshold: config.defaultThreshold,
  logger: createConsoleLogger("Server"),
});

try {
  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
} catch (err) {
  logFatal(`Failed to start server: ${errorMessage(err)}`);
  process.exit(1);
}

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
