// Speaker Match - Server Unit Tests
// Each test boots the Express app on an OS-assigned port and talks to it with fetch.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createAppServer, statusForError, API_MESSAGE, type AppServer } from "./server.js";
import { RecommendationService } from "./recommendation-service.js";
import { SpeakerMatcher, type ItemScorer } from "./speaker-matcher.js";
import { SpeakerScorer } from "./speaker-scorer.js";
import { ProviderError, UpstreamUnavailableError, ValidationError } from "./errors.js";
import type { ScoringClient } from "./scoring-client.js";
import type { SpeakerRecord } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const BIO = "We sell counter-drone detection systems to air bases.";

const SCORES: Record<string, number> = { "Jordan Avery": 8, "Priya Raman": 4, "Samuel Okafor": 6 };

const CATALOG: SpeakerRecord[] = Object.keys(SCORES).map((name) => ({
  name,
  title: "Program Manager",
  organization: "Example Command",
  bio: `${name} manages air defense programs.`,
}));

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function scoringClient(): ScoringClient {
  return {
    provider: "openai",
    model: "fake-model",
    async complete(prompt: string) {
      const name = /Name: (.*)\n/.exec(prompt)?.[1] ?? "";
      return `\`\`\`json\n{"score": ${SCORES[name] ?? 0}, "reasoning": "fit for ${name}"}\n\`\`\``;
    },
  };
}

function createService(catalog: readonly SpeakerRecord[] = CATALOG, scorer?: ItemScorer) {
  return new RecommendationService({
    matcher: new SpeakerMatcher(scorer ?? new SpeakerScorer(scoringClient())),
    catalog,
  });
}

/** Gets the server's base URL after listening */
function getServerUrl(server: AppServer): string {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return `http://127.0.0.1:${addr.port}`;
}

function postJson(server: AppServer, path: string, body: unknown): Promise<Response> {
  return fetch(`${getServerUrl(server)}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer | undefined;
  let logger: ReturnType<typeof createSilentLogger>;

  async function start(service = createService(), defaultThreshold?: number): Promise<AppServer> {
    server = createAppServer({ service, logger, defaultThreshold });
    await server.listen(TEST_PORT);
    return server;
  }

  beforeEach(() => {
    logger = createSilentLogger();
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  // ─── Read-only endpoints ────────────────────────────────────────────────────

  describe("GET endpoints", () => {
    it("should respond to /health", async () => {
      const s = await start();
      const response = await fetch(`${getServerUrl(s)}/health`);
      expect(response.ok).toBe(true);
      expect(await response.json()).toEqual({ status: "ok" });
    });

    it("should report the banner and catalog size on /", async () => {
      const s = await start();
      const response = await fetch(`${getServerUrl(s)}/`);
      expect(await response.json()).toEqual({ message: API_MESSAGE, speakers_loaded: 3 });
    });

    it("should list the catalog on /speakers", async () => {
      const s = await start();
      const response = await fetch(`${getServerUrl(s)}/speakers`);
      expect(await response.json()).toEqual({ speakers: CATALOG, count: 3 });
    });
  });

  // ─── POST /match ────────────────────────────────────────────────────────────

  describe("POST /match", () => {
    it("should return ranked matches for user_bio", async () => {
      const s = await start();

      const response = await postJson(s, "/match", { user_bio: BIO, threshold: 6 });

      expect(response.status).toBe(200);
      expect(response.headers.get("x-request-id")).toMatch(UUID_V4);
      expect(await response.json()).toEqual({
        matches: [
          { ...CATALOG[0], score: 8, reasoning: "fit for Jordan Avery" },
          { ...CATALOG[2], score: 6, reasoning: "fit for Samuel Okafor" },
        ],
        total_count: 3,
        matched_count: 2,
      });
    });

    it("should accept `query` as an alias for user_bio", async () => {
      const s = await start();
      const response = await postJson(s, "/match", { query: BIO, threshold: 0 });
      expect(await response.json()).toMatchObject({ matched_count: 3 });
    });

    it("should apply the configured default threshold", async () => {
      const s = await start(createService(), 7);
      const response = await postJson(s, "/match", { user_bio: BIO });
      expect(await response.json()).toMatchObject({
        matches: [{ name: "Jordan Avery" }],
        matched_count: 1,
      });
    });

    it("should fall back to the shared default threshold", async () => {
      const s = await start();
      const response = await postJson(s, "/match", { user_bio: BIO });
      expect(await response.json()).toMatchObject({ matched_count: 2 });
    });

    it("should read a numeric string threshold as a number", async () => {
      const s = await start();
      const response = await postJson(s, "/match", { user_bio: BIO, threshold: " 7 " });
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        matches: [{ name: "Jordan Avery", score: 8 }],
        matched_count: 1,
      });
    });

    it("should reject a non-numeric threshold with 400", async () => {
      const s = await start();
      const response = await postJson(s, "/match", { user_bio: BIO, threshold: "high" });
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Invalid "threshold": must be a number',
        code: "VALIDATION_ERROR",
      });
    });

    it("should reject a short bio with 400", async () => {
      const s = await start();

      const response = await postJson(s, "/match", { user_bio: "hi", threshold: 6 });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Invalid "query": must be at least 10 characters',
        code: "VALIDATION_ERROR",
      });
      expect(logger.warn).toHaveBeenCalledWith('Rejected request: Invalid "query": must be at least 10 characters');
    });

    it("should reject an out-of-range threshold with 400", async () => {
      const s = await start();
      const response = await postJson(s, "/match", { user_bio: BIO, threshold: 11 });
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Invalid "threshold": must be between 0 and 10',
        code: "VALIDATION_ERROR",
      });
    });

    it("should reject malformed JSON with 400", async () => {
      const s = await start();

      const response = await fetch(`${getServerUrl(s)}/match`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{ not json",
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: "INVALID_BODY" });
    });

    it("should answer 503 when no speakers are loaded", async () => {
      const s = await start(createService([]));

      const response = await postJson(s, "/match", { user_bio: BIO });

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({ error: "Speaker data not loaded", code: "UPSTREAM_UNAVAILABLE" });
      expect(logger.error).toHaveBeenCalledWith("Request failed: Speaker data not loaded");
    });

    it("should answer 500 for an unexpected failure", async () => {
      const broken: ItemScorer = {
        score: async () => {
          throw new Error("scorer crashed");
        },
      };
      const s = await start(createService(CATALOG, broken));

      const response = await postJson(s, "/match", { user_bio: BIO });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: "scorer crashed", code: "INTERNAL_ERROR" });
    });

    it("should give every request its own id", async () => {
      const s = await start();
      const first = await postJson(s, "/match", { user_bio: BIO });
      const second = await postJson(s, "/match", { user_bio: BIO });
      expect(first.headers.get("x-request-id")).not.toBe(second.headers.get("x-request-id"));
    });
  });
});

// ─── Unit Tests for Exported Helpers ──────────────────────────────────────────

describe("statusForError", () => {
  it("maps the error hierarchy to HTTP statuses", () => {
    expect(statusForError(new ValidationError("must be a number", "threshold"))).toBe(400);
    expect(statusForError(new UpstreamUnavailableError("Speaker data not loaded"))).toBe(503);
    expect(statusForError(new ProviderError("openai", "completion failed: boom"))).toBe(500);
    expect(statusForError(new Error("boom"))).toBe(500);
    expect(statusForError("boom")).toBe(500);
  });

  it("passes through body-parser statuses", () => {
    const tooLarge = Object.assign(new Error("request entity too large"), { status: 413, type: "entity.too.large" });
    expect(statusForError(tooLarge)).toBe(413);
  });
});
