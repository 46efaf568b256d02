// Speaker Match - Express Server
// Thin HTTP pass-through over RecommendationService:
//   GET  /health    liveness
//   GET  /          service banner + catalog size
//   GET  /speakers  the loaded catalog
//   POST /match     rank speakers for a business description

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { v4 as uuidv4 } from "uuid";
import { DEFAULT_THRESHOLD } from "./config.js";
import { MatcherError, UpstreamUnavailableError, ValidationError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { RecommendationService } from "./recommendation-service.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const API_MESSAGE = "Speaker Recommendation API";

const MAX_BODY_SIZE = "100kb";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  service: RecommendationService;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  defaultThreshold?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/** Map an error to its HTTP status. */
export function statusForError(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof UpstreamUnavailableError) return 503;
  if (isBodyParserError(error)) return error.status;
  return 500;
}

/** express.json() rejects malformed bodies with an error carrying a 4xx `status`. */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500 &&
    "type" in error &&
    typeof error.type === "string"
  );
}

/** A numeric string threshold (`"7"`) is read as its number; anything else passes through for validation. */
function readThreshold(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return value;
}

function errorCode(error: unknown): string {
  if (error instanceof MatcherError) return error.code;
  if (isBodyParserError(error)) return "INVALID_BODY";
  return "INTERNAL_ERROR";
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    service,
    logger = createConsoleLogger("Server"),
    defaultThreshold = DEFAULT_THRESHOLD,
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (_req, res) => {
    res.json({ message: API_MESSAGE, speakers_loaded: service.speakerCount });
  });

  app.get("/speakers", (_req, res) => {
    res.json({ speakers: service.listSpeakers(), count: service.speakerCount });
  });

  app.post("/match", (req: Request, res: Response, next: NextFunction) => {
    const requestId = uuidv4();
    res.setHeader("X-Request-Id", requestId);

    const body: unknown = req.body;
    const fields: Record<string, unknown> =
      body && typeof body === "object" && !Array.isArray(body) ? { ...body } : {};
    const queryText = fields.user_bio ?? fields.query;
    const threshold = readThreshold(fields.threshold ?? defaultThreshold);

    logger.info(`[${requestId}] POST /match threshold=${String(threshold)}`);

    service
      .recommend(queryText, threshold, { requestId })
      .then((result) => {
        logger.info(`[${requestId}] ${result.matched_count}/${result.total_count} speakers matched`);
        res.json(result);
      })
      .catch(next);
  });

  // Error handler: Express recognizes it by its four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);
    if (status >= 500) {
      logger.error(`Request failed: ${errorMessage(err)}`);
    } else {
      logger.warn(`Rejected request: ${errorMessage(err)}`);
    }
    res.status(status).json({ error: errorMessage(err), code: errorCode(err) });
  });

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
