// Speaker Match - Response Parser
// Pulls a JSON object out of a model reply that may be wrapped in markdown
// fences or surrounded by prose. Lenient about formatting, strict about the
// JSON itself: whatever is extracted must parse as an object.

import { ParseError } from "./errors.js";
import type { JsonObject, JsonValue } from "./types.js";

const FENCE = "```";
const JSON_FENCE_PATTERN = /```json/i;

/**
 * Returns the part of `text` most likely to hold the JSON payload:
 *  1. the body of a ```json fence, if there is one;
 *  2. otherwise the body of the first ``` fence;
 *  3. otherwise the text itself.
 * An unterminated fence runs to the end of the text.
 */
export function extractCandidate(text: string): string {
  const jsonFence = JSON_FENCE_PATTERN.exec(text);
  if (jsonFence) {
    return sliceUntilFence(text, jsonFence.index + jsonFence[0].length);
  }

  const fenceStart = text.indexOf(FENCE);
  if (fenceStart !== -1) {
    return sliceUntilFence(text, fenceStart + FENCE.length);
  }

  return text;
}

function sliceUntilFence(text: string, start: number): string {
  const end = text.indexOf(FENCE, start);
  return (end === -1 ? text.slice(start) : text.slice(start, end)).trim();
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): JsonObject | null {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

/**
 * Extract the JSON object from a model reply.
 *
 * When the fenced or verbatim candidate is not itself an object, the span from
 * its first `{` to its last `}` is tried before giving up, which covers replies
 * like `Here is my verdict: {"score": 7, ...}`.
 *
 * @throws ParseError when no JSON object can be recovered.
 */
export function extractJson(text: string): JsonObject {
  const candidate = extractCandidate(text);

  const direct = tryParseObject(candidate);
  if (direct) return direct;

  const open = candidate.indexOf("{");
  const close = candidate.lastIndexOf("}");
  if (open !== -1 && close > open) {
    const braced = tryParseObject(candidate.slice(open, close + 1));
    if (braced) return braced;
  }

  const preview = text.length > 200 ? `${text.slice(0, 200)}…` : text;
  throw new ParseError(`No JSON object found in model response: ${preview}`);
}
