// Property-Based Tests for the Response Parser
// Any JSON object survives being wrapped in prose or markdown fences;
// text without a JSON object always fails the same way.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { extractJson } from "./response-parser.js";
import { ParseError } from "./errors.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Serialized JSON objects that do not themselves contain a fence marker. */
function arbitraryJsonObjectText(): fc.Arbitrary<string> {
  return fc
    .dictionary(
      fc.string().filter((k) => k !== "__proto__"),
      fc.jsonValue(),
    )
    .map((obj) => JSON.stringify(obj))
    .filter((json) => !json.includes("```"));
}

/** Prose with no backticks or braces, so it cannot be mistaken for payload. */
function arbitraryProse(): fc.Arbitrary<string> {
  return fc.string().filter((s) => !/[`{}]/.test(s));
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("extractJson properties", () => {
  it("recovers an object from a ```json fence between prose", () => {
    fc.assert(
      fc.property(arbitraryJsonObjectText(), arbitraryProse(), arbitraryProse(), (json, before, after) => {
        const reply = `${before}\n\`\`\`json\n${json}\n\`\`\`\n${after}`;
        expect(extractJson(reply)).toEqual(JSON.parse(json));
      }),
    );
  });

  it("recovers an object from an untagged fence", () => {
    fc.assert(
      fc.property(arbitraryJsonObjectText(), arbitraryProse(), (json, before) => {
        const reply = `${before}\n\`\`\`\n${json}\n\`\`\``;
        expect(extractJson(reply)).toEqual(JSON.parse(json));
      }),
    );
  });

  it("recovers an object from unfenced prose", () => {
    fc.assert(
      fc.property(arbitraryJsonObjectText(), arbitraryProse(), arbitraryProse(), (json, before, after) => {
        const reply = `${before} ${json} ${after}`;
        expect(extractJson(reply)).toEqual(JSON.parse(json));
      }),
    );
  });

  it("fails deterministically when there is no object to find", () => {
    fc.assert(
      fc.property(fc.string().filter((s) => !s.includes("{")), (text) => {
        let first: unknown;
        let second: unknown;
        try {
          extractJson(text);
        } catch (err) {
          first = err;
        }
        try {
          extractJson(text);
        } catch (err) {
          second = err;
        }
        expect(first).toBeInstanceOf(ParseError);
        expect(second).toBeInstanceOf(ParseError);
        expect(String(second)).toBe(String(first));
      }),
    );
  });
});
