// Speaker Match - Catalog loader
// Reads the flat JSON speaker catalog produced by the scraper. Loaded once at
// start-up and held in memory; never reloaded or watched.

import { readFile } from "node:fs/promises";
import { UpstreamUnavailableError, errorMessage } from "./errors.js";
import type { SpeakerRecord } from "./types.js";

const str = (value: unknown): string => (typeof value === "string" ? value.trim() : "");

/**
 * Normalize one raw catalog entry. Non-string fields become "".
 * Returns null for entries that are not objects or carry neither a name nor a bio.
 */
export function toSpeakerRecord(raw: unknown): SpeakerRecord | null {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return null;
  const entry: Record<string, unknown> = { ...raw };

  const record: SpeakerRecord = {
    name: str(entry.name),
    title: str(entry.title),
    organization: str(entry.organization),
    bio: str(entry.bio),
  };
  if (!record.name && !record.bio) return null;
  return record;
}

/** Parse catalog JSON text. */
export function parseCatalog(json: string, source = "catalog"): SpeakerRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new UpstreamUnavailableError(`Failed to parse ${source}: ${errorMessage(err)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new UpstreamUnavailableError(`${source} must contain a JSON array of speakers`);
  }

  const speakers: SpeakerRecord[] = [];
  for (const entry of parsed) {
    const record = toSpeakerRecord(entry);
    if (record) speakers.push(record);
  }
  return speakers;
}

/**
 * Load speakers from a JSON file.
 *
 * @throws UpstreamUnavailableError when the file cannot be read or is not a JSON array.
 */
export async function loadCatalog(filePath: string): Promise<SpeakerRecord[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new UpstreamUnavailableError(`Failed to read speaker catalog ${filePath}: ${errorMessage(err)}`);
  }
  return parseCatalog(text, filePath);
}
