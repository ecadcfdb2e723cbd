/**
 * Agency name handling.
 *
 * Agency data arrives from the Federal Register API as a list of objects
 * (`{ name, raw_name, id, slug, ... }`), but older rows and hand-loaded data
 * hold bare strings, single objects or unparseable text. Everything here
 * degrades to an empty list instead of throwing.
 */

import { createLogger } from "./logger";

const logger = createLogger("Agencies");

const ACRONYM_SKIP_WORDS: ReadonlySet<string> = new Set(["and", "of", "the", "for", "on", "in", "to", "a", "us"]);

export type AgencyEntry = {
  name: string;
  rawJson: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nameFromRecord(record: Record<string, unknown>): string | null {
  for (const key of ["name", "raw_name", "agency"]) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return null;
}

function parseJsonText(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Extract agency display names from a stored agencies payload.
 * Non-list, non-JSON or otherwise malformed payloads yield `[]`.
 */
export function parseAgencyNames(raw: unknown): string[] {
  if (raw === null || raw === undefined || raw === "") return [];

  const data = typeof raw === "string" ? parseJsonText(raw) : raw;

  if (Array.isArray(data)) {
    const names: string[] = [];
    for (const item of data) {
      if (isRecord(item)) {
        const name = nameFromRecord(item);
        if (name) names.push(name);
      } else if (typeof item === "string" && item.trim()) {
        names.push(item.trim());
      }
    }
    return names;
  }

  if (isRecord(data)) {
    const name = nameFromRecord(data);
    if (name) return [name];
  }

  logger.debug("Ignoring malformed agency payload", { payloadType: data === undefined ? "invalid_json" : typeof data });
  return [];
}

/**
 * Coerce an incoming agencies value into a JSON list before it is stored.
 * A JSON string is parsed; a plain string, object or scalar is wrapped.
 */
export function normalizeAgenciesPayload(raw: unknown): unknown[] {
  if (raw === null || raw === undefined) return [];
  if (Array.isArray(raw)) return raw;
  if (typeof raw === "string") {
    const parsed = parseJsonText(raw);
    if (parsed === undefined) return [raw];
    return Array.isArray(parsed) ? parsed : [parsed];
  }
  if (isRecord(raw)) return [raw];
  return [String(raw)];
}

/**
 * One entry per named agency in a normalized payload, keeping the raw item.
 */
export function extractAgencyEntries(payload: unknown[]): AgencyEntry[] {
  const entries: AgencyEntry[] = [];
  const seen = new Set<string>();
  for (const item of payload) {
    const name = isRecord(item) ? nameFromRecord(item) : typeof item === "string" ? item.trim() : null;
    if (!name || seen.has(name)) continue;
    seen.add(name);
    entries.push({ name, rawJson: JSON.stringify(item) });
  }
  return entries;
}

/**
 * Case- and punctuation-insensitive key for an agency name.
 * `"U.S. Customs and Border Protection"` → `"us customs and border protection"`.
 */
export function normalizeAgencyKey(name: string): string {
  return name
    .toLowerCase()
    .replace(/[.']/g, "")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

/**
 * Initials of the significant words of an agency name.
 * `"Environmental Protection Agency"` → `"epa"`. Null for single-word names.
 */
export function agencyAcronym(name: string): string | null {
  const words = normalizeAgencyKey(name)
    .split(" ")
    .filter(word => word && !ACRONYM_SKIP_WORDS.has(word));
  if (words.length < 2) return null;
  return words.map(word => word[0]).join("");
}

/**
 * Whether a user-supplied agency token refers to the given agency: the
 * normalized token occurs in the normalized name starting at a word boundary,
 * or equals its acronym. Anchoring at a word keeps `epa` from matching
 * "department".
 */
export function agencyMatches(agency: { normalizedKey: string; acronym: string | null }, query: string): boolean {
  const key = normalizeAgencyKey(query);
  if (!key) return false;
  if (` ${agency.normalizedKey}`.includes(` ${key}`)) return true;
  return agency.acronym !== null && agency.acronym === key.replace(/ /g, "");
}
