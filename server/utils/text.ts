/**
 * Tokenization and truncation helpers shared by the relevance gate,
 * vocabulary ranking and result formatting.
 */

import stopwords from "../data/stopwords.json";

/**
 * Words ignored when ranking title keywords. Includes boilerplate that appears
 * in nearly every Federal Register title.
 */
export const KEYWORD_STOPWORDS: ReadonlySet<string> = new Set(stopwords.keyword);

/**
 * Filler words dropped from user queries before measuring domain overlap.
 */
export const QUERY_STOPWORDS: ReadonlySet<string> = new Set(stopwords.query);

const NON_TOKEN_CHARS = /[^A-Za-z0-9'\-]+/g;
const EDGE_PUNCTUATION = /^['\-]+|['\-]+$/g;

/**
 * Lowercase the text and split it into word tokens. Letters, digits,
 * apostrophes and hyphens are kept; apostrophes and hyphens are trimmed from
 * token edges.
 */
export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];
  return text
    .replace(NON_TOKEN_CHARS, " ")
    .toLowerCase()
    .split(/\s+/)
    .map(token => token.replace(EDGE_PUNCTUATION, ""))
    .filter(token => token.length > 0);
}

/**
 * Tokenize and drop stopwords.
 */
export function contentTokens(text: string | null | undefined, stopwords: ReadonlySet<string> = QUERY_STOPWORDS): string[] {
  return tokenize(text).filter(token => !stopwords.has(token));
}

/**
 * Cut text to at most `maxChars` characters, counting by code point so that
 * a surrogate pair is never split.
 */
export function truncateChars(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  return chars.slice(0, maxChars).join("");
}

/**
 * Split a string at its first run of whitespace.
 * `"find  EPA rules"` → `["find", "EPA rules"]`.
 */
export function splitFirstWord(text: string): [string, string] {
  const trimmed = text.trim();
  const match = /\s+/.exec(trimmed);
  if (!match) return [trimmed, ""];
  return [trimmed.slice(0, match.index), trimmed.slice(match.index + match[0].length).trim()];
}
