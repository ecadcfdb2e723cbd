import { VOCABULARY_CONSTANTS } from "../config/constants";
import { KEYWORD_STOPWORDS, tokenize } from "../utils/text";

const DIGITS_ONLY = /^\d+$/;

/**
 * Rank the most frequent keywords across document titles.
 *
 * Tokens shorter than `minLength`, stopwords and pure numbers are skipped.
 * Ties keep first-seen order, so the ranking is stable for a given title list.
 */
export function rankKeywords(
  titles: Iterable<string | null | undefined>,
  limit: number = VOCABULARY_CONSTANTS.TOP_KEYWORDS,
  minLength: number = VOCABULARY_CONSTANTS.MIN_KEYWORD_LENGTH,
): string[] {
  const counts = new Map<string, number>();

  for (const title of titles) {
    for (const token of tokenize(title)) {
      if (token.length < minLength || KEYWORD_STOPWORDS.has(token) || DIGITS_ONLY.test(token)) {
        continue;
      }
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  // Array.prototype.sort is stable, so equal counts stay in insertion order
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}
