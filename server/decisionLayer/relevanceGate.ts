/**
 * Relevance Gate
 *
 * Purpose:
 * Decides whether a query belongs to the regulatory domain before any
 * lookup runs. Recognized commands always pass. Everything else is scored by
 * the share of its content tokens that appear in the vocabulary snapshot.
 * `find` or `search` with no searchable term is rejected outright.
 *
 * A query of one or two content tokens needs a ratio of at least 0.33;
 * longer queries need at least 0.18.
 *
 * Layer: Decision Layer (Relevance Gate)
 */

import { RELEVANCE_THRESHOLDS, SEARCH_LIMITS } from "../config/constants";
import { DEFAULT_HELP_PROMPT, getRejectionMessage } from "../utils/assistantMessages";
import { contentTokens } from "../utils/text";
import type { DomainTokens, VocabularySnapshot } from "../vocabulary/vocabularyCache";
import { classifyIntent, isIncompleteCommand, parseCommand, type Intent } from "./intent";

export type RejectionReason = "empty" | "missing_argument" | "no_content_tokens" | "low_overlap";

export type RelevanceDecision =
  | {
      accepted: true;
      reason: "command" | "overlap";
      intent: Intent;
      overlapRatio: number;
      matchedTokens: string[];
    }
  | {
      accepted: false;
      reason: RejectionReason;
      overlapRatio: number;
      matchedTokens: string[];
      prompt: string;
    };

export function thresholdFor(tokenCount: number): number {
  return tokenCount <= RELEVANCE_THRESHOLDS.SHORT_INPUT_MAX_TOKENS
    ? RELEVANCE_THRESHOLDS.SHORT_INPUT_THRESHOLD
    : RELEVANCE_THRESHOLDS.OVERLAP_THRESHOLD;
}

/**
 * Share of distinct content tokens found in the domain vocabulary.
 */
export function measureOverlap(query: string, domainTokens: Pick<DomainTokens, "has">): {
  tokens: string[];
  matchedTokens: string[];
  ratio: number;
} {
  const tokens = Array.from(new Set(contentTokens(query)));
  const matchedTokens = tokens.filter(token => domainTokens.has(token));
  const ratio = tokens.length === 0 ? 0 : matchedTokens.length / tokens.length;
  return { tokens, matchedTokens, ratio };
}

export function evaluateRelevance(
  query: string,
  vocabulary: VocabularySnapshot,
  maxResults: number = SEARCH_LIMITS.MAX_RESULTS,
): RelevanceDecision {
  const text = query.trim();
  if (!text) {
    return { accepted: false, reason: "empty", overlapRatio: 0, matchedTokens: [], prompt: DEFAULT_HELP_PROMPT };
  }

  const command = parseCommand(text, maxResults);
  if (command) {
    return { accepted: true, reason: "command", intent: command, overlapRatio: 1, matchedTokens: [] };
  }
  if (isIncompleteCommand(text)) {
    return { accepted: false, reason: "missing_argument", overlapRatio: 0, matchedTokens: [], prompt: DEFAULT_HELP_PROMPT };
  }

  const { tokens, matchedTokens, ratio } = measureOverlap(text, vocabulary.domainTokens);
  if (tokens.length === 0) {
    return { accepted: false, reason: "no_content_tokens", overlapRatio: 0, matchedTokens: [], prompt: DEFAULT_HELP_PROMPT };
  }

  if (ratio >= thresholdFor(tokens.length)) {
    return { accepted: true, reason: "overlap", intent: classifyIntent(text, maxResults), overlapRatio: ratio, matchedTokens };
  }

  return {
    accepted: false,
    reason: "low_overlap",
    overlapRatio: ratio,
    matchedTokens,
    prompt: getRejectionMessage(vocabulary),
  };
}
