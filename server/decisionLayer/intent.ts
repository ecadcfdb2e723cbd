/**
 * Intent Classification
 *
 * Purpose:
 * Maps an accepted query to exactly one intent. Commands are recognized by
 * their first word, case-insensitively; the first match wins:
 *
 *   help | /help | commands   → help
 *   recent [N]                → recent (N defaults when missing or invalid)
 *   find <agency>             → agency filter
 *   search <keywords>         → keyword search
 *   anything else             → free text (searched like `search`)
 *
 * `find` and `search` need an argument with at least one word in it.
 * Without one they are incomplete commands, which the relevance gate
 * rejects with the help prompt.
 *
 * Layer: Decision Layer (Intent Router)
 */

import { SEARCH_LIMITS } from "../config/constants";
import { splitFirstWord, tokenize } from "../utils/text";

export type Intent =
  | { kind: "help" }
  | { kind: "recent"; limit: number }
  | { kind: "find"; agency: string }
  | { kind: "search"; keywords: string }
  | { kind: "freeText"; text: string };

export type IntentKind = Intent["kind"];

export type CommandIntent = Exclude<Intent, { kind: "freeText" }>;

const HELP_WORDS: ReadonlySet<string> = new Set(["help", "/help", "commands"]);
const ARGUMENT_COMMANDS: ReadonlySet<string> = new Set(["find", "search"]);
const POSITIVE_INTEGER = /^\d+$/;

function hasWords(argument: string): boolean {
  return tokenize(argument).length > 0;
}

/**
 * Parse the argument of `recent`. Missing, non-numeric, zero or negative
 * values fall back to the default; large values are clamped to the ceiling.
 */
export function parseRecentLimit(argument: string, maxResults: number = SEARCH_LIMITS.MAX_RESULTS): number {
  const [first] = splitFirstWord(argument);
  if (!POSITIVE_INTEGER.test(first)) {
    return Math.min(SEARCH_LIMITS.DEFAULT_RECENT, maxResults);
  }
  const value = Number.parseInt(first, 10);
  if (value < 1) {
    return Math.min(SEARCH_LIMITS.DEFAULT_RECENT, maxResults);
  }
  return Math.min(value, maxResults);
}

/**
 * Recognize a command. Returns null for anything that is not one.
 */
export function parseCommand(text: string, maxResults: number = SEARCH_LIMITS.MAX_RESULTS): CommandIntent | null {
  const [head, argument] = splitFirstWord(text);
  const command = head.toLowerCase();

  if (HELP_WORDS.has(command)) {
    return { kind: "help" };
  }
  if (command === "recent") {
    return { kind: "recent", limit: parseRecentLimit(argument, maxResults) };
  }
  if (command === "find" && hasWords(argument)) {
    return { kind: "find", agency: argument };
  }
  if (command === "search" && hasWords(argument)) {
    return { kind: "search", keywords: argument };
  }
  return null;
}

/**
 * `find` or `search` with nothing searchable after it: `search`, `find .`.
 */
export function isIncompleteCommand(text: string): boolean {
  const [head, argument] = splitFirstWord(text);
  return ARGUMENT_COMMANDS.has(head.toLowerCase()) && !hasWords(argument);
}

export function classifyIntent(text: string, maxResults: number = SEARCH_LIMITS.MAX_RESULTS): Intent {
  return parseCommand(text, maxResults) ?? { kind: "freeText", text: text.trim() };
}
