/**
 * Intent Router
 *
 * Executes one lookup per intent and renders the outcome:
 *
 *   help      → usage summary from the vocabulary snapshot (no store access)
 *   recent    → N newest documents
 *   find      → documents whose agency matches the name or acronym
 *   search    → full-text search, substring fallback
 *   freeText  → search over the query's content tokens
 *
 * Every lookup is capped at the result ceiling.
 *
 * Layer: Decision Layer (Intent Router)
 */

import type { DocumentWithAgencies } from "@shared/schema";
import { SEARCH_LIMITS } from "../config/constants";
import { formatResults } from "../services/resultFormatter";
import type { DocumentStore, SearchStrategy } from "../storage";
import { formatHelpText } from "../utils/assistantMessages";
import { createLogger } from "../utils/logger";
import { contentTokens } from "../utils/text";
import type { VocabularySnapshot } from "../vocabulary/vocabularyCache";
import type { Intent } from "./intent";

const logger = createLogger("Router");

export type LookupStrategy = "help" | "recent" | "agency" | SearchStrategy;

export type RouterContext = {
  store: DocumentStore;
  vocabulary: VocabularySnapshot;
  maxResults?: number;
};

export type RouteResult = {
  intent: Intent;
  text: string;
  documents: DocumentWithAgencies[];
  strategy: LookupStrategy;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled intent: ${JSON.stringify(value)}`);
}

/**
 * Search string for a free-text query: its content tokens, or the trimmed
 * text when every word is a stopword.
 */
export function freeTextSearchQuery(text: string): string {
  const tokens = contentTokens(text);
  return tokens.length > 0 ? tokens.join(" ") : text.trim();
}

async function runSearch(
  intent: Intent,
  query: string,
  subtitle: string,
  { store, maxResults }: { store: DocumentStore; maxResults: number },
): Promise<RouteResult> {
  const { documents, strategy } = await store.search(query, maxResults);
  logger.debug(`Search "${query}" via ${strategy}: ${documents.length} results`);
  return { intent, text: formatResults(documents, subtitle), documents, strategy };
}

export async function routeIntent(intent: Intent, context: RouterContext): Promise<RouteResult> {
  const { store, vocabulary } = context;
  const maxResults = Math.min(context.maxResults ?? SEARCH_LIMITS.MAX_RESULTS, SEARCH_LIMITS.MAX_RESULTS);

  switch (intent.kind) {
    case "help":
      return { intent, text: formatHelpText(vocabulary), documents: [], strategy: "help" };

    case "recent": {
      const limit = Math.min(intent.limit, maxResults);
      const documents = await store.recent(limit);
      return {
        intent,
        text: formatResults(documents, `${documents.length} most recent documents`),
        documents,
        strategy: "recent",
      };
    }

    case "find": {
      const documents = await store.filterByAgency(intent.agency, maxResults);
      logger.debug(`Agency "${intent.agency}": ${documents.length} results`);
      return {
        intent,
        text: formatResults(documents, `Agency: ${intent.agency}`),
        documents,
        strategy: "agency",
      };
    }

    case "search":
      return runSearch(intent, intent.keywords, `Search: ${intent.keywords}`, { store, maxResults });

    case "freeText": {
      const query = freeTextSearchQuery(intent.text);
      return runSearch(intent, query, `Search: ${query}`, { store, maxResults });
    }

    default:
      return assertNever(intent);
  }
}
