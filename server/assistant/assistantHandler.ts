/**
 * Regulatory Assistant Handler - Thin Orchestration Layer
 *
 * Purpose:
 * Runs one query through the pipeline:
 *
 *   raw text → Relevance Gate → Intent Router → Result Formatter → text
 *
 * Key Principles:
 * - The gate decides relevance; the handler never second-guesses it
 * - Store failures become one user-facing message, raw errors stay in the log
 * - Query text is logged by length only
 */

import { v4 as uuidv4 } from "uuid";
import type { ChatRequest, ChatResponse, OutputFormat } from "@shared/schema";
import { SEARCH_LIMITS } from "../config/constants";
import { evaluateRelevance, routeIntent, type RelevanceDecision } from "../decisionLayer";
import type { DocumentStore } from "../storage";
import { DEFAULT_HELP_PROMPT } from "../utils/assistantMessages";
import { classifyPipelineError } from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";
import { formatMarkdown } from "../utils/markdownFormatter";
import type { VocabularyCache } from "../vocabulary/vocabularyCache";

export type AssistantDependencies = {
  store: DocumentStore;
  vocabulary: VocabularyCache;
  maxResults?: number;
  now?: () => number;
};

export type AssistantOutcome = "empty" | "rejected" | "answered" | "failed";

export type AssistantResult = ChatResponse & {
  outcome: AssistantOutcome;
  decision?: RelevanceDecision;
};

export class RegulatoryAssistant {
  private readonly store: DocumentStore;
  private readonly vocabulary: VocabularyCache;
  private readonly maxResults: number;
  private readonly now: () => number;

  constructor(deps: AssistantDependencies) {
    this.store = deps.store;
    this.vocabulary = deps.vocabulary;
    this.maxResults = deps.maxResults ?? SEARCH_LIMITS.MAX_RESULTS;
    this.now = deps.now ?? Date.now;
  }

  async handle(request: ChatRequest): Promise<AssistantResult> {
    const chatId = request.chatId ?? uuidv4();
    const format: OutputFormat = request.format ?? "markdown";
    const reqLogger = new RequestLogger("Assistant", chatId);
    const query = request.message.trim();

    reqLogger.info("Query received", { queryLength: query.length });

    if (!query) {
      return { response: formatMarkdown(DEFAULT_HELP_PROMPT, format), chatId, outcome: "empty" };
    }

    try {
      reqLogger.startStage("vocabulary");
      const snapshot = await this.vocabulary.getOrRefresh(this.now());
      const vocabularyMs = reqLogger.endStage("vocabulary");

      const decision = evaluateRelevance(query, snapshot, this.maxResults);
      if (!decision.accepted) {
        reqLogger.info("Query rejected", {
          reason: decision.reason,
          overlapRatio: Number(decision.overlapRatio.toFixed(3)),
          vocabularyMs,
        });
        return { response: formatMarkdown(decision.prompt, format), chatId, outcome: "rejected", decision };
      }

      reqLogger.startStage("lookup");
      const result = await routeIntent(decision.intent, {
        store: this.store,
        vocabulary: snapshot,
        maxResults: this.maxResults,
      });
      reqLogger.info("Query answered", {
        intent: decision.intent.kind,
        strategy: result.strategy,
        results: result.documents.length,
        lookupMs: reqLogger.endStage("lookup"),
        vocabularyMs,
      });

      return { response: formatMarkdown(result.text, format), chatId, outcome: "answered", decision };
    } catch (error) {
      const classified = classifyPipelineError(error);
      reqLogger.error(`Pipeline failed (${classified.type})`, error, { errorCode: classified.errorCode });
      return { response: formatMarkdown(classified.userMessage, format), chatId, outcome: "failed" };
    }
  }
}
