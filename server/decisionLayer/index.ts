/**
 * Decision Layer (Relevance Gate + Intent Router)
 *
 * Flow:
 * 1. Relevance Gate: accept commands and in-domain text, reject the rest
 * 2. Intent Router: classify the accepted query and run one lookup strategy
 * 3. Result Formatter renders the lookup outcome
 *
 * Both steps are pure functions over a vocabulary snapshot.
 */

export {
  classifyIntent,
  parseCommand,
  parseRecentLimit,
  type Intent,
  type IntentKind,
  type CommandIntent,
} from "./intent";

export {
  evaluateRelevance,
  measureOverlap,
  thresholdFor,
  type RelevanceDecision,
  type RejectionReason,
} from "./relevanceGate";

export {
  routeIntent,
  freeTextSearchQuery,
  type LookupStrategy,
  type RouteResult,
  type RouterContext,
} from "./router";
