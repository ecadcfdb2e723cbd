/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Lookup limits shared by every search strategy.
 */
export const SEARCH_LIMITS = {
  /**
   * Pagination ceiling applied to every lookup strategy.
   */
  MAX_RESULTS: 25,

  /**
   * Number of documents returned by `recent` when N is missing or invalid.
   */
  DEFAULT_RECENT: 5,
} as const;

/**
 * Relevance gate thresholds.
 *
 * Short inputs (a word or two) need a higher share of in-domain tokens than
 * longer sentences, which naturally carry more filler words.
 */
export const RELEVANCE_THRESHOLDS = {
  SHORT_INPUT_MAX_TOKENS: 2,
  SHORT_INPUT_THRESHOLD: 0.33,
  OVERLAP_THRESHOLD: 0.18,
} as const;

export const VOCABULARY_CONSTANTS = {
  /**
   * Snapshot time-to-live (milliseconds).
   */
  TTL_MS: 15 * 1000, // 15 seconds

  /**
   * Number of frequent title keywords kept in the snapshot.
   */
  TOP_KEYWORDS: 30,

  /**
   * Shortest token counted as a keyword.
   */
  MIN_KEYWORD_LENGTH: 4,

  /**
   * Maximum number of titles scanned when ranking keywords.
   */
  KEYWORD_SCAN_LIMIT: 20000,
} as const;

export const FORMAT_CONSTANTS = {
  /**
   * Summary budget per document, in characters (code points).
   */
  SUMMARY_MAX_CHARS: 600,

  /**
   * Agencies and keywords listed in the help summary.
   */
  HELP_TOP_AGENCIES: 7,
  HELP_TOP_KEYWORDS: 12,

  /**
   * Suggestions offered when the relevance gate rejects a query.
   */
  REJECTION_SUGGESTIONS: 3,
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Federal Register list page fetch timeout (milliseconds).
   */
  LIST_FETCH_MS: 30000, // 30 seconds

  /**
   * Federal Register document detail fetch timeout (milliseconds).
   */
  DETAIL_FETCH_MS: 20000, // 20 seconds

  /**
   * LLM reachability probe timeout (milliseconds).
   */
  LLM_PROBE_MS: 3000, // 3 seconds
} as const;

export const INGESTION_CONSTANTS = {
  /**
   * Attempts per list page before pagination gives up.
   */
  MAX_RETRIES: 3,

  /**
   * Base of the exponential backoff between retries (milliseconds).
   */
  BACKOFF_BASE_MS: 1000,

  /**
   * Log a progress line every N processed documents.
   */
  PROGRESS_LOG_INTERVAL: 50,
} as const;

/**
 * Rate limiting configuration
 */
export const RATE_LIMIT_CONSTANTS = {
  /**
   * Chat rate limit window (milliseconds).
   */
  CHAT_WINDOW_MS: 60 * 1000, // 1 minute

  /**
   * Maximum chat requests per client per window.
   */
  CHAT_MAX_REQUESTS: 60,
} as const;
