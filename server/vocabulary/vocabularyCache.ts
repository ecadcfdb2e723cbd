/**
 * Vocabulary Cache
 *
 * Holds a TTL-bounded snapshot of the domain vocabulary (agency names,
 * document types, frequent title keywords) used by the relevance gate and the
 * help summary.
 *
 * Snapshots are frozen and replaced wholesale on refresh, so a reader always
 * sees either the previous snapshot or the new one, never a mix. Concurrent
 * callers that find the snapshot expired share one in-flight refresh.
 *
 * Layer: Decision Layer (shared state)
 */

import { VOCABULARY_CONSTANTS } from "../config/constants";
import { createLogger } from "../utils/logger";
import { tokenize } from "../utils/text";

const logger = createLogger("Vocabulary");

export type VocabularyData = {
  agencies: string[];
  documentTypes: string[];
  keywords: string[];
  totalDocuments: number;
  latestPublicationDate: string | null;
};

export type VocabularySnapshot = Readonly<{
  agencies: readonly string[];
  documentTypes: readonly string[];
  keywords: readonly string[];
  totalDocuments: number;
  latestPublicationDate: string | null;
  domainTokens: DomainTokens;
  refreshedAt: number;
}>;

/**
 * Lookup-only view of the snapshot's token set. The backing Set stays
 * private to the snapshot.
 */
export type DomainTokens = Readonly<{
  size: number;
  has(token: string): boolean;
  toArray(): string[];
}>;

export interface VocabularySource {
  getVocabularyData(): Promise<VocabularyData>;
}

function domainTokensOf(terms: readonly string[]): DomainTokens {
  const tokens = new Set<string>();
  for (const term of terms) {
    for (const token of tokenize(term)) {
      tokens.add(token);
    }
  }
  return Object.freeze({
    size: tokens.size,
    has: (token: string) => tokens.has(token),
    toArray: () => Array.from(tokens),
  });
}

export function buildSnapshot(data: VocabularyData, refreshedAt: number): VocabularySnapshot {
  const domainTokens = domainTokensOf([...data.keywords, ...data.agencies, ...data.documentTypes]);

  return Object.freeze({
    agencies: Object.freeze([...data.agencies]),
    documentTypes: Object.freeze([...data.documentTypes]),
    keywords: Object.freeze([...data.keywords]),
    totalDocuments: data.totalDocuments,
    latestPublicationDate: data.latestPublicationDate,
    domainTokens,
    refreshedAt,
  });
}

export class VocabularyCache {
  private snapshot: VocabularySnapshot | null = null;
  private inFlight: Promise<VocabularySnapshot> | null = null;

  constructor(
    private readonly source: VocabularySource,
    private readonly ttlMs: number = VOCABULARY_CONSTANTS.TTL_MS,
  ) {}

  /**
   * Return the current snapshot if it is younger than the TTL, otherwise
   * refresh from the source.
   *
   * When a refresh fails, the stale snapshot is returned if there is one;
   * with no snapshot to fall back on the error propagates.
   */
  async getOrRefresh(now: number = Date.now()): Promise<VocabularySnapshot> {
    const current = this.snapshot;
    if (current && now - current.refreshedAt < this.ttlMs) {
      return current;
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh(now).finally(() => {
        this.inFlight = null;
      });
    }

    try {
      return await this.inFlight;
    } catch (error) {
      if (current) {
        logger.warn("Refresh failed, serving stale snapshot", {
          error: error instanceof Error ? error.message : String(error),
          ageMs: now - current.refreshedAt,
        });
        return current;
      }
      throw error;
    }
  }

  /**
   * The last snapshot taken, without triggering a refresh.
   */
  peek(): VocabularySnapshot | null {
    return this.snapshot;
  }

  private async refresh(now: number): Promise<VocabularySnapshot> {
    const start = Date.now();
    const data = await this.source.getVocabularyData();
    const next = buildSnapshot(data, now);
    this.snapshot = next;
    logger.info(`Refreshed: ${next.agencies.length} agencies, ${next.documentTypes.length} document types, ${next.keywords.length} keywords`, {
      duration: Date.now() - start,
    });
    return next;
  }
}
