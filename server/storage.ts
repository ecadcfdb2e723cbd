import {
  type Document,
  type DocumentWithAgencies,
  type InsertDocument,
  type Agency,
  documents as documentsTable,
  agencies as agenciesTable,
} from "@shared/schema";
import { and, asc, desc, eq, ilike, inArray, isNotNull, or, sql, type SQL } from "drizzle-orm";
import type { Database } from "./db";
import { VOCABULARY_CONSTANTS } from "./config/constants";
import { rankKeywords } from "./vocabulary/keywords";
import type { VocabularyData, VocabularySource } from "./vocabulary/vocabularyCache";
import { agencyAcronym, agencyMatches, normalizeAgencyKey, parseAgencyNames, type AgencyEntry } from "./utils/agencies";
import { StoreUnavailableError } from "./utils/errorHandler";
import { createLogger } from "./utils/logger";
import { tokenize } from "./utils/text";

const logger = createLogger("Store");

export type SearchStrategy = "fulltext" | "substring";

export type SearchResult = {
  documents: DocumentWithAgencies[];
  strategy: SearchStrategy;
};

export type StoreStats = {
  totalDocuments: number;
  latestPublicationDate: string | null;
  totalAgencyEntries: number;
};

export type DocumentSample = Pick<Document, "id" | "title" | "publicationDate" | "documentType">;

export type UpsertDocumentInput = {
  document: InsertDocument;
  agencies: AgencyEntry[];
};

export interface DocumentStore extends VocabularySource {
  // Lookups
  search(query: string, limit: number): Promise<SearchResult>;
  filterByAgency(agency: string, limit: number): Promise<DocumentWithAgencies[]>;
  recent(limit: number): Promise<DocumentWithAgencies[]>;

  // Metadata
  getStats(): Promise<StoreStats>;
  getVocabularyData(): Promise<VocabularyData>;
  hasFullTextIndex(): Promise<boolean>;
  getSampleDocuments(limit: number): Promise<DocumentSample[]>;

  // Ingestion
  getContentHash(id: string): Promise<string | null>;
  upsertDocument(input: UpsertDocumentInput): Promise<void>;
}

/**
 * Split a search string into lowercase whitespace-separated terms.
 */
export function searchTerms(query: string): string[] {
  return query.trim().toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Publication date descending (undated last), then id descending.
 */
export function compareByRecency(a: Pick<Document, "publicationDate" | "id">, b: Pick<Document, "publicationDate" | "id">): number {
  if (a.publicationDate !== b.publicationDate) {
    if (a.publicationDate === null) return 1;
    if (b.publicationDate === null) return -1;
    return a.publicationDate < b.publicationDate ? 1 : -1;
  }
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}

function searchableFields(doc: Document): string[] {
  return [doc.title, doc.abstract, doc.excerpt, doc.fullText].filter((field): field is string => Boolean(field));
}

function buildAgencyRows(documentId: string, entries: AgencyEntry[]): Omit<Agency, "id">[] {
  return entries.map(entry => ({
    documentId,
    name: entry.name,
    normalizedKey: normalizeAgencyKey(entry.name),
    acronym: agencyAcronym(entry.name),
    rawJson: entry.rawJson,
  }));
}

function rankAgencyNames(counts: Map<string, number>): string[] {
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([name]) => name);
}

/**
 * In-process document store.
 *
 * Used by tests and local runs without a database. Full-text search is off by
 * default, which exercises the substring fallback; pass `fullTextSearch: true`
 * to rank by term frequency instead.
 */
export class MemDocumentStore implements DocumentStore {
  private documents: Map<string, Document> = new Map();
  private agencies: Agency[] = [];
  private nextAgencyId = 1;
  private readonly fullTextSearch: boolean;

  constructor(options: { fullTextSearch?: boolean } = {}) {
    this.fullTextSearch = options.fullTextSearch ?? false;
  }

  private withAgencies(doc: Document): DocumentWithAgencies {
    const names = this.agencies.filter(a => a.documentId === doc.id).map(a => a.name);
    return { ...doc, agencyNames: names.length > 0 ? names : parseAgencyNames(doc.agencies) };
  }

  private sorted(docs: Iterable<Document>): Document[] {
    return Array.from(docs).sort(compareByRecency);
  }

  async search(query: string, limit: number): Promise<SearchResult> {
    const terms = searchTerms(query);
    const strategy: SearchStrategy = this.fullTextSearch ? "fulltext" : "substring";
    if (terms.length === 0) {
      return { documents: [], strategy };
    }

    if (this.fullTextSearch) {
      const scored: Array<{ doc: Document; score: number }> = [];
      for (const doc of Array.from(this.documents.values())) {
        const tokens = searchableFields(doc).flatMap(field => tokenize(field));
        const score = tokens.filter(token => terms.includes(token)).length;
        if (score > 0) scored.push({ doc, score });
      }
      scored.sort((a, b) => b.score - a.score || compareByRecency(a.doc, b.doc));
      return {
        documents: scored.slice(0, limit).map(({ doc }) => this.withAgencies(doc)),
        strategy,
      };
    }

    const matches = Array.from(this.documents.values()).filter(doc => {
      const fields = searchableFields(doc).map(field => field.toLowerCase());
      return terms.every(term => fields.some(field => field.includes(term)));
    });
    return {
      documents: this.sorted(matches).slice(0, limit).map(doc => this.withAgencies(doc)),
      strategy,
    };
  }

  async filterByAgency(agency: string, limit: number): Promise<DocumentWithAgencies[]> {
    const documentIds = new Set(
      this.agencies.filter(a => agencyMatches(a, agency)).map(a => a.documentId),
    );
    const matches = Array.from(this.documents.values()).filter(doc => documentIds.has(doc.id));
    return this.sorted(matches).slice(0, limit).map(doc => this.withAgencies(doc));
  }

  async recent(limit: number): Promise<DocumentWithAgencies[]> {
    return this.sorted(this.documents.values()).slice(0, limit).map(doc => this.withAgencies(doc));
  }

  async getStats(): Promise<StoreStats> {
    let latest: string | null = null;
    for (const doc of Array.from(this.documents.values())) {
      if (doc.publicationDate && (latest === null || doc.publicationDate > latest)) {
        latest = doc.publicationDate;
      }
    }
    return {
      totalDocuments: this.documents.size,
      latestPublicationDate: latest,
      totalAgencyEntries: this.agencies.length,
    };
  }

  async getVocabularyData(): Promise<VocabularyData> {
    const byId = Array.from(this.documents.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    const agencyCounts = new Map<string, number>();
    for (const agency of this.agencies) {
      agencyCounts.set(agency.name, (agencyCounts.get(agency.name) ?? 0) + 1);
    }
    if (agencyCounts.size === 0) {
      for (const doc of byId) {
        for (const name of parseAgencyNames(doc.agencies)) {
          agencyCounts.set(name, (agencyCounts.get(name) ?? 0) + 1);
        }
      }
    }

    const documentTypes = Array.from(
      new Set(byId.map(doc => doc.documentType).filter((type): type is string => Boolean(type))),
    ).sort();

    const stats = await this.getStats();
    return {
      agencies: rankAgencyNames(agencyCounts),
      documentTypes,
      keywords: rankKeywords(byId.slice(0, VOCABULARY_CONSTANTS.KEYWORD_SCAN_LIMIT).map(doc => doc.title)),
      totalDocuments: stats.totalDocuments,
      latestPublicationDate: stats.latestPublicationDate,
    };
  }

  async hasFullTextIndex(): Promise<boolean> {
    return this.fullTextSearch;
  }

  async getSampleDocuments(limit: number): Promise<DocumentSample[]> {
    return this.sorted(this.documents.values())
      .slice(0, limit)
      .map(({ id, title, publicationDate, documentType }) => ({ id, title, publicationDate, documentType }));
  }

  async getContentHash(id: string): Promise<string | null> {
    return this.documents.get(id)?.contentHash ?? null;
  }

  async upsertDocument({ document, agencies }: UpsertDocumentInput): Promise<void> {
    const stored: Document = {
      id: document.id,
      documentNumber: document.documentNumber ?? null,
      title: document.title ?? null,
      abstract: document.abstract ?? null,
      excerpt: document.excerpt ?? null,
      fullText: document.fullText ?? null,
      documentType: document.documentType ?? null,
      publicationDate: document.publicationDate ?? null,
      agencies: document.agencies ?? null,
      htmlUrl: document.htmlUrl ?? null,
      pdfUrl: document.pdfUrl ?? null,
      action: document.action ?? null,
      rawJson: document.rawJson ?? null,
      contentHash: document.contentHash ?? null,
      lastUpdated: new Date(),
    };
    this.documents.set(stored.id, stored);

    this.agencies = this.agencies.filter(a => a.documentId !== stored.id);
    for (const row of buildAgencyRows(stored.id, agencies)) {
      this.agencies.push({ id: this.nextAgencyId++, ...row });
    }
  }
}

const SEARCH_VECTOR = sql`to_tsvector('english', coalesce(${documentsTable.title}, '') || ' ' || coalesce(${documentsTable.abstract}, '') || ' ' || coalesce(${documentsTable.excerpt}, '') || ' ' || coalesce(${documentsTable.fullText}, ''))`;
const RECENCY_ORDER: SQL[] = [sql`${documentsTable.publicationDate} DESC NULLS LAST`, desc(documentsTable.id)];

function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, "\\$&");
}

/**
 * Postgres-backed document store (Drizzle over Neon HTTP).
 *
 * Every driver failure surfaces as StoreUnavailableError; the driver error
 * is logged here and kept as `cause`.
 */
export class DbDocumentStore implements DocumentStore {
  private fullTextIndexPresent: boolean | null = null;

  constructor(private readonly db: Database) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error(`${operation} failed`, error);
      throw new StoreUnavailableError(operation, error);
    }
  }

  private async attachAgencies(rows: Document[]): Promise<DocumentWithAgencies[]> {
    if (rows.length === 0) return [];

    const agencyRows = await this.db
      .select({ documentId: agenciesTable.documentId, name: agenciesTable.name })
      .from(agenciesTable)
      .where(inArray(agenciesTable.documentId, rows.map(row => row.id)))
      .orderBy(asc(agenciesTable.id));

    const namesByDocument = new Map<string, string[]>();
    for (const { documentId, name } of agencyRows) {
      const names = namesByDocument.get(documentId) ?? [];
      names.push(name);
      namesByDocument.set(documentId, names);
    }

    return rows.map(row => ({
      ...row,
      agencyNames: namesByDocument.get(row.id) ?? parseAgencyNames(row.agencies),
    }));
  }

  async hasFullTextIndex(): Promise<boolean> {
    if (this.fullTextIndexPresent !== null) {
      return this.fullTextIndexPresent;
    }
    try {
      const result = await this.db.execute(sql`
        SELECT 1 FROM pg_indexes
        WHERE tablename = 'documents' AND indexdef ILIKE '%to_tsvector%'
        LIMIT 1
      `);
      this.fullTextIndexPresent = result.rows.length > 0;
      logger.info(`Full-text index ${this.fullTextIndexPresent ? "detected" : "not found, using substring search"}`);
      return this.fullTextIndexPresent;
    } catch (error) {
      logger.debug("Full-text index check failed, using substring search", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async search(query: string, limit: number): Promise<SearchResult> {
    const terms = searchTerms(query);
    if (terms.length === 0) {
      return { documents: [], strategy: "substring" };
    }

    if (await this.hasFullTextIndex()) {
      try {
        const tsQuery = sql`plainto_tsquery('english', ${query.trim()})`;
        const rows = await this.db
          .select()
          .from(documentsTable)
          .where(sql`${SEARCH_VECTOR} @@ ${tsQuery}`)
          .orderBy(sql`ts_rank(${SEARCH_VECTOR}, ${tsQuery}) DESC`, ...RECENCY_ORDER)
          .limit(limit);
        return { documents: await this.attachAgencies(rows), strategy: "fulltext" };
      } catch (error) {
        logger.warn("Full-text query failed, falling back to substring search", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return this.run("search", async () => {
      const conditions = terms.map(term => {
        const pattern = `%${escapeLikePattern(term)}%`;
        return or(
          ilike(documentsTable.title, pattern),
          ilike(documentsTable.abstract, pattern),
          ilike(documentsTable.excerpt, pattern),
          ilike(documentsTable.fullText, pattern),
        );
      });
      const rows = await this.db
        .select()
        .from(documentsTable)
        .where(and(...conditions))
        .orderBy(...RECENCY_ORDER)
        .limit(limit);
      return { documents: await this.attachAgencies(rows), strategy: "substring" as const };
    });
  }

  async filterByAgency(agency: string, limit: number): Promise<DocumentWithAgencies[]> {
    const key = normalizeAgencyKey(agency);
    if (!key) return [];

    return this.run("filterByAgency", async () => {
      const matchingDocuments = this.db
        .selectDistinct({ documentId: agenciesTable.documentId })
        .from(agenciesTable)
        .where(or(
          sql`(' ' || ${agenciesTable.normalizedKey}) LIKE ${`% ${key}%`}`,
          eq(agenciesTable.acronym, key.replace(/ /g, "")),
        ));

      const rows = await this.db
        .select()
        .from(documentsTable)
        .where(inArray(documentsTable.id, matchingDocuments))
        .orderBy(...RECENCY_ORDER)
        .limit(limit);
      return this.attachAgencies(rows);
    });
  }

  async recent(limit: number): Promise<DocumentWithAgencies[]> {
    return this.run("recent", async () => {
      const rows = await this.db
        .select()
        .from(documentsTable)
        .orderBy(...RECENCY_ORDER)
        .limit(limit);
      return this.attachAgencies(rows);
    });
  }

  async getSampleDocuments(limit: number): Promise<DocumentSample[]> {
    return this.run("getSampleDocuments", async () => {
      const rows = await this.db
        .select({
          id: documentsTable.id,
          title: documentsTable.title,
          publicationDate: documentsTable.publicationDate,
          documentType: documentsTable.documentType,
        })
        .from(documentsTable)
        .orderBy(...RECENCY_ORDER)
        .limit(limit);
      return rows;
    });
  }

  async getStats(): Promise<StoreStats> {
    return this.run("getStats", async () => {
      const [documentRow] = await this.db
        .select({
          total: sql<number>`count(*)::int`,
          latest: sql<string | null>`max(${documentsTable.publicationDate})::text`,
        })
        .from(documentsTable);
      const [agencyRow] = await this.db
        .select({ total: sql<number>`count(*)::int` })
        .from(agenciesTable);

      return {
        totalDocuments: documentRow?.total ?? 0,
        latestPublicationDate: documentRow?.latest ?? null,
        totalAgencyEntries: agencyRow?.total ?? 0,
      };
    });
  }

  async getVocabularyData(): Promise<VocabularyData> {
    const stats = await this.getStats();

    return this.run("getVocabularyData", async () => {
      const agencyRows = await this.db
        .select({ name: agenciesTable.name, count: sql<number>`count(distinct ${agenciesTable.documentId})::int` })
        .from(agenciesTable)
        .groupBy(agenciesTable.name)
        .orderBy(sql`count(distinct ${agenciesTable.documentId}) DESC`, asc(agenciesTable.name));

      let agencyNames = agencyRows.map(row => row.name);
      if (agencyNames.length === 0) {
        // Older rows may only carry the raw payload
        const payloads = await this.db
          .select({ agencies: documentsTable.agencies })
          .from(documentsTable)
          .where(isNotNull(documentsTable.agencies))
          .orderBy(asc(documentsTable.id))
          .limit(10000);
        const counts = new Map<string, number>();
        for (const { agencies } of payloads) {
          for (const name of parseAgencyNames(agencies)) {
            counts.set(name, (counts.get(name) ?? 0) + 1);
          }
        }
        agencyNames = rankAgencyNames(counts);
      }

      const typeRows = await this.db
        .selectDistinct({ documentType: documentsTable.documentType })
        .from(documentsTable)
        .where(isNotNull(documentsTable.documentType))
        .orderBy(asc(documentsTable.documentType));

      const titleRows = await this.db
        .select({ title: documentsTable.title })
        .from(documentsTable)
        .where(isNotNull(documentsTable.title))
        .orderBy(asc(documentsTable.id))
        .limit(VOCABULARY_CONSTANTS.KEYWORD_SCAN_LIMIT);

      return {
        agencies: agencyNames,
        documentTypes: typeRows.map(row => row.documentType).filter((type): type is string => Boolean(type)),
        keywords: rankKeywords(titleRows.map(row => row.title)),
        totalDocuments: stats.totalDocuments,
        latestPublicationDate: stats.latestPublicationDate,
      };
    });
  }

  async getContentHash(id: string): Promise<string | null> {
    return this.run("getContentHash", async () => {
      const [row] = await this.db
        .select({ contentHash: documentsTable.contentHash })
        .from(documentsTable)
        .where(eq(documentsTable.id, id))
        .limit(1);
      return row?.contentHash ?? null;
    });
  }

  async upsertDocument({ document, agencies }: UpsertDocumentInput): Promise<void> {
    const { id: _id, ...updatable } = document;

    await this.run("upsertDocument", async () => {
      const upsert = this.db
        .insert(documentsTable)
        .values(document)
        .onConflictDoUpdate({
          target: documentsTable.id,
          set: { ...updatable, lastUpdated: new Date() },
        });
      const clearAgencies = this.db.delete(agenciesTable).where(eq(agenciesTable.documentId, document.id));
      const rows = buildAgencyRows(document.id, agencies);

      // neon-http batches run as a single transaction
      if (rows.length > 0) {
        await this.db.batch([upsert, clearAgencies, this.db.insert(agenciesTable).values(rows).onConflictDoNothing()]);
      } else {
        await this.db.batch([upsert, clearAgencies]);
      }
    });
  }
}
