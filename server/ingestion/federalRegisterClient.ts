/**
 * Federal Register API client.
 *
 * Responsibilities:
 * - Page through the document list for a publication date window
 * - Fetch the detail record for each listed document
 * - Merge list and detail records
 *
 * This file MUST NOT:
 * - Write to the document store
 * - Interpret document contents
 *
 * Layer: Ingestion (read-only, network)
 */

import { format, subDays } from "date-fns";
import { z } from "zod";
import type { FederalRegisterConfig } from "../config/appConfig";
import { INGESTION_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError, getErrorMessage } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";

const logger = createLogger("Ingestion");

export type FederalRegisterRecord = Record<string, unknown>;

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export type FederalRegisterClientOptions = FederalRegisterConfig & {
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  today?: () => Date;
  maxRetries?: number;
  backoffBaseMs?: number;
};

export type FetchDocumentsOptions = {
  daysBack?: number;
  maxPages?: number;
};

const listPageSchema = z.object({
  results: z.array(z.record(z.unknown())),
}).passthrough();

const detailSchema = z.record(z.unknown());

export function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Document number of a list or detail record, falling back to `id`.
 */
export function documentNumberOf(record: FederalRegisterRecord): string | null {
  for (const key of ["document_number", "id"]) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number") return String(value);
  }
  return null;
}

export class FederalRegisterClient {
  private readonly baseUrl: string;
  private readonly perPage: number;
  private readonly maxWorkers: number;
  private readonly daysBack: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly today: () => Date;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;

  constructor(options: FederalRegisterClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.perPage = options.perPage;
    this.maxWorkers = Math.max(1, options.maxWorkers);
    this.daysBack = options.daysBack;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.today = options.today ?? (() => new Date());
    this.maxRetries = options.maxRetries ?? INGESTION_CONSTANTS.MAX_RETRIES;
    this.backoffBaseMs = options.backoffBaseMs ?? INGESTION_CONSTANTS.BACKOFF_BASE_MS;
  }

  buildListUrl(page: number, daysBack: number = this.daysBack): string {
    const end = this.today();
    const start = subDays(end, daysBack);
    const params = new URLSearchParams({
      "conditions[publication_date][gte]": format(start, "yyyy-MM-dd"),
      "conditions[publication_date][lte]": format(end, "yyyy-MM-dd"),
      per_page: String(this.perPage),
      order: "newest",
      page: String(page),
    });
    return `${this.baseUrl}/api/v1/documents.json?${params.toString()}`;
  }

  buildDetailUrl(documentNumber: string): string {
    return `${this.baseUrl}/api/v1/documents/${encodeURIComponent(documentNumber)}.json`;
  }

  private async getJson(url: string, timeoutMs: number): Promise<unknown> {
    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw new ExternalServiceError("Federal Register", `HTTP ${response.status}`);
    }
    return response.json();
  }

  /**
   * Shallow records for the date window, newest first.
   *
   * Stops on an empty or short page, after `maxPages`, on a payload without
   * `results`, or when one page fails `maxRetries` times. Retries back off
   * exponentially (2s, 4s, ... with the default base).
   */
  async fetchDocumentList(options: FetchDocumentsOptions = {}): Promise<FederalRegisterRecord[]> {
    const daysBack = options.daysBack ?? this.daysBack;
    const records: FederalRegisterRecord[] = [];
    let page = 1;
    let retries = 0;

    while (options.maxPages === undefined || page <= options.maxPages) {
      let payload: unknown;
      try {
        logger.info(`Fetching page ${page}`);
        payload = await this.getJson(this.buildListUrl(page, daysBack), TIMEOUT_CONSTANTS.LIST_FETCH_MS);
      } catch (error) {
        retries++;
        logger.warn(`Page ${page} failed (attempt ${retries}/${this.maxRetries})`, { error: getErrorMessage(error) });
        if (retries >= this.maxRetries) {
          logger.error("Exceeded retries for pagination", error, { page });
          break;
        }
        await this.sleep(2 ** retries * this.backoffBaseMs);
        continue;
      }

      const parsed = listPageSchema.safeParse(payload);
      if (!parsed.success) {
        logger.warn(`Unexpected API response on page ${page}`);
        break;
      }

      const results = parsed.data.results;
      logger.info(`Fetched ${results.length} shallow documents from page ${page}`);
      if (results.length === 0) break;

      records.push(...results);
      if (results.length < this.perPage) break;

      page++;
      retries = 0;
    }

    logger.info(`Total shallow documents fetched: ${records.length}`);
    return records;
  }

  /**
   * Detail record for one document, or `{}` when it cannot be fetched.
   */
  async fetchFullDocument(documentNumber: string): Promise<FederalRegisterRecord> {
    try {
      const payload = await this.getJson(this.buildDetailUrl(documentNumber), TIMEOUT_CONSTANTS.DETAIL_FETCH_MS);
      const parsed = detailSchema.safeParse(payload);
      return parsed.success ? parsed.data : {};
    } catch (error) {
      logger.warn(`Failed to fetch full document ${documentNumber}`, { error: getErrorMessage(error) });
      return {};
    }
  }

  /**
   * List records merged with their detail records; detail fields win.
   * Detail requests run `maxWorkers` at a time.
   */
  async fetchDocuments(options: FetchDocumentsOptions = {}): Promise<FederalRegisterRecord[]> {
    const shallow = await this.fetchDocumentList(options);
    const withNumbers = shallow.flatMap(record => {
      const documentNumber = documentNumberOf(record);
      return documentNumber ? [{ record, documentNumber }] : [];
    });

    const merged: FederalRegisterRecord[] = [];
    for (let i = 0; i < withNumbers.length; i += this.maxWorkers) {
      const batch = withNumbers.slice(i, i + this.maxWorkers);
      const details = await Promise.all(batch.map(({ documentNumber }) => this.fetchFullDocument(documentNumber)));
      batch.forEach(({ record }, index) => {
        merged.push({ ...record, ...details[index] });
      });
    }

    logger.info(`Total full documents prepared: ${merged.length}`);
    return merged;
  }
}
