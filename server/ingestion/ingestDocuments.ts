/**
 * Document ingestion.
 *
 * Responsibilities:
 * - Map Federal Register records onto document rows
 * - Skip records whose content hash is unchanged
 * - Upsert documents together with their agency entries
 *
 * This file MUST NOT:
 * - Call the Federal Register API
 * - Abort the batch because one record fails
 *
 * Layer: Ingestion (deterministic, write-only)
 */

import { createHash } from "crypto";
import { isValid, parseISO } from "date-fns";
import type { InsertDocument } from "@shared/schema";
import { INGESTION_CONSTANTS } from "../config/constants";
import type { DocumentStore } from "../storage";
import { extractAgencyEntries, normalizeAgenciesPayload, type AgencyEntry } from "../utils/agencies";
import { StoreUnavailableError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import { documentNumberOf, type FederalRegisterRecord } from "./federalRegisterClient";

const logger = createLogger("Ingestion");

export type IngestSummary = {
  processed: number;
  unchanged: number;
  skipped: number;
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map(key => [key, canonicalize(Reflect.get(value, key))]),
    );
  }
  return value;
}

/**
 * SHA-256 over the record serialized with sorted keys, so key order in the
 * API response does not change the hash.
 */
export function computeContentHash(record: FederalRegisterRecord): string {
  return createHash("sha256").update(JSON.stringify(canonicalize(record)), "utf8").digest("hex");
}

/**
 * `YYYY-MM-DD` from a date or timestamp string, or null when invalid.
 */
export function normalizePublicationDate(value: unknown): string | null {
  if (typeof value !== "string" || !value.trim()) return null;
  const datePart = value.trim().split("T")[0];
  if (!ISO_DATE.test(datePart) || !isValid(parseISO(datePart))) return null;
  return datePart;
}

function optionalString(record: FederalRegisterRecord, key: string): string | null {
  const value = record[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function toUpsertInput(
  documentNumber: string,
  record: FederalRegisterRecord,
  contentHash: string,
): { document: InsertDocument; agencies: AgencyEntry[] } {
  const agencyPayload = normalizeAgenciesPayload(record.agencies);

  return {
    document: {
      id: documentNumber,
      documentNumber: optionalString(record, "document_number") ?? documentNumber,
      title: optionalString(record, "title"),
      abstract: optionalString(record, "abstract"),
      excerpt: optionalString(record, "excerpt"),
      fullText: optionalString(record, "full_text"),
      documentType: optionalString(record, "type") ?? optionalString(record, "document_type"),
      publicationDate: normalizePublicationDate(record.publication_date),
      agencies: agencyPayload.length > 0 ? agencyPayload : null,
      htmlUrl: optionalString(record, "html_url"),
      pdfUrl: optionalString(record, "pdf_url"),
      action: optionalString(record, "action"),
      rawJson: JSON.stringify(record),
      contentHash,
    },
    agencies: extractAgencyEntries(agencyPayload),
  };
}

/**
 * Upsert records into the store.
 *
 * Records without a document number, and records that fail to map, are
 * counted as skipped. A store outage stops the run.
 */
export async function ingestDocuments(
  store: DocumentStore,
  records: readonly FederalRegisterRecord[],
): Promise<IngestSummary> {
  const summary: IngestSummary = { processed: 0, unchanged: 0, skipped: 0 };
  if (records.length === 0) {
    logger.warn("No documents to process");
    return summary;
  }

  for (const record of records) {
    const documentNumber = documentNumberOf(record);
    if (!documentNumber) {
      logger.warn("Skipping document without document_number");
      summary.skipped++;
      continue;
    }

    try {
      const contentHash = computeContentHash(record);
      if ((await store.getContentHash(documentNumber)) === contentHash) {
        logger.debug(`Skipping unchanged document ${documentNumber}`);
        summary.unchanged++;
        continue;
      }

      await store.upsertDocument(toUpsertInput(documentNumber, record, contentHash));
      summary.processed++;
      if (summary.processed % INGESTION_CONSTANTS.PROGRESS_LOG_INTERVAL === 0) {
        logger.info(`Processed ${summary.processed} documents...`);
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      logger.error(`Error processing document ${documentNumber}`, error);
      summary.skipped++;
    }
  }

  logger.info(`Processed ${summary.processed} documents, ${summary.unchanged} unchanged, ${summary.skipped} skipped`);
  return summary;
}
