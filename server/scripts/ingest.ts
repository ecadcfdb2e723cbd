/**
 * Ingest Federal Register Documents
 *
 * Fetches documents published in the last N days, merges list and detail
 * records, and upserts them into the database. Unchanged documents are
 * skipped by content hash.
 *
 * Usage:
 *   npm run ingest -- [--days 30] [--max-pages 2]
 *
 * Options:
 *   --days N        Publication window in days (default FR_DAYS_BACK)
 *   --max-pages N   Stop after N list pages (default: all)
 */

import "dotenv/config";
import { loadAppConfig } from "../config/appConfig";
import { createDb } from "../db";
import { FederalRegisterClient } from "../ingestion/federalRegisterClient";
import { ingestDocuments } from "../ingestion/ingestDocuments";
import { DbDocumentStore } from "../storage";
import { setLogLevel } from "../utils/logger";

function readPositiveInt(args: string[], flag: string): number | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = Number.parseInt(args[index + 1] ?? "", 10);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer`);
  }
  return value;
}

async function main() {
  const args = process.argv.slice(2);
  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  const daysBack = readPositiveInt(args, "--days") ?? config.federalRegister.daysBack;
  const maxPages = readPositiveInt(args, "--max-pages");

  console.log("=".repeat(60));
  console.log("Federal Register Ingestion");
  console.log("=".repeat(60));
  console.log(`Window: last ${daysBack} days${maxPages ? `, at most ${maxPages} pages` : ""}`);
  console.log();

  const client = new FederalRegisterClient(config.federalRegister);
  const store = new DbDocumentStore(createDb(config.databaseUrl));

  const records = await client.fetchDocuments({ daysBack, maxPages });
  const summary = await ingestDocuments(store, records);

  console.log();
  console.log("=".repeat(60));
  console.log("Ingestion Complete");
  console.log("=".repeat(60));
  console.log(`Fetched: ${records.length}`);
  console.log(`Processed: ${summary.processed}`);
  console.log(`Unchanged: ${summary.unchanged}`);
  console.log(`Skipped: ${summary.skipped}`);
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
