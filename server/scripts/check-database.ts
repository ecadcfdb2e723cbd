/**
 * Check Database Contents
 *
 * Prints document totals, the latest publication date, the search strategy in
 * use and a sample of recent documents, then runs a sample search.
 *
 * Usage:
 *   npm run check-db [-- --query environment]
 */

import "dotenv/config";
import { loadAppConfig } from "../config/appConfig";
import { createDb } from "../db";
import { DbDocumentStore } from "../storage";
import { setLogLevel } from "../utils/logger";

const SAMPLE_SIZE = 5;

async function main() {
  const args = process.argv.slice(2);
  const queryIndex = args.indexOf("--query");
  const sampleQuery = (queryIndex !== -1 ? args[queryIndex + 1] : undefined) ?? "environment";

  const config = loadAppConfig();
  setLogLevel(config.logLevel);
  const store = new DbDocumentStore(createDb(config.databaseUrl));

  const stats = await store.getStats();
  console.log(`Documents: ${stats.totalDocuments}`);
  console.log(`Agency entries: ${stats.totalAgencyEntries}`);
  console.log(`Latest publication: ${stats.latestPublicationDate ?? "n/a"}`);
  console.log(`Full-text index: ${(await store.hasFullTextIndex()) ? "yes" : "no (substring search)"}`);

  console.log();
  console.log("Recent documents:");
  for (const doc of await store.getSampleDocuments(SAMPLE_SIZE)) {
    console.log(`  ${doc.publicationDate ?? "????-??-??"}  ${doc.id}  ${doc.title ?? "(No title)"}`);
  }

  const { documents, strategy } = await store.search(sampleQuery, SAMPLE_SIZE);
  console.log();
  console.log(`Search "${sampleQuery}" (${strategy}): ${documents.length} results`);
  for (const doc of documents) {
    console.log(`  ${doc.id}  ${doc.title ?? "(No title)"}`);
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
