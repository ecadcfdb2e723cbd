import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, date, serial, index, uniqueIndex } from "drizzle-orm/pg-core";
import { z } from "zod";

export const documents = pgTable(
  "documents",
  {
    id: varchar("id", { length: 255 }).primaryKey(), // Federal Register document number
    documentNumber: varchar("document_number", { length: 255 }),
    title: text("title"),
    abstract: text("abstract"),
    excerpt: text("excerpt"),
    fullText: text("full_text"),
    documentType: varchar("document_type", { length: 255 }),
    publicationDate: date("publication_date", { mode: "string" }),
    agencies: jsonb("agencies"), // Raw agency payload as received; may be malformed
    htmlUrl: text("html_url"),
    pdfUrl: text("pdf_url"),
    action: text("action"),
    rawJson: text("raw_json"),
    contentHash: varchar("content_hash", { length: 64 }),
    lastUpdated: timestamp("last_updated").defaultNow().notNull(),
  },
  (table) => [
    index("documents_publication_date_idx").on(table.publicationDate),
    index("documents_document_type_idx").on(table.documentType),
    index("documents_search_idx").using(
      "gin",
      sql`to_tsvector('english', coalesce(${table.title}, '') || ' ' || coalesce(${table.abstract}, '') || ' ' || coalesce(${table.excerpt}, '') || ' ' || coalesce(${table.fullText}, ''))`,
    ),
  ],
);

export const agencies = pgTable(
  "agencies",
  {
    id: serial("id").primaryKey(),
    documentId: varchar("document_id", { length: 255 })
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    name: varchar("name", { length: 255 }).notNull(),
    normalizedKey: varchar("normalized_key", { length: 255 }).notNull(),
    acronym: varchar("acronym", { length: 32 }),
    rawJson: text("raw_json"),
  },
  (table) => [
    uniqueIndex("agencies_document_name_idx").on(table.documentId, table.name),
    index("agencies_normalized_key_idx").on(table.normalizedKey),
    index("agencies_acronym_idx").on(table.acronym),
  ],
);

export type Document = typeof documents.$inferSelect;
export type InsertDocument = Omit<typeof documents.$inferInsert, "lastUpdated">;
export type Agency = typeof agencies.$inferSelect;

/**
 * A document as returned by the lookup strategies: the stored row plus its
 * agency names, taken from the agencies relation or, when that is empty,
 * parsed from the raw payload.
 */
export type DocumentWithAgencies = Document & {
  agencyNames: string[];
};

// Chat API contract
export const OUTPUT_FORMATS = ["markdown", "plaintext"] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const chatRequestSchema = z.object({
  message: z.string().max(2000, "Message is too long"),
  chatId: z.string().min(1).max(128).optional(),
  format: z.enum(OUTPUT_FORMATS).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type ChatResponse = {
  response: string;
  chatId: string;
};
