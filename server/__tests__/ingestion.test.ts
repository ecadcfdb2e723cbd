/**
 * Unit Tests: Ingestion
 *
 * The Federal Register API is replaced by a fetch stub; documents are
 * written to the in-memory store.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { FederalRegisterClient, documentNumberOf, type FetchLike } from "../ingestion/federalRegisterClient";
import {
  computeContentHash,
  ingestDocuments,
  normalizePublicationDate,
} from "../ingestion/ingestDocuments";
import { MemDocumentStore, type UpsertDocumentInput } from "../storage";
import { StoreUnavailableError } from "../utils/errorHandler";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function createClient(fetchImpl: FetchLike, sleep = vi.fn().mockResolvedValue(undefined)) {
  const client = new FederalRegisterClient({
    baseUrl: "https://fr.test/",
    perPage: 2,
    maxWorkers: 2,
    daysBack: 30,
    fetch: fetchImpl,
    sleep,
    today: () => new Date(2024, 2, 31),
  });
  return { client, sleep };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("FederalRegisterClient", () => {
  it("builds the list URL for the publication window", () => {
    const { client } = createClient(vi.fn());
    const url = new URL(client.buildListUrl(3));

    expect(url.origin + url.pathname).toBe("https://fr.test/api/v1/documents.json");
    expect(url.searchParams.get("conditions[publication_date][gte]")).toBe("2024-03-01");
    expect(url.searchParams.get("conditions[publication_date][lte]")).toBe("2024-03-31");
    expect(url.searchParams.get("per_page")).toBe("2");
    expect(url.searchParams.get("order")).toBe("newest");
    expect(url.searchParams.get("page")).toBe("3");
  });

  it("pages until a short page", async () => {
    const fetchImpl = vi.fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse({ results: [{ document_number: "A" }, { document_number: "B" }] }))
      .mockResolvedValueOnce(jsonResponse({ results: [{ document_number: "C" }] }));
    const { client } = createClient(fetchImpl);

    const records = await client.fetchDocumentList();

    expect(records.map(documentNumberOf)).toEqual(["A", "B", "C"]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("stops on an empty page, at maxPages, or on an unexpected payload", async () => {
    const empty = createClient(vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ results: [] })));
    expect(await empty.client.fetchDocumentList()).toEqual([]);

    const fullPages = vi.fn<FetchLike>().mockImplementation(async () =>
      jsonResponse({ results: [{ document_number: "A" }, { document_number: "B" }] }),
    );
    const capped = createClient(fullPages);
    expect(await capped.client.fetchDocumentList({ maxPages: 1 })).toHaveLength(2);
    expect(fullPages).toHaveBeenCalledTimes(1);

    const unexpected = createClient(vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ error: "nope" })));
    expect(await unexpected.client.fetchDocumentList()).toEqual([]);
  });

  it("retries failed pages with exponential backoff", async () => {
    const fetchImpl = vi.fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse({}, 500))
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse({ results: [{ document_number: "A" }] }));
    const { client, sleep } = createClient(fetchImpl);

    const records = await client.fetchDocumentList();

    expect(records).toHaveLength(1);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it("gives up after three failed attempts", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockImplementation(async () => jsonResponse({}, 503));
    const { client, sleep } = createClient(fetchImpl);

    expect(await client.fetchDocumentList()).toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("returns an empty record when a detail fetch fails", async () => {
    const { client } = createClient(vi.fn<FetchLike>().mockResolvedValue(jsonResponse({}, 404)));
    expect(await client.fetchFullDocument("2024-00001")).toEqual({});
  });

  it("merges detail records over list records", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockImplementation(async url => {
      if (url.includes("/api/v1/documents.json")) {
        const page = new URL(url).searchParams.get("page");
        return jsonResponse({
          results: page === "1" ? [{ document_number: "2024-00001", title: "Shallow" }, { title: "No number" }] : [],
        });
      }
      if (url.endsWith("/api/v1/documents/2024-00001.json")) {
        return jsonResponse({ document_number: "2024-00001", title: "Detailed", full_text: "Body" });
      }
      return jsonResponse({}, 404);
    });
    const { client } = createClient(fetchImpl);

    expect(await client.fetchDocuments()).toEqual([
      { document_number: "2024-00001", title: "Detailed", full_text: "Body" },
    ]);
  });
});

describe("ingestDocuments", () => {
  const record = {
    document_number: "2024-05001",
    title: "Ozone Transport Rule",
    abstract: "Revises interstate ozone transport obligations.",
    type: "Rule",
    publication_date: "2024-03-05",
    agencies: [{ name: "Environmental Protection Agency", id: 145 }],
    html_url: "https://fr.test/d/2024-05001",
  };

  it("hashes independently of key order", () => {
    const hash = computeContentHash({ a: 1, b: { c: 2, d: [3, { e: 4, f: 5 }] } });
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(computeContentHash({ b: { d: [3, { f: 5, e: 4 }], c: 2 }, a: 1 })).toBe(hash);
    expect(computeContentHash({ a: 2, b: { c: 2, d: [3, { e: 4, f: 5 }] } })).not.toBe(hash);
  });

  it.each([
    ["2024-03-05", "2024-03-05"],
    ["2024-03-05T12:00:00-05:00", "2024-03-05"],
    ["2024-02-30", null],
    ["March 5, 2024", null],
    [20240305, null],
    [null, null],
  ])("normalizes publication date %j to %j", (input, expected) => {
    expect(normalizePublicationDate(input)).toBe(expected);
  });

  it("stores documents with their agencies", async () => {
    const store = new MemDocumentStore();
    const summary = await ingestDocuments(store, [record, { title: "No number" }]);

    expect(summary).toEqual({ processed: 1, unchanged: 0, skipped: 1 });
    const [stored] = await store.filterByAgency("epa", 5);
    expect(stored.id).toBe("2024-05001");
    expect(stored.documentType).toBe("Rule");
    expect(stored.publicationDate).toBe("2024-03-05");
    expect(stored.htmlUrl).toBe("https://fr.test/d/2024-05001");
    expect(stored.agencyNames).toEqual(["Environmental Protection Agency"]);
    expect(stored.contentHash).toBe(computeContentHash(record));
  });

  it("skips unchanged documents and rewrites changed ones", async () => {
    const store = new MemDocumentStore();
    await ingestDocuments(store, [record]);

    expect(await ingestDocuments(store, [record])).toEqual({ processed: 0, unchanged: 1, skipped: 0 });
    expect(await ingestDocuments(store, [{ ...record, title: "Ozone Transport Rule (Corrected)" }])).toEqual({
      processed: 1,
      unchanged: 0,
      skipped: 0,
    });
    const [stored] = await store.recent(1);
    expect(stored.title).toBe("Ozone Transport Rule (Corrected)");
  });

  it("counts a failing document as skipped and continues", async () => {
    class FlakyStore extends MemDocumentStore {
      async upsertDocument(input: UpsertDocumentInput): Promise<void> {
        if (input.document.id === "bad") throw new Error("value too long");
        return super.upsertDocument(input);
      }
    }
    const store = new FlakyStore();

    const summary = await ingestDocuments(store, [{ ...record, document_number: "bad" }, record]);

    expect(summary).toEqual({ processed: 1, unchanged: 0, skipped: 1 });
  });

  it("stops when the store is unavailable", async () => {
    class DownStore extends MemDocumentStore {
      async getContentHash(): Promise<string | null> {
        throw new StoreUnavailableError("getContentHash");
      }
    }

    await expect(ingestDocuments(new DownStore(), [record])).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
