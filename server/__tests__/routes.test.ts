/**
 * Unit Tests: HTTP Routes
 *
 * The app is served on an ephemeral loopback port inside the test process,
 * over the in-memory store. The OpenAI SDK is mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server } from "http";

const { mockModelsList } = vi.hoisted(() => ({
  mockModelsList: vi.fn(),
}));

vi.mock("openai", () => {
  return {
    OpenAI: class MockOpenAI {
      models = {
        list: mockModelsList,
      };
    },
  };
});

import { createApp } from "../app";
import { RegulatoryAssistant } from "../assistant/assistantHandler";
import { createLLMClient } from "../llm/client";
import { createRateLimit } from "../middleware/security";
import type { RequestHandler } from "express";
import { MemDocumentStore } from "../storage";
import { StoreUnavailableError } from "../utils/errorHandler";
import { VocabularyCache } from "../vocabulary/vocabularyCache";
import { createSampleStore } from "./fixtures";

const llmConfig = {
  baseUrl: "http://localhost:11434/v1",
  apiKey: "test-secret",
  model: "phi3:latest",
  timeoutMs: 1000,
};

const servers: Server[] = [];

async function startServer(options: { store?: MemDocumentStore; chatLimiter?: RequestHandler } = {}): Promise<string> {
  const store = options.store ?? (await createSampleStore());
  const server = createApp({
    assistant: new RegulatoryAssistant({ store, vocabulary: new VocabularyCache(store) }),
    store,
    llm: createLLMClient(llmConfig),
    chatLimiter: options.chatLimiter ?? createRateLimit({ windowMs: 60_000, maxRequests: 100 }),
  });
  servers.push(server);

  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port");
  }
  return `http://127.0.0.1:${address.port}`;
}

function postChat(baseUrl: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/chat`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  mockModelsList.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(server => new Promise<void>(resolve => server.close(() => resolve()))),
  );
  vi.restoreAllMocks();
});

describe("POST /api/chat", () => {
  it("answers and passes the chat id through", async () => {
    const baseUrl = await startServer();
    const res = await postChat(baseUrl, { message: "recent 1", chatId: "chat-42" });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(res.headers.get("x-content-type-options")).toBe("nosniff");
    expect(body.chatId).toBe("chat-42");
    expect(body.response).toContain("### Pesticide Tolerances for Glyphosate");
    expect(body.response).not.toContain("Air Quality Plans");
  });

  it("rejects a body without a message", async () => {
    const baseUrl = await startServer();
    const res = await postChat(baseUrl, { chatId: "chat-42" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "message: Required" });
  });

  it("rejects malformed JSON", async () => {
    const baseUrl = await startServer();
    const res = await postChat(baseUrl, "{ not json");
    expect(res.status).toBe(400);
  });

  it("returns 429 with Retry-After once the limit is reached", async () => {
    const baseUrl = await startServer({
      chatLimiter: createRateLimit({ windowMs: 60_000, maxRequests: 1, now: () => 0 }),
    });

    const first = await postChat(baseUrl, { message: "help" });
    const second = await postChat(baseUrl, { message: "help" });

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
    expect(second.headers.get("retry-after")).toBe("60");
    expect(await second.json()).toEqual({ error: "Too many requests, retry in 60s" });
  });
});

describe("GET /api/health", () => {
  it("reports ok when the database and model are reachable", async () => {
    mockModelsList.mockResolvedValue({ data: [{ id: "phi3:latest" }] });
    const baseUrl = await startServer();
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      service: "regulatory-document-assistant",
      database: { ok: true, documents: 5 },
      llm: { reachable: true, model: "phi3:latest", modelAvailable: true },
    });
  });

  it("returns 503 when the database is down", async () => {
    mockModelsList.mockRejectedValue(new Error("connect ECONNREFUSED"));
    class DownStore extends MemDocumentStore {
      async getStats(): Promise<never> {
        throw new StoreUnavailableError("getStats");
      }
    }
    const baseUrl = await startServer({ store: new DownStore() });
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      status: "unavailable",
      service: "regulatory-document-assistant",
      database: { ok: false, error: "unreachable" },
      llm: { reachable: false, model: "phi3:latest", modelAvailable: false },
    });
  });
});

describe("debug routes", () => {
  it("reports the search strategy and sample titles", async () => {
    const baseUrl = await startServer();
    const res = await fetch(`${baseUrl}/api/debug/search?query=ozone`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      query: "ozone",
      agencyFilter: null,
      strategy: "substring",
      fullTextIndex: false,
      resultsCount: 1,
      sampleTitles: ["Air Quality Plans; California; Ozone Standards"],
    });
  });

  it("filters by agency when one is given", async () => {
    const baseUrl = await startServer();
    const res = await fetch(`${baseUrl}/api/debug/search?agency=FDA&limit=1`);
    const body = await res.json();

    expect(body.strategy).toBe("agency");
    expect(body.agencyFilter).toBe("FDA");
    expect(body.sampleTitles).toEqual(["Medical Devices; Premarket Approval Requirements"]);
  });

  it("rejects an out-of-range limit", async () => {
    const baseUrl = await startServer();
    const res = await fetch(`${baseUrl}/api/debug/search?limit=99`);
    expect(res.status).toBe(400);
  });

  it("summarizes the database", async () => {
    const baseUrl = await startServer();
    const body = await (await fetch(`${baseUrl}/api/debug/database-info`)).json();

    expect(body.totalDocuments).toBe(5);
    expect(body.latestPublicationDate).toBe("2024-03-05");
    expect(body.totalAgencyEntries).toBe(5);
    expect(body.fullTextIndex).toBe(false);
    expect(body.recentSamples).toHaveLength(5);
  });
});

describe("unknown routes", () => {
  it("returns 404 under /api", async () => {
    const baseUrl = await startServer();
    const res = await fetch(`${baseUrl}/api/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Route GET /nope not found" });
  });
});
