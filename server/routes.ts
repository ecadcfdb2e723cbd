import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { createServer, type Server } from "http";
import { chatRequestSchema, type ChatRequest, type ChatResponse } from "@shared/schema";
import type { RegulatoryAssistant } from "./assistant/assistantHandler";
import { checkLLMReachable, type LLMClient } from "./llm/client";
import { chatRateLimit } from "./middleware/security";
import { querySchemas, validate } from "./middleware/validation";
import type { DocumentStore } from "./storage";
import { NotFoundError, getErrorMessage, handleRouteError } from "./utils/errorHandler";
import { createLogger } from "./utils/logger";

const logger = createLogger("Routes");

const SERVICE_NAME = "regulatory-document-assistant";
const SAMPLE_SIZE = 5;

export type RouteDependencies = {
  assistant: RegulatoryAssistant;
  store: DocumentStore;
  llm: LLMClient;
  /** Limiter for /api/chat; defaults to the shared per-IP chat limit. */
  chatLimiter?: RequestHandler;
};

export function registerRoutes(app: Express, { assistant, store, llm, chatLimiter = chatRateLimit }: RouteDependencies): Server {
  app.post("/api/chat", chatLimiter, validate({ body: chatRequestSchema }), async (req, res) => {
    try {
      // validate() has already replaced the body with the parsed request
      const body: ChatRequest = req.body;
      const { response, chatId }: ChatResponse = await assistant.handle(body);
      res.json({ response, chatId });
    } catch (error) {
      handleRouteError(res, error, "Chat");
    }
  });

  app.get("/api/health", async (_req, res) => {
    let database: { ok: boolean; documents?: number; error?: string };
    try {
      const stats = await store.getStats();
      database = { ok: true, documents: stats.totalDocuments };
    } catch (error) {
      logger.warn("Health check: database unreachable", { error: getErrorMessage(error) });
      database = { ok: false, error: "unreachable" };
    }

    const llmHealth = await checkLLMReachable(llm);
    const status = database.ok ? (llmHealth.reachable ? "ok" : "degraded") : "unavailable";

    res.status(database.ok ? 200 : 503).json({
      status,
      service: SERVICE_NAME,
      database,
      llm: {
        reachable: llmHealth.reachable,
        model: llmHealth.model,
        modelAvailable: llmHealth.modelAvailable,
      },
    });
  });

  app.get("/api/debug/search", validate({ query: querySchemas.debugSearch }), async (req, res) => {
    try {
      const { query, agency, limit } = querySchemas.debugSearch.parse(req.query);
      const fullTextIndex = await store.hasFullTextIndex();

      if (agency) {
        const documents = await store.filterByAgency(agency, limit);
        res.json({
          query,
          agencyFilter: agency,
          strategy: "agency",
          fullTextIndex,
          resultsCount: documents.length,
          sampleTitles: documents.map(doc => doc.title),
        });
        return;
      }

      const { documents, strategy } = await store.search(query, limit);
      res.json({
        query,
        agencyFilter: null,
        strategy,
        fullTextIndex,
        resultsCount: documents.length,
        sampleTitles: documents.map(doc => doc.title),
      });
    } catch (error) {
      handleRouteError(res, error, "Debug Search");
    }
  });

  app.get("/api/debug/database-info", async (_req, res) => {
    try {
      const [stats, samples, fullTextIndex] = await Promise.all([
        store.getStats(),
        store.getSampleDocuments(SAMPLE_SIZE),
        store.hasFullTextIndex(),
      ]);
      res.json({
        totalDocuments: stats.totalDocuments,
        latestPublicationDate: stats.latestPublicationDate,
        totalAgencyEntries: stats.totalAgencyEntries,
        fullTextIndex,
        recentSamples: samples,
      });
    } catch (error) {
      handleRouteError(res, error, "Database Info");
    }
  });

  app.use("/api", (req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });

  // Errors passed to next(), including validation and rate limit rejections
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    handleRouteError(res, err, "Routes");
  });

  return createServer(app);
}
