import "dotenv/config";
import { loadAppConfig } from "./config/appConfig";
import { createDb } from "./db";
import { DbDocumentStore } from "./storage";
import { VocabularyCache } from "./vocabulary/vocabularyCache";
import { RegulatoryAssistant } from "./assistant/assistantHandler";
import { createLLMClient } from "./llm/client";
import { createApp } from "./app";
import { createLogger, setLogLevel } from "./utils/logger";

const logger = createLogger("Server");

function main(): void {
  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  const store = new DbDocumentStore(createDb(config.databaseUrl));
  const vocabulary = new VocabularyCache(store, config.vocabularyTtlMs);
  const assistant = new RegulatoryAssistant({ store, vocabulary });
  const llm = createLLMClient(config.llm);

  const server = createApp({ assistant, store, llm });
  server.listen(config.port, () => {
    logger.info(`Listening on port ${config.port} (${config.nodeEnv})`, {
      llm: config.llm.baseUrl,
      model: config.llm.model,
    });
  });
}

try {
  main();
} catch (error) {
  logger.error("Startup failed", error);
  process.exit(1);
}
