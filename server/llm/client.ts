import { OpenAI } from "openai";
import type { LLMConfig } from "../config/appConfig";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError, getErrorMessage } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";

const logger = createLogger("LLM Client");

/**
 * Handle on the OpenAI-compatible endpoint (Ollama by default). Answers are
 * never generated by the model; the handle exists for health reporting.
 */
export type LLMClient = {
  client: OpenAI;
  model: string;
  baseUrl: string;
};

export type LLMHealth = {
  reachable: boolean;
  model: string;
  modelAvailable: boolean;
  error?: string;
};

export function createLLMClient(config: LLMConfig): LLMClient {
  const client = new OpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
  return { client, model: config.model, baseUrl: config.baseUrl };
}

/**
 * List the models the endpoint serves.
 *
 * @throws ExternalServiceError when the endpoint cannot be reached
 */
export async function listModels(llm: LLMClient, timeoutMs: number = TIMEOUT_CONSTANTS.LLM_PROBE_MS): Promise<string[]> {
  try {
    const page = await llm.client.models.list({ timeout: timeoutMs });
    return page.data.map(model => model.id);
  } catch (error) {
    throw new ExternalServiceError("LLM", getErrorMessage(error));
  }
}

export async function checkLLMReachable(llm: LLMClient, timeoutMs: number = TIMEOUT_CONSTANTS.LLM_PROBE_MS): Promise<LLMHealth> {
  try {
    const models = await listModels(llm, timeoutMs);
    return { reachable: true, model: llm.model, modelAvailable: models.includes(llm.model) };
  } catch (error) {
    logger.warn(`Endpoint ${llm.baseUrl} unreachable`, { error: getErrorMessage(error) });
    return { reachable: false, model: llm.model, modelAvailable: false, error: getErrorMessage(error) };
  }
}
