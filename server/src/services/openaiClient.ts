import OpenAI from "openai";

import type { AppConfig } from "./env.js";

/**
 * Built once per process and handed to the responder. Without an API key there
 * is no client, and chat queries fall back to the static reply.
 */
export function createOpenAIClient(config: AppConfig): OpenAI | null {
  if (!config.openaiApiKey) {
    return null;
  }

  return new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl
  });
}
