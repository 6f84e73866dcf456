import type { FastifyBaseLogger } from "fastify";
import OpenAI from "openai";

import type { DependencyFailure, Result } from "../types.js";
import { SPEECH, truncateSpeech } from "./speech.js";

/** The slice of the OpenAI client the responder calls. */
export type CompletionClient = {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number; maxRetries?: number }
      ): Promise<OpenAI.ChatCompletion>;
    };
  };
};

export type AiResponderOptions = {
  client: CompletionClient | null;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
};

type RespondParams = {
  query: string;
  userId: string;
  log: FastifyBaseLogger;
};

export type AiResponder = {
  /** Resolves to speakable text. Failures resolve to the fallback sentence. */
  respond(params: RespondParams): Promise<string>;
};

export const SYSTEM_PROMPT = [
  "You are a helpful AI assistant that people talk to through a voice assistant.",
  "Keep replies concise and conversational, two or three sentences at most.",
  "Speak naturally, as if talking to someone in person.",
  "Avoid lists, markdown and any other formatting; when several items matter, say them in a sentence.",
  "Be helpful and friendly.",
  "Do not use phrases like \"Here's what I found\"; just give the information."
].join(" ");

export function createAiResponder(options: AiResponderOptions): AiResponder {
  return {
    async respond({ query, userId, log }) {
      const result = await requestCompletion(options, query);
      if (!result.ok) {
        log.error(
          { reason: result.failure.reason, detail: result.failure.detail, userId },
          "Completion request failed, answering with fallback"
        );
        return SPEECH.fallback;
      }

      return truncateSpeech(result.value);
    }
  };
}

async function requestCompletion(
  options: AiResponderOptions,
  query: string
): Promise<Result<string, DependencyFailure>> {
  if (!options.client) {
    return dependencyFailure("missing_credentials", "OPENAI_API_KEY is not configured");
  }

  let completion: OpenAI.ChatCompletion;
  try {
    completion = await options.client.chat.completions.create(
      {
        model: options.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: query }
        ],
        max_tokens: options.maxTokens,
        temperature: options.temperature
      },
      { timeout: options.timeoutMs, maxRetries: 0 }
    );
  } catch (error) {
    return { ok: false, failure: classifyError(error) };
  }

  // Gateways behind OPENAI_BASE_URL do not always honour the schema.
  const text = completion.choices?.[0]?.message?.content?.trim() ?? "";
  if (!text) {
    return dependencyFailure("malformed_response", "Completion returned no content");
  }

  return { ok: true, value: text };
}

function classifyError(error: unknown): DependencyFailure {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { kind: "dependency", reason: "timeout", detail: error.message };
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return { kind: "dependency", reason: "network_error", detail: error.message };
  }

  if (error instanceof OpenAI.APIError) {
    return {
      kind: "dependency",
      reason: "api_error",
      detail: `${error.status ?? "no status"}: ${error.message}`
    };
  }

  return {
    kind: "dependency",
    reason: "unexpected",
    detail: error instanceof Error ? error.message : "Unknown error"
  };
}

function dependencyFailure(
  reason: DependencyFailure["reason"],
  detail: string
): Result<string, DependencyFailure> {
  return { ok: false, failure: { kind: "dependency", reason, detail } };
}
