import { z } from "zod";

const blankAsUndefined = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const schema = z.object({
  OPENAI_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(
    blankAsUndefined,
    z.string().url("OPENAI_BASE_URL must be a valid URL").optional()
  ),
  OPENAI_LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(150),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info")
});

export type LogLevel = z.infer<typeof schema>["LOG_LEVEL"];

export type AppConfig = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  llmModel: string;
  llmMaxTokens: number;
  llmTemperature: number;
  llmTimeoutMs: number;
  host: string;
  port: number;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    openaiBaseUrl: parsed.data.OPENAI_BASE_URL,
    llmModel: parsed.data.OPENAI_LLM_MODEL,
    llmMaxTokens: parsed.data.LLM_MAX_TOKENS,
    llmTemperature: parsed.data.LLM_TEMPERATURE,
    llmTimeoutMs: parsed.data.LLM_TIMEOUT_MS,
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL
  };
}
