import dotenv from "dotenv";

import { buildApp } from "./app.js";
import { loadConfig } from "./services/env.js";
import { createAiResponder } from "./services/llm.js";
import { createOpenAIClient } from "./services/openaiClient.js";

dotenv.config();

const config = loadConfig();
const client = createOpenAIClient(config);

const responder = createAiResponder({
  client,
  model: config.llmModel,
  maxTokens: config.llmMaxTokens,
  temperature: config.llmTemperature,
  timeoutMs: config.llmTimeoutMs
});

const app = await buildApp({
  responder,
  model: config.llmModel,
  responderConfigured: client !== null,
  logger: { level: config.logLevel }
});

if (!client) {
  app.log.warn("OPENAI_API_KEY is not set; chat queries will get the fallback reply");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error(error);
        process.exit(1);
      }
    );
  });
}

try {
  await app.listen({
    host: config.host,
    port: config.port
  });

  app.log.info(`Voice skill bridge ready at http://${config.host}:${config.port}`);
} catch (error) {
  app.log.error(error);
  process.exit(1);
}
