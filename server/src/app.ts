import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";

import { healthRoutes } from "./routes/health.js";
import { skillRoutes } from "./routes/skill.js";
import type { AiResponder } from "./services/llm.js";
import { apologyResponse } from "./services/speech.js";

type BuildAppOptions = {
  responder: AiResponder;
  model: string;
  responderConfigured: boolean;
  logger?: FastifyServerOptions["logger"];
};

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? true
  });

  // Body parsing errors (including unsupported media types) answer 400; anything
  // else is still answered with speech, since the platform only plays back 200
  // responses.
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      request.log.error({ err: error }, "Rejected unreadable request body");
      return reply.code(400).send({ error: "Invalid request body" });
    }

    request.log.error({ err: error }, "Failed to process voice request");
    return reply.code(200).send(apologyResponse());
  });

  await app.register(healthRoutes, {
    model: options.model,
    responderConfigured: options.responderConfigured
  });
  await app.register(skillRoutes, { responder: options.responder });

  return app;
}
