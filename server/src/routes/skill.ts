import type { FastifyPluginAsync } from "fastify";

import { parseEnvelope } from "../services/envelope.js";
import type { AiResponder } from "../services/llm.js";
import { routeRequest } from "../services/router.js";

type SkillRoutesOptions = {
  responder: AiResponder;
};

export const SKILL_PATH = "/api/alexa";

export const skillRoutes: FastifyPluginAsync<SkillRoutesOptions> = async (app, options) => {
  app.all(SKILL_PATH, async (request, reply) => {
    if (request.method !== "POST") {
      request.log.error({ method: request.method }, "Rejected voice request method");
      return reply.code(405).send({ error: "Method not allowed" });
    }

    const envelope = parseEnvelope(request.body);
    if (!envelope.ok) {
      request.log.error({ reason: envelope.failure.error }, "Rejected voice request envelope");
      return reply.code(envelope.failure.statusCode).send({ error: envelope.failure.error });
    }

    const log = request.log.child({
      requestType: envelope.value.requestType,
      intentName: envelope.value.intentName,
      platformRequestId: envelope.value.requestId
    });

    const response = await routeRequest(envelope.value, {
      responder: options.responder,
      log
    });

    reply.header("cache-control", "no-store");
    return reply.send(response);
  });
};
