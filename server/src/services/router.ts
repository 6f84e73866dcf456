import type { FastifyBaseLogger } from "fastify";

import type { InboundRequest, OutboundResponse, Result, SemanticFailure } from "../types.js";
import type { AiResponder } from "./llm.js";
import { SPEECH, emptyResponse, speechResponse } from "./speech.js";

export const INTENTS = {
  chat: "ChatIntent",
  help: "AMAZON.HelpIntent",
  cancel: "AMAZON.CancelIntent",
  stop: "AMAZON.StopIntent"
} as const;

export const QUERY_SLOT = "query";

type RouteContext = {
  responder: AiResponder;
  log: FastifyBaseLogger;
};

type HandlerResult = Result<OutboundResponse, SemanticFailure>;

/**
 * Dispatches on request kind, then on intent name. Semantic failures become
 * explanatory speech with the session left open.
 */
export async function routeRequest(
  request: InboundRequest,
  context: RouteContext
): Promise<OutboundResponse> {
  const result = await dispatch(request, context);
  if (result.ok) {
    return result.value;
  }

  context.log.error(
    {
      reason: result.failure.reason,
      requestType: request.requestType,
      intentName: request.intentName
    },
    "Could not handle voice request"
  );

  return speechResponse(result.failure.message);
}

async function dispatch(request: InboundRequest, context: RouteContext): Promise<HandlerResult> {
  switch (request.kind) {
    case "launch":
      return handled(speechResponse(SPEECH.launch, { reprompt: SPEECH.launchReprompt }));
    case "intent":
      return dispatchIntent(request, context);
    case "session-ended":
      return handled(emptyResponse());
    case "unknown":
      return semanticFailure("unknown_request_type", SPEECH.unknownRequestType);
  }
}

async function dispatchIntent(
  request: InboundRequest,
  context: RouteContext
): Promise<HandlerResult> {
  switch (request.intentName) {
    case INTENTS.chat:
      return handleChat(request, context);
    case INTENTS.help:
      return handled(speechResponse(SPEECH.help));
    case INTENTS.cancel:
    case INTENTS.stop:
      return handled(speechResponse(SPEECH.goodbye, { shouldEndSession: true }));
    default:
      return semanticFailure("unknown_intent", SPEECH.unknownIntent);
  }
}

async function handleChat(request: InboundRequest, context: RouteContext): Promise<HandlerResult> {
  const query = request.slots[QUERY_SLOT]?.trim() ?? "";
  if (!query) {
    return semanticFailure("missing_slot", SPEECH.repeat);
  }

  const text = await context.responder.respond({
    query,
    userId: request.userId,
    log: context.log
  });

  return handled(speechResponse(text));
}

function handled(response: OutboundResponse): HandlerResult {
  return { ok: true, value: response };
}

function semanticFailure(reason: SemanticFailure["reason"], message: string): HandlerResult {
  return { ok: false, failure: { kind: "semantic", reason, message } };
}
