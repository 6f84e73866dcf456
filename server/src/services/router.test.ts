import { describe, expect, it, vi } from "vitest";

import { createSilentLogger, inboundRequest } from "../testing/fakes.js";
import type { AiResponder } from "./llm.js";
import { routeRequest } from "./router.js";
import { SPEECH } from "./speech.js";

function createResponder(text = "Comets are icy bodies that grow tails near the Sun.") {
  const respond = vi.fn<AiResponder["respond"]>(async () => text);
  return { responder: { respond }, respond };
}

describe("routeRequest", () => {
  it("greets on launch and keeps the session open with a reprompt", async () => {
    const { responder } = createResponder();

    const response = await routeRequest(inboundRequest(), {
      responder,
      log: createSilentLogger()
    });

    expect(response).toEqual({
      version: "1.0",
      response: {
        outputSpeech: { type: "PlainText", text: SPEECH.launch },
        reprompt: { outputSpeech: { type: "PlainText", text: SPEECH.launchReprompt } },
        shouldEndSession: false
      }
    });
  });

  it("answers session end with an empty body", async () => {
    const { responder } = createResponder();

    const response = await routeRequest(
      inboundRequest({ kind: "session-ended", requestType: "SessionEndedRequest" }),
      { responder, log: createSilentLogger() }
    );

    expect(response).toEqual({ version: "1.0", response: {} });
  });

  it("reports an unknown request type and logs it", async () => {
    const { responder } = createResponder();
    const log = createSilentLogger();
    const errorSpy = vi.spyOn(log, "error");

    const response = await routeRequest(
      inboundRequest({ kind: "unknown", requestType: "Display.ElementSelected" }),
      { responder, log }
    );

    expect(response).toEqual({
      version: "1.0",
      response: {
        outputSpeech: { type: "PlainText", text: "Unknown request type" },
        shouldEndSession: false
      }
    });
    expect(errorSpy).toHaveBeenCalledWith(
      {
        reason: "unknown_request_type",
        requestType: "Display.ElementSelected",
        intentName: undefined
      },
      "Could not handle voice request"
    );
  });

  it("passes the chat query and user to the responder", async () => {
    const { responder, respond } = createResponder();
    const log = createSilentLogger();

    const response = await routeRequest(
      inboundRequest({
        kind: "intent",
        requestType: "IntentRequest",
        intentName: "ChatIntent",
        slots: { query: "what is a comet" },
        userId: "user-1"
      }),
      { responder, log }
    );

    expect(respond).toHaveBeenCalledWith({ query: "what is a comet", userId: "user-1", log });
    expect(response).toEqual({
      version: "1.0",
      response: {
        outputSpeech: {
          type: "PlainText",
          text: "Comets are icy bodies that grow tails near the Sun."
        },
        shouldEndSession: false
      }
    });
  });

  it.each<Record<string, string>>([{}, { query: "" }, { query: "   " }])(
    "asks the user to repeat when the query slot is %j",
    async (slots) => {
      const { responder, respond } = createResponder();

      const response = await routeRequest(
        inboundRequest({
          kind: "intent",
          requestType: "IntentRequest",
          intentName: "ChatIntent",
          slots
        }),
        { responder, log: createSilentLogger() }
      );

      expect(respond).not.toHaveBeenCalled();
      expect(response).toEqual({
        version: "1.0",
        response: {
          outputSpeech: { type: "PlainText", text: SPEECH.repeat },
          shouldEndSession: false
        }
      });
    }
  );

  it("gives help and keeps the session open", async () => {
    const { responder } = createResponder();

    const response = await routeRequest(
      inboundRequest({ kind: "intent", requestType: "IntentRequest", intentName: "AMAZON.HelpIntent" }),
      { responder, log: createSilentLogger() }
    );

    expect(response).toEqual({
      version: "1.0",
      response: {
        outputSpeech: { type: "PlainText", text: SPEECH.help },
        shouldEndSession: false
      }
    });
  });

  it.each(["AMAZON.StopIntent", "AMAZON.CancelIntent"])("ends the session on %s", async (intentName) => {
    const { responder } = createResponder();

    const response = await routeRequest(
      inboundRequest({ kind: "intent", requestType: "IntentRequest", intentName }),
      { responder, log: createSilentLogger() }
    );

    expect(response).toEqual({
      version: "1.0",
      response: {
        outputSpeech: { type: "PlainText", text: "Goodbye!" },
        shouldEndSession: true
      }
    });
  });

  it.each(["AMAZON.FallbackIntent", "amazon.stopintent", undefined])(
    "does not understand intent %s",
    async (intentName) => {
      const { responder, respond } = createResponder();

      const response = await routeRequest(
        inboundRequest({ kind: "intent", requestType: "IntentRequest", intentName }),
        { responder, log: createSilentLogger() }
      );

      expect(respond).not.toHaveBeenCalled();
      expect(response).toEqual({
        version: "1.0",
        response: {
          outputSpeech: { type: "PlainText", text: "I didn't understand that request." },
          shouldEndSession: false
        }
      });
    }
  );
});
