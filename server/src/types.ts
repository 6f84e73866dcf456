export type RequestKind = "launch" | "intent" | "session-ended" | "unknown";

export type InboundRequest = {
  kind: RequestKind;
  requestType: string;
  intentName?: string;
  slots: Readonly<Record<string, string>>;
  userId: string;
  sessionId?: string;
  requestId?: string;
};

export type OutputSpeech = {
  type: "PlainText";
  text: string;
};

export type SpeechResponseBody = {
  outputSpeech: OutputSpeech;
  reprompt?: {
    outputSpeech: OutputSpeech;
  };
  shouldEndSession: boolean;
};

export type OutboundResponse = {
  version: "1.0";
  response: SpeechResponseBody | Record<string, never>;
};

export type Result<T, F> = { ok: true; value: T } | { ok: false; failure: F };

export type TransportFailure = {
  kind: "transport";
  statusCode: 400 | 405;
  error: string;
};

export type SemanticFailure = {
  kind: "semantic";
  reason: "unknown_request_type" | "unknown_intent" | "missing_slot";
  message: string;
};

export type DependencyFailure = {
  kind: "dependency";
  reason:
    | "missing_credentials"
    | "timeout"
    | "network_error"
    | "api_error"
    | "malformed_response"
    | "unexpected";
  detail: string;
};
