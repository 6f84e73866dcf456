import { z } from "zod";

import type { InboundRequest, RequestKind, Result, TransportFailure } from "../types.js";

const UNKNOWN_USER_ID = "unknown";

const REQUEST_KINDS = new Map<string, RequestKind>([
  ["LaunchRequest", "launch"],
  ["IntentRequest", "intent"],
  ["SessionEndedRequest", "session-ended"]
]);

// Only `request` is mandatory; every other malformed part is read as absent.
const optionalString = z.string().optional().catch(undefined);

const slotSchema = z
  .object({ value: z.string() })
  .optional()
  .catch(undefined);

const intentSchema = z
  .object({
    name: optionalString,
    slots: z.record(slotSchema).optional().catch(undefined)
  })
  .optional()
  .catch(undefined);

const sessionSchema = z
  .object({
    sessionId: optionalString,
    user: z
      .object({ userId: optionalString })
      .optional()
      .catch(undefined)
  })
  .optional()
  .catch(undefined);

const envelopeSchema = z.object({
  request: z
    .object({
      type: optionalString,
      requestId: optionalString,
      intent: intentSchema
    })
    .passthrough()
    .refine((request) => Object.keys(request).length > 0),
  session: sessionSchema
});

export function parseEnvelope(body: unknown): Result<InboundRequest, TransportFailure> {
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      failure: { kind: "transport", statusCode: 400, error: "Invalid Alexa request" }
    };
  }

  const { request, session } = parsed.data;
  const requestType = request.type ?? "";
  const slots = Object.fromEntries(
    Object.entries(request.intent?.slots ?? {}).flatMap(([name, slot]) =>
      slot ? [[name, slot.value] as const] : []
    )
  );

  return {
    ok: true,
    value: {
      kind: REQUEST_KINDS.get(requestType) ?? "unknown",
      requestType,
      intentName: request.intent?.name,
      slots,
      userId: session?.user?.userId ?? UNKNOWN_USER_ID,
      sessionId: session?.sessionId,
      requestId: request.requestId
    }
  };
}
