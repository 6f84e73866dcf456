import type { OutboundResponse, OutputSpeech } from "../types.js";

export const MAX_SPEECH_LENGTH = 8000;
const TRUNCATED_SPEECH_LENGTH = 7900;

export const SPEECH = {
  launch: "Hello! I'm your AI assistant. How can I help you today?",
  launchReprompt: "What would you like me to help you with?",
  help: "I'm your AI assistant. You can ask me questions, get information, or have a conversation. Just say what you need help with!",
  goodbye: "Goodbye!",
  unknownRequestType: "Unknown request type",
  unknownIntent: "I didn't understand that request.",
  repeat: "I didn't catch what you said. Could you repeat that?",
  fallback:
    "I'm having trouble connecting to my knowledge base right now. Please try again in a moment.",
  apology: "Sorry, I encountered an error. Please try again."
} as const;

type SpeechOptions = {
  reprompt?: string;
  shouldEndSession?: boolean;
};

export function speechResponse(text: string, options: SpeechOptions = {}): OutboundResponse {
  const outputSpeech = plainText(text);
  const shouldEndSession = options.shouldEndSession ?? false;

  if (options.reprompt === undefined) {
    return {
      version: "1.0",
      response: { outputSpeech, shouldEndSession }
    };
  }

  return {
    version: "1.0",
    response: {
      outputSpeech,
      reprompt: { outputSpeech: plainText(options.reprompt) },
      shouldEndSession
    }
  };
}

export function emptyResponse(): OutboundResponse {
  return {
    version: "1.0",
    response: {}
  };
}

export function apologyResponse(): OutboundResponse {
  return speechResponse(SPEECH.apology, { shouldEndSession: true });
}

export function truncateSpeech(text: string): string {
  if (text.length <= MAX_SPEECH_LENGTH) {
    return text;
  }

  return `${text.slice(0, TRUNCATED_SPEECH_LENGTH)}...`;
}

function plainText(text: string): OutputSpeech {
  return {
    type: "PlainText",
    text
  };
}
