import { Logger } from "../../logger.js";
import { defineAction, type ActionConnector } from "../base.js";
import type { TextToSpeech } from "../../providers/tts-provider.js";

export class TtsSpeakConnector implements ActionConnector {
  constructor(private readonly tts: TextToSpeech) {}

  async connect(action: { value: string }): Promise<string> {
    this.tts.addPendingMessage(action.value);
    return `said: ${action.value}`;
  }
}

export class LogSpeakConnector implements ActionConnector {
  async connect(action: { value: string }): Promise<string> {
    Logger.info(`[Speak] ${action.value}`);
    return `said: ${action.value}`;
  }
}

export const speakAction = defineAction({
  name: "speak",
  description: "Say a sentence out loud",
  schema: {
    description: "Say something to the people around you. Keep it short and conversational.",
    properties: {
      text: { type: "string", description: "The sentence to say" },
    },
    required: ["text"],
  },
  connectors: {
    tts: (_config, ctx) => new TtsSpeakConnector(ctx.tts),
    log: () => new LogSpeakConnector(),
  },
  defaultConnector: "tts",
});
