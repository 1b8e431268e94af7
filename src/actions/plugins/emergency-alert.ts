import { Logger } from "../../logger.js";
import { defineAction, type ActionConnector } from "../base.js";
import type { TextToSpeech } from "../../providers/tts-provider.js";
import type { CortexAction } from "../../cortex-types.js";

export class TtsAlertConnector implements ActionConnector {
  constructor(private readonly tts: TextToSpeech) {}

  async connect(action: CortexAction): Promise<string> {
    Logger.warn(`[Alert] ${action.value}`);
    this.tts.addPendingMessage(`Attention. ${action.value}`);
    return `alerted: ${action.value}`;
  }
}

export const emergencyAlertAction = defineAction({
  name: "emergency_alert",
  description: "Announce an emergency",
  schema: {
    description: "Raise an audible emergency alert describing the situation.",
    properties: {
      message: { type: "string", description: "What is happening and what people should do" },
    },
    required: ["message"],
  },
  connectors: {
    tts: (_config, ctx) => new TtsAlertConnector(ctx.tts),
  },
  defaultConnector: "tts",
});
