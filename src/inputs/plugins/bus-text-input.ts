/**
 * BusTextInput: buffers recognised speech (or any text) published on a
 * bus topic. Payloads are either plain text or JSON `{ "text": ... }`.
 *
 * With `mode_transition` set, each message is also queued for the mode
 * manager's keyword rules and the ticker is asked to run the next tick
 * without sleeping.
 */

import { z } from "zod";
import { Logger } from "../../logger.js";
import { waitForAbort } from "../../utils/retry.js";
import type { MessageBus, Unsubscribe } from "../../bus/message-bus.js";
import type { IOProvider } from "../../providers/io-provider.js";
import type { SleepTicker } from "../../providers/sleep-ticker.js";
import { formatInputBlock, type BufferedMessage, type Sensor } from "../base.js";

export const busTextInputSchema = z.object({
  topic: z.string().min(1).default("speech/text"),
  descriptor: z.string().default("Voice"),
  mode_transition: z.boolean().default(false),
  max_buffer: z.number().int().positive().default(10),
});

export type BusTextInputConfig = z.infer<typeof busTextInputSchema>;

const textPayload = z.object({ text: z.string() });

export function extractText(payload: string): string {
  const trimmed = payload.trim();
  if (trimmed.startsWith("{")) {
    try {
      const parsed = textPayload.safeParse(JSON.parse(trimmed));
      if (parsed.success) return parsed.data.text.trim();
    } catch {
      // not JSON, use the raw text
    }
  }
  return trimmed;
}

export class BusTextInput implements Sensor {
  readonly name = "BusTextInput";
  private messages: BufferedMessage[] = [];
  private unsubscribe: Unsubscribe | null = null;

  constructor(
    private readonly config: BusTextInputConfig,
    private readonly bus: MessageBus,
    private readonly io: IOProvider,
    private readonly ticker: SleepTicker,
  ) {}

  async listen(signal: AbortSignal): Promise<void> {
    this.unsubscribe = this.bus.subscribe(this.config.topic, (payload) => this.onMessage(payload));
    Logger.debug(`[Inputs] ${this.name} listening on ${this.config.topic}`);
    try {
      await waitForAbort(signal);
    } finally {
      this.stop();
    }
  }

  private onMessage(payload: string): void {
    const text = extractText(payload);
    if (!text) return;
    const timestamp = Date.now();
    this.messages.push({ timestamp, text });
    if (this.messages.length > this.config.max_buffer) this.messages.shift();
    this.io.recordInput(this.name, text, timestamp);
    if (this.config.mode_transition) {
      this.io.addModeTransitionInput(text);
      this.ticker.requestSkip();
    }
  }

  formattedLatestBuffer(): string | null {
    if (this.messages.length === 0) return null;
    const text = this.messages.map((m) => m.text).join(" ");
    this.messages = [];
    return formatInputBlock(this.config.descriptor, text);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
