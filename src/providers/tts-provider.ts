/**
 * Text-to-speech provider.
 *
 * Messages are queued by message hooks and speak actions and drained one
 * at a time into a sink: an HTTP speech service or a bus topic that the
 * robot's speech process listens on.
 */

import { Logger } from "../logger.js";
import { asError, cortexError, errorLogFields } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import { MAX_RETRIES, isRetryable, retryDelay, sleep } from "../utils/retry.js";
import type { MessageBus } from "../bus/message-bus.js";

export interface TextToSpeech {
  addPendingMessage(text: string): void;
}

export type TtsSink = (text: string) => Promise<void>;

export interface TtsSettings {
  sink: "http" | "bus" | "log";
  url?: string;
  topic?: string;
  voice_id?: string;
  timeout_ms?: number;
}

export const DEFAULT_TTS_TOPIC = "speech/pending";

export class TtsProvider implements TextToSpeech {
  private queue: string[] = [];
  private running = false;
  private draining: Promise<void> | null = null;

  constructor(private readonly sink: TtsSink, readonly label = "tts") {}

  start(): void {
    if (this.running) {
      Logger.warn(`[TTS] ${this.label} already started`);
      return;
    }
    this.running = true;
    this.kick();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.draining) await this.draining;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  addPendingMessage(text: string): void {
    const trimmed = text.trim();
    if (!trimmed) return;
    this.queue.push(trimmed);
    this.kick();
  }

  /** Resolves once every message queued so far has been handed to the sink. */
  async flush(): Promise<void> {
    while (this.draining) await this.draining;
  }

  private kick(): void {
    if (!this.running || this.draining || this.queue.length === 0) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      this.kick();
    });
  }

  private async drain(): Promise<void> {
    while (this.running && this.queue.length > 0) {
      const text = this.queue.shift();
      if (text === undefined) break;
      try {
        await this.sink(text);
      } catch (e: unknown) {
        const ce = cortexError("provider_error", `TTS ${this.label} failed: ${asError(e).message}`, {
          plugin: this.label,
          cause: e,
        });
        Logger.error("[TTS] message dropped:", errorLogFields(ce));
      }
    }
  }
}

export function httpTtsSink(url: string, opts: { voiceId?: string; timeoutMs?: number } = {}): TtsSink {
  return async (text: string) => {
    for (let attempt = 0; ; attempt++) {
      const res = await timedFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text, voice_id: opts.voiceId ?? null }),
        timeoutMs: opts.timeoutMs ?? 10_000,
        where: "tts",
      });
      if (res.ok) return;
      if (isRetryable(res.status) && attempt < MAX_RETRIES) {
        await sleep(retryDelay(attempt));
        continue;
      }
      throw new Error(`TTS service responded ${res.status}`);
    }
  };
}

export function busTtsSink(bus: MessageBus, topic = DEFAULT_TTS_TOPIC, voiceId?: string): TtsSink {
  return async (text: string) => {
    bus.publish(topic, JSON.stringify({ text, voice_id: voiceId ?? null }));
  };
}

export function createTtsProvider(settings: TtsSettings | undefined, bus: MessageBus): TtsProvider {
  const s: TtsSettings = settings ?? { sink: "bus" };
  switch (s.sink) {
    case "http":
      if (!s.url) {
        throw cortexError("config_error", "tts.url is required for the http sink");
      }
      return new TtsProvider(httpTtsSink(s.url, { voiceId: s.voice_id, timeoutMs: s.timeout_ms }), "http");
    case "log":
      return new TtsProvider(async (text) => { Logger.info(`[TTS] ${text}`); }, "log");
    case "bus":
    default:
      return new TtsProvider(busTtsSink(bus, s.topic, s.voice_id), "bus");
  }
}
