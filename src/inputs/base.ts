/**
 * Sensor contract and a polling base class.
 *
 * A sensor's `listen` runs until its signal fires and then rejects with an
 * AbortError; the fuser reads whatever it buffered through
 * `formattedLatestBuffer`, which also clears it.
 */

import { sleep } from "../utils/retry.js";
import type { IOProvider } from "../providers/io-provider.js";

export interface Sensor {
  readonly name: string;
  listen(signal: AbortSignal): Promise<void>;
  formattedLatestBuffer(): string | null;
  stop(): void | Promise<void>;
}

export function formatInputBlock(descriptor: string, text: string): string {
  return `INPUT: ${descriptor}\n// START\n${text}\n// END`;
}

export interface BufferedMessage {
  timestamp: number;
  text: string;
}

/**
 * Base for sensors that sample something on an interval. Subclasses
 * implement `poll` (raw reading or null) and `toText`.
 */
export abstract class PollingSensor<R> implements Sensor {
  protected messages: BufferedMessage[] = [];

  constructor(
    readonly name: string,
    protected readonly descriptor: string,
    protected readonly io: IOProvider,
    protected readonly pollIntervalMs: number,
    protected readonly maxBuffer = 10,
  ) {}

  protected abstract poll(): Promise<R | null>;
  protected abstract toText(raw: R): string | null;

  async listen(signal: AbortSignal): Promise<void> {
    for (;;) {
      const raw = await this.poll();
      if (raw !== null) {
        const text = this.toText(raw);
        if (text) this.push(text);
      }
      await sleep(this.pollIntervalMs, signal);
    }
  }

  protected push(text: string, timestamp = Date.now()): void {
    this.messages.push({ timestamp, text });
    if (this.messages.length > this.maxBuffer) this.messages.shift();
    this.io.recordInput(this.name, text, timestamp);
  }

  formattedLatestBuffer(): string | null {
    const latest = this.messages[this.messages.length - 1];
    if (!latest) return null;
    this.messages = [];
    return formatInputBlock(this.descriptor, latest.text);
  }

  stop(): void {
    this.messages = [];
  }
}
