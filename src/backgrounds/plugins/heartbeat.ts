import { z } from "zod";
import { sleep } from "../../utils/retry.js";
import type { MessageBus } from "../../bus/message-bus.js";
import type { Background } from "../base.js";

export const heartbeatSchema = z.object({
  topic: z.string().min(1).default("cortex/heartbeat"),
  interval_ms: z.number().int().positive().default(5_000),
  URID: z.string().optional(),
});

export type HeartbeatConfig = z.infer<typeof heartbeatSchema>;

/** Publishes `{ urid, mode, seq, timestamp }` on an interval. */
export class Heartbeat implements Background {
  readonly name = "Heartbeat";
  private seq = 0;

  constructor(
    private readonly config: HeartbeatConfig,
    private readonly mode: string,
    private readonly bus: MessageBus,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    for (;;) {
      this.beat();
      await sleep(this.config.interval_ms, signal);
    }
  }

  beat(): void {
    this.bus.publish(
      this.config.topic,
      JSON.stringify({ urid: this.config.URID ?? null, mode: this.mode, seq: this.seq++, timestamp: Date.now() }),
    );
  }
}
