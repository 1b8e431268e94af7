import { z } from "zod";
import type { MessageBus } from "../../bus/message-bus.js";
import type { CortexAction } from "../../cortex-types.js";
import type { Simulator } from "../base.js";

export const actionRecorderSchema = z.object({
  topic: z.string().min(1).default("cortex/actions"),
  max_batches: z.number().int().positive().default(20),
});

export type ActionRecorderConfig = z.infer<typeof actionRecorderSchema>;

export interface RecordedBatch {
  mode: string;
  timestamp: number;
  actions: CortexAction[];
}

/** Keeps the most recent action batches and publishes each one. */
export class ActionRecorder implements Simulator {
  readonly name = "ActionRecorder";
  private batches: RecordedBatch[] = [];

  constructor(
    private readonly config: ActionRecorderConfig,
    private readonly mode: string,
    private readonly bus: MessageBus,
  ) {}

  sim(actions: CortexAction[]): void {
    const batch: RecordedBatch = { mode: this.mode, timestamp: Date.now(), actions };
    this.batches.push(batch);
    if (this.batches.length > this.config.max_batches) {
      this.batches = this.batches.slice(-this.config.max_batches);
    }
    this.bus.publish(this.config.topic, JSON.stringify(batch));
  }

  get recorded(): readonly RecordedBatch[] {
    return this.batches;
  }

  stop(): void {
    this.batches = [];
  }
}
