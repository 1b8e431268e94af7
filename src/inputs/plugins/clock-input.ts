import { z } from "zod";
import { PollingSensor } from "../base.js";
import type { IOProvider } from "../../providers/io-provider.js";

export const clockInputSchema = z.object({
  poll_interval_ms: z.number().int().positive().default(60_000),
  descriptor: z.string().default("Current time"),
  locale: z.string().default("en-US"),
});

export type ClockInputConfig = z.infer<typeof clockInputSchema>;

/** Reports the local wall-clock time so the LLM can reason about it. */
export class ClockInput extends PollingSensor<Date> {
  constructor(
    private readonly config: ClockInputConfig,
    io: IOProvider,
    private readonly now: () => Date = () => new Date(),
  ) {
    super("ClockInput", config.descriptor, io, config.poll_interval_ms);
  }

  protected async poll(): Promise<Date> {
    return this.now();
  }

  protected toText(raw: Date): string {
    const when = raw.toLocaleString(this.config.locale, {
      weekday: "long",
      hour: "2-digit",
      minute: "2-digit",
    });
    return `It is ${when}.`;
  }
}
