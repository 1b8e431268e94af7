import { z } from "zod";
import type { AgentAction } from "../../actions/base.js";
import type { CortexOutput } from "../../cortex-types.js";
import type { CortexLLM } from "../base.js";

export const echoLlmSchema = z.object({
  action: z.string().min(1).default("speak"),
  prefix: z.string().default(""),
});

export type EchoLlmConfig = z.infer<typeof echoLlmSchema>;

const INPUT_BLOCK_RE = /\/\/ START\n([\s\S]*?)\n\/\/ END/g;

/**
 * Offline backend: repeats the last input block through one action.
 * Useful for wiring checks on a robot without network access.
 */
export class EchoLLM implements CortexLLM {
  readonly name = "EchoLLM";

  constructor(private readonly config: EchoLlmConfig) {}

  async ask(prompt: string, actions: AgentAction[]): Promise<CortexOutput | null> {
    const blocks = [...prompt.matchAll(INPUT_BLOCK_RE)];
    const last = blocks[blocks.length - 1]?.[1]?.trim();
    if (!last) return null;
    const wanted = this.config.action.toLowerCase();
    const target = actions.find((a) => a.llmLabel.toLowerCase() === wanted);
    if (!target) return null;
    const value = `${this.config.prefix}${last}`;
    return { actions: [{ type: target.llmLabel, value, args: { text: value } }] };
  }
}
