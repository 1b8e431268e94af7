/**
 * Fuser: assembles the LLM prompt for one tick from the mode's prompt
 * text, the inputs' latest buffers and the results of recent actions.
 */

import type { Sensor } from "../inputs/base.js";
import type { AgentAction } from "../actions/base.js";
import type { ActionResult } from "../actions/orchestrator.js";

export interface FuserSettings {
  systemPromptBase: string;
  systemGovernance: string;
  systemPromptExamples: string;
}

function describeResult(r: ActionResult): string {
  const call = `${r.action.type}(${r.action.value})`;
  if (!r.ok) return `- ${call}: failed: ${r.error ?? "unknown error"}`;
  return r.output ? `- ${call}: ${r.output}` : `- ${call}: done`;
}

export class Fuser {
  constructor(private readonly settings: FuserSettings) {}

  /**
   * Null when no input produced anything and no action finished since the
   * last tick. Reading an input's buffer clears it.
   */
  fuse(inputs: readonly Sensor[], results: readonly ActionResult[], actions: readonly AgentAction[]): string | null {
    const blocks: string[] = [];
    for (const input of inputs) {
      const block = input.formattedLatestBuffer();
      if (block) blocks.push(block);
    }
    if (blocks.length === 0 && results.length === 0) return null;

    const sections: string[] = [];
    const { systemPromptBase, systemGovernance, systemPromptExamples } = this.settings;
    if (systemPromptBase.trim()) sections.push(systemPromptBase.trim());
    if (systemGovernance.trim()) sections.push(`LAWS:\n${systemGovernance.trim()}`);
    if (systemPromptExamples.trim()) sections.push(`EXAMPLES:\n${systemPromptExamples.trim()}`);
    if (blocks.length > 0) sections.push(`INPUTS:\n${blocks.join("\n")}`);
    if (results.length > 0) sections.push(`RECENT ACTIONS:\n${results.map(describeResult).join("\n")}`);

    const visible = actions.filter((a) => !a.excludeFromPrompt);
    if (visible.length > 0) {
      sections.push(`AVAILABLE ACTIONS:\n${visible.map((a) => `- ${a.llmLabel}: ${a.schema.description}`).join("\n")}`);
    }
    sections.push("What will you do next? Respond with actions.");
    return sections.join("\n\n");
  }
}
