/**
 * Shared types for the modecortex runtime and its plugins.
 */

import type { MessageBus } from "./bus/message-bus.js";
import type { IOProvider } from "./providers/io-provider.js";
import type { SleepTicker } from "./providers/sleep-ticker.js";
import type { TextToSpeech } from "./providers/tts-provider.js";
import type { McpServerConfig } from "./mcp/client.js";

/** One action chosen by the reasoning backend. */
export interface CortexAction {
  /** The action's LLM label (e.g. "speak", "move"). */
  type: string;
  /** Primary argument, e.g. the sentence to say or the move to make. */
  value: string;
  /** Full argument object as produced by the LLM. */
  args: Record<string, unknown>;
}

export interface CortexOutput {
  actions: CortexAction[];
}

/** Metadata injected into every component manifest's config. */
export interface ComponentMeta {
  api_key?: string;
  robot_ip?: string;
  URID?: string;
  mode: string;
}

/** Free-form plugin configuration, after metadata injection. */
export type ComponentConfig = Record<string, unknown> & ComponentMeta;

/**
 * Collaborators a plugin may use. Owned by the runtime and shared by every
 * component it instantiates; plugins never construct these themselves.
 */
export interface PluginContext {
  bus: MessageBus;
  io: IOProvider;
  ticker: SleepTicker;
  tts: TextToSpeech;
  mcpServers: Record<string, McpServerConfig>;
}
