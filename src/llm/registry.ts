import { PluginRegistry } from "../plugins/registry.js";
import type { CortexLLM } from "./base.js";

export const llmRegistry = new PluginRegistry<CortexLLM>("llm");
