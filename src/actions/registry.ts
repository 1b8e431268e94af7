import { PluginRegistry } from "../plugins/registry.js";
import type { AgentAction } from "./base.js";

export const actionRegistry = new PluginRegistry<AgentAction>("action");
