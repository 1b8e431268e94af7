import { PluginRegistry } from "../plugins/registry.js";
import type { Background } from "./base.js";

export const backgroundRegistry = new PluginRegistry<Background>("background");
