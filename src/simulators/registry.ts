import { PluginRegistry } from "../plugins/registry.js";
import type { Simulator } from "./base.js";

export const simulatorRegistry = new PluginRegistry<Simulator>("simulator");
