import { PluginRegistry } from "../plugins/registry.js";
import type { Sensor } from "./base.js";

export const inputRegistry = new PluginRegistry<Sensor>("input");
