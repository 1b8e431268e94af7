/**
 * Register all built-in plugins.
 * Import this module once during startup to populate the registries.
 */

import { parsePluginConfig } from "./registry.js";
import { inputRegistry } from "../inputs/registry.js";
import { actionRegistry } from "../actions/registry.js";
import { simulatorRegistry } from "../simulators/registry.js";
import { backgroundRegistry } from "../backgrounds/registry.js";
import { llmRegistry } from "../llm/registry.js";
import { BusTextInput, busTextInputSchema } from "../inputs/plugins/bus-text-input.js";
import { ClockInput, clockInputSchema } from "../inputs/plugins/clock-input.js";
import { speakAction } from "../actions/plugins/speak.js";
import { moveAction } from "../actions/plugins/move.js";
import { emergencyAlertAction } from "../actions/plugins/emergency-alert.js";
import { mcpToolAction } from "../actions/plugins/mcp-tool.js";
import { LogSimulator } from "../simulators/plugins/log-simulator.js";
import { ActionRecorder, actionRecorderSchema } from "../simulators/plugins/action-recorder.js";
import { Heartbeat, heartbeatSchema } from "../backgrounds/plugins/heartbeat.js";
import { OpenAILLM, openAiLlmSchema } from "../llm/plugins/openai-llm.js";
import { EchoLLM, echoLlmSchema } from "../llm/plugins/echo-llm.js";

// --- Inputs ---
inputRegistry.register({
  type: "BusTextInput",
  description: "Text (e.g. recognised speech) from a bus topic; can feed mode keyword rules.",
  factory: (config, ctx) =>
    new BusTextInput(parsePluginConfig("BusTextInput", busTextInputSchema, config), ctx.bus, ctx.io, ctx.ticker),
});

inputRegistry.register({
  type: "ClockInput",
  description: "Current local time.",
  factory: (config, ctx) => new ClockInput(parsePluginConfig("ClockInput", clockInputSchema, config), ctx.io),
});

// --- Actions ---
actionRegistry.register(speakAction);
actionRegistry.register(moveAction);
actionRegistry.register(emergencyAlertAction);
actionRegistry.register(mcpToolAction);

// --- Simulators ---
simulatorRegistry.register({
  type: "LogSimulator",
  description: "Logs every action batch.",
  factory: (config) => new LogSimulator(config.mode),
});

simulatorRegistry.register({
  type: "ActionRecorder",
  description: "Keeps recent action batches and publishes them on a topic.",
  factory: (config, ctx) =>
    new ActionRecorder(parsePluginConfig("ActionRecorder", actionRecorderSchema, config), config.mode, ctx.bus),
});

// --- Backgrounds ---
backgroundRegistry.register({
  type: "Heartbeat",
  description: "Publishes a status heartbeat on an interval.",
  factory: (config, ctx) => new Heartbeat(parsePluginConfig("Heartbeat", heartbeatSchema, config), config.mode, ctx.bus),
});

// --- LLMs ---
llmRegistry.register({
  type: "OpenAILLM",
  description: "OpenAI-compatible chat completions with function calling.",
  factory: (config) => new OpenAILLM(parsePluginConfig("OpenAILLM", openAiLlmSchema, config)),
});

llmRegistry.register({
  type: "EchoLLM",
  description: "Offline backend that repeats the latest input through one action.",
  factory: (config) => new EchoLLM(parsePluginConfig("EchoLLM", echoLlmSchema, config)),
});
