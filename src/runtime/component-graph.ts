/**
 * Builds the live component graph of one mode activation from its
 * manifests. Every activation gets fresh instances.
 */

import { Logger } from "../logger.js";
import { cortexError } from "../errors.js";
import { inputRegistry } from "../inputs/registry.js";
import { actionRegistry } from "../actions/registry.js";
import { simulatorRegistry } from "../simulators/registry.js";
import { backgroundRegistry } from "../backgrounds/registry.js";
import { llmRegistry } from "../llm/registry.js";
import { InputOrchestrator } from "../inputs/orchestrator.js";
import { ActionOrchestrator } from "../actions/orchestrator.js";
import { SimulatorOrchestrator } from "../simulators/orchestrator.js";
import { BackgroundOrchestrator } from "../backgrounds/orchestrator.js";
import { Fuser } from "./fuser.js";
import type { CortexLLM } from "../llm/base.js";
import type { ComponentConfig, PluginContext } from "../cortex-types.js";
import type { ModeDefinition, ModeSystemConfig } from "../modes/config.js";

export interface ModeGraph {
  mode: ModeDefinition;
  inputs: InputOrchestrator;
  actions: ActionOrchestrator;
  simulators: SimulatorOrchestrator;
  backgrounds: BackgroundOrchestrator;
  llm: CortexLLM;
  fuser: Fuser;
}

/** Manifest config plus the system metadata; the manifest wins except for `mode`. */
export function addMeta(config: Record<string, unknown>, system: ModeSystemConfig, mode: string): ComponentConfig {
  const meta: Record<string, unknown> = { URID: system.URID };
  if (system.apiKey) meta.api_key = system.apiKey;
  if (system.robotIp) meta.robot_ip = system.robotIp;
  return { ...meta, ...config, mode };
}

export function buildModeGraph(mode: ModeDefinition, system: ModeSystemConfig, ctx: PluginContext): ModeGraph {
  Logger.info(`[Cortex] loading components for mode: ${mode.name}`);
  const meta = (config: Record<string, unknown>) => addMeta(config, system, mode.name);

  const inputs = mode.inputs.map((m) => inputRegistry.create(m.type, meta(m.config), ctx));
  const actions = mode.actions.map((m) => {
    const config: ComponentConfig = { ...meta(m.config), exclude_from_prompt: m.excludeFromPrompt };
    if (m.connector) config.connector = m.connector;
    if (m.llmLabel) config.llm_label = m.llmLabel;
    return actionRegistry.create(m.name, config, ctx);
  });
  const simulators = mode.simulators.map((m) => simulatorRegistry.create(m.type, meta(m.config), ctx));
  const backgrounds = mode.backgrounds.map((m) => backgroundRegistry.create(m.type, meta(m.config), ctx));

  const llmManifest = mode.llm ?? system.globalLlm;
  if (!llmManifest) {
    throw cortexError("config_error", `No LLM configured for mode '${mode.name}'`, { mode: mode.name });
  }
  const llm = llmRegistry.create(llmManifest.type, meta(llmManifest.config), ctx);

  Logger.info(
    `[Cortex] mode '${mode.name}': ${inputs.length} input(s), ${actions.length} action(s), ${simulators.length} simulator(s), ${backgrounds.length} background(s), llm ${llm.name}`,
  );
  return {
    mode,
    inputs: new InputOrchestrator(inputs),
    actions: new ActionOrchestrator(actions),
    simulators: new SimulatorOrchestrator(simulators),
    backgrounds: new BackgroundOrchestrator(backgrounds),
    llm,
    fuser: new Fuser({
      systemPromptBase: mode.systemPromptBase,
      systemGovernance: system.systemGovernance,
      systemPromptExamples: system.systemPromptExamples,
    }),
  };
}
