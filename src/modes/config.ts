/**
 * Mode system model: modes, transition rules and the global settings that
 * every mode's components share.
 *
 * Modes carry component *manifests*, never instances; the runtime builds
 * fresh instances on every activation (see runtime/component-graph.ts).
 */

import { cortexError } from "../errors.js";
import { Logger } from "../logger.js";
import {
  executeLifecycleHooks,
  parseLifecycleHooks,
  type HookContext,
  type LifecycleHook,
  type LifecycleHookType,
} from "../lifecycle/hook.js";
import type { HookEnvironment } from "../lifecycle/handlers.js";
import type { McpServerConfig } from "../mcp/client.js";
import type { TtsSettings } from "../providers/tts-provider.js";
import type { ParsedModeSystemConfig, TRANSITION_KINDS } from "./schema.js";

export type TransitionKind = (typeof TRANSITION_KINDS)[number];

export interface TransitionRule {
  /** Mode name or "*" for any mode. */
  fromMode: string;
  toMode: string;
  kind: TransitionKind;
  triggerKeywords: string[];
  /** Higher wins. */
  priority: number;
  cooldownSeconds: number;
  /** For time_based rules: seconds in the mode before the rule is due. Falls back to the mode's timeout. */
  timeoutSeconds: number | null;
  contextConditions: Record<string, unknown>;
}

export interface ComponentManifest {
  type: string;
  config: Record<string, unknown>;
}

export interface ActionManifest {
  name: string;
  llmLabel?: string;
  connector?: string;
  excludeFromPrompt: boolean;
  config: Record<string, unknown>;
}

export interface ModeDefinition {
  name: string;
  displayName: string;
  description: string;
  systemPromptBase: string;
  hertz: number;
  timeoutSeconds: number | null;
  rememberLocations: boolean;
  saveInteractions: boolean;
  lifecycleHooks: LifecycleHook[];
  inputs: ComponentManifest[];
  actions: ActionManifest[];
  simulators: ComponentManifest[];
  backgrounds: ComponentManifest[];
  llm: ComponentManifest | null;
}

export interface ModeSystemConfig {
  name: string;
  configName: string;
  defaultMode: string;
  allowManualSwitching: boolean;
  modeMemoryEnabled: boolean;
  modes: Record<string, ModeDefinition>;
  transitionRules: TransitionRule[];
  globalLifecycleHooks: LifecycleHook[];
  apiKey: string;
  robotIp: string;
  URID: string;
  systemGovernance: string;
  systemPromptExamples: string;
  globalLlm: ComponentManifest | null;
  tts?: TtsSettings;
  mcpServers: Record<string, McpServerConfig>;
}

export function hasMode(config: ModeSystemConfig, name: string): boolean {
  return Object.hasOwn(config.modes, name);
}

export function getMode(config: ModeSystemConfig, name: string): ModeDefinition {
  const mode = hasMode(config, name) ? config.modes[name] : undefined;
  if (!mode) throw cortexError("config_error", `Unknown mode '${name}'`, { mode: name });
  return mode;
}

/** Build the model from a schema-validated document and check cross references. */
export function buildModeSystemConfig(doc: ParsedModeSystemConfig, configName: string): ModeSystemConfig {
  const modes: Record<string, ModeDefinition> = {};
  for (const [name, m] of Object.entries(doc.modes)) {
    modes[name] = {
      name,
      displayName: m.display_name ?? name,
      description: m.description,
      systemPromptBase: m.system_prompt_base,
      hertz: m.hertz,
      timeoutSeconds: m.timeout_seconds ?? null,
      rememberLocations: m.remember_locations,
      saveInteractions: m.save_interactions,
      lifecycleHooks: parseLifecycleHooks(m.lifecycle_hooks),
      inputs: m.agent_inputs,
      actions: m.agent_actions.map((a) => ({
        name: a.name,
        llmLabel: a.llm_label,
        connector: a.connector,
        excludeFromPrompt: a.exclude_from_prompt,
        config: a.config,
      })),
      simulators: m.simulators,
      backgrounds: m.backgrounds,
      llm: m.cortex_llm ?? null,
    };
  }

  const config: ModeSystemConfig = {
    name: doc.name,
    configName,
    defaultMode: doc.default_mode,
    allowManualSwitching: doc.allow_manual_switching,
    modeMemoryEnabled: doc.mode_memory_enabled,
    modes,
    transitionRules: doc.transition_rules.map((r) => ({
      fromMode: r.from_mode,
      toMode: r.to_mode,
      kind: r.transition_type,
      triggerKeywords: r.trigger_keywords,
      priority: r.priority,
      cooldownSeconds: r.cooldown_seconds,
      timeoutSeconds: r.timeout_seconds ?? null,
      contextConditions: r.context_conditions,
    })),
    globalLifecycleHooks: parseLifecycleHooks(doc.global_lifecycle_hooks),
    apiKey: doc.api_key,
    robotIp: doc.robot_ip,
    URID: doc.URID,
    systemGovernance: doc.system_governance,
    systemPromptExamples: doc.system_prompt_examples,
    globalLlm: doc.cortex_llm ?? null,
    tts: doc.tts,
    mcpServers: doc.mcp_servers,
  };

  validateModeSystemConfig(config);
  return config;
}

export function validateModeSystemConfig(config: ModeSystemConfig): void {
  if (!hasMode(config, config.defaultMode)) {
    throw cortexError("config_error", `Default mode '${config.defaultMode}' not found in modes`);
  }
  for (const rule of config.transitionRules) {
    if (!hasMode(config, rule.toMode)) {
      throw cortexError("config_error", `Transition rule ${rule.fromMode}->${rule.toMode}: unknown target mode`);
    }
  }
  for (const mode of Object.values(config.modes)) {
    if (!mode.llm && !config.globalLlm) {
      throw cortexError("config_error", `No LLM configured for mode '${mode.name}'`, { mode: mode.name });
    }
  }
}

/** Run a mode's hooks of one type with the mode's identity added to the context. */
export async function executeModeHooks(
  mode: ModeDefinition,
  type: LifecycleHookType,
  context: HookContext,
  env: HookEnvironment,
): Promise<boolean> {
  const ctx: HookContext = {
    ...context,
    mode_name: mode.name,
    mode_display_name: mode.displayName,
    mode_description: mode.description,
  };
  const ok = await executeLifecycleHooks(mode.lifecycleHooks, type, ctx, env);
  if (!ok) Logger.warn(`[Hooks] some ${type} hooks of mode '${mode.name}' failed`);
  return ok;
}

export async function executeGlobalHooks(
  config: ModeSystemConfig,
  type: LifecycleHookType,
  context: HookContext,
  env: HookEnvironment,
): Promise<boolean> {
  const ctx: HookContext = { ...context, system_name: config.name, is_global_hook: true };
  const ok = await executeLifecycleHooks(config.globalLifecycleHooks, type, ctx, env);
  if (!ok) Logger.warn(`[Hooks] some global ${type} hooks failed`);
  return ok;
}
