/**
 * zod schemas for the mode configuration document (`config/<name>.json`).
 */

import { z } from "zod";

export const TRANSITION_KINDS = ["input_triggered", "time_based", "context_aware", "manual"] as const;

export const componentManifestSchema = z.object({
  type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});

export const actionManifestSchema = z.object({
  name: z.string().min(1),
  llm_label: z.string().min(1).optional(),
  connector: z.string().min(1).optional(),
  exclude_from_prompt: z.boolean().default(false),
  config: z.record(z.unknown()).default({}),
});

export const modeSchema = z.object({
  display_name: z.string().optional(),
  description: z.string().default(""),
  system_prompt_base: z.string().default(""),
  hertz: z.number().positive().default(1),
  timeout_seconds: z.number().positive().nullable().optional(),
  remember_locations: z.boolean().default(false),
  save_interactions: z.boolean().default(false),
  // entries are validated one by one so a bad hook is skipped, not fatal
  lifecycle_hooks: z.unknown().optional(),
  agent_inputs: z.array(componentManifestSchema).default([]),
  agent_actions: z.array(actionManifestSchema).default([]),
  simulators: z.array(componentManifestSchema).default([]),
  backgrounds: z.array(componentManifestSchema).default([]),
  cortex_llm: componentManifestSchema.optional(),
});

export const transitionRuleSchema = z.object({
  from_mode: z.string().min(1),
  to_mode: z.string().min(1),
  transition_type: z.enum(TRANSITION_KINDS),
  trigger_keywords: z.array(z.string()).default([]),
  priority: z.number().default(1),
  cooldown_seconds: z.number().nonnegative().default(0),
  timeout_seconds: z.number().positive().nullable().optional(),
  context_conditions: z.record(z.unknown()).default({}),
});

export const mcpServerSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
  timeout: z.number().int().positive().optional(),
});

export const ttsSettingsSchema = z.object({
  sink: z.enum(["http", "bus", "log"]).default("bus"),
  url: z.string().url().optional(),
  topic: z.string().min(1).optional(),
  voice_id: z.string().optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export const modeSystemSchema = z.object({
  name: z.string().default("mode_system"),
  default_mode: z.string().min(1),
  allow_manual_switching: z.boolean().default(true),
  mode_memory_enabled: z.boolean().default(true),
  api_key: z.string().default(""),
  robot_ip: z.string().default(""),
  URID: z.string().default("default"),
  system_governance: z.string().default(""),
  system_prompt_examples: z.string().default(""),
  cortex_llm: componentManifestSchema.optional(),
  tts: ttsSettingsSchema.optional(),
  mcp_servers: z.record(mcpServerSchema).default({}),
  modes: z.record(modeSchema),
  transition_rules: z.array(transitionRuleSchema).default([]),
  global_lifecycle_hooks: z.unknown().optional(),
});

export type RawModeSystemConfig = z.input<typeof modeSystemSchema>;
export type ParsedModeSystemConfig = z.infer<typeof modeSystemSchema>;
