/**
 * Agent actions: what the LLM may do, and the connector that does it.
 *
 * An action plugin declares its LLM-facing schema once and offers one or
 * more connectors (e.g. `speak` via `tts` or `log`); the manifest picks the
 * connector and may relabel the action for the prompt.
 */

import { z } from "zod";
import { cortexError } from "../errors.js";
import { parsePluginConfig, type PluginDescriptor, type PluginFactory } from "../plugins/registry.js";
import type { CortexAction } from "../cortex-types.js";

export interface ParameterSchema {
  type: "string" | "number" | "integer" | "boolean";
  description?: string;
  enum?: string[];
}

export interface ActionSchema {
  description: string;
  properties: Record<string, ParameterSchema>;
  required?: string[];
}

export interface ActionConnector {
  /** Carry out one action. The resolved string, if any, is reported back to the LLM. */
  connect(action: CortexAction): Promise<string | void>;
  /** Periodic work while the mode is active (e.g. polling hardware state). */
  tick?(): Promise<void>;
  tickIntervalMs?: number;
  stop?(): void | Promise<void>;
}

export interface AgentAction {
  /** Plugin name, e.g. "speak". */
  name: string;
  /** Name the LLM sees and uses in tool calls. */
  llmLabel: string;
  schema: ActionSchema;
  connector: ActionConnector;
  excludeFromPrompt: boolean;
}

export interface ActionDefinition {
  name: string;
  description: string;
  schema: ActionSchema;
  connectors: Record<string, PluginFactory<ActionConnector>>;
  defaultConnector: string;
}

const actionFieldsSchema = z
  .object({
    connector: z.string().optional(),
    llm_label: z.string().min(1).optional(),
    exclude_from_prompt: z.boolean().default(false),
  })
  .passthrough();

/** Turn an action definition into a registry descriptor. */
export function defineAction(def: ActionDefinition): PluginDescriptor<AgentAction> {
  return {
    type: def.name,
    description: def.description,
    factory: (config, ctx) => {
      const fields = parsePluginConfig(def.name, actionFieldsSchema, config);
      const connectorName = fields.connector ?? def.defaultConnector;
      const make = Object.hasOwn(def.connectors, connectorName) ? def.connectors[connectorName] : undefined;
      if (!make) {
        throw cortexError(
          "plugin_error",
          `Action '${def.name}' has no connector '${connectorName}'. Available: ${Object.keys(def.connectors).join(", ")}`,
          { plugin: def.name, mode: config.mode },
        );
      }
      return {
        name: def.name,
        llmLabel: fields.llm_label ?? def.name,
        schema: def.schema,
        connector: make(config, ctx),
        excludeFromPrompt: fields.exclude_from_prompt,
      };
    },
  };
}
