/**
 * OpenAI-style function tools from agent actions, and the reverse: tool
 * calls back into cortex actions.
 */

import { z } from "zod";
import { Logger } from "../logger.js";
import type { AgentAction, ParameterSchema } from "../actions/base.js";
import type { CortexAction } from "../cortex-types.js";

export interface FunctionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: {
      type: "object";
      properties: Record<string, ParameterSchema>;
      required: string[];
      additionalProperties: false;
    };
    strict: true;
  };
}

export interface ToolCall {
  id?: string;
  function: { name: string; arguments: string };
}

export function buildFunctionSchemas(actions: AgentAction[]): FunctionTool[] {
  return actions
    .filter((a) => !a.excludeFromPrompt)
    .map((a): FunctionTool => ({
      type: "function",
      function: {
        name: a.llmLabel,
        description: a.schema.description,
        parameters: {
          type: "object",
          properties: a.schema.properties,
          // strict mode wants every property listed
          required: a.schema.required ?? Object.keys(a.schema.properties),
          additionalProperties: false,
        },
        strict: true,
      },
    }));
}

const VALUE_KEYS = ["text", "message", "value", "command"] as const;

function stringify(v: unknown): string {
  return typeof v === "string" ? v : JSON.stringify(v);
}

/** The primary argument of a call: `action`, then the usual text keys, then whatever comes first. */
export function actionValue(args: Record<string, unknown>): string {
  if (typeof args.action === "string") return args.action;
  for (const key of VALUE_KEYS) {
    if (args[key] !== undefined) return stringify(args[key]);
  }
  const first = Object.values(args)[0];
  return first === undefined ? "" : stringify(first);
}

const argsSchema = z.record(z.unknown());

export function parseToolArguments(raw: string): Record<string, unknown> | null {
  try {
    const parsed = argsSchema.safeParse(JSON.parse(raw || "{}"));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Calls whose arguments do not parse to an object are logged and skipped. */
export function toolCallsToActions(calls: ToolCall[]): CortexAction[] {
  const actions: CortexAction[] = [];
  for (const call of calls) {
    const args = parseToolArguments(call.function.arguments);
    if (!args) {
      Logger.warn(`[LLM] skipping ${call.function.name}: unparseable arguments ${call.function.arguments}`);
      continue;
    }
    actions.push({ type: call.function.name, value: actionValue(args), args });
  }
  return actions;
}
