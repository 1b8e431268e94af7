/**
 * Hook handlers. Each resolves true on success and false on failure;
 * throwing counts as failure too.
 */

import { spawn } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { formatTemplate } from "../utils/template.js";
import { actionRegistry } from "../actions/registry.js";
import { actionValue } from "../llm/function-schemas.js";
import type { AgentAction } from "../actions/base.js";
import type { CortexAction, PluginContext } from "../cortex-types.js";
import type { TextToSpeech } from "../providers/tts-provider.js";
import type { HookContext, LifecycleHook } from "./hook.js";

export interface HookEnvironment {
  tts?: TextToSpeech;
  /** Directory `function` hooks are loaded from. */
  hooksDir: string;
  /** Needed by `action` hooks to build their action. */
  pluginContext?: PluginContext;
}

export type HookHandler = (
  hook: LifecycleHook,
  context: HookContext,
  env: HookEnvironment,
  signal: AbortSignal,
) => Promise<boolean>;

export const DEFAULT_HOOKS_DIR = fileURLToPath(new URL("../hooks/", import.meta.url));

const MAX_OUTPUT = 4_000;

function truncate(s: string): string {
  return s.length <= MAX_OUTPUT ? s : `${s.slice(0, MAX_OUTPUT)}... (truncated ${s.length - MAX_OUTPUT} chars)`;
}

function configString(hook: LifecycleHook, key: string): string | undefined {
  const v = hook.handlerConfig[key];
  return typeof v === "string" ? v : undefined;
}

// ---------------------------------------------------------------------------
// message
// ---------------------------------------------------------------------------

export const messageHandler: HookHandler = async (hook, context, env) => {
  const template = configString(hook, "message") ?? "";
  if (!template) return true;
  const text = formatTemplate(template, context);
  Logger.info(`[Hooks] ${text}`);
  if (!env.tts) {
    Logger.warn("[Hooks] message hook has no text-to-speech provider");
    return false;
  }
  env.tts.addPendingMessage(text);
  return true;
};

// ---------------------------------------------------------------------------
// command
// ---------------------------------------------------------------------------

export interface ShellResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export function runShell(command: string, signal?: AbortSignal): Promise<ShellResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, { shell: true, signal, stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf-8").on("data", (d: string) => { stdout += d; });
    child.stderr.setEncoding("utf-8").on("data", (d: string) => { stderr += d; });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });
}

export const commandHandler: HookHandler = async (hook, context, _env, signal) => {
  const template = configString(hook, "command");
  if (!template) {
    Logger.error("[Hooks] command hook has no command");
    return false;
  }
  const command = formatTemplate(template, context);
  Logger.debug(`[Hooks] running: ${command}`);
  const { code, stdout, stderr } = await runShell(command, signal);
  if (code === 0) {
    if (stdout.trim()) Logger.info(`[Hooks] ${truncate(stdout.trim())}`);
    return true;
  }
  Logger.error(`[Hooks] command exited ${code ?? "by signal"}: ${truncate(stderr.trim())}`);
  return false;
};

// ---------------------------------------------------------------------------
// function
// ---------------------------------------------------------------------------

const MODULE_EXTENSIONS = [".js", ".mjs", ".ts"];
const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Locate `<hooksDir>/<moduleName>.{js,mjs,ts}`; names with path segments are refused. */
export function resolveHookModule(hooksDir: string, moduleName: string): string | null {
  if (!moduleName || moduleName.includes("/") || moduleName.includes("\\") || moduleName.includes("..")) {
    return null;
  }
  const candidates = MODULE_EXTENSIONS.some((ext) => moduleName.endsWith(ext))
    ? [moduleName]
    : MODULE_EXTENSIONS.map((ext) => `${moduleName}${ext}`);
  for (const file of candidates) {
    const full = join(hooksDir, file);
    if (existsSync(full)) return full;
  }
  return null;
}

export function declaresFunction(source: string, name: string): boolean {
  const n = escapeRegExp(name);
  return new RegExp(`export\\s+(async\\s+)?function\\s*\\*?\\s*${n}\\s*\\(`).test(source)
    || new RegExp(`export\\s+const\\s+${n}\\s*=`).test(source);
}

export const functionHandler: HookHandler = async (hook, context, env) => {
  const moduleName = configString(hook, "module_name");
  const fnName = configString(hook, "function");
  if (!moduleName || !fnName || !IDENTIFIER_RE.test(fnName)) {
    Logger.error("[Hooks] function hook needs module_name and a valid function name");
    return false;
  }
  const file = resolveHookModule(env.hooksDir, moduleName);
  if (!file) {
    Logger.error(`[Hooks] hook module '${moduleName}' not found in ${env.hooksDir}`);
    return false;
  }
  if (!declaresFunction(readFileSync(file, "utf-8"), fnName)) {
    Logger.error(`[Hooks] ${moduleName} does not export function '${fnName}'`);
    return false;
  }

  const mod: Record<string, unknown> = await import(pathToFileURL(file).href);
  const fn = mod[fnName];
  if (typeof fn !== "function") {
    Logger.error(`[Hooks] ${moduleName}.${fnName} is not a function`);
    return false;
  }
  const args: HookContext = env.tts ? { ...context, tts: env.tts } : context;
  const result: unknown = await fn(args);
  return result !== false;
};

// ---------------------------------------------------------------------------
// action
// ---------------------------------------------------------------------------

function toAction(agentAction: AgentAction, input: unknown): CortexAction {
  if (typeof input === "object" && input !== null && !Array.isArray(input)) {
    const args: Record<string, unknown> = { ...input };
    return { type: agentAction.llmLabel, value: actionValue(args), args };
  }
  const value = input === undefined || input === null ? "" : String(input);
  return { type: agentAction.llmLabel, value, args: { text: value } };
}

export const actionHandler: HookHandler = async (hook, context, env) => {
  const actionType = configString(hook, "action_type");
  if (!actionType) {
    Logger.error("[Hooks] action hook has no action_type");
    return false;
  }
  if (!env.pluginContext) {
    Logger.error("[Hooks] action hook needs a plugin context");
    return false;
  }

  // one instance per run, stopped afterwards
  const raw = hook.handlerConfig.action_config;
  const actionConfig: Record<string, unknown> = typeof raw === "object" && raw !== null ? { ...raw } : {};
  const mode = typeof context.mode_name === "string" ? context.mode_name : "";
  const agentAction = actionRegistry.create(actionType, { ...actionConfig, mode }, env.pluginContext);

  try {
    await agentAction.connector.connect(toAction(agentAction, context.input_data));
    return true;
  } catch (e: unknown) {
    Logger.error(`[Hooks] action ${actionType} failed: ${asError(e).message}`);
    return false;
  } finally {
    try {
      await agentAction.connector.stop?.();
    } catch (e: unknown) {
      Logger.warn(`[Hooks] action ${actionType} stop failed: ${asError(e).message}`);
    }
  }
};

export const HOOK_HANDLERS: Record<string, HookHandler> = {
  message: messageHandler,
  command: commandHandler,
  function: functionHandler,
  action: actionHandler,
};
