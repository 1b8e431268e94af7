/**
 * Lifecycle hooks: declarative side effects run around mode changes and
 * runtime start/stop.
 *
 * A batch for one hook type runs sequentially in descending priority
 * (stable for equal priorities). Each hook's `on_failure` decides whether a
 * failure stops the batch (`abort`) or is recorded and skipped (`ignore`).
 */

import { z } from "zod";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { HOOK_HANDLERS, type HookEnvironment } from "./handlers.js";

export const HOOK_TYPES = ["on_entry", "on_exit", "on_startup", "on_shutdown", "on_timeout"] as const;
export type LifecycleHookType = (typeof HOOK_TYPES)[number];

export type HookContext = Record<string, unknown>;

export interface LifecycleHook {
  hookType: LifecycleHookType;
  /** "message" | "command" | "function" | "action"; anything else fails at run time. */
  handlerType: string;
  handlerConfig: Record<string, unknown>;
  asyncExecution: boolean;
  /** Seconds; null runs without a time limit. */
  timeoutSeconds: number | null;
  onFailure: "ignore" | "abort";
  priority: number;
}

export const DEFAULT_HOOK_TIMEOUT_SECONDS = 5;

export const rawHookSchema = z.object({
  hook_type: z.enum(HOOK_TYPES),
  handler_type: z.string().min(1),
  handler_config: z.record(z.unknown()).default({}),
  async_execution: z.boolean().default(true),
  timeout_seconds: z.number().positive().nullable().default(DEFAULT_HOOK_TIMEOUT_SECONDS),
  on_failure: z.enum(["ignore", "abort"]).default("ignore"),
  priority: z.number().default(0),
});

export type RawLifecycleHook = z.input<typeof rawHookSchema>;

/** One record per valid entry; malformed entries are logged and skipped. */
export function parseLifecycleHooks(raw: unknown): LifecycleHook[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    Logger.warn("[Hooks] lifecycle_hooks must be a list; ignoring");
    return [];
  }
  const hooks: LifecycleHook[] = [];
  raw.forEach((entry: unknown, i: number) => {
    const parsed = rawHookSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      Logger.warn(`[Hooks] skipping hook #${i}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`);
      return;
    }
    const h = parsed.data;
    hooks.push({
      hookType: h.hook_type,
      handlerType: h.handler_type,
      handlerConfig: h.handler_config,
      asyncExecution: h.async_execution,
      timeoutSeconds: h.timeout_seconds,
      onFailure: h.on_failure,
      priority: h.priority,
    });
  });
  return hooks;
}

class HookTimeoutError extends Error {
  constructor(seconds: number) {
    super(`timed out after ${seconds}s`);
    this.name = "HookTimeoutError";
  }
}

async function runHook(hook: LifecycleHook, context: HookContext, env: HookEnvironment): Promise<boolean> {
  const handlerType = hook.handlerType.toLowerCase();
  const handler = Object.hasOwn(HOOK_HANDLERS, handlerType) ? HOOK_HANDLERS[handlerType] : undefined;
  if (!handler) {
    Logger.error(`[Hooks] unknown handler type '${hook.handlerType}'`);
    return false;
  }

  const controller = new AbortController();
  const work = handler(hook, context, env, controller.signal);
  if (!hook.asyncExecution || hook.timeoutSeconds === null) return work;

  const seconds = hook.timeoutSeconds;
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new HookTimeoutError(seconds));
    }, seconds * 1000);
  });
  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
    work.catch((e: unknown) => {
      Logger.debug(`[Hooks] ${hook.handlerType} hook settled after timeout: ${asError(e).message}`);
    });
  }
}

/**
 * Run every hook of `type`. Returns true only if every executed hook
 * succeeded; an `abort` hook's failure returns false immediately.
 */
export async function executeLifecycleHooks(
  hooks: readonly LifecycleHook[],
  type: LifecycleHookType,
  context: HookContext,
  env: HookEnvironment,
): Promise<boolean> {
  const batch = hooks
    .filter((h) => h.hookType === type)
    .map((hook, index) => ({ hook, index }))
    .sort((a, b) => b.hook.priority - a.hook.priority || a.index - b.index)
    .map((e) => e.hook);
  if (batch.length === 0) return true;

  const ctx: HookContext = { ...context, hook_type: type };
  let allOk = true;

  for (const hook of batch) {
    let ok: boolean;
    try {
      ok = await runHook(hook, ctx, env);
    } catch (e: unknown) {
      Logger.error(`[Hooks] ${type} ${hook.handlerType} hook failed: ${asError(e).message}`);
      ok = false;
    }
    if (ok) continue;

    allOk = false;
    if (hook.onFailure === "abort") {
      Logger.error(`[Hooks] ${type} ${hook.handlerType} hook failed; aborting remaining ${type} hooks`);
      return false;
    }
    Logger.warn(`[Hooks] ${type} ${hook.handlerType} hook failed; continuing`);
  }
  return allOk;
}
