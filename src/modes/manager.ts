/**
 * ModeManager: owns the active mode and decides when to leave it.
 *
 * Every evaluation and transition (tick-driven, programmatic or from the
 * wire) runs through one SerialQueue, so transitions never interleave.
 * Transition callbacks run inside that queue: a callback must not wait on
 * another manager call or it deadlocks.
 */

import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { SerialQueue } from "../utils/serial-queue.js";
import type { HookEnvironment } from "../lifecycle/handlers.js";
import type { HookContext } from "../lifecycle/hook.js";
import {
  executeGlobalHooks,
  executeModeHooks,
  getMode,
  hasMode,
  type ModeDefinition,
  type ModeSystemConfig,
  type TransitionRule,
} from "./config.js";
import type { ModeStateStore } from "./state-store.js";

export type TransitionCallback = (fromMode: string, toMode: string) => void | Promise<void>;

export const MAX_HISTORY = 50;
export const TRIMMED_HISTORY = 25;

export interface ModeRuntimeState {
  currentMode: string;
  previousMode: string | null;
  /** Seconds since the epoch. */
  modeStartTime: number;
  transitionHistory: string[];
  lastTransitionTime: number | null;
  userContext: Record<string, unknown>;
}

export interface ModeInfo {
  current_mode: string;
  display_name: string;
  description: string;
  mode_duration: number;
  previous_mode: string | null;
  available_transitions: string[];
  all_modes: string[];
  transition_history: string[];
  timeout_seconds: number | null;
  time_remaining: number | null;
}

export interface ModeManagerOptions {
  hookEnv: HookEnvironment;
  /** Null disables persistence regardless of `modeMemoryEnabled`. */
  stateStore?: ModeStateStore | null;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

function appliesTo(rule: TransitionRule, mode: string): boolean {
  return rule.fromMode === mode || rule.fromMode === "*";
}

export class ModeManager {
  private readonly queue = new SerialQueue();
  private readonly callbacks: TransitionCallback[] = [];
  private readonly cooldowns = new Map<string, number>();
  private readonly state: ModeRuntimeState;
  private readonly stateStore: ModeStateStore | null;
  private readonly now: () => number;
  private hookEnv: HookEnvironment;

  constructor(readonly config: ModeSystemConfig, opts: ModeManagerOptions) {
    this.hookEnv = opts.hookEnv;
    this.stateStore = opts.stateStore ?? null;
    this.now = opts.now ?? Date.now;
    // fails fast on an unknown default mode
    getMode(config, config.defaultMode);
    this.state = {
      currentMode: config.defaultMode,
      previousMode: null,
      modeStartTime: this.seconds(),
      transitionHistory: [],
      lastTransitionTime: null,
      userContext: {},
    };
    if (config.modeMemoryEnabled) this.restoreState();
    Logger.info(`[ModeManager] initialized in mode: ${this.state.currentMode}`);
  }

  private seconds(): number {
    return this.now() / 1000;
  }

  get currentModeName(): string {
    return this.state.currentMode;
  }

  get currentMode(): ModeDefinition {
    return getMode(this.config, this.state.currentMode);
  }

  /** A copy of the runtime state. */
  getState(): ModeRuntimeState {
    return {
      ...this.state,
      transitionHistory: [...this.state.transitionHistory],
      userContext: { ...this.state.userContext },
    };
  }

  setHookEnvironment(env: HookEnvironment): void {
    this.hookEnv = env;
  }

  addTransitionCallback(callback: TransitionCallback): void {
    this.callbacks.push(callback);
  }

  removeTransitionCallback(callback: TransitionCallback): void {
    const i = this.callbacks.indexOf(callback);
    if (i >= 0) this.callbacks.splice(i, 1);
  }

  // -------------------------------------------------------------------------
  // Rule evaluation
  // -------------------------------------------------------------------------

  /** Cooldown (keyed by the rule's own from/to) and target existence. */
  canTransition(rule: TransitionRule): boolean {
    const key = `${rule.fromMode}->${rule.toMode}`;
    const last = this.cooldowns.get(key);
    if (last !== undefined && this.seconds() - last < rule.cooldownSeconds) {
      Logger.debug(`[ModeManager] transition ${key} still in cooldown`);
      return false;
    }
    if (!hasMode(this.config, rule.toMode)) {
      Logger.warn(`[ModeManager] target mode '${rule.toMode}' not found in configuration`);
      return false;
    }
    return true;
  }

  /**
   * Runs the mode's on_timeout hooks once its timeout has passed, then
   * returns the target of the first due time_based rule. A rule is due
   * after its own timeout_seconds, or the mode's timeout when it has none.
   */
  async checkTimeBasedTransitions(): Promise<string | null> {
    const mode = this.currentMode;
    const now = this.seconds();
    const duration = now - this.state.modeStartTime;

    if (mode.timeoutSeconds && duration >= mode.timeoutSeconds) {
      const context: HookContext = {
        mode_name: mode.name,
        timeout_seconds: mode.timeoutSeconds,
        actual_duration: duration,
        timestamp: now,
      };
      try {
        await executeModeHooks(mode, "on_timeout", context, this.hookEnv);
      } catch (e: unknown) {
        Logger.error(`[ModeManager] timeout hooks failed: ${asError(e).message}`);
      }
    }

    for (const rule of this.config.transitionRules) {
      if (rule.kind !== "time_based" || !appliesTo(rule, mode.name)) continue;
      const limit = rule.timeoutSeconds ?? mode.timeoutSeconds;
      if (!limit || duration < limit) continue;
      if (this.canTransition(rule)) {
        Logger.info(`[ModeManager] time-based transition: ${mode.name} -> ${rule.toMode}`);
        return rule.toMode;
      }
    }
    return null;
  }

  /** Highest-priority input_triggered rule whose keyword occurs in the text. Ties keep the first rule. */
  checkInputTriggeredTransitions(inputText: string): string | null {
    if (!inputText) return null;
    const text = inputText.toLowerCase();
    let best: TransitionRule | null = null;

    for (const rule of this.config.transitionRules) {
      if (rule.kind !== "input_triggered" || !appliesTo(rule, this.state.currentMode)) continue;
      if (!rule.triggerKeywords.some((k) => text.includes(k.toLowerCase()))) continue;
      if (!this.canTransition(rule)) continue;
      if (!best || rule.priority > best.priority) best = rule;
    }

    if (!best) return null;
    Logger.info(
      `[ModeManager] input-triggered transition: ${this.state.currentMode} -> ${best.toMode} (keywords: ${best.triggerKeywords.join(", ")})`,
    );
    return best.toMode;
  }

  getAvailableTransitions(): string[] {
    const available = new Set<string>();
    for (const rule of this.config.transitionRules) {
      if (appliesTo(rule, this.state.currentMode) && this.canTransition(rule)) available.add(rule.toMode);
    }
    return Array.from(available);
  }

  // -------------------------------------------------------------------------
  // Queued entry points
  // -------------------------------------------------------------------------

  /**
   * Evaluate time-based then input-triggered rules; at most one transition
   * per tick. Resolves with the new mode name, or null.
   */
  processTick(inputText?: string | null): Promise<string | null> {
    return this.queue.run(async () => {
      const timeTarget = await this.checkTimeBasedTransitions();
      if (timeTarget && (await this.executeTransition(timeTarget, "timeout"))) return timeTarget;

      if (inputText) {
        const inputTarget = this.checkInputTriggeredTransitions(inputText);
        if (inputTarget && (await this.executeTransition(inputTarget, "input_triggered"))) return inputTarget;
      }
      return null;
    });
  }

  /** Switch without rule or cooldown checks. */
  requestTransition(targetMode: string, reason = "manual"): Promise<boolean> {
    return this.queue.run(async () => {
      if (!this.config.allowManualSwitching && reason === "manual") {
        Logger.warn("[ModeManager] manual mode switching is disabled");
        return false;
      }
      if (!hasMode(this.config, targetMode)) {
        Logger.error(`[ModeManager] target mode '${targetMode}' not found`);
        return false;
      }
      if (targetMode === this.state.currentMode) {
        Logger.info(`[ModeManager] already in mode '${targetMode}'`);
        return true;
      }
      return this.executeTransition(targetMode, reason);
    });
  }

  /** Resolves once every queued evaluation and transition has finished. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // -------------------------------------------------------------------------
  // Transition procedure
  // -------------------------------------------------------------------------

  private async executeTransition(targetMode: string, reason: string): Promise<boolean> {
    const fromMode = this.state.currentMode;
    const key = `${fromMode}->${targetMode}`;

    try {
      this.cooldowns.set(key, this.seconds());

      const fromConfig = getMode(this.config, fromMode);
      const toConfig = getMode(this.config, targetMode);
      const context: HookContext = {
        from_mode: fromMode,
        to_mode: targetMode,
        reason,
        timestamp: this.seconds(),
        transition_key: key,
      };

      await executeModeHooks(fromConfig, "on_exit", { ...context }, this.hookEnv);
      await executeGlobalHooks(this.config, "on_exit", { ...context }, this.hookEnv);

      const now = this.seconds();
      this.state.previousMode = fromMode;
      this.state.currentMode = targetMode;
      this.state.modeStartTime = now;
      this.state.lastTransitionTime = now;
      this.state.transitionHistory.push(`${key}:${reason}`);
      if (this.state.transitionHistory.length > MAX_HISTORY) {
        this.state.transitionHistory = this.state.transitionHistory.slice(-TRIMMED_HISTORY);
      }
      Logger.info(`[ModeManager] mode transition: ${fromMode} -> ${targetMode} (reason: ${reason})`);

      await executeModeHooks(toConfig, "on_entry", { ...context }, this.hookEnv);
      await executeGlobalHooks(this.config, "on_entry", { ...context }, this.hookEnv);

      await this.notifyCallbacks(fromMode, targetMode);
      this.persistState();
      return true;
    } catch (e: unknown) {
      Logger.error(`[ModeManager] failed to execute transition ${key}: ${asError(e).message}`);
      return false;
    }
  }

  private async notifyCallbacks(fromMode: string, toMode: string): Promise<void> {
    for (const callback of [...this.callbacks]) {
      try {
        await callback(fromMode, toMode);
      } catch (e: unknown) {
        Logger.error(`[ModeManager] transition callback failed: ${asError(e).message}`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Info and user context
  // -------------------------------------------------------------------------

  getModeInfo(): ModeInfo {
    const mode = this.currentMode;
    const duration = this.seconds() - this.state.modeStartTime;
    return {
      current_mode: this.state.currentMode,
      display_name: mode.displayName,
      description: mode.description,
      mode_duration: duration,
      previous_mode: this.state.previousMode,
      available_transitions: this.getAvailableTransitions(),
      all_modes: Object.keys(this.config.modes),
      transition_history: this.state.transitionHistory.slice(-5),
      timeout_seconds: mode.timeoutSeconds,
      time_remaining: mode.timeoutSeconds ? mode.timeoutSeconds - duration : null,
    };
  }

  updateUserContext(context: Record<string, unknown>): void {
    Object.assign(this.state.userContext, context);
  }

  getUserContext(): Record<string, unknown> {
    return { ...this.state.userContext };
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  private restoreState(): void {
    if (!this.stateStore) return;
    const snapshot = this.stateStore.load();
    if (!snapshot) {
      Logger.info(`[ModeManager] using default mode: ${this.config.defaultMode}`);
      return;
    }
    const saved = snapshot.last_active_mode;
    if (saved === this.config.defaultMode || !hasMode(this.config, saved)) {
      if (!hasMode(this.config, saved)) Logger.warn(`[ModeManager] saved mode '${saved}' no longer exists`);
      Logger.info(`[ModeManager] using default mode: ${this.config.defaultMode}`);
      return;
    }
    Logger.info(`[ModeManager] restoring last active mode: ${saved}`);
    this.state.currentMode = saved;
    this.state.previousMode = snapshot.previous_mode;
    this.state.transitionHistory.push(...snapshot.transition_history);
    if (this.state.transitionHistory.length > MAX_HISTORY) {
      this.state.transitionHistory = this.state.transitionHistory.slice(-TRIMMED_HISTORY);
    }
  }

  private persistState(): void {
    if (!this.config.modeMemoryEnabled || !this.stateStore) return;
    this.stateStore.save({
      last_active_mode: this.state.currentMode,
      previous_mode: this.state.previousMode,
      timestamp: this.seconds(),
      transition_history: this.state.transitionHistory,
    });
  }
}
