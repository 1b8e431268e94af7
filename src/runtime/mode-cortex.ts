/**
 * ModeCortexRuntime: the supervisor loop of a mode-aware robot agent.
 *
 * Owns the collaborators (bus, IO provider, sleep ticker, TTS), the mode
 * manager and the live component graph of the active mode. On every
 * transition it cancels the old mode's subsystem tasks, waits for them to
 * finish, builds the new mode's graph and starts its tasks; the tick loop
 * keeps running throughout.
 */

import { Logger, C } from "../logger.js";
import { abortError, asError, cortexError, errorLogFields, isAbortError } from "../errors.js";
import { sleep } from "../utils/retry.js";
import { LocalBus, type MessageBus } from "../bus/message-bus.js";
import { IOProvider } from "../providers/io-provider.js";
import { SleepTicker } from "../providers/sleep-ticker.js";
import { createTtsProvider, type TtsProvider } from "../providers/tts-provider.js";
import { DEFAULT_HOOKS_DIR, type HookEnvironment } from "../lifecycle/handlers.js";
import { executeGlobalHooks, executeModeHooks, getMode, type ModeSystemConfig } from "../modes/config.js";
import { ModeManager, type ModeInfo } from "../modes/manager.js";
import { ModeStateStore } from "../modes/state-store.js";
import { ModeStatusController, type StatusTopics } from "../modes/status-controller.js";
import { buildModeGraph, type ModeGraph } from "./component-graph.js";
import { Task, nextTaskEvent } from "./task.js";
import type { PluginContext } from "../cortex-types.js";

export const ABORT_BACKOFF_MS = 100;
export const ERROR_BACKOFF_MS = 1_000;

export interface CortexRuntimeOptions {
  bus?: MessageBus;
  tts?: TtsProvider;
  /** Directory for the last-active-mode snapshot; null disables persistence. */
  stateDir?: string | null;
  hooksDir?: string;
  statusTopics?: StatusTopics;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

export interface ModeSummary {
  display_name: string;
  description: string;
  is_current: boolean;
}

export class ModeCortexRuntime {
  readonly manager: ModeManager;
  readonly bus: MessageBus;
  readonly io = new IOProvider();
  readonly ticker = new SleepTicker();
  readonly tts: TtsProvider;
  readonly pluginContext: PluginContext;

  private readonly hookEnv: HookEnvironment;
  private readonly statusController: ModeStatusController;
  private readonly now: () => number;
  private graph: ModeGraph | null = null;
  private tasks: Task[] = [];
  private tickTask: Task | null = null;
  private running = false;
  private stopRequested = false;
  private fatalError: Error | null = null;

  constructor(readonly config: ModeSystemConfig, opts: CortexRuntimeOptions = {}) {
    this.now = opts.now ?? Date.now;
    this.bus = opts.bus ?? new LocalBus();
    this.tts = opts.tts ?? createTtsProvider(config.tts, this.bus);
    this.pluginContext = {
      bus: this.bus,
      io: this.io,
      ticker: this.ticker,
      tts: this.tts,
      mcpServers: config.mcpServers,
    };
    this.hookEnv = {
      tts: this.tts,
      hooksDir: opts.hooksDir ?? DEFAULT_HOOKS_DIR,
      pluginContext: this.pluginContext,
    };
    const stateStore = opts.stateDir ? new ModeStateStore(opts.stateDir, config.configName) : null;
    this.manager = new ModeManager(config, { hookEnv: this.hookEnv, stateStore, now: this.now });
    this.manager.addTransitionCallback((from, to) => this.onModeTransition(from, to));
    this.statusController = new ModeStatusController(this.manager, this.bus, opts.statusTopics);
  }

  private seconds(): number {
    return this.now() / 1000;
  }

  /** The graph of the active mode; null between teardown and rebuild. */
  get currentGraph(): ModeGraph | null {
    return this.graph;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Start up, run until stop() (or a fatal transition failure), then run
   * the shutdown hooks and release every task. Rejects with the fatal
   * error, if there was one.
   */
  async run(): Promise<void> {
    if (this.running) throw new Error("ModeCortexRuntime is already running");
    this.running = true;
    this.fatalError = null;
    this.tts.start();
    this.statusController.start();

    try {
      await executeGlobalHooks(
        this.config,
        "on_startup",
        { mode: this.manager.currentModeName, timestamp: this.seconds() },
        this.hookEnv,
      );
      this.initializeMode(this.manager.currentModeName);
      await executeModeHooks(this.manager.currentMode, "on_startup", { timestamp: this.seconds() }, this.hookEnv);
      this.startSubsystems();

      Logger.info(`${C.green("[Cortex]")} running in mode: ${C.bold(this.manager.currentModeName)}`);
      const tickTask = new Task("cortex-loop", (signal) => this.cortexLoop(signal));
      this.tickTask = tickTask;
      if (this.stopRequested) tickTask.cancel();

      while (!tickTask.done) {
        const { task, outcome } = await nextTaskEvent(tickTask, this.tasks);
        if (outcome.ok) continue;
        if (isAbortError(outcome.error)) {
          Logger.debug(`[Cortex] ${task.name} cancelled`);
          if (!tickTask.done) await sleep(ABORT_BACKOFF_MS);
        } else {
          Logger.error(`[Cortex] ${task.name} failed: ${asError(outcome.error).message}`);
          if (!tickTask.done) await sleep(ERROR_BACKOFF_MS);
        }
      }
    } finally {
      await this.shutdown();
    }
    if (this.fatalError) throw this.fatalError;
  }

  /** Ask the run loop to finish; run() resolves after shutdown. */
  stop(): void {
    this.stopRequested = true;
    this.tickTask?.cancel();
  }

  private async shutdown(): Promise<void> {
    Logger.info("[Cortex] shutting down");
    this.stopRequested = true;
    // no new switch requests; the ones already queued see stopRequested and skip the rebuild
    this.statusController.stop();
    await this.statusController.idle();
    await this.manager.idle();

    const context = { timestamp: this.seconds() };
    try {
      await executeModeHooks(this.manager.currentMode, "on_shutdown", context, this.hookEnv);
      await executeGlobalHooks(this.config, "on_shutdown", { ...context, mode: this.manager.currentModeName }, this.hookEnv);
    } catch (e: unknown) {
      Logger.error(`[Cortex] shutdown hooks failed: ${asError(e).message}`);
    }

    const tickTask = this.tickTask;
    if (tickTask) {
      tickTask.cancel();
      await tickTask.outcome;
      this.tickTask = null;
    }
    await this.stopSubsystems();
    await this.tts.stop();
    this.running = false;
    this.stopRequested = false;
  }

  // -------------------------------------------------------------------------
  // Mode activation
  // -------------------------------------------------------------------------

  private initializeMode(modeName: string): void {
    const mode = getMode(this.config, modeName);
    this.graph = buildModeGraph(mode, this.config, this.pluginContext);
    Logger.info(`[Cortex] mode '${mode.displayName}' initialized`);
  }

  private startSubsystems(): void {
    const graph = this.graph;
    if (!graph) throw new Error("No mode graph to start");
    this.tasks = [
      new Task("inputs", (signal) => graph.inputs.listen(signal)),
      new Task("simulators", (signal) => graph.simulators.start(signal)),
      new Task("actions", (signal) => graph.actions.start(signal)),
      new Task("backgrounds", (signal) => graph.backgrounds.start(signal)),
    ];
  }

  /** Cancel every subsystem task and wait until all of them have finished. */
  private async stopSubsystems(): Promise<void> {
    const tasks = this.tasks;
    const graph = this.graph;
    this.tasks = [];
    this.graph = null;
    for (const task of tasks) task.cancel();
    const outcomes = await Promise.all(tasks.map((t) => t.outcome));
    outcomes.forEach((o, i) => {
      if (!o.ok && !isAbortError(o.error)) {
        Logger.warn(`[Cortex] ${tasks[i]?.name ?? "task"} ended with: ${asError(o.error).message}`);
      }
    });
    if (graph?.llm.stop) {
      try {
        await graph.llm.stop();
      } catch (e: unknown) {
        Logger.warn(`[Cortex] ${graph.llm.name} stop failed: ${asError(e).message}`);
      }
    }
    if (tasks.length > 0) Logger.debug(`[Cortex] stopped ${tasks.length} subsystem task(s)`);
  }

  private async onModeTransition(fromMode: string, toMode: string): Promise<void> {
    Logger.info(`[Cortex] handling mode transition: ${fromMode} -> ${toMode}`);
    await this.stopSubsystems();
    if (!this.running || this.stopRequested) {
      Logger.info(`[Cortex] not running, mode '${toMode}' will be built on the next run`);
      return;
    }
    try {
      this.initializeMode(toMode);
      this.startSubsystems();
    } catch (e: unknown) {
      const ce = cortexError("transition_error", `Could not build mode '${toMode}': ${asError(e).message}`, {
        mode: toMode,
        cause: e,
      });
      this.fatalError = ce;
      Logger.error(`[Cortex] transition ${fromMode} -> ${toMode} failed, stopping:`, errorLogFields(ce));
      this.tickTask?.cancel();
      throw ce;
    }
    Logger.info(`[Cortex] now in mode: ${C.bold(toMode)}`);
  }

  // -------------------------------------------------------------------------
  // Tick loop
  // -------------------------------------------------------------------------

  private async cortexLoop(signal: AbortSignal): Promise<void> {
    for (;;) {
      if (signal.aborted) throw abortError();
      try {
        await this.tick();
      } catch (e: unknown) {
        if (isAbortError(e)) throw e;
        Logger.error(`[Cortex] tick failed: ${asError(e).message}`);
      }

      if (this.ticker.skipSleep) {
        this.ticker.skipSleep = false;
        await this.ticker.sleep(0, signal);
      } else {
        await this.ticker.sleep(1000 / this.manager.currentMode.hertz, signal);
        this.ticker.skipSleep = false;
      }
    }
  }

  /**
   * One perception → reasoning → action cycle. A tick with nothing to fuse
   * ends early: no transition rules are checked and the LLM is not asked.
   */
  async tick(): Promise<void> {
    const graph = this.graph;
    if (!graph) {
      Logger.debug("[Cortex] no active mode graph, skipping tick");
      return;
    }

    const results = graph.actions.flushPromises();
    const prompt = graph.fuser.fuse(graph.inputs.inputs, results, graph.actions.actions);
    if (prompt === null) {
      Logger.debug("[Cortex] nothing to fuse");
      return;
    }
    const transitionText = this.io.consumeModeTransitionInput();

    const newMode = await this.manager.processTick(transitionText);
    if (newMode) {
      Logger.info(`[Cortex] mode switched to: ${newMode}`);
      return;
    }

    this.io.recordPrompt(prompt);
    const output = await graph.llm.ask(prompt, graph.actions.actions);
    if (this.graph !== graph) {
      Logger.debug("[Cortex] mode changed while waiting on the LLM; dropping its output");
      return;
    }
    if (!output || output.actions.length === 0) {
      Logger.debug("[Cortex] no output from LLM");
      return;
    }
    graph.simulators.promise(output.actions);
    graph.actions.promise(output.actions);
  }

  // -------------------------------------------------------------------------
  // Control surface
  // -------------------------------------------------------------------------

  getModeInfo(): ModeInfo {
    return this.manager.getModeInfo();
  }

  requestModeChange(targetMode: string): Promise<boolean> {
    return this.manager.requestTransition(targetMode, "manual");
  }

  getAvailableModes(): Record<string, ModeSummary> {
    const current = this.manager.currentModeName;
    const modes: Record<string, ModeSummary> = {};
    for (const mode of Object.values(this.config.modes)) {
      modes[mode.name] = {
        display_name: mode.displayName,
        description: mode.description,
        is_current: mode.name === current,
      };
    }
    return modes;
  }
}
