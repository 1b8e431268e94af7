/**
 * ActionOrchestrator: dispatches LLM actions to their connectors without
 * blocking the tick, and hands finished results back to the fuser.
 */

import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { tickLoop } from "../utils/tick-loop.js";
import { waitForAbort } from "../utils/retry.js";
import type { CortexAction } from "../cortex-types.js";
import type { AgentAction } from "./base.js";

export interface ActionResult {
  action: CortexAction;
  ok: boolean;
  output?: string;
  error?: string;
}

interface InFlight {
  action: CortexAction;
  result: ActionResult | null;
}

const DEFAULT_CONNECTOR_TICK_MS = 100;

export class ActionOrchestrator {
  private inFlight: InFlight[] = [];

  constructor(readonly actions: AgentAction[]) {}

  find(type: string): AgentAction | undefined {
    const wanted = type.toLowerCase();
    return this.actions.find((a) => a.llmLabel.toLowerCase() === wanted);
  }

  /** Start every action; unknown action types are logged and skipped. */
  promise(actions: CortexAction[]): void {
    for (const action of actions) {
      const agentAction = this.find(action.type);
      if (!agentAction) {
        Logger.warn(`[Actions] no action named '${action.type}' in this mode`);
        continue;
      }
      const entry: InFlight = { action, result: null };
      this.inFlight.push(entry);
      agentAction.connector.connect(action).then(
        (output) => {
          entry.result = { action, ok: true, ...(typeof output === "string" ? { output } : {}) };
        },
        (e: unknown) => {
          const message = asError(e).message;
          Logger.warn(`[Actions] ${agentAction.name} failed: ${message}`);
          entry.result = { action, ok: false, error: message };
        },
      );
    }
  }

  /** Finished results since the last flush; unfinished actions stay queued. */
  flushPromises(): ActionResult[] {
    const done: ActionResult[] = [];
    const pending: InFlight[] = [];
    for (const entry of this.inFlight) {
      if (entry.result) done.push(entry.result);
      else pending.push(entry);
    }
    this.inFlight = pending;
    return done;
  }

  get pendingCount(): number {
    return this.inFlight.filter((e) => e.result === null).length;
  }

  /** Run connector tick loops until aborted, then stop every connector. */
  async start(signal: AbortSignal): Promise<void> {
    const loops = this.actions.flatMap((a) => {
      const { connector } = a;
      if (!connector.tick) return [];
      const tick = connector.tick.bind(connector);
      return [tickLoop(`Actions:${a.name}`, tick, connector.tickIntervalMs ?? DEFAULT_CONNECTOR_TICK_MS, signal)];
    });
    try {
      await Promise.all([waitForAbort(signal), ...loops]);
    } finally {
      for (const a of this.actions) {
        try {
          await a.connector.stop?.();
        } catch (e: unknown) {
          Logger.warn(`[Actions] ${a.name} stop failed: ${asError(e).message}`);
        }
      }
    }
  }
}
