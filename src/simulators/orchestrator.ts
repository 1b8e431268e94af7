import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { tickLoop } from "../utils/tick-loop.js";
import { waitForAbort } from "../utils/retry.js";
import type { CortexAction } from "../cortex-types.js";
import type { Simulator } from "./base.js";

const DEFAULT_SIM_TICK_MS = 100;

export class SimulatorOrchestrator {
  private inFlight = new Set<Promise<void>>();

  constructor(readonly simulators: Simulator[]) {}

  /** Fan the actions out to every simulator without waiting for them. */
  promise(actions: CortexAction[]): void {
    for (const simulator of this.simulators) {
      const run: Promise<void> = Promise.resolve()
        .then(() => simulator.sim(actions))
        .catch((e: unknown) => {
          Logger.warn(`[Simulators] ${simulator.name} failed: ${asError(e).message}`);
        })
        .finally(() => {
          this.inFlight.delete(run);
        });
      this.inFlight.add(run);
    }
  }

  /** Resolves once every dispatched batch has been simulated. */
  async settled(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async start(signal: AbortSignal): Promise<void> {
    const loops = this.simulators.flatMap((s) => {
      if (!s.tick) return [];
      const tick = s.tick.bind(s);
      return [tickLoop(`Simulators:${s.name}`, tick, s.tickIntervalMs ?? DEFAULT_SIM_TICK_MS, signal)];
    });
    try {
      await Promise.all([waitForAbort(signal), ...loops]);
    } finally {
      for (const s of this.simulators) {
        try {
          await s.stop?.();
        } catch (e: unknown) {
          Logger.warn(`[Simulators] ${s.name} stop failed: ${asError(e).message}`);
        }
      }
    }
  }
}
