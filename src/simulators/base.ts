import type { CortexAction } from "../cortex-types.js";

/** Mirrors the actions of each tick somewhere (a log, a topic, a visualiser). */
export interface Simulator {
  readonly name: string;
  sim(actions: CortexAction[]): void | Promise<void>;
  tick?(): Promise<void>;
  tickIntervalMs?: number;
  stop?(): void | Promise<void>;
}
