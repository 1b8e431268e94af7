import { Logger, C } from "../../logger.js";
import type { CortexAction } from "../../cortex-types.js";
import type { Simulator } from "../base.js";

export class LogSimulator implements Simulator {
  readonly name = "LogSimulator";

  constructor(private readonly mode: string) {}

  sim(actions: CortexAction[]): void {
    if (actions.length === 0) return;
    const line = actions.map((a) => `${a.type}(${a.value})`).join(", ");
    Logger.info(`${C.gray(`[Sim:${this.mode}]`)} ${line}`);
  }
}
