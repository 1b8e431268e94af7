import { Logger } from "../logger.js";
import { asError, isAbortError } from "../errors.js";
import { sleep } from "./retry.js";

/**
 * Call `tick` every `intervalMs` until the signal fires, then reject with
 * an AbortError. A failing tick is logged and the loop carries on.
 */
export async function tickLoop(
  label: string,
  tick: () => void | Promise<void>,
  intervalMs: number,
  signal: AbortSignal,
): Promise<never> {
  for (;;) {
    try {
      await tick();
    } catch (e: unknown) {
      if (isAbortError(e)) throw e;
      Logger.warn(`[${label}] tick failed: ${asError(e).message}`);
    }
    await sleep(intervalMs, signal);
  }
}
