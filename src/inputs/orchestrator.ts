import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { waitForAbort } from "../utils/retry.js";
import type { Sensor } from "./base.js";

/**
 * Runs every sensor's listen loop for one mode activation. When the signal
 * fires the loops reject, every sensor is stopped and the AbortError
 * propagates to the caller.
 */
export class InputOrchestrator {
  constructor(readonly inputs: Sensor[]) {}

  async listen(signal: AbortSignal): Promise<void> {
    try {
      await Promise.all([waitForAbort(signal), ...this.inputs.map((input) => input.listen(signal))]);
    } finally {
      await this.stopAll();
    }
  }

  private async stopAll(): Promise<void> {
    for (const input of this.inputs) {
      try {
        await input.stop();
      } catch (e: unknown) {
        Logger.warn(`[Inputs] ${input.name} stop failed: ${asError(e).message}`);
      }
    }
  }
}
