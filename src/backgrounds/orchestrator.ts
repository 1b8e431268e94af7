import { Logger } from "../logger.js";
import { asError } from "../errors.js";
import { waitForAbort } from "../utils/retry.js";
import type { Background } from "./base.js";

export class BackgroundOrchestrator {
  constructor(readonly backgrounds: Background[]) {}

  async start(signal: AbortSignal): Promise<void> {
    try {
      await Promise.all([waitForAbort(signal), ...this.backgrounds.map((b) => b.run(signal))]);
    } finally {
      for (const b of this.backgrounds) {
        try {
          await b.stop?.();
        } catch (e: unknown) {
          Logger.warn(`[Backgrounds] ${b.name} stop failed: ${asError(e).message}`);
        }
      }
    }
  }
}
