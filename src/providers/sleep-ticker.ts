/**
 * SleepTicker: paces the cortex loop and lets urgent inputs cut the
 * current sleep short.
 */

import { abortError } from "../errors.js";

export class SleepTicker {
  skipSleep = false;
  private wake: (() => void) | null = null;

  /** Ask the loop to run its next tick without waiting. */
  requestSkip(): void {
    this.skipSleep = true;
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }
      const finish = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.wake = null;
      };
      const onAbort = () => {
        finish();
        reject(abortError());
      };
      const timer = setTimeout(() => {
        finish();
        resolve();
      }, Math.max(0, ms));
      this.wake = () => {
        finish();
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
