/**
 * Retry helpers for HTTP-backed providers (LLM, TTS).
 */

import { abortError } from "../errors.js";

export const MAX_RETRIES = 3;
export const RETRY_BASE_MS = 1000;

/** Rate limiting and gateway/overload statuses are worth another attempt. */
export function isRetryable(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504 || status === 529;
}

/** Exponential backoff with up to 50% jitter. */
export function retryDelay(attempt: number, baseMs = RETRY_BASE_MS): number {
  const base = baseMs * Math.pow(2, attempt);
  return Math.round(base + Math.random() * base * 0.5);
}

/**
 * Resolve after `ms`. With a signal, rejects with an AbortError as soon as
 * the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Never resolves; rejects with an AbortError once the signal fires. */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener("abort", () => reject(abortError()), { once: true });
  });
}
