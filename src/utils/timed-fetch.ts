import { asError } from "../errors.js";

/** Wrap fetch with timeout and location context for debugging. */
export async function timedFetch(
  url: string,
  init: RequestInit & { timeoutMs?: number; where?: string } = {}
): Promise<Response> {
  const { timeoutMs, where, ...rest } = init;
  let timer: ReturnType<typeof setTimeout> | null = null;

  try {
    if (timeoutMs && timeoutMs > 0) {
      const controller = new AbortController();
      const outer = rest.signal;
      if (outer) {
        if (outer.aborted) controller.abort();
        else outer.addEventListener("abort", () => controller.abort(), { once: true });
      }
      rest.signal = controller.signal;
      timer = setTimeout(() => controller.abort(), timeoutMs);
    }
    return await fetch(url, rest);
  } catch (e: unknown) {
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    throw new Error(
      `[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`,
      { cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}
