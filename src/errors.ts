/**
 * Structured error types for modecortex.
 *
 * Error boundaries wrap failures in a CortexError instead of stringifying
 * e.message, so stack traces survive and log lines share the same fields.
 */

export type CortexErrorKind =
  | "config_error"
  | "hook_error"
  | "transition_error"
  | "plugin_error"
  | "provider_error"
  | "timeout_error"
  | "wire_error"
  | "state_error";

export interface CortexError extends Error {
  kind: CortexErrorKind;
  mode?: string;
  plugin?: string;
  retryable: boolean;
  latency_ms?: number;
  cause?: unknown;
}

/**
 * Create a CortexError with structured fields.
 */
export function cortexError(
  kind: CortexErrorKind,
  message: string,
  opts: {
    mode?: string;
    plugin?: string;
    retryable?: boolean;
    latency_ms?: number;
    cause?: unknown;
  } = {},
): CortexError {
  const err: CortexError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.mode) err.mode = opts.mode;
  if (opts.plugin) err.plugin = opts.plugin;
  if (opts.latency_ms !== undefined) err.latency_ms = opts.latency_ms;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isCortexError(e: unknown): e is CortexError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/** True for the rejection an aborted task or fetch produces. */
export function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError";
}

/** The error a cancelled subsystem task rejects with. */
export function abortError(message = "Task cancelled"): Error {
  const err = new Error(message);
  err.name = "AbortError";
  return err;
}

/**
 * Format a CortexError for structured logging.
 */
export function errorLogFields(e: CortexError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.mode) fields.mode = e.mode;
  if (e.plugin) fields.plugin = e.plugin;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
