/**
 * Tests for structured error types (CortexError).
 *
 * Covers: cortexError, asError, isCortexError, isAbortError, abortError, errorLogFields
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { cortexError, asError, isCortexError, isAbortError, abortError, errorLogFields } from "../src/errors.js";

// ---------------------------------------------------------------------------
// cortexError factory
// ---------------------------------------------------------------------------

describe("cortexError", () => {
  test("creates an Error with kind and retryable fields", () => {
    const e = cortexError("config_error", "bad config");
    assert.ok(e instanceof Error);
    assert.strictEqual(e.kind, "config_error");
    assert.strictEqual(e.message, "bad config");
    assert.strictEqual(e.retryable, false);
    assert.ok(e.stack, "should have a stack trace");
  });

  test("retryable can be set to true", () => {
    const e = cortexError("provider_error", "503", { retryable: true });
    assert.strictEqual(e.retryable, true);
  });

  test("optional fields are set when provided", () => {
    const e = cortexError("plugin_error", "fail", {
      mode: "patrol",
      plugin: "BusTextInput",
      latency_ms: 450,
      cause: new Error("underlying"),
    });
    assert.strictEqual(e.mode, "patrol");
    assert.strictEqual(e.plugin, "BusTextInput");
    assert.strictEqual(e.latency_ms, 450);
    assert.ok(e.cause instanceof Error);
  });

  test("optional fields are omitted when not provided", () => {
    const e = cortexError("state_error", "disk full");
    assert.strictEqual(e.mode, undefined);
    assert.strictEqual(e.plugin, undefined);
    assert.strictEqual(e.latency_ms, undefined);
    assert.strictEqual(e.cause, undefined);
  });

  test("latency_ms of 0 is preserved", () => {
    const e = cortexError("provider_error", "fast fail", { latency_ms: 0 });
    assert.strictEqual(e.latency_ms, 0);
  });
});

// ---------------------------------------------------------------------------
// asError
// ---------------------------------------------------------------------------

describe("asError", () => {
  test("returns Error instances unchanged", () => {
    const original = new TypeError("nope");
    assert.strictEqual(asError(original), original);
  });

  test("wraps strings", () => {
    assert.strictEqual(asError("boom").message, "boom");
  });

  test("null and undefined become 'Unknown error'", () => {
    assert.strictEqual(asError(null).message, "Unknown error");
    assert.strictEqual(asError(undefined).message, "Unknown error");
  });

  test("other values are stringified", () => {
    assert.strictEqual(asError(42).message, "42");
  });
});

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

describe("isCortexError / isAbortError", () => {
  test("isCortexError recognises factory errors only", () => {
    assert.strictEqual(isCortexError(cortexError("hook_error", "x")), true);
    assert.strictEqual(isCortexError(new Error("x")), false);
    assert.strictEqual(isCortexError("x"), false);
  });

  test("abortError is an AbortError", () => {
    const e = abortError();
    assert.strictEqual(e.name, "AbortError");
    assert.strictEqual(e.message, "Task cancelled");
    assert.strictEqual(isAbortError(e), true);
  });

  test("plain errors are not abort errors", () => {
    assert.strictEqual(isAbortError(new Error("Task cancelled")), false);
    assert.strictEqual(isAbortError({ name: "AbortError" }), false);
  });
});

// ---------------------------------------------------------------------------
// errorLogFields
// ---------------------------------------------------------------------------

describe("errorLogFields", () => {
  test("includes kind, message and retryable", () => {
    const fields = errorLogFields(cortexError("wire_error", "bad frame"));
    assert.strictEqual(fields.kind, "wire_error");
    assert.strictEqual(fields.message, "bad frame");
    assert.strictEqual(fields.retryable, false);
    assert.strictEqual(fields.mode, undefined);
  });

  test("flattens the cause", () => {
    const fields = errorLogFields(
      cortexError("transition_error", "build failed", { mode: "patrol", cause: new Error("no such input") }),
    );
    assert.strictEqual(fields.mode, "patrol");
    assert.strictEqual(fields.cause_message, "no such input");
    assert.strictEqual(typeof fields.cause_stack, "string");
  });
});
