/**
 * Tests for hook message templates.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { formatTemplate, MissingTemplateKeyError } from "../src/utils/template.js";

describe("formatTemplate", () => {
  test("substitutes placeholders from the context", () => {
    assert.strictEqual(
      formatTemplate("Switching from {from_mode} to {to_mode}", { from_mode: "idle", to_mode: "patrol" }),
      "Switching from idle to patrol",
    );
  });

  test("renders numbers, booleans, null and objects", () => {
    const out = formatTemplate("{n} {b} {z} {o}", { n: 2.5, b: true, z: null, o: { a: 1 } });
    assert.strictEqual(out, '2.5 true null {"a":1}');
  });

  test("doubled braces are literal", () => {
    assert.strictEqual(formatTemplate("{{mode}} is {mode}", { mode: "idle" }), "{mode} is idle");
  });

  test("whitespace inside a placeholder is ignored", () => {
    assert.strictEqual(formatTemplate("{ mode }", { mode: "idle" }), "idle");
  });

  test("a missing key throws MissingTemplateKeyError", () => {
    assert.throws(
      () => formatTemplate("hello {name}", {}),
      (e: unknown) => e instanceof MissingTemplateKeyError && e.key === "name" && e.message === "Missing template key: name",
    );
  });

  test("inherited properties are not template keys", () => {
    assert.throws(() => formatTemplate("{toString}", {}), MissingTemplateKeyError);
  });

  test("text without placeholders is unchanged", () => {
    assert.strictEqual(formatTemplate("Map saved.", { x: 1 }), "Map saved.");
  });
});
