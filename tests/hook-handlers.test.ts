/**
 * Tests for the hook handlers.
 *
 * Covers: message, command, function (module resolution and calling),
 * action, and the bundled map-service hook modules
 */

import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import "../src/plugins/register-plugins.js";
import {
  declaresFunction,
  resolveHookModule,
  runShell,
  type HookEnvironment,
} from "../src/lifecycle/handlers.js";
import { executeLifecycleHooks, parseLifecycleHooks, type RawLifecycleHook } from "../src/lifecycle/hook.js";
import { LocalBus } from "../src/bus/message-bus.js";
import { IOProvider } from "../src/providers/io-provider.js";
import { SleepTicker } from "../src/providers/sleep-ticker.js";
import { actionRegistry } from "../src/actions/registry.js";
import { defineAction } from "../src/actions/base.js";
import { startNav2, stopNav2 } from "../src/hooks/nav2.js";
import { stopSlam } from "../src/hooks/slam.js";
import { RecordingTts, readBody, startServer, tempDir, type TestServer } from "./fixtures.js";

const hooksDir = tempDir("modecortex-hooks-");

before(() => {
  writeFileSync(
    join(hooksDir, "greeter.mjs"),
    [
      "export function greet(ctx) {",
      '  ctx.tts.addPendingMessage("hello from " + ctx.mode_name);',
      '  return { status: "success" };',
      "}",
      "export async function refuse() {",
      "  return false;",
      "}",
      "export function explode() {",
      '  throw new Error("kaboom");',
      "}",
      "export const notAFunction = 3;",
    ].join("\n"),
  );
});

function run(raw: RawLifecycleHook, context: Record<string, unknown> = {}, env?: Partial<HookEnvironment>) {
  const tts = new RecordingTts();
  const fullEnv: HookEnvironment = { tts, hooksDir, ...env };
  const ok = executeLifecycleHooks(parseLifecycleHooks([raw]), raw.hook_type, context, fullEnv);
  return { ok, tts };
}

// ---------------------------------------------------------------------------
// message
// ---------------------------------------------------------------------------

describe("message handler", () => {
  test("speaks the formatted message", async () => {
    const { ok, tts } = run(
      { hook_type: "on_entry", handler_type: "message", handler_config: { message: "Entering {mode_display_name}" } },
      { mode_display_name: "Patrol" },
    );
    assert.strictEqual(await ok, true);
    assert.deepStrictEqual(tts.messages, ["Entering Patrol"]);
  });

  test("an empty message succeeds without speaking", async () => {
    const { ok, tts } = run({ hook_type: "on_entry", handler_type: "message" });
    assert.strictEqual(await ok, true);
    assert.deepStrictEqual(tts.messages, []);
  });

  test("fails without a text-to-speech provider", async () => {
    const { ok } = run(
      { hook_type: "on_entry", handler_type: "message", handler_config: { message: "hi" } },
      {},
      { tts: undefined },
    );
    assert.strictEqual(await ok, false);
  });
});

// ---------------------------------------------------------------------------
// command
// ---------------------------------------------------------------------------

describe("command handler", () => {
  test("exit code 0 succeeds", async () => {
    const { ok } = run(
      { hook_type: "on_exit", handler_type: "command", handler_config: { command: "echo leaving {mode_name}" } },
      { mode_name: "patrol" },
    );
    assert.strictEqual(await ok, true);
  });

  test("a non-zero exit code fails", async () => {
    const { ok } = run({ hook_type: "on_exit", handler_type: "command", handler_config: { command: "exit 3" } });
    assert.strictEqual(await ok, false);
  });

  test("a missing command fails", async () => {
    const { ok } = run({ hook_type: "on_exit", handler_type: "command" });
    assert.strictEqual(await ok, false);
  });

  test("runShell captures output and exit code", async () => {
    const result = await runShell("echo out; echo err 1>&2; exit 2");
    assert.deepStrictEqual(result, { code: 2, stdout: "out\n", stderr: "err\n" });
  });
});

// ---------------------------------------------------------------------------
// function
// ---------------------------------------------------------------------------

describe("function handler", () => {
  test("calls the exported function with the context and tts", async () => {
    const { ok, tts } = run(
      { hook_type: "on_entry", handler_type: "function", handler_config: { module_name: "greeter", function: "greet" } },
      { mode_name: "patrol" },
    );
    assert.strictEqual(await ok, true);
    assert.deepStrictEqual(tts.messages, ["hello from patrol"]);
  });

  test("a false return is a failure", async () => {
    const { ok } = run({
      hook_type: "on_entry",
      handler_type: "function",
      handler_config: { module_name: "greeter", function: "refuse" },
    });
    assert.strictEqual(await ok, false);
  });

  test("a throwing function is a failure", async () => {
    const { ok } = run({
      hook_type: "on_entry",
      handler_type: "function",
      handler_config: { module_name: "greeter", function: "explode" },
    });
    assert.strictEqual(await ok, false);
  });

  test("a function the module does not export fails", async () => {
    const { ok } = run({
      hook_type: "on_entry",
      handler_type: "function",
      handler_config: { module_name: "greeter", function: "missing" },
    });
    assert.strictEqual(await ok, false);
  });

  test("an exported value that is not a function fails", async () => {
    const { ok } = run({
      hook_type: "on_entry",
      handler_type: "function",
      handler_config: { module_name: "greeter", function: "notAFunction" },
    });
    assert.strictEqual(await ok, false);
  });

  test("a module outside the hooks directory is refused", async () => {
    const { ok } = run({
      hook_type: "on_entry",
      handler_type: "function",
      handler_config: { module_name: "../greeter", function: "greet" },
    });
    assert.strictEqual(await ok, false);
  });

  test("resolveHookModule finds files by extension", () => {
    assert.strictEqual(resolveHookModule(hooksDir, "greeter"), join(hooksDir, "greeter.mjs"));
    assert.strictEqual(resolveHookModule(hooksDir, "greeter.mjs"), join(hooksDir, "greeter.mjs"));
    assert.strictEqual(resolveHookModule(hooksDir, "nothing"), null);
    assert.strictEqual(resolveHookModule(hooksDir, "sub/greeter"), null);
    assert.strictEqual(resolveHookModule(hooksDir, ".."), null);
  });

  test("declaresFunction recognises exported functions and consts", () => {
    const src = "export async function startSlam(ctx) {}\nexport const stopSlam = async () => {};\nfunction hidden() {}";
    assert.strictEqual(declaresFunction(src, "startSlam"), true);
    assert.strictEqual(declaresFunction(src, "stopSlam"), true);
    assert.strictEqual(declaresFunction(src, "hidden"), false);
    assert.strictEqual(declaresFunction(src, "start"), false);
  });
});

// ---------------------------------------------------------------------------
// action
// ---------------------------------------------------------------------------

describe("action handler", () => {
  function pluginEnv() {
    const tts = new RecordingTts();
    const bus = new LocalBus();
    return {
      tts,
      env: {
        tts,
        hooksDir,
        pluginContext: { bus, io: new IOProvider(), ticker: new SleepTicker(), tts, mcpServers: {} },
      } satisfies HookEnvironment,
    };
  }

  test("runs the action with text input", async () => {
    const { tts, env } = pluginEnv();
    const hooks = parseLifecycleHooks([
      { hook_type: "on_entry", handler_type: "action", handler_config: { action_type: "speak" } },
    ]);
    const ok = await executeLifecycleHooks(hooks, "on_entry", { mode_name: "patrol", input_data: "Patrol started" }, env);
    assert.strictEqual(ok, true);
    assert.deepStrictEqual(tts.messages, ["Patrol started"]);
  });

  test("object input is passed as the action's arguments", async () => {
    const { tts, env } = pluginEnv();
    const hooks = parseLifecycleHooks([
      { hook_type: "on_entry", handler_type: "action", handler_config: { action_type: "emergency_alert" } },
    ]);
    await executeLifecycleHooks(hooks, "on_entry", { input_data: { message: "Smoke detected" } }, env);
    assert.deepStrictEqual(tts.messages, ["Attention. Smoke detected"]);
  });

  test("action_config picks the connector", async () => {
    const { env } = pluginEnv();
    const received: string[] = [];
    env.pluginContext.bus.subscribe("robot/move", (payload) => {
      received.push(payload);
    });
    const hooks = parseLifecycleHooks([
      {
        hook_type: "on_entry",
        handler_type: "action",
        handler_config: { action_type: "move", action_config: { connector: "bus" } },
      },
    ]);
    assert.strictEqual(await executeLifecycleHooks(hooks, "on_entry", { input_data: "sit" }, env), true);
    await new Promise((r) => setImmediate(r));
    assert.strictEqual(received.length, 1);
  });

  test("a failing action is a hook failure", async () => {
    const { env } = pluginEnv();
    const hooks = parseLifecycleHooks([
      { hook_type: "on_entry", handler_type: "action", handler_config: { action_type: "move" } },
    ]);
    assert.strictEqual(await executeLifecycleHooks(hooks, "on_entry", { input_data: "fly" }, env), false);
  });

  test("an unknown action type fails", async () => {
    const { env } = pluginEnv();
    const hooks = parseLifecycleHooks([
      { hook_type: "on_entry", handler_type: "action", handler_config: { action_type: "teleport" } },
    ]);
    assert.strictEqual(await executeLifecycleHooks(hooks, "on_entry", {}, env), false);
  });

  test("builds the action for each run with that run's mode and stops it after", async () => {
    const events: string[] = [];
    actionRegistry.register(
      defineAction({
        name: "wag_tail",
        description: "Wag the tail",
        schema: { description: "Wag the tail", properties: {} },
        defaultConnector: "log",
        connectors: {
          log: (config) => ({
            connect: async () => {
              events.push(`wag in ${config.mode}`);
            },
            stop: () => {
              events.push(`stop in ${config.mode}`);
            },
          }),
        },
      }),
    );
    const { env } = pluginEnv();
    const hooks = parseLifecycleHooks([
      { hook_type: "on_entry", handler_type: "action", handler_config: { action_type: "wag_tail" } },
    ]);

    assert.strictEqual(await executeLifecycleHooks(hooks, "on_entry", { mode_name: "idle" }, env), true);
    assert.strictEqual(await executeLifecycleHooks(hooks, "on_entry", { mode_name: "patrol" }, env), true);
    assert.deepStrictEqual(events, ["wag in idle", "stop in idle", "wag in patrol", "stop in patrol"]);
  });

  test("fails without a plugin context", async () => {
    const { ok } = run({ hook_type: "on_entry", handler_type: "action", handler_config: { action_type: "speak" } });
    assert.strictEqual(await ok, false);
  });
});

// ---------------------------------------------------------------------------
// Map service hook modules
// ---------------------------------------------------------------------------

describe("map service hooks", () => {
  let srv: TestServer;
  const calls: { path: string; body: string }[] = [];
  let failNext = false;

  before(async () => {
    srv = await startServer(async (req, res) => {
      calls.push({ path: req.url ?? "", body: await readBody(req) });
      const status = failNext ? 500 : 200;
      failNext = false;
      res.writeHead(status, { "content-type": "application/json" });
      res.end(JSON.stringify({ message: status === 200 ? "ok" : "service down" }));
    });
  });

  after(async () => {
    await srv.close();
  });

  test("stopSlam saves the map, announces it, then stops SLAM", async () => {
    calls.length = 0;
    const tts = new RecordingTts();
    const reply = await stopSlam({ base_url: srv.url, map_name: "kitchen", tts });
    assert.deepStrictEqual(calls, [
      { path: "/maps/save", body: '{"map_name":"kitchen"}' },
      { path: "/stop/slam", body: "" },
    ]);
    assert.deepStrictEqual(tts.messages, ["Map has been saved successfully."]);
    assert.deepStrictEqual(reply, { status: "success", message: "SLAM process stopped", response: { message: "ok" } });
  });

  test("startNav2 announces navigation", async () => {
    calls.length = 0;
    const tts = new RecordingTts();
    const reply = await startNav2({ base_url: `${srv.url}/`, tts });
    assert.deepStrictEqual(calls.map((c) => c.path), ["/start/nav2"]);
    assert.deepStrictEqual(tts.messages, ["Navigation is ready."]);
    assert.strictEqual(reply.message, "Nav2 process initiated");
  });

  test("a non-200 reply throws with the service message", async () => {
    failNext = true;
    await assert.rejects(stopNav2({ base_url: srv.url }), /^Error: Failed to stop Nav2: service down$/);
  });
});
