/**
 * Tests for agent actions.
 *
 * Covers: defineAction (connector choice, relabelling), ActionOrchestrator
 * (dispatch, results, connector tick loops), speak/move/emergency_alert/mcp_tool
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { z } from "zod";
import { ActionOrchestrator } from "../src/actions/orchestrator.js";
import type { ActionConnector, AgentAction } from "../src/actions/base.js";
import { speakAction } from "../src/actions/plugins/speak.js";
import { moveAction, MOVES } from "../src/actions/plugins/move.js";
import { emergencyAlertAction } from "../src/actions/plugins/emergency-alert.js";
import { mcpToolAction } from "../src/actions/plugins/mcp-tool.js";
import { isAbortError, isCortexError } from "../src/errors.js";
import { LocalBus } from "../src/bus/message-bus.js";
import { IOProvider } from "../src/providers/io-provider.js";
import { SleepTicker } from "../src/providers/sleep-ticker.js";
import { sleep } from "../src/utils/retry.js";
import type { CortexAction, PluginContext } from "../src/cortex-types.js";
import { RecordingTts, flushImmediate, until } from "./fixtures.js";

function context() {
  const tts = new RecordingTts();
  const bus = new LocalBus();
  const ctx: PluginContext = { bus, io: new IOProvider(), ticker: new SleepTicker(), tts, mcpServers: {} };
  return { tts, bus, ctx };
}

function call(type: string, value: string, args: Record<string, unknown> = { text: value }): CortexAction {
  return { type, value, args };
}

function stubAction(label: string, connector: ActionConnector): AgentAction {
  return {
    name: label,
    llmLabel: label,
    schema: { description: `${label} things`, properties: {} },
    connector,
    excludeFromPrompt: false,
  };
}

// ---------------------------------------------------------------------------
// defineAction
// ---------------------------------------------------------------------------

describe("defineAction", () => {
  test("uses the default connector and the plugin name as label", () => {
    const { ctx } = context();
    const action = speakAction.factory({ mode: "idle" }, ctx);
    assert.strictEqual(action.name, "speak");
    assert.strictEqual(action.llmLabel, "speak");
    assert.strictEqual(action.excludeFromPrompt, false);
  });

  test("llm_label and exclude_from_prompt come from the manifest", () => {
    const { ctx } = context();
    const action = emergencyAlertAction.factory({ mode: "idle", llm_label: "alarm", exclude_from_prompt: true }, ctx);
    assert.strictEqual(action.name, "emergency_alert");
    assert.strictEqual(action.llmLabel, "alarm");
    assert.strictEqual(action.excludeFromPrompt, true);
  });

  test("an unknown connector is a plugin error", () => {
    const { ctx } = context();
    assert.throws(
      () => speakAction.factory({ mode: "idle", connector: "carrier_pigeon" }, ctx),
      (e: unknown) =>
        isCortexError(e) &&
        e.kind === "plugin_error" &&
        e.message === "Action 'speak' has no connector 'carrier_pigeon'. Available: tts, log",
    );
  });
});

// ---------------------------------------------------------------------------
// Built-in actions
// ---------------------------------------------------------------------------

describe("built-in actions", () => {
  test("speak queues the sentence for text-to-speech", async () => {
    const { tts, ctx } = context();
    const action = speakAction.factory({ mode: "idle" }, ctx);
    assert.strictEqual(await action.connector.connect(call("speak", "Hello there")), "said: Hello there");
    assert.deepStrictEqual(tts.messages, ["Hello there"]);
  });

  test("speak through the log connector does not use tts", async () => {
    const { tts, ctx } = context();
    const action = speakAction.factory({ mode: "idle", connector: "log" }, ctx);
    assert.strictEqual(await action.connector.connect(call("speak", "quiet")), "said: quiet");
    assert.deepStrictEqual(tts.messages, []);
  });

  test("move publishes a normalised command", async () => {
    const { bus, ctx } = context();
    const received: string[] = [];
    bus.subscribe("robot/move", (payload) => {
      received.push(payload);
    });
    const action = moveAction.factory({ mode: "idle" }, ctx);
    const result = await action.connector.connect(call("move", " Turn Left ", { action: "turn left" }));
    assert.strictEqual(result, "moving: turn left");

    await flushImmediate();
    const published = z
      .object({ command: z.string(), args: z.record(z.unknown()), timestamp: z.number() })
      .parse(JSON.parse(received[0] ?? ""));
    assert.strictEqual(published.command, "turn left");
    assert.deepStrictEqual(published.args, { action: "turn left" });
  });

  test("move honours a custom topic", async () => {
    const { bus, ctx } = context();
    let count = 0;
    bus.subscribe("dog/legs", () => {
      count++;
    });
    const action = moveAction.factory({ mode: "idle", topic: "dog/legs" }, ctx);
    await action.connector.connect(call("move", "sit"));
    await flushImmediate();
    assert.strictEqual(count, 1);
  });

  test("move rejects unknown movements", async () => {
    const { ctx } = context();
    const action = moveAction.factory({ mode: "idle" }, ctx);
    await assert.rejects(action.connector.connect(call("move", "moonwalk")), /Unknown move 'moonwalk'/);
  });

  test("the move schema lists every movement", () => {
    const { ctx } = context();
    const action = moveAction.factory({ mode: "idle" }, ctx);
    assert.deepStrictEqual(action.schema.properties.action?.enum, [...MOVES]);
  });

  test("emergency_alert prefixes the announcement", async () => {
    const { tts, ctx } = context();
    const action = emergencyAlertAction.factory({ mode: "idle" }, ctx);
    assert.strictEqual(await action.connector.connect(call("emergency_alert", "Fire in the lab")), "alerted: Fire in the lab");
    assert.deepStrictEqual(tts.messages, ["Attention. Fire in the lab"]);
  });

  test("mcp_tool needs a configured server", () => {
    const { ctx } = context();
    assert.throws(
      () => mcpToolAction.factory({ mode: "idle", server: "maps", tool: "route" }, ctx),
      (e: unknown) => isCortexError(e) && e.message === "mcp_tool: no MCP server named 'maps' in mcp_servers",
    );
  });

  test("mcp_tool builds without connecting", () => {
    const { ctx } = context();
    ctx.mcpServers = { maps: { command: "maps-server" } };
    const action = mcpToolAction.factory({ mode: "idle", server: "maps", tool: "route" }, ctx);
    assert.strictEqual(action.llmLabel, "mcp_tool");
  });
});

// ---------------------------------------------------------------------------
// ActionOrchestrator
// ---------------------------------------------------------------------------

describe("ActionOrchestrator", () => {
  test("dispatches without blocking and reports results on flush", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = () => r();
    });
    const orchestrator = new ActionOrchestrator([
      stubAction("wave", {
        connect: async (a) => {
          await gate;
          return `waved ${a.value}`;
        },
      }),
    ]);

    orchestrator.promise([call("wave", "hello")]);
    assert.strictEqual(orchestrator.pendingCount, 1);
    assert.deepStrictEqual(orchestrator.flushPromises(), []);

    release();
    await until(() => orchestrator.pendingCount === 0, 1_000, "action to finish");
    assert.deepStrictEqual(orchestrator.flushPromises(), [
      { action: call("wave", "hello"), ok: true, output: "waved hello" },
    ]);
    assert.deepStrictEqual(orchestrator.flushPromises(), []);
  });

  test("failures are reported, unknown actions skipped, labels matched case-insensitively", async () => {
    const orchestrator = new ActionOrchestrator([
      stubAction("wave", {
        connect: async () => {
          throw new Error("arm stuck");
        },
      }),
      stubAction("nod", { connect: async () => undefined }),
    ]);

    orchestrator.promise([call("WAVE", "hi"), call("juggle", "balls"), call("nod", "yes")]);
    await until(() => orchestrator.pendingCount === 0, 1_000, "actions to finish");
    assert.deepStrictEqual(orchestrator.flushPromises(), [
      { action: call("WAVE", "hi"), ok: false, error: "arm stuck" },
      { action: call("nod", "yes"), ok: true },
    ]);
  });

  test("start runs connector ticks until aborted, then stops connectors", async () => {
    let ticks = 0;
    let stopped = false;
    const orchestrator = new ActionOrchestrator([
      stubAction("patrol", {
        connect: async () => undefined,
        tick: async () => {
          ticks++;
        },
        tickIntervalMs: 5,
        stop: () => {
          stopped = true;
        },
      }),
    ]);
    const controller = new AbortController();
    const running = orchestrator.start(controller.signal);
    await sleep(40);
    controller.abort();

    await assert.rejects(running, (e: unknown) => isAbortError(e));
    assert.ok(ticks >= 2, `expected several ticks, got ${ticks}`);
    assert.strictEqual(stopped, true);
  });
});
