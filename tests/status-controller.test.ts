/**
 * Tests for the mode-status wire protocol and its controller.
 *
 * Covers: decodeRequest, prepareHeader, ModeStatusController query and
 * switch handling, malformed requests
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { tmpdir } from "node:os";
import { z } from "zod";
import { LocalBus } from "../src/bus/message-bus.js";
import { ModeManager } from "../src/modes/manager.js";
import { ModeStatusController } from "../src/modes/status-controller.js";
import {
  MODE_REQUEST_TOPIC,
  MODE_RESPONSE_TOPIC,
  decodeRequest,
  prepareHeader,
} from "../src/modes/status-protocol.js";
import { modeSystem, until } from "./fixtures.js";

const responseSchema = z.object({
  header: z.object({ frame_id: z.string(), stamp: z.object({ sec: z.number(), nanosec: z.number() }) }),
  request_id: z.string(),
  code: z.number(),
  current_mode: z.string(),
  message: z.string(),
});

type StatusResponse = z.infer<typeof responseSchema>;

function setup() {
  const bus = new LocalBus();
  const manager = new ModeManager(modeSystem(), { hookEnv: { hooksDir: tmpdir() }, stateStore: null });
  const controller = new ModeStatusController(manager, bus);
  const responses: StatusResponse[] = [];
  bus.subscribe(MODE_RESPONSE_TOPIC, (payload) => {
    responses.push(responseSchema.parse(JSON.parse(payload)));
  });
  controller.start();
  const send = (request: unknown) => bus.publish(MODE_REQUEST_TOPIC, typeof request === "string" ? request : JSON.stringify(request));
  return { bus, manager, controller, responses, send };
}

// ---------------------------------------------------------------------------
// Protocol
// ---------------------------------------------------------------------------

describe("decodeRequest", () => {
  test("accepts a query without header or mode", () => {
    const decoded = decodeRequest(JSON.stringify({ request_id: "r1", code: 1 }));
    assert.deepStrictEqual(decoded, { ok: true, request: { header: { frame_id: "" }, request_id: "r1", code: 1 } });
  });

  test("a switch without a mode is malformed but keeps its id", () => {
    const decoded = decodeRequest(JSON.stringify({ request_id: "r2", code: 0, header: { frame_id: "map" } }));
    assert.deepStrictEqual(decoded, {
      ok: false,
      error: "mode: switch requests need a target mode",
      requestId: "r2",
      frameId: "map",
    });
  });

  test("an unknown code is malformed", () => {
    const decoded = decodeRequest(JSON.stringify({ request_id: "r3", code: 7 }));
    assert.strictEqual(decoded.ok, false);
    if (!decoded.ok) assert.strictEqual(decoded.requestId, "r3");
  });

  test("invalid JSON has no request id", () => {
    const decoded = decodeRequest("{{");
    assert.strictEqual(decoded.ok, false);
    if (!decoded.ok) {
      assert.strictEqual(decoded.requestId, null);
      assert.match(decoded.error, /^invalid JSON: /);
    }
  });
});

describe("prepareHeader", () => {
  test("splits milliseconds into seconds and nanoseconds", () => {
    assert.deepStrictEqual(prepareHeader("base_link", 1_500_250), {
      frame_id: "base_link",
      stamp: { sec: 1500, nanosec: 250_000_000 },
    });
  });
});

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

describe("ModeStatusController", () => {
  test("answers a query with the mode info", async () => {
    const { send, responses, controller } = setup();
    send({ request_id: "q1", code: 1, header: { frame_id: "odom" } });
    await until(() => responses.length === 1, 2_000, "query response");

    const [response] = responses;
    assert.strictEqual(response?.request_id, "q1");
    assert.strictEqual(response?.code, 0);
    assert.strictEqual(response?.current_mode, "default");
    assert.strictEqual(response?.header.frame_id, "odom");
    const info = z.object({ current_mode: z.string(), all_modes: z.array(z.string()) }).parse(JSON.parse(response?.message ?? ""));
    assert.deepStrictEqual(info, { current_mode: "default", all_modes: ["default", "advanced", "emergency"] });
    controller.stop();
  });

  test("switches mode and reports success", async () => {
    const { send, responses, manager, controller } = setup();
    send({ request_id: "s1", code: 0, mode: "advanced" });
    await until(() => responses.length === 1, 2_000, "switch response");
    await controller.idle();

    assert.strictEqual(manager.currentModeName, "advanced");
    assert.deepStrictEqual(
      responses.map((r) => [r.request_id, r.code, r.current_mode, r.message]),
      [["s1", 0, "advanced", "Successfully switched to mode advanced"]],
    );
    controller.stop();
  });

  test("a switch to an unknown mode reports failure", async () => {
    const { send, responses, manager, controller } = setup();
    send({ request_id: "s2", code: 0, mode: "ghost" });
    await until(() => responses.length === 1, 2_000, "switch response");

    assert.strictEqual(manager.currentModeName, "default");
    assert.deepStrictEqual(
      responses.map((r) => [r.code, r.current_mode, r.message]),
      [[1, "default", "Failed to switch to mode ghost"]],
    );
    controller.stop();
  });

  test("a malformed request with an id gets a failure response", async () => {
    const { send, responses, controller } = setup();
    send({ request_id: "bad", code: 0 });
    await until(() => responses.length === 1, 2_000, "failure response");
    assert.strictEqual(responses[0]?.code, 1);
    assert.strictEqual(responses[0]?.message, "Invalid request: mode: switch requests need a target mode");
    controller.stop();
  });

  test("an unreadable request is dropped", async () => {
    const { send, responses, controller } = setup();
    send("definitely not json");
    send({ request_id: "q2", code: 1 });
    await until(() => responses.length === 1, 2_000, "query response");
    await new Promise((r) => setTimeout(r, 20));
    assert.deepStrictEqual(
      responses.map((r) => r.request_id),
      ["q2"],
    );
    controller.stop();
  });

  test("stop unsubscribes from the request topic", () => {
    const { bus, controller } = setup();
    assert.strictEqual(bus.subscriberCount(MODE_REQUEST_TOPIC), 1);
    controller.stop();
    assert.strictEqual(bus.subscriberCount(MODE_REQUEST_TOPIC), 0);
  });
});
