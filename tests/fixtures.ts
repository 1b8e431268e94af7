/**
 * Shared helpers for the test suites: a fake clock, a speech recorder,
 * temp dirs, a polling wait and a small mode system to build on.
 */

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import http from "node:http";
import type { AddressInfo } from "node:net";
import { parseModeConfig } from "../src/modes/loader.js";
import type { ModeSystemConfig } from "../src/modes/config.js";
import type { RawModeSystemConfig } from "../src/modes/schema.js";
import type { TextToSpeech } from "../src/providers/tts-provider.js";

export class RecordingTts implements TextToSpeech {
  messages: string[] = [];

  addPendingMessage(text: string): void {
    this.messages.push(text);
  }
}

export interface FakeClock {
  now: () => number;
  advance(ms: number): void;
}

export function fakeClock(startMs = 1_000_000): FakeClock {
  let t = startMs;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

export function tempDir(prefix = "modecortex-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Poll until `predicate` holds; rejects after `timeoutMs`. */
export async function until(predicate: () => boolean, timeoutMs = 3_000, what = "condition"): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${what}`);
    await new Promise((r) => setTimeout(r, 5));
  }
}

/** Let pending setImmediate callbacks (bus deliveries) run. */
export function flushImmediate(): Promise<void> {
  return new Promise((r) => setImmediate(r));
}

/**
 * Three modes (default, advanced, emergency) with a global EchoLLM and no
 * rules; `overrides` replaces top-level keys.
 */
export function modeSystem(overrides: Partial<RawModeSystemConfig> = {}): ModeSystemConfig {
  return parseModeConfig(
    {
      name: "test_system",
      default_mode: "default",
      cortex_llm: { type: "EchoLLM" },
      modes: {
        default: { display_name: "Default", description: "Default mode" },
        advanced: { display_name: "Advanced", description: "Advanced mode" },
        emergency: { display_name: "Emergency", description: "Emergency mode" },
      },
      ...overrides,
    },
    "test",
    {},
  );
}

export interface TestServer {
  port: number;
  url: string;
  close: () => Promise<void>;
}

export function startServer(handler: http.RequestListener): Promise<TestServer> {
  return new Promise((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const address: AddressInfo | string | null = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({
        port,
        url: `http://127.0.0.1:${port}`,
        close: () => new Promise<void>((r) => server.close(() => r())),
      });
    });
  });
}

export function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.setEncoding("utf-8");
    req.on("data", (d: string) => {
      body += d;
    });
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}
