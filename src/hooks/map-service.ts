/**
 * Client for the robot's local map/navigation service, shared by the
 * `slam` and `nav2` hook modules.
 */

import { z } from "zod";
import { Logger } from "../logger.js";
import { timedFetch } from "../utils/timed-fetch.js";

export const DEFAULT_MAP_SERVICE_URL = "http://localhost:5000";

export interface ServiceReply {
  status: "success";
  message: string;
  response: unknown;
}

interface Speaker {
  addPendingMessage(text: string): void;
}

const messageBody = z.object({ message: z.string() }).passthrough();

export function baseUrl(context: Record<string, unknown>): string {
  const url = context.base_url;
  return (typeof url === "string" && url ? url : DEFAULT_MAP_SERVICE_URL).replace(/\/+$/, "");
}

export function speaker(context: Record<string, unknown>): Speaker | null {
  const tts = context.tts;
  if (typeof tts === "object" && tts !== null && "addPendingMessage" in tts && typeof tts.addPendingMessage === "function") {
    const add = tts.addPendingMessage.bind(tts);
    return { addPendingMessage: (text: string) => { add(text); } };
  }
  return null;
}

/** POST to `url`; any non-200 status throws with the service's message. */
export async function postService(
  url: string,
  what: string,
  body?: Record<string, unknown>,
  timeoutMs = 5_000,
): Promise<unknown> {
  const res = await timedFetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    ...(body ? { body: JSON.stringify(body) } : {}),
    timeoutMs,
    where: `hook:${what}`,
  });
  const json: unknown = await res.json().catch(() => ({}));
  const parsed = messageBody.safeParse(json);
  const message = parsed.success ? parsed.data.message : res.ok ? "Success" : "Unknown error";
  if (res.status !== 200) {
    Logger.error(`[Hooks] failed to ${what}: ${message}`);
    throw new Error(`Failed to ${what}: ${message}`);
  }
  Logger.info(`[Hooks] ${what}: ${message}`);
  return json;
}
