/**
 * Mode-status messages exchanged on the bus.
 *
 *   request:  { header, request_id, code: 0 (switch) | 1 (query), mode? }
 *   response: { header, request_id, code: 0 (success) | 1 (failure), current_mode, message }
 */

import { z } from "zod";
import { asError } from "../errors.js";

export const MODE_REQUEST_TOPIC = "mode/request";
export const MODE_RESPONSE_TOPIC = "mode/response";

export const RequestCode = { SWITCH: 0, QUERY: 1 } as const;
export const ResponseCode = { SUCCESS: 0, FAILURE: 1 } as const;

const headerSchema = z.object({
  frame_id: z.string().default(""),
  stamp: z.object({ sec: z.number().int(), nanosec: z.number().int() }).optional(),
});

export const modeStatusRequestSchema = z
  .object({
    header: headerSchema.default({}),
    request_id: z.string().min(1),
    code: z.union([z.literal(RequestCode.SWITCH), z.literal(RequestCode.QUERY)]),
    mode: z.string().min(1).optional(),
  })
  .refine((r) => r.code !== RequestCode.SWITCH || r.mode !== undefined, {
    message: "switch requests need a target mode",
    path: ["mode"],
  });

export type ModeStatusRequest = z.infer<typeof modeStatusRequestSchema>;

export interface ModeStatusResponse {
  header: { frame_id: string; stamp: { sec: number; nanosec: number } };
  request_id: string;
  code: (typeof ResponseCode)[keyof typeof ResponseCode];
  current_mode: string;
  message: string;
}

export type DecodeResult =
  | { ok: true; request: ModeStatusRequest }
  | { ok: false; error: string; requestId: string | null; frameId: string };

const recoverable = z
  .object({
    request_id: z.string().min(1),
    header: z.object({ frame_id: z.string() }).partial().optional(),
  })
  .passthrough();

export function decodeRequest(payload: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (e: unknown) {
    return { ok: false, error: `invalid JSON: ${asError(e).message}`, requestId: null, frameId: "" };
  }
  const parsed = modeStatusRequestSchema.safeParse(raw);
  if (parsed.success) return { ok: true, request: parsed.data };

  const issue = parsed.error.issues[0];
  const error = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid request";
  const partial = recoverable.safeParse(raw);
  return {
    ok: false,
    error,
    requestId: partial.success ? partial.data.request_id : null,
    frameId: partial.success ? partial.data.header?.frame_id ?? "" : "",
  };
}

export function prepareHeader(frameId: string, nowMs = Date.now()): ModeStatusResponse["header"] {
  const sec = Math.floor(nowMs / 1000);
  return { frame_id: frameId, stamp: { sec, nanosec: Math.round((nowMs - sec * 1000) * 1e6) } };
}

export function encodeResponse(response: ModeStatusResponse): string {
  return JSON.stringify(response);
}
