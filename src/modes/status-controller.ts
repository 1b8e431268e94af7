/**
 * Answers mode-status requests from the bus on behalf of a ModeManager.
 *
 * Queries are answered immediately. Switches go through the manager's
 * serial queue; the bus handler returns at once and the response is
 * published when the switch has completed.
 */

import { Logger } from "../logger.js";
import { asError, cortexError, errorLogFields } from "../errors.js";
import type { MessageBus, Unsubscribe } from "../bus/message-bus.js";
import type { ModeManager } from "./manager.js";
import {
  MODE_REQUEST_TOPIC,
  MODE_RESPONSE_TOPIC,
  RequestCode,
  ResponseCode,
  decodeRequest,
  encodeResponse,
  prepareHeader,
  type ModeStatusResponse,
} from "./status-protocol.js";

export interface StatusTopics {
  request: string;
  response: string;
}

export class ModeStatusController {
  private unsubscribe: Unsubscribe | null = null;
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly manager: ModeManager,
    private readonly bus: MessageBus,
    readonly topics: StatusTopics = { request: MODE_REQUEST_TOPIC, response: MODE_RESPONSE_TOPIC },
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe(this.topics.request, (payload) => this.handle(payload));
    Logger.debug(`[ModeStatus] listening on ${this.topics.request}`);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Resolves once every accepted switch request has been answered. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) await Promise.all([...this.inFlight]);
  }

  handle(payload: string): void {
    const decoded = decodeRequest(payload);
    if (!decoded.ok) {
      const ce = cortexError("wire_error", `malformed mode status request: ${decoded.error}`);
      Logger.warn("[ModeStatus]", errorLogFields(ce));
      if (decoded.requestId !== null) {
        this.respond(decoded.frameId, decoded.requestId, ResponseCode.FAILURE, `Invalid request: ${decoded.error}`);
      }
      return;
    }

    const { request } = decoded;
    Logger.info(`[ModeStatus] request ${request.request_id}: code=${request.code}${request.mode ? ` mode=${request.mode}` : ""}`);
    const frameId = request.header.frame_id;

    if (request.code === RequestCode.QUERY) {
      this.respond(frameId, request.request_id, ResponseCode.SUCCESS, JSON.stringify(this.manager.getModeInfo()));
      return;
    }

    const target = request.mode ?? "";
    const job: Promise<void> = this.manager
      .requestTransition(target, "manual")
      .then((ok) => {
        this.respond(
          frameId,
          request.request_id,
          ok ? ResponseCode.SUCCESS : ResponseCode.FAILURE,
          ok ? `Successfully switched to mode ${target}` : `Failed to switch to mode ${target}`,
        );
      })
      .catch((e: unknown) => {
        Logger.error(`[ModeStatus] switch to ${target} failed: ${asError(e).message}`);
        this.respond(frameId, request.request_id, ResponseCode.FAILURE, `Failed to switch to mode ${target}`);
      })
      .finally(() => {
        this.inFlight.delete(job);
      });
    this.inFlight.add(job);
  }

  private respond(frameId: string, requestId: string, code: ModeStatusResponse["code"], message: string): void {
    const response: ModeStatusResponse = {
      header: prepareHeader(frameId),
      request_id: requestId,
      code,
      current_mode: this.manager.currentModeName,
      message,
    };
    this.bus.publish(this.topics.response, encodeResponse(response));
  }
}
