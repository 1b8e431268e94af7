/**
 * Message bus: the pub/sub seam between the runtime and the outside world
 * (speech recognition, teleops consoles, the robot's own services).
 *
 * The runtime only depends on the MessageBus interface. LocalBus is the
 * in-process implementation used by the CLI and by tests; a network
 * transport plugs in behind the same interface.
 */

import { Logger } from "../logger.js";
import { asError } from "../errors.js";

export type BusHandler = (payload: string, topic: string) => void | Promise<void>;

export type Unsubscribe = () => void;

export interface MessageBus {
  publish(topic: string, payload: string): void;
  subscribe(topic: string, handler: BusHandler): Unsubscribe;
  close(): Promise<void>;
}

export class LocalBus implements MessageBus {
  private topics = new Map<string, Set<BusHandler>>();
  private closed = false;

  publish(topic: string, payload: string): void {
    if (this.closed) {
      Logger.warn(`[Bus] publish on closed bus dropped (${topic})`);
      return;
    }
    const handlers = this.topics.get(topic);
    if (!handlers || handlers.size === 0) return;
    for (const handler of [...handlers]) {
      setImmediate(() => {
        Promise.resolve()
          .then(() => handler(payload, topic))
          .catch((e: unknown) => {
            Logger.error(`[Bus] handler for ${topic} failed: ${asError(e).message}`);
          });
      });
    }
  }

  subscribe(topic: string, handler: BusHandler): Unsubscribe {
    let handlers = this.topics.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.topics.set(topic, handlers);
    }
    handlers.add(handler);
    return () => {
      const set = this.topics.get(topic);
      if (!set) return;
      set.delete(handler);
      if (set.size === 0) this.topics.delete(topic);
    };
  }

  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.topics.clear();
  }
}
