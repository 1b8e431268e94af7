import { z } from "zod";
import { cortexError } from "../../errors.js";
import { parsePluginConfig } from "../../plugins/registry.js";
import { defineAction, type ActionConnector } from "../base.js";
import type { MessageBus } from "../../bus/message-bus.js";
import type { CortexAction } from "../../cortex-types.js";

export const MOVES = ["stand still", "sit", "walk", "walk back", "turn left", "turn right", "dance"] as const;

const moveBusSchema = z.object({
  topic: z.string().min(1).default("robot/move"),
});

/** Publishes `{ command, args, timestamp }` for the robot's motion service. */
export class BusMoveConnector implements ActionConnector {
  constructor(
    private readonly bus: MessageBus,
    private readonly topic: string,
  ) {}

  async connect(action: CortexAction): Promise<string> {
    const command = action.value.trim().toLowerCase();
    if (!MOVES.some((m) => m === command)) {
      throw cortexError("plugin_error", `Unknown move '${action.value}'`, { plugin: "move" });
    }
    this.bus.publish(this.topic, JSON.stringify({ command, args: action.args, timestamp: Date.now() }));
    return `moving: ${command}`;
  }
}

export const moveAction = defineAction({
  name: "move",
  description: "Publish a motion command",
  schema: {
    description: "Move the robot body.",
    properties: {
      action: { type: "string", description: "The movement to perform", enum: [...MOVES] },
    },
    required: ["action"],
  },
  connectors: {
    bus: (config, ctx) => new BusMoveConnector(ctx.bus, parsePluginConfig("move", moveBusSchema, config).topic),
  },
  defaultConnector: "bus",
});
