/**
 * mcp_tool: lets the LLM call one tool on a configured MCP server.
 * The server is connected on first use and disconnected when the mode ends.
 */

import { z } from "zod";
import { cortexError } from "../../errors.js";
import { McpManager, type McpServerConfig } from "../../mcp/client.js";
import { parsePluginConfig } from "../../plugins/registry.js";
import { defineAction, type ActionConnector } from "../base.js";
import type { CortexAction } from "../../cortex-types.js";

const mcpConnectorSchema = z.object({
  server: z.string().min(1),
  tool: z.string().min(1),
});

export class McpToolConnector implements ActionConnector {
  private connecting: Promise<void> | null = null;

  constructor(
    private readonly serverName: string,
    private readonly server: McpServerConfig,
    private readonly tool: string,
    private readonly mcp = new McpManager(),
  ) {}

  private ensureConnected(): Promise<void> {
    this.connecting ??= this.mcp.connectAll({ [this.serverName]: this.server });
    return this.connecting;
  }

  async connect(action: CortexAction): Promise<string> {
    await this.ensureConnected();
    return this.mcp.callTool(this.tool, action.args);
  }

  async stop(): Promise<void> {
    if (!this.connecting) return;
    this.connecting = null;
    await this.mcp.disconnectAll();
  }
}

export const mcpToolAction = defineAction({
  name: "mcp_tool",
  description: "Call a tool on an MCP server",
  schema: {
    description: "Run an external tool. Describe the request in plain words.",
    properties: {
      query: { type: "string", description: "The request for the tool" },
    },
    required: ["query"],
  },
  connectors: {
    mcp: (config, ctx) => {
      const { server, tool } = parsePluginConfig("mcp_tool", mcpConnectorSchema, config);
      const serverConfig = Object.hasOwn(ctx.mcpServers, server) ? ctx.mcpServers[server] : undefined;
      if (!serverConfig) {
        throw cortexError("plugin_error", `mcp_tool: no MCP server named '${server}' in mcp_servers`, {
          plugin: "mcp_tool",
          mode: config.mode,
        });
      }
      return new McpToolConnector(server, serverConfig, tool);
    },
  },
  defaultConnector: "mcp",
});
