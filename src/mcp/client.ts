/**
 * MCP client: connects to MCP servers over stdio, discovers their tools
 * and routes tool calls. Used by the `mcp` action connector.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { Logger } from "../logger.js";
import { cortexError, asError, errorLogFields } from "../errors.js";

export interface McpServerConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** Tool call timeout in ms. Default: 30 seconds. */
  timeout?: number;
}

export interface McpTool {
  name: string;
  description?: string;
  /** Which MCP server provides this tool. */
  serverName: string;
}

interface ConnectedServer {
  name: string;
  client: Client;
  tools: McpTool[];
  timeout: number;
}

const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

function inheritedEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (typeof v === "string") env[k] = v;
  }
  return { ...env, ...extra };
}

function renderContent(item: unknown): string {
  if (typeof item === "object" && item !== null && "type" in item && item.type === "text" && "text" in item) {
    return String(item.text);
  }
  return JSON.stringify(item);
}

export class McpManager {
  private servers = new Map<string, ConnectedServer>();
  private configs = new Map<string, McpServerConfig>();

  /**
   * Connect to the given servers. A server that fails to connect is logged
   * and left out; the others stay usable.
   */
  async connectAll(configs: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(configs);
    if (entries.length === 0) return;

    Logger.debug(`[MCP] connecting to ${entries.length} server(s)...`);

    await Promise.all(
      entries.map(([name, cfg]) => {
        this.configs.set(name, cfg);
        return this.connectOne(name, cfg).catch((e: unknown) => {
          const ce = cortexError("provider_error", `MCP server "${name}" failed to connect: ${asError(e).message}`, {
            plugin: "mcp",
            retryable: true,
            cause: e,
          });
          Logger.warn(ce.message, errorLogFields(ce));
        });
      }),
    );
  }

  private async reconnectServer(name: string): Promise<ConnectedServer> {
    const cfg = this.configs.get(name);
    if (!cfg) throw new Error(`No config stored for MCP server "${name}"`);
    const old = this.servers.get(name);
    if (old) {
      await old.client.close().catch((e: unknown) => {
        Logger.debug(`[MCP] "${name}" close error: ${asError(e).message}`);
      });
      this.servers.delete(name);
    }
    Logger.info(`[MCP] "${name}": reconnecting...`);
    return this.connectOne(name, cfg);
  }

  private async connectOne(name: string, cfg: McpServerConfig): Promise<ConnectedServer> {
    const transport = new StdioClientTransport({
      command: cfg.command,
      args: cfg.args ?? [],
      env: inheritedEnv(cfg.env),
      cwd: cfg.cwd,
      stderr: "pipe",
    });

    const client = new Client({ name: "modecortex", version: "0.1.0" }, { capabilities: {} });
    await client.connect(transport);

    const { tools } = await client.listTools();
    const server: ConnectedServer = {
      name,
      client,
      tools: tools.map((t) => ({ name: t.name, description: t.description, serverName: name })),
      timeout: cfg.timeout ?? DEFAULT_TOOL_TIMEOUT_MS,
    };
    this.servers.set(name, server);
    Logger.debug(`[MCP] "${name}": ${server.tools.length} tool(s) available`);
    return server;
  }

  listTools(): McpTool[] {
    return Array.from(this.servers.values()).flatMap((s) => s.tools);
  }

  hasTool(name: string): boolean {
    return this.listTools().some((t) => t.name === name);
  }

  /**
   * Call a tool, routed to the server that provides it.
   * On disconnect errors, reconnects once and retries.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    const server = Array.from(this.servers.values()).find((s) => s.tools.some((t) => t.name === name));
    if (!server) {
      throw cortexError("provider_error", `No MCP server provides tool "${name}"`, { plugin: "mcp" });
    }

    const attempt = async (target: ConnectedServer): Promise<string> => {
      const result = await target.client.callTool({ name, arguments: args }, undefined, { timeout: target.timeout });
      const content: unknown = result.content;
      if (Array.isArray(content)) return content.map(renderContent).join("\n");
      return JSON.stringify(result);
    };

    try {
      return await attempt(server);
    } catch (e: unknown) {
      const err = asError(e);
      const isDisconnect = err.message.includes("Not connected") || err.message.includes("Connection closed");
      let failure: unknown = e;
      if (isDisconnect && this.configs.has(server.name)) {
        Logger.warn(`[MCP] "${server.name}" disconnected, retrying ${name}`);
        try {
          return await attempt(await this.reconnectServer(server.name));
        } catch (retryErr: unknown) {
          failure = retryErr;
        }
      }
      const ce = cortexError("provider_error", `MCP tool "${name}" (server: ${server.name}) failed: ${asError(failure).message}`, {
        plugin: "mcp",
        retryable: true,
        cause: failure,
      });
      Logger.error(`[MCP] tool call failed [${server.name}/${name}]:`, errorLogFields(ce));
      throw ce;
    }
  }

  async disconnectAll(): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.client.close();
      } catch (e: unknown) {
        Logger.debug(`[MCP] "${server.name}" close error: ${asError(e).message}`);
      }
    }
    this.servers.clear();
  }
}
