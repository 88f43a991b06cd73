import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { CallToolResult, CallToolResultSchema, Tool } from "@modelcontextprotocol/sdk/types.js";
import { ILogger } from "../logger";
import { describeError, ToolProviderError } from "../errors";

export const CLIENT_INFO = { name: "mcp-chat", version: "1.0.0" } as const;
const TOOL_CALL_TIMEOUT_MS = 300000; // 5 min

export interface ToolProviderParams {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

/** The slice of the tool-provider connection the agent depends on. */
export interface ToolProvider {
  getTools(): Promise<Tool[]>;
  executeTool(name: string, args: Record<string, unknown>, options?: { signal?: AbortSignal }): Promise<CallToolResult>;
}

/** A tool provider the client starts and stops itself. */
export interface ToolProviderConnection extends ToolProvider {
  connect(params: ToolProviderParams): Promise<void>;
  disconnect(): Promise<void>;
}

export class MCPClient implements ToolProviderConnection {
  private client: Client | null = null;

  constructor(private readonly logger: ILogger) {}

  /**
   * Spawns the tool-provider and runs the initialize handshake over its stdio.
   */
  async connect(params: ToolProviderParams): Promise<void> {
    if (this.client) {
      await this.disconnect();
    }
    await this.logger.info('MCP', 'Starting tool provider', { command: params.command, args: params.args });

    const client = new Client(CLIENT_INFO, { capabilities: {} });
    const transport = new StdioClientTransport({
      command: params.command,
      args: params.args,
      env: params.env,
    });

    try {
      await client.connect(transport);
    } catch (error) {
      await this.logger.error('MCP', 'Handshake with tool provider failed', { error: describeError(error) });
      await transport.close();
      throw new ToolProviderError(
        `Failed to connect to tool provider "${[params.command, ...params.args].join(" ")}": ${describeError(error)}`,
        undefined,
        { cause: error }
      );
    }

    this.client = client;
    await this.logger.info('MCP', 'Connected to tool provider', { serverVersion: client.getServerVersion() });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;

    try {
      await client.close();
      await this.logger.info('MCP', 'Tool provider connection closed');
    } catch (error) {
      await this.logger.warn('MCP', 'Error closing tool provider connection', { error: describeError(error) });
    }
  }

  async getTools(): Promise<Tool[]> {
    const response = await this.requireClient().listTools();
    await this.logger.debug('MCP', 'Listed tools', { tools: response.tools.map(tool => tool.name) });
    return response.tools;
  }

  async executeTool(name: string, args: Record<string, unknown>, options?: { signal?: AbortSignal }): Promise<CallToolResult> {
    const client = this.requireClient();
    await this.logger.debug('MCP', 'Calling tool', { name, args });

    const result = await client.callTool({
      name,
      arguments: args
    }, CallToolResultSchema, {
      timeout: TOOL_CALL_TIMEOUT_MS,
      signal: options?.signal
    });

    const parsed = CallToolResultSchema.parse(result);
    if (parsed.isError) {
      await this.logger.warn('MCP', 'Tool reported an error', { name });
    }
    return parsed;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new ToolProviderError('Not connected to a tool provider');
    }
    return this.client;
  }
}
