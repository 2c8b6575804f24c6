import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  type Tool,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";

/**
 * MCP tool definition. `inputSchema` is a JSON Schema object.
 */
export type McpToolDefinition = Tool;

/**
 * Base class that absorbs the MCP server boilerplate.
 *
 * Subclasses implement `getTools()` and `handleToolCall()`. Registration of the
 * ListTools / CallTool handlers and the stdio connection live here.
 */
export abstract class McpBaseServer {
  protected server: Server;

  constructor(name: string, version: string) {
    this.server = new Server(
      { name, version },
      { capabilities: { tools: {} } },
    );
    this.setupHandlers();
  }

  public abstract getTools(): McpToolDefinition[];

  /**
   * Route one tool call by name and build the complete MCP result
   * (content parts, `isError`). Throwing for an unknown name lets the SDK
   * answer with a protocol error.
   */
  public abstract handleToolCall(
    name: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult>;

  /**
   * Same path the CallTool handler takes; exposed for in-process callers.
   */
  public async callTool(
    name: string,
    args: Record<string, unknown> = {},
  ): Promise<CallToolResult> {
    return this.handleToolCall(name, args);
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
