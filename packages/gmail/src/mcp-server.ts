import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { McpBaseServer } from "@mailshield/mcp-core";
import { generateBoundary } from "./content-sanitizer.js";
import { ToolInputError } from "./errors.js";
import { getGmailTools } from "./mcp-tools.js";
import {
  attachmentResult,
  emailResult,
  errorResult,
  jsonResult,
} from "./response-builder.js";
import {
  buildListQuery,
  optionalString,
  parseAttachmentIndex,
  parseMaxResults,
  requireString,
} from "./tool-args.js";
import type { MailService } from "./types.js";

export const SERVER_NAME = "gmail";
export const SERVER_VERSION = "1.3.0";

export interface GmailMcpServerOptions {
  /** Boundary factory; one call per sanitized response */
  createBoundary?: () => string;
}

/**
 * Read-only Gmail tools. Every response that carries sender-controlled text
 * is boundary-wrapped and preceded by the security preamble.
 */
export class GmailMcpServer extends McpBaseServer {
  private tools: Tool[];
  private createBoundary: () => string;

  constructor(
    private mail: MailService,
    options: GmailMcpServerOptions = {},
  ) {
    super(SERVER_NAME, SERVER_VERSION);
    this.tools = getGmailTools();
    this.createBoundary = options.createBoundary ?? (() => generateBoundary());
  }

  public getTools(): Tool[] {
    return this.tools;
  }

  public async handleToolCall(
    name: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    switch (name) {
      case "list_emails":
        return this.run(name, "Error listing emails", async () => {
          const query = buildListQuery(
            optionalString(args, "query"),
            optionalString(args, "label"),
          );
          const messages = await this.mail.listMessages(
            query,
            parseMaxResults(args),
          );
          return emailResult(messages, this.createBoundary());
        });

      case "read_email":
        return this.run(name, "Error reading email", async () => {
          const id = requireString(args, "id");
          const message = await this.mail.getMessage(id);
          return emailResult(message, this.createBoundary());
        });

      case "search_emails":
        return this.run(name, "Error searching emails", async () => {
          const query = requireString(args, "query");
          const messages = await this.mail.searchMessages(
            query,
            parseMaxResults(args),
          );
          return emailResult(messages, this.createBoundary());
        });

      case "list_labels":
        return this.run(name, "Error listing labels", async () => {
          const labels = await this.mail.listLabels();
          return jsonResult(labels);
        });

      case "get_attachment":
        return this.run(name, "Error fetching attachment", async () => {
          const messageId = requireString(args, "messageId");
          const attachmentIndex = parseAttachmentIndex(args);
          const result = await this.mail.getAttachmentContent(
            messageId,
            attachmentIndex,
          );
          return attachmentResult(result, this.createBoundary());
        });

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  /**
   * Caller mistakes come back verbatim; anything else is logged and
   * reported with the operation prefix.
   */
  private async run(
    toolName: string,
    failurePrefix: string,
    handler: () => Promise<CallToolResult>,
  ): Promise<CallToolResult> {
    try {
      return await handler();
    } catch (error) {
      if (error instanceof ToolInputError) {
        return errorResult(error.message);
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Gmail] ${toolName} failed:`, message);
      return errorResult(`${failurePrefix}: ${message}`);
    }
  }

  public async start(): Promise<void> {
    await super.start();
    console.error("[Gmail] MCP server started");
  }
}
