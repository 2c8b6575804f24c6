// packages/mcp-core/src/index.ts
// Shared MCP server boilerplate

export { McpBaseServer, type McpToolDefinition } from "./mcp-base-server.js";
