#!/usr/bin/env node
import { google } from "googleapis";
import { getAuthenticatedClient } from "./auth.js";
import { runAuthFlow } from "./cli-auth.js";
import { loadConfig } from "./config.js";
import { GmailClient } from "./gmail-client.js";
import { GmailMcpServer } from "./mcp-server.js";

async function main() {
  const config = loadConfig();

  if (process.argv.includes("--auth")) {
    await runAuthFlow(config);
    return;
  }

  const authResult = await getAuthenticatedClient(config);
  if (!authResult.success) {
    throw new Error(authResult.error);
  }

  const gmail = google.gmail({ version: "v1", auth: authResult.data });
  const server = new GmailMcpServer(
    new GmailClient(gmail, config.attachmentsDir),
  );

  const shutdown = () => {
    console.error("[Gmail] Shutting down MCP server");
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("[Gmail] Error while closing:", error);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await server.start();
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
