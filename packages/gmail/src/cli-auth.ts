import { getAuthUrl, handleCallback, OAUTH_CALLBACK_PATH } from "./auth.js";
import type { GmailMcpConfig } from "./config.js";
import { waitForCallback } from "./oauth-callback-server.js";

/**
 * Interactive consent flow behind `--auth`. Prints go to stderr so the
 * command behaves the same whether or not stdout is attached to a client.
 */
export async function runAuthFlow(config: GmailMcpConfig): Promise<void> {
  const url = await getAuthUrl(config);
  if (!url.success) {
    throw new Error(url.error);
  }

  console.error("Open this URL in a browser and grant read-only Gmail access:\n");
  console.error(url.data);
  console.error("");

  const code = await waitForCallback({
    port: config.authPort,
    callbackPath: OAUTH_CALLBACK_PATH,
  });

  const tokens = await handleCallback(config, code);
  if (!tokens.success) {
    throw new Error(`Authorization failed: ${tokens.error}`);
  }

  console.error(`Tokens saved to ${config.tokensPath}`);
  console.error("Authorization successful. You can now start the MCP server.");
}
