import { createServer } from "node:http";
import { URL } from "node:url";

export interface WaitForCallbackOptions {
  port: number;
  callbackPath: string;
  codeParam?: string;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Start a local HTTP server and wait for the OAuth redirect.
 * Resolves with the authorization code once it arrives.
 */
export function waitForCallback(
  options: WaitForCallbackOptions,
): Promise<string> {
  const { port, callbackPath, codeParam = "code" } = options;

  return new Promise((resolve, reject) => {
    const server = createServer((req, res) => {
      const reqUrl = new URL(req.url || "/", `http://localhost:${port}`);

      if (reqUrl.pathname === callbackPath) {
        const code = reqUrl.searchParams.get(codeParam);
        if (code) {
          res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
          res.end("<h1>Authorization complete</h1><p>You can close this tab.</p>");
          console.error("[Gmail Auth] Authorization code received");
          server.close();
          resolve(code);
        } else {
          const error = reqUrl.searchParams.get("error") || "unknown";
          res.writeHead(400, { "Content-Type": "text/html; charset=utf-8" });
          res.end(`<h1>Authorization failed</h1><p>${escapeHtml(error)}</p>`);
          server.close();
          reject(new Error(`OAuth auth error: ${error}`));
        }
      } else {
        res.writeHead(404);
        res.end("Not Found");
      }
    });

    server.listen(port, "127.0.0.1", () => {
      console.error(`[Gmail Auth] Waiting for callback on http://localhost:${port}${callbackPath}`);
    });

    server.on("error", (err) => {
      reject(new Error(`Failed to start callback server: ${err.message}`));
    });
  });
}
