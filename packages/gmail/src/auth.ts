import { mkdir, readFile, writeFile } from "node:fs/promises";
import { google } from "googleapis";
import { z } from "zod";
import type { GmailMcpConfig } from "./config.js";
import type { Tokens } from "./types.js";

export type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

export type AuthResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export const GMAIL_SCOPES = [
  "https://www.googleapis.com/auth/gmail.readonly",
];

export const OAUTH_CALLBACK_PATH = "/oauth2callback";

const clientSecretFileSchema = z.union([
  z.object({
    installed: z.object({ client_id: z.string(), client_secret: z.string() }),
  }),
  z.object({
    web: z.object({ client_id: z.string(), client_secret: z.string() }),
  }),
]);

const storedTokensSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  expiry: z.coerce.date(),
});

interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

export function getRedirectUri(config: GmailMcpConfig): string {
  return `http://localhost:${config.authPort}${OAUTH_CALLBACK_PATH}`;
}

/**
 * Environment variables win; otherwise the client_secret.json downloaded
 * from the Google Cloud console.
 */
export async function loadClientCredentials(
  config: GmailMcpConfig,
): Promise<AuthResult<ClientCredentials>> {
  if (config.clientId && config.clientSecret) {
    return {
      success: true,
      data: { clientId: config.clientId, clientSecret: config.clientSecret },
    };
  }

  let raw: string;
  try {
    raw = await readFile(config.clientSecretPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return {
        success: false,
        error: `GMAIL_CLIENT_ID and GMAIL_CLIENT_SECRET must be set, or client_secret.json placed at ${config.clientSecretPath}`,
      };
    }
    return { success: false, error: errorMessage(error) };
  }

  try {
    const parsed = clientSecretFileSchema.parse(JSON.parse(raw));
    const entry = "installed" in parsed ? parsed.installed : parsed.web;
    return {
      success: true,
      data: { clientId: entry.client_id, clientSecret: entry.client_secret },
    };
  } catch (error) {
    return {
      success: false,
      error: `Invalid client_secret.json: ${errorMessage(error)}`,
    };
  }
}

export async function createOAuth2Client(
  config: GmailMcpConfig,
): Promise<AuthResult<OAuth2Client>> {
  const credentials = await loadClientCredentials(config);
  if (!credentials.success) return credentials;

  return {
    success: true,
    data: new google.auth.OAuth2(
      credentials.data.clientId,
      credentials.data.clientSecret,
      getRedirectUri(config),
    ),
  };
}

export async function getAuthUrl(
  config: GmailMcpConfig,
): Promise<AuthResult<string>> {
  const result = await createOAuth2Client(config);
  if (!result.success) return result;

  const url = result.data.generateAuthUrl({
    access_type: "offline",
    scope: GMAIL_SCOPES,
    prompt: "consent",
  });
  return { success: true, data: url };
}

export async function handleCallback(
  config: GmailMcpConfig,
  code: string,
): Promise<AuthResult<Tokens>> {
  const clientResult = await createOAuth2Client(config);
  if (!clientResult.success) return clientResult;

  try {
    const { tokens } = await clientResult.data.getToken(code);

    if (!tokens.access_token || !tokens.refresh_token) {
      return { success: false, error: "Failed to obtain tokens from Google" };
    }

    const result: Tokens = {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token,
      expiry: new Date(tokens.expiry_date || Date.now() + 3600 * 1000),
    };

    await saveTokens(config, result);
    return { success: true, data: result };
  } catch (error) {
    const message = errorMessage(error);
    console.error("[Gmail Auth] handleCallback error:", message);
    return { success: false, error: message };
  }
}

export async function saveTokens(
  config: GmailMcpConfig,
  tokens: Tokens,
): Promise<void> {
  await mkdir(config.configDir, { recursive: true, mode: 0o700 });
  const stored = {
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
    expiry: tokens.expiry.toISOString(),
  };
  await writeFile(config.tokensPath, JSON.stringify(stored, null, 2), {
    mode: 0o600,
  });
}

export async function loadTokens(
  config: GmailMcpConfig,
): Promise<Tokens | null> {
  let raw: string;
  try {
    raw = await readFile(config.tokensPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
  return storedTokensSchema.parse(JSON.parse(raw));
}

export async function refreshTokenIfNeeded(
  config: GmailMcpConfig,
): Promise<AuthResult<Tokens>> {
  let stored: Tokens | null;
  try {
    stored = await loadTokens(config);
  } catch (error) {
    return {
      success: false,
      error: `Could not read stored credentials: ${errorMessage(error)}`,
    };
  }
  if (!stored) {
    return {
      success: false,
      error: "No stored credentials found. Run with --auth first.",
    };
  }

  // Still valid, with a five minute buffer
  if (stored.expiry.getTime() > Date.now() + 5 * 60 * 1000) {
    return { success: true, data: stored };
  }

  const clientResult = await createOAuth2Client(config);
  if (!clientResult.success) return clientResult;

  try {
    clientResult.data.setCredentials({ refresh_token: stored.refreshToken });
    const { credentials } = await clientResult.data.refreshAccessToken();

    if (!credentials.access_token) {
      return { success: false, error: "Failed to refresh access token" };
    }

    const updated: Tokens = {
      accessToken: credentials.access_token,
      refreshToken: credentials.refresh_token || stored.refreshToken,
      expiry: new Date(credentials.expiry_date || Date.now() + 3600 * 1000),
    };

    await saveTokens(config, updated);
    return { success: true, data: updated };
  } catch (error) {
    const message = errorMessage(error);
    console.error("[Gmail Auth] refreshTokenIfNeeded error:", message);
    return { success: false, error: message };
  }
}

/**
 * OAuth2 client holding valid credentials. Refreshes performed later by the
 * client itself are written back to the token file.
 */
export async function getAuthenticatedClient(
  config: GmailMcpConfig,
): Promise<AuthResult<OAuth2Client>> {
  const tokenResult = await refreshTokenIfNeeded(config);
  if (!tokenResult.success) return tokenResult;

  const clientResult = await createOAuth2Client(config);
  if (!clientResult.success) return clientResult;

  const client = clientResult.data;
  const tokens = tokenResult.data;
  client.setCredentials({
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    expiry_date: tokens.expiry.getTime(),
  });

  client.on("tokens", (refreshed) => {
    if (!refreshed.access_token) return;
    const updated: Tokens = {
      accessToken: refreshed.access_token,
      refreshToken: refreshed.refresh_token || tokens.refreshToken,
      expiry: new Date(refreshed.expiry_date || Date.now() + 3600 * 1000),
    };
    saveTokens(config, updated).catch((error: unknown) => {
      console.error("[Gmail Auth] Failed to persist refreshed tokens:", errorMessage(error));
    });
  });

  return { success: true, data: client };
}
