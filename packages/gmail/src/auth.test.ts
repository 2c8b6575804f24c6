import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, type GmailMcpConfig } from "./config.js";

const oauth = vi.hoisted(() => ({
  construct: vi.fn(),
  generateAuthUrl: vi.fn(),
  getToken: vi.fn(),
  setCredentials: vi.fn(),
  refreshAccessToken: vi.fn(),
  on: vi.fn(),
}));

vi.mock("googleapis", () => ({
  google: {
    auth: {
      OAuth2: function MockOAuth2(...args: unknown[]) {
        oauth.construct(...args);
        return {
          generateAuthUrl: oauth.generateAuthUrl,
          getToken: oauth.getToken,
          setCredentials: oauth.setCredentials,
          refreshAccessToken: oauth.refreshAccessToken,
          on: oauth.on,
        };
      },
    },
  },
}));

import {
  GMAIL_SCOPES,
  createOAuth2Client,
  getAuthUrl,
  getAuthenticatedClient,
  getRedirectUri,
  handleCallback,
  loadClientCredentials,
  loadTokens,
  refreshTokenIfNeeded,
  saveTokens,
} from "./auth.js";

const HOUR = 3600 * 1000;

describe("gmail auth", () => {
  let tmp: string;
  let config: GmailMcpConfig;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmp = await mkdtemp(join(tmpdir(), "gmail-auth-"));
    config = loadConfig(
      {
        GMAIL_MCP_HOME: join(tmp, "config"),
        GMAIL_CLIENT_ID: "test-client-id",
        GMAIL_CLIENT_SECRET: "test-secret",
      },
      "",
    );
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  async function writeClientSecret(content: string): Promise<GmailMcpConfig> {
    const fileConfig = loadConfig({ GMAIL_MCP_HOME: join(tmp, "config") }, "");
    await mkdir(fileConfig.configDir, { recursive: true });
    await writeFile(fileConfig.clientSecretPath, content);
    return fileConfig;
  }

  describe("loadClientCredentials", () => {
    it("should prefer the environment", async () => {
      const result = await loadClientCredentials(config);

      expect(result).toEqual({
        success: true,
        data: { clientId: "test-client-id", clientSecret: "test-secret" },
      });
    });

    it("should read an installed-app client_secret.json", async () => {
      const fileConfig = await writeClientSecret(
        JSON.stringify({
          installed: { client_id: "file-client-id", client_secret: "file-secret" },
        }),
      );

      const result = await loadClientCredentials(fileConfig);

      expect(result).toEqual({
        success: true,
        data: { clientId: "file-client-id", clientSecret: "file-secret" },
      });
    });

    it("should read a web-app client_secret.json", async () => {
      const fileConfig = await writeClientSecret(
        JSON.stringify({ web: { client_id: "web-id", client_secret: "web-secret" } }),
      );

      const result = await loadClientCredentials(fileConfig);

      expect(result).toEqual({
        success: true,
        data: { clientId: "web-id", clientSecret: "web-secret" },
      });
    });

    it("should explain what to configure when nothing is available", async () => {
      const bare = loadConfig({ GMAIL_MCP_HOME: join(tmp, "config") }, "");

      const result = await loadClientCredentials(bare);

      expect(result).toEqual({
        success: false,
        error: `GMAIL_CLIENT_ID and GMAIL_CLIENT_SECRET must be set, or client_secret.json placed at ${bare.clientSecretPath}`,
      });
    });

    it("should reject a malformed client_secret.json", async () => {
      const fileConfig = await writeClientSecret(JSON.stringify({ other: {} }));

      const result = await loadClientCredentials(fileConfig);

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toMatch(/^Invalid client_secret\.json: /);
    });
  });

  describe("createOAuth2Client", () => {
    it("should point the redirect at the local callback server", async () => {
      const result = await createOAuth2Client(config);

      expect(result.success).toBe(true);
      expect(getRedirectUri(config)).toBe("http://localhost:3951/oauth2callback");
      expect(oauth.construct).toHaveBeenCalledWith(
        "test-client-id",
        "test-secret",
        "http://localhost:3951/oauth2callback",
      );
    });
  });

  describe("getAuthUrl", () => {
    it("should request offline read-only access", async () => {
      oauth.generateAuthUrl.mockReturnValue("https://accounts.example/auth");

      const result = await getAuthUrl(config);

      expect(result).toEqual({ success: true, data: "https://accounts.example/auth" });
      expect(oauth.generateAuthUrl).toHaveBeenCalledWith({
        access_type: "offline",
        scope: ["https://www.googleapis.com/auth/gmail.readonly"],
        prompt: "consent",
      });
      expect(GMAIL_SCOPES).toHaveLength(1);
    });
  });

  describe("handleCallback", () => {
    it("should exchange the code and store tokens owner-only", async () => {
      oauth.getToken.mockResolvedValue({
        tokens: {
          access_token: "test-access",
          refresh_token: "test-refresh",
          expiry_date: 1704103200000,
        },
      });

      const result = await handleCallback(config, "test-code");

      expect(oauth.getToken).toHaveBeenCalledWith("test-code");
      expect(result).toEqual({
        success: true,
        data: {
          accessToken: "test-access",
          refreshToken: "test-refresh",
          expiry: new Date(1704103200000),
        },
      });
      expect(JSON.parse(await readFile(config.tokensPath, "utf-8"))).toEqual({
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiry: "2024-01-01T10:00:00.000Z",
      });
      if (process.platform !== "win32") {
        expect((await stat(config.tokensPath)).mode & 0o777).toBe(0o600);
      }
    });

    it("should fail when Google returns no refresh token", async () => {
      oauth.getToken.mockResolvedValue({ tokens: { access_token: "test-access" } });

      const result = await handleCallback(config, "test-code");

      expect(result).toEqual({
        success: false,
        error: "Failed to obtain tokens from Google",
      });
      expect(await loadTokens(config)).toBeNull();
    });

    it("should report exchange errors", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      oauth.getToken.mockRejectedValue(new Error("invalid_grant"));

      const result = await handleCallback(config, "bad-code");

      expect(result).toEqual({ success: false, error: "invalid_grant" });
    });
  });

  describe("loadTokens", () => {
    it("should return null when nothing is stored", async () => {
      expect(await loadTokens(config)).toBeNull();
    });

    it("should read what saveTokens wrote", async () => {
      const tokens = {
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiry: new Date("2024-03-01T12:00:00.000Z"),
      };

      await saveTokens(config, tokens);

      expect(await loadTokens(config)).toEqual(tokens);
    });
  });

  describe("refreshTokenIfNeeded", () => {
    it("should ask for --auth when no tokens are stored", async () => {
      const result = await refreshTokenIfNeeded(config);

      expect(result).toEqual({
        success: false,
        error: "No stored credentials found. Run with --auth first.",
      });
    });

    it("should keep tokens that are still valid", async () => {
      const tokens = {
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiry: new Date(Date.now() + HOUR),
      };
      await saveTokens(config, tokens);

      const result = await refreshTokenIfNeeded(config);

      expect(result).toEqual({ success: true, data: tokens });
      expect(oauth.refreshAccessToken).not.toHaveBeenCalled();
    });

    it("should refresh tokens expiring within five minutes", async () => {
      await saveTokens(config, {
        accessToken: "old-access",
        refreshToken: "test-refresh",
        expiry: new Date(Date.now() + 60 * 1000),
      });
      const newExpiry = Date.now() + HOUR;
      oauth.refreshAccessToken.mockResolvedValue({
        credentials: { access_token: "new-access", expiry_date: newExpiry },
      });

      const result = await refreshTokenIfNeeded(config);

      expect(oauth.setCredentials).toHaveBeenCalledWith({
        refresh_token: "test-refresh",
      });
      expect(result).toEqual({
        success: true,
        data: {
          accessToken: "new-access",
          refreshToken: "test-refresh",
          expiry: new Date(newExpiry),
        },
      });
      expect((await loadTokens(config))?.accessToken).toBe("new-access");
    });

    it("should report refresh failures", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      await saveTokens(config, {
        accessToken: "old-access",
        refreshToken: "test-refresh",
        expiry: new Date(Date.now() - HOUR),
      });
      oauth.refreshAccessToken.mockRejectedValue(new Error("token revoked"));

      const result = await refreshTokenIfNeeded(config);

      expect(result).toEqual({ success: false, error: "token revoked" });
    });

    it("should report an unreadable token file", async () => {
      await mkdir(config.configDir, { recursive: true });
      await writeFile(config.tokensPath, "not json");

      const result = await refreshTokenIfNeeded(config);

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toMatch(
        /^Could not read stored credentials: /,
      );
    });
  });

  describe("getAuthenticatedClient", () => {
    it("should load credentials and persist later refreshes", async () => {
      const expiry = new Date(Date.now() + HOUR);
      await saveTokens(config, {
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiry,
      });

      const result = await getAuthenticatedClient(config);

      expect(result.success).toBe(true);
      expect(oauth.setCredentials).toHaveBeenCalledWith({
        access_token: "test-access",
        refresh_token: "test-refresh",
        expiry_date: expiry.getTime(),
      });
      expect(oauth.on).toHaveBeenCalledWith("tokens", expect.any(Function));

      const onTokens = oauth.on.mock.calls[0][1];
      onTokens({ access_token: "rotated-access", expiry_date: expiry.getTime() + HOUR });

      await vi.waitFor(async () => {
        expect(await loadTokens(config)).toEqual({
          accessToken: "rotated-access",
          refreshToken: "test-refresh",
          expiry: new Date(expiry.getTime() + HOUR),
        });
      });
    });

    it("should fail without stored tokens", async () => {
      const result = await getAuthenticatedClient(config);

      expect(result.success).toBe(false);
      expect(oauth.on).not.toHaveBeenCalled();
    });
  });
});
