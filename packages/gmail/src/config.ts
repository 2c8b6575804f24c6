import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const envSchema = z.object({
  GMAIL_MCP_HOME: z.string().min(1).optional(),
  GMAIL_MCP_ATTACHMENTS_DIR: z.string().min(1).optional(),

  // OAuth client; falls back to client_secret.json in the config dir
  GMAIL_CLIENT_ID: z.string().min(1).optional(),
  GMAIL_CLIENT_SECRET: z.string().min(1).optional(),
  GMAIL_AUTH_PORT: z.coerce.number().int().min(1).max(65535).default(3951),
});

export type Env = z.infer<typeof envSchema>;

export interface GmailMcpConfig {
  configDir: string;
  attachmentsDir: string;
  clientSecretPath: string;
  tokensPath: string;
  clientId?: string;
  clientSecret?: string;
  authPort: number;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = homedir(),
): GmailMcpConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const vars = parsed.data;

  let configDir = vars.GMAIL_MCP_HOME;
  if (!configDir) {
    if (!homeDir || homeDir.trim() === "") {
      throw new ConfigError(
        "Home directory is not set; set GMAIL_MCP_HOME to choose a config directory",
      );
    }
    configDir = join(homeDir, ".gmail-mcp");
  }

  return {
    configDir,
    attachmentsDir: vars.GMAIL_MCP_ATTACHMENTS_DIR ?? join(configDir, "attachments"),
    clientSecretPath: join(configDir, "client_secret.json"),
    tokensPath: join(configDir, "tokens.json"),
    clientId: vars.GMAIL_CLIENT_ID,
    clientSecret: vars.GMAIL_CLIENT_SECRET,
    authPort: vars.GMAIL_AUTH_PORT,
  };
}
