// packages/gmail/src/index.ts
// Public API: sanitization pipeline, Gmail client and MCP server

export type {
  AttachmentDescriptor,
  AttachmentKind,
  AttachmentMetadata,
  AttachmentResult,
  ImageAttachmentResult,
  LabelInfo,
  MailService,
  MessageDetail,
  MessageSummary,
  SavedFileAttachmentResult,
  TextAttachmentResult,
  Tokens,
} from "./types.js";

export {
  BOUNDARY_PREFIX,
  MAX_ATTACHMENT_LENGTH,
  MAX_BODY_LENGTH,
  TRUNCATION_MARKER,
  UNTRUSTED_FIELDS,
  buildSecurityContext,
  generateBoundary,
  sanitizeMessage,
  sanitizeMessages,
  truncateText,
  wrapUntrusted,
  type RandomSource,
  type SanitizedRecord,
} from "./content-sanitizer.js";

export {
  FALLBACK_FILENAME,
  MAX_FILENAME_LENGTH,
  sanitizeFilename,
} from "./filename-sanitizer.js";

export {
  MAX_IMAGE_SIZE_BYTES,
  classifyAttachment,
  saveAttachmentToDisk,
  type ClassifyOptions,
  type FetchBytes,
} from "./attachment-classifier.js";

export {
  attachmentResult,
  emailResult,
  errorResult,
  jsonResult,
} from "./response-builder.js";

export { stripHtml } from "./html-text.js";
export { ConfigError, ToolInputError } from "./errors.js";
export { loadConfig, type GmailMcpConfig } from "./config.js";
export { getAuthenticatedClient, type AuthResult } from "./auth.js";
export { GmailClient } from "./gmail-client.js";
export { GmailMcpServer, type GmailMcpServerOptions } from "./mcp-server.js";
