import type { gmail_v1 } from "googleapis";

export interface MessageSummary {
  id: string;
  threadId: string;
  snippet: string;
  from: string;
  to: string;
  subject: string;
  date: string;
}

export interface AttachmentMetadata {
  /** Zero-based, depth-first position in the message part tree */
  index: number;
  filename: string;
  mimeType: string;
  /** Declared by the mail service; may not match the bytes fetched */
  sizeBytes: number;
}

export interface MessageDetail {
  id: string;
  threadId: string;
  from: string;
  to: string;
  subject: string;
  date: string;
  body: string;
  labels?: string[];
  attachments?: AttachmentMetadata[];
}

export interface AttachmentDescriptor extends AttachmentMetadata {
  /** Source part, only read when fetching the attachment bytes */
  part: gmail_v1.Schema$MessagePart;
}

export interface LabelInfo {
  id: string;
  name: string;
  type: string;
}

interface AttachmentResultBase {
  messageId: string;
  index: number;
  filename: string;
  mimeType: string;
  sizeBytes: number;
}

export interface TextAttachmentResult extends AttachmentResultBase {
  kind: "text";
  content: string;
}

export interface ImageAttachmentResult extends AttachmentResultBase {
  kind: "image";
  base64Data: string;
  filePath: string;
}

export interface SavedFileAttachmentResult extends AttachmentResultBase {
  kind: "saved_file";
  filePath: string;
}

export type AttachmentResult =
  | TextAttachmentResult
  | ImageAttachmentResult
  | SavedFileAttachmentResult;

export type AttachmentKind = AttachmentResult["kind"];

/**
 * Read-only view of a mailbox. Implemented against the Gmail API by
 * `GmailClient`; the MCP server depends only on this shape.
 */
export interface MailService {
  listMessages(
    query: string | undefined,
    maxResults: number,
  ): Promise<MessageSummary[]>;
  searchMessages(query: string, maxResults: number): Promise<MessageSummary[]>;
  getMessage(id: string): Promise<MessageDetail>;
  listLabels(): Promise<LabelInfo[]>;
  getAttachmentContent(
    messageId: string,
    attachmentIndex: number,
  ): Promise<AttachmentResult>;
}

export interface Tokens {
  accessToken: string;
  refreshToken: string;
  expiry: Date;
}
