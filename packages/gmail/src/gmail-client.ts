import type { gmail_v1 } from "googleapis";
import {
  assertAttachmentIndex,
  assertSafeMessageId,
  classifyAttachment,
} from "./attachment-classifier.js";
import { stripHtml } from "./html-text.js";
import type {
  AttachmentDescriptor,
  AttachmentResult,
  LabelInfo,
  MailService,
  MessageDetail,
  MessageSummary,
} from "./types.js";

export const MAX_RESULTS_LIMIT = 100;

const METADATA_HEADERS = ["From", "To", "Subject", "Date"] as const;
type MetadataField = "from" | "to" | "subject" | "date";

const BASE64URL = /^[A-Za-z0-9_-]*={0,2}$/;

/**
 * Decode Gmail's base64url part data as UTF-8.
 * @throws Error when the input has characters outside the base64url alphabet
 */
export function decodeBase64Url(data: string): string {
  return decodeBase64UrlBytes(data).toString("utf-8");
}

function decodeBase64UrlBytes(data: string): Buffer {
  if (!BASE64URL.test(data)) {
    throw new Error("Invalid base64url data");
  }
  return Buffer.from(data, "base64url");
}

function readMetadataHeaders(
  payload: gmail_v1.Schema$MessagePart | undefined,
): Record<MetadataField, string> {
  const fields: Record<MetadataField, string> = {
    from: "",
    to: "",
    subject: "",
    date: "",
  };

  for (const header of payload?.headers ?? []) {
    switch (header.name) {
      case "From":
        fields.from = header.value ?? "";
        break;
      case "To":
        fields.to = header.value ?? "";
        break;
      case "Subject":
        fields.subject = header.value ?? "";
        break;
      case "Date":
        fields.date = header.value ?? "";
        break;
    }
  }
  return fields;
}

/**
 * Depth-first search for the first part of `mimeType` with inline data.
 */
export function findBodyByMimeType(
  part: gmail_v1.Schema$MessagePart | null | undefined,
  mimeType: string,
): string | null {
  if (!part) return null;

  if (part.mimeType === mimeType && part.body?.data) {
    return decodeBase64Url(part.body.data);
  }

  for (const child of part.parts ?? []) {
    const found = findBodyByMimeType(child, mimeType);
    if (found !== null) return found;
  }
  return null;
}

/**
 * Plain text wins; HTML is the fallback and is converted to text.
 */
export function extractBody(
  payload: gmail_v1.Schema$MessagePart | null | undefined,
): string | null {
  if (!payload) return null;

  const plain = findBodyByMimeType(payload, "text/plain");
  if (plain !== null) return plain;

  const html = findBodyByMimeType(payload, "text/html");
  if (html !== null) return stripHtml(html);

  return null;
}

/**
 * Every part with a filename, root included, indexed in depth-first order.
 */
export function extractAttachments(
  root: gmail_v1.Schema$MessagePart | null | undefined,
): AttachmentDescriptor[] {
  const attachments: AttachmentDescriptor[] = [];

  const visit = (part: gmail_v1.Schema$MessagePart | null | undefined) => {
    if (!part) return;

    if (part.filename) {
      attachments.push({
        index: attachments.length,
        filename: part.filename,
        mimeType: part.mimeType ?? "application/octet-stream",
        sizeBytes: part.body?.size ?? 0,
        part,
      });
    }

    for (const child of part.parts ?? []) {
      visit(child);
    }
  };

  visit(root);
  return attachments;
}

export class GmailClient implements MailService {
  constructor(
    private gmail: gmail_v1.Gmail,
    private attachmentsDir: string,
  ) {}

  async listMessages(
    query: string | undefined,
    maxResults: number,
  ): Promise<MessageSummary[]> {
    const limit = Math.max(1, Math.min(maxResults, MAX_RESULTS_LIMIT));

    const res = await this.gmail.users.messages.list({
      userId: "me",
      maxResults: limit,
      ...(query && query.trim() !== "" ? { q: query } : {}),
    });

    const messages = res.data.messages ?? [];
    const results: MessageSummary[] = [];
    for (const msg of messages) {
      if (!msg.id) continue;
      const detail = await this.gmail.users.messages.get({
        userId: "me",
        id: msg.id,
        format: "metadata",
        metadataHeaders: [...METADATA_HEADERS],
      });

      const headers = readMetadataHeaders(detail.data.payload);
      results.push({
        id: detail.data.id ?? msg.id,
        threadId: detail.data.threadId ?? "",
        snippet: detail.data.snippet ?? "",
        ...headers,
      });
    }
    return results;
  }

  async searchMessages(
    query: string,
    maxResults: number,
  ): Promise<MessageSummary[]> {
    return this.listMessages(query, maxResults);
  }

  async getMessage(id: string): Promise<MessageDetail> {
    const res = await this.gmail.users.messages.get({
      userId: "me",
      id,
      format: "full",
    });
    const message = res.data;

    const result: MessageDetail = {
      id: message.id ?? id,
      threadId: message.threadId ?? "",
      ...readMetadataHeaders(message.payload),
      body: extractBody(message.payload) ?? "",
    };

    if (message.labelIds) {
      result.labels = message.labelIds;
    }

    const attachments = extractAttachments(message.payload);
    if (attachments.length > 0) {
      result.attachments = attachments.map(
        ({ index, filename, mimeType, sizeBytes }) => ({
          index,
          filename,
          mimeType,
          sizeBytes,
        }),
      );
    }

    return result;
  }

  async listLabels(): Promise<LabelInfo[]> {
    const res = await this.gmail.users.labels.list({ userId: "me" });
    return (res.data.labels ?? []).map((label) => ({
      id: label.id ?? "",
      name: label.name ?? "",
      type: label.type ?? "",
    }));
  }

  async getAttachmentContent(
    messageId: string,
    attachmentIndex: number,
  ): Promise<AttachmentResult> {
    assertSafeMessageId(messageId);

    const res = await this.gmail.users.messages.get({
      userId: "me",
      id: messageId,
      format: "full",
    });

    const attachments = extractAttachments(res.data.payload);
    assertAttachmentIndex(attachmentIndex, attachments.length);
    const attachment = attachments[attachmentIndex];

    return classifyAttachment(
      attachment,
      () => this.fetchAttachmentBytes(messageId, attachment),
      { messageId, attachmentsDir: this.attachmentsDir },
    );
  }

  private async fetchAttachmentBytes(
    messageId: string,
    attachment: AttachmentDescriptor,
  ): Promise<Uint8Array | null> {
    const body = attachment.part.body;
    if (body?.data) {
      return decodeBase64UrlBytes(body.data);
    }
    if (body?.attachmentId) {
      const res = await this.gmail.users.messages.attachments.get({
        userId: "me",
        messageId,
        id: body.attachmentId,
      });
      if (res.data.data) {
        return decodeBase64UrlBytes(res.data.data);
      }
    }
    return null;
  }
}
