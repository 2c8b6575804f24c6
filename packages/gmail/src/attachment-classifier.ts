import { chmod, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { MAX_ATTACHMENT_LENGTH, truncateText } from "./content-sanitizer.js";
import { ToolInputError } from "./errors.js";
import { sanitizeFilename } from "./filename-sanitizer.js";
import { stripHtml } from "./html-text.js";
import type { AttachmentMetadata, AttachmentResult } from "./types.js";

export const MAX_IMAGE_SIZE_BYTES = 10 * 1024 * 1024;

/**
 * Fetches the attachment bytes from the mail service. `null` means the
 * service had no data for the part.
 */
export type FetchBytes = () => Promise<Uint8Array | null>;

export interface ClassifyOptions {
  messageId: string;
  /** Base directory; files land in `<attachmentsDir>/<messageId>/` */
  attachmentsDir: string;
}

/**
 * Message ids become a directory name, so anything that could walk out of
 * the attachments directory is rejected.
 */
export function assertSafeMessageId(messageId: string): void {
  if (
    messageId.includes("/") ||
    messageId.includes("\\") ||
    messageId.includes("..")
  ) {
    throw new ToolInputError("Invalid messageId");
  }
}

export function assertAttachmentIndex(index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new ToolInputError(
      `Attachment index ${index} out of range (0-${count - 1})`,
    );
  }
}

async function restrictToOwner(dir: string): Promise<void> {
  try {
    await chmod(dir, 0o700);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Gmail] Could not restrict permissions on ${dir}:`, message);
  }
}

export async function saveAttachmentToDisk(
  bytes: Uint8Array,
  messageId: string,
  filename: string,
  attachmentsDir: string,
): Promise<string> {
  assertSafeMessageId(messageId);

  const messageDir = join(attachmentsDir, messageId);
  await mkdir(messageDir, { recursive: true });
  await restrictToOwner(attachmentsDir);

  const filePath = join(messageDir, sanitizeFilename(filename));
  await writeFile(filePath, bytes);
  return filePath;
}

/**
 * Decide how one attachment is surfaced:
 * - `text/*` is decoded (HTML stripped) and returned inline, never written to disk
 * - everything else is saved under the attachments directory
 * - images up to 10 MiB are additionally returned inline as base64
 */
export async function classifyAttachment(
  attachment: AttachmentMetadata,
  fetchBytes: FetchBytes,
  options: ClassifyOptions,
): Promise<AttachmentResult> {
  const { messageId, attachmentsDir } = options;
  const base = {
    messageId,
    index: attachment.index,
    filename: attachment.filename,
    mimeType: attachment.mimeType,
    sizeBytes: attachment.sizeBytes,
  };

  if (attachment.mimeType.startsWith("text/")) {
    const bytes = await fetchBytes();
    let content = bytes ? Buffer.from(bytes).toString("utf-8") : "";
    if (attachment.mimeType === "text/html") {
      content = stripHtml(content);
    }
    return {
      kind: "text",
      ...base,
      content: truncateText(content, MAX_ATTACHMENT_LENGTH),
    };
  }

  const bytes = (await fetchBytes()) ?? new Uint8Array(0);
  const filePath = await saveAttachmentToDisk(
    bytes,
    messageId,
    attachment.filename,
    attachmentsDir,
  );

  if (
    attachment.mimeType.startsWith("image/") &&
    bytes.length > 0 &&
    bytes.length <= MAX_IMAGE_SIZE_BYTES
  ) {
    return {
      kind: "image",
      ...base,
      base64Data: Buffer.from(bytes).toString("base64"),
      filePath,
    };
  }

  return { kind: "saved_file", ...base, filePath };
}
