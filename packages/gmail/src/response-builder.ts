import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import {
  buildSecurityContext,
  generateBoundary,
  sanitizeMessage,
  sanitizeMessages,
} from "./content-sanitizer.js";
import type { AttachmentResult } from "./types.js";

function toJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Response for anything carrying sender-controlled text: the security
 * preamble first, then the sanitized record (or list) as JSON.
 */
export function emailResult(
  data: object,
  boundary: string = generateBoundary(),
): CallToolResult {
  const sanitized = Array.isArray(data)
    ? sanitizeMessages(data, boundary)
    : sanitizeMessage(data, boundary);

  return {
    content: [
      { type: "text" as const, text: buildSecurityContext(boundary) },
      { type: "text" as const, text: toJson(sanitized) },
    ],
  };
}

/** Response for data with no untrusted content; no preamble. */
export function jsonResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: toJson(data) }],
  };
}

export function errorResult(message: string): CallToolResult {
  return {
    isError: true,
    content: [{ type: "text" as const, text: message }],
  };
}

export function attachmentResult(
  result: AttachmentResult,
  boundary: string = generateBoundary(),
): CallToolResult {
  const metadata = {
    messageId: result.messageId,
    index: result.index,
    filename: result.filename,
    mimeType: result.mimeType,
    sizeBytes: result.sizeBytes,
  };

  switch (result.kind) {
    case "text":
      return emailResult({ ...metadata, content: result.content }, boundary);

    case "saved_file":
      return emailResult(
        {
          ...metadata,
          savedTo: result.filePath,
          content: `Binary attachment saved to: ${result.filePath}`,
        },
        boundary,
      );

    case "image": {
      const sanitized = sanitizeMessage(
        { ...metadata, savedTo: result.filePath },
        boundary,
      );
      return {
        content: [
          { type: "text" as const, text: buildSecurityContext(boundary) },
          { type: "text" as const, text: toJson(sanitized) },
          {
            type: "image" as const,
            data: result.base64Data,
            mimeType: result.mimeType,
          },
        ],
      };
    }

    default: {
      const unhandled: never = result;
      throw new Error(`Unhandled attachment result: ${JSON.stringify(unhandled)}`);
    }
  }
}
