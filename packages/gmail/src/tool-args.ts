import { z } from "zod";
import { ToolInputError } from "./errors.js";

export const DEFAULT_MAX_RESULTS = 10;

// Agents send numbers either as JSON numbers or as numeric strings.
const integerLike = z.union([
  z.number().finite().transform(Math.trunc),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/)
    .transform(Number),
]);

const nonBlankString = z.string().refine((s) => s.trim() !== "");

export function requireString(
  args: Record<string, unknown>,
  key: string,
): string {
  const parsed = nonBlankString.safeParse(args[key]);
  if (!parsed.success) {
    throw new ToolInputError(`'${key}' is required`);
  }
  return parsed.data;
}

export function optionalString(
  args: Record<string, unknown>,
  key: string,
): string | undefined {
  const parsed = nonBlankString.safeParse(args[key]);
  return parsed.success ? parsed.data : undefined;
}

export function parseMaxResults(args: Record<string, unknown>): number {
  const parsed = integerLike.safeParse(args.maxResults);
  return parsed.success ? parsed.data : DEFAULT_MAX_RESULTS;
}

export function parseAttachmentIndex(args: Record<string, unknown>): number {
  const raw = args.attachmentIndex;
  if (typeof raw !== "number" && typeof raw !== "string") {
    throw new ToolInputError(
      "'attachmentIndex' is required and must be an integer",
    );
  }
  const parsed = integerLike.safeParse(raw);
  if (!parsed.success) {
    throw new ToolInputError("'attachmentIndex' must be an integer");
  }
  return parsed.data;
}

/** `label:<name>` appended to the free-text query, or used on its own. */
export function buildListQuery(
  query: string | undefined,
  label: string | undefined,
): string | undefined {
  if (!label) return query;
  const labelQuery = `label:${label}`;
  return query ? `${query} ${labelQuery}` : labelQuery;
}
