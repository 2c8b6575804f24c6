import { decodeHTML } from "entities";

// Unterminated comments, scripts and styles run to the end of the input.
const HTML_COMMENT = /<!--[\s\S]*?(?:-->|$)/g;
const SCRIPT_OR_STYLE = /<(script|style)\b[^>]*>[\s\S]*?(?:<\/\1\s*>|$)/gi;
const LINE_BREAK_TAG = /<br\b[^>]*>|<\/p\s*>/gi;
const HTML_TAG = /<[^>]+>/g;

/**
 * Convert an HTML email part to plain text. Script and style content is
 * dropped; `<br>` and paragraph ends become line breaks. Character
 * references are decoded after tags are removed, so `&lt;b&gt;` stays text.
 */
export function stripHtml(html: string): string {
  const text = html
    .replace(HTML_COMMENT, "")
    .replace(SCRIPT_OR_STYLE, "")
    .replace(LINE_BREAK_TAG, "\n")
    .replace(HTML_TAG, "");

  return decodeHTML(text)
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ ?\n ?/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
