export const FALLBACK_FILENAME = "attachment";
export const MAX_FILENAME_LENGTH = 200;

/**
 * Reduce an attacker-controlled attachment name to something safe to join
 * onto a directory: no path components, no leading dots, ASCII only.
 * Idempotent.
 */
export function sanitizeFilename(filename: string | null | undefined): string {
  if (!filename || filename.trim() === "") {
    return FALLBACK_FILENAME;
  }

  let name = filename;
  const lastSlash = Math.max(name.lastIndexOf("/"), name.lastIndexOf("\\"));
  if (lastSlash >= 0) {
    name = name.slice(lastSlash + 1);
  }

  name = name.replace(/^\.+/, "");
  name = name.replace(/[^a-zA-Z0-9._-]/gu, "_");

  if (name.length > MAX_FILENAME_LENGTH) {
    name = name.slice(0, MAX_FILENAME_LENGTH);
  }

  return name === "" ? FALLBACK_FILENAME : name;
}
