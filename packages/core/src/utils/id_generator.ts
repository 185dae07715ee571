import { randomUUID } from "crypto";

/**
 * Generates a record id. Ids double as filename stems, so they are
 * random UUIDs rather than slugs of the title.
 */
export function generateRecordId(): string {
  return randomUUID();
}

/**
 * Returns true when `id` can safely be used as a filename stem:
 * non-empty, no path separators, not `.` or `..`, no control characters.
 */
export function isValidRecordId(id: unknown): id is string {
  if (typeof id !== "string") return false;
  if (id.length === 0 || id.length > 200) return false;
  if (id === "." || id === "..") return false;
  if (id.includes("/") || id.includes("\\")) return false;
  // eslint-disable-next-line no-control-regex
  return !/[\u0000-\u001f]/.test(id);
}
