import { createHash } from "crypto";

/**
 * SHA-256 of a file's content. The store compares these to tell a real
 * external edit from a touch that only moved the modification time.
 */
export function calculateContentHash(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}
