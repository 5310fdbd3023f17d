import crypto from "node:crypto";

// Package IDs are 40-char lowercase hex SHA-1 digests; changing the algorithm changes every ID.
export function contentHash(text: string): string {
  return crypto.createHash("sha1").update(text, "utf8").digest("hex");
}
