import { createHash } from "crypto";

const TIMESTAMP_PREFIX_PATTERN = /^\[[^\]]+\]\s*/;
const WHITESPACE_PATTERN = /\s+/g;

// Strip the "[timestamp]" prefix, collapse whitespace and case-fold
export function normalizeAlertMessage(line: string): string {
  const message = line.trim().replace(TIMESTAMP_PREFIX_PATTERN, "");
  return message.replace(WHITESPACE_PATTERN, " ").trim().toLowerCase();
}

// Generate stable signature for alert deduplication (SHA-256 hex, 64 chars)
export function buildAlertSignature(line: string): string {
  return createHash("sha256").update(normalizeAlertMessage(line), "utf8").digest("hex");
}
