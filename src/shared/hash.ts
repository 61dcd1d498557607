import { createHash } from "crypto";

/** SHA-256 hex digest of raw bytes. */
export function sha256Bytes(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/** SHA-256 hex digest of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}
