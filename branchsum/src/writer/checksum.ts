import { createHash } from "node:crypto";

/** SHA-256 of a string or buffer, hex encoded. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}
