import { createHash } from "node:crypto";
import fs from "node:fs";

export type FileDigest = {
  size: number;
  sha256: string;
};

/** SHA-256 of a string or buffer, lowercase hex. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** Size and hash from one read, so both describe the same bytes. */
export function digestFile(filePath: string): FileDigest {
  const content = fs.readFileSync(filePath);
  return { size: content.byteLength, sha256: computeSha256FromContent(content) };
}
