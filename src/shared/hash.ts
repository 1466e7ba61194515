import { createHash } from "crypto";
import { readFile } from "fs/promises";

/** SHA-256 of raw bytes, hex. */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** SHA-256 fingerprint of a file on disk (templates in the preflight report). */
export async function sha256File(filePath: string): Promise<string> {
  return sha256Bytes(await readFile(filePath));
}
